import { z } from 'zod';

export const SceneObjectSchema = z.object({
  id: z.number().int().nonnegative(),
  name: z.string(),
  /** 부착된 컴포넌트 타입 이름 */
  components: z.array(z.string()),
});

export const SceneFileSchema = z.object({
  name: z.string(),
  nextId: z.number().int().nonnegative(),
  objects: z.array(SceneObjectSchema),
});

export type SceneObject = z.infer<typeof SceneObjectSchema>;
export type SceneFile = z.infer<typeof SceneFileSchema>;
