import { z } from 'zod';

export const RUNTIME_ASSEMBLY = 'Assembly-CSharp';
export const EDITOR_ASSEMBLY = 'Assembly-CSharp-Editor';
export const GLOBAL_SCOPE = 'global';

export type AssemblyName = typeof RUNTIME_ASSEMBLY | typeof EDITOR_ASSEMBLY;
export type TypeScope = AssemblyName | typeof GLOBAL_SCOPE;

export type TypeKind = 'class' | 'struct' | 'enum';

export interface TypeHandle {
  name: string;
  kind: TypeKind;
  scope: TypeScope;
  baseType?: string;
  /** 선언이 들어 있는 소스의 논리 경로 (global 타입은 없음) */
  sourcePath?: string;
}

export const AssetFileSchema = z.object({
  type: z.string().min(1),
  fields: z.record(z.unknown()),
});


export interface AssetHandle {
  path: string;
  type: string;
  fields: Record<string, unknown>;
}
