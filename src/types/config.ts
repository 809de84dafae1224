import { z } from 'zod';

export const FileHashSchema = z.object({
  module: z.string(),
  version: z.string(),
  hash: z.string(),
});

export const FrameworkConfigSchema = z.object({
  version: z.string(),
  installedAt: z.string(),
  updatedAt: z.string(),
  scenePath: z.string(),
  modules: z.array(z.string()),
  files: z.record(FileHashSchema),
});

export type FrameworkConfig = z.infer<typeof FrameworkConfigSchema>;

export const CONFIG_FILENAME = 'framework-setup.config.json';
