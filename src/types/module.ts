import { z } from 'zod';

export const ModuleFileSchema = z.object({
  source: z.string().min(1),      // templates/ 내 상대 경로
  destination: z.string().min(1), // 프로젝트 논리 경로
});

export const ConfigAssetSpecSchema = z.object({
  typeName: z.string().min(1),
  path: z.string().min(1),
});

export const SceneManagerSpecSchema = z.object({
  objectName: z.string().min(1),
  component: z.string().min(1),
});

export const SceneSetupSchema = z.object({
  header: z.string().min(1),
  managers: z.array(SceneManagerSpecSchema),
});

export const ModuleDefinitionSchema = z.object({
  name: z.string().min(1),
  title: z.string().min(1),
  description: z.string(),
  icon: z.string(),
  folder: z.string().min(1),
  /** isInstalled 판정에 쓰는 대표 파일 */
  primaryFile: z.string().min(1),
  files: z.array(ModuleFileSchema).min(1),
  configAsset: ConfigAssetSpecSchema.optional(),
  scene: SceneSetupSchema.optional(),
});

export const ModuleManifestSchema = z.object({
  version: z.string(),
  modules: z.array(ModuleDefinitionSchema),
});

export type ModuleFile = z.infer<typeof ModuleFileSchema>;
export type ConfigAssetSpec = z.infer<typeof ConfigAssetSpecSchema>;
export type SceneManagerSpec = z.infer<typeof SceneManagerSpecSchema>;
export type SceneSetup = z.infer<typeof SceneSetupSchema>;
export type ModuleDefinition = z.infer<typeof ModuleDefinitionSchema>;
export type ModuleManifest = z.infer<typeof ModuleManifestSchema>;

export interface InstallResult {
  module: string;
  created: string[];
  skipped: string[];
  errors: string[];
  /** 지연 큐에 등록된 작업 라벨 */
  deferred: string[];
}

/**
 * 대시보드에 노출되는 모듈 서술자.
 * 레지스트리 초기화 때 한 번 만들어지고 이후 변경되지 않는다.
 */
export interface ModuleDescriptor {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly icon: string;
  readonly targetFiles: ReadonlySet<string>;
  install(): InstallResult;
  isInstalled(): boolean;
}

/** 산출물 존재 여부로부터 매번 다시 계산되는 설치 상태 (저장하지 않음) */
export type ModuleState = 'uninstalled' | 'code-written' | 'installed';
