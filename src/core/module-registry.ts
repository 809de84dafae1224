import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  ModuleManifestSchema,
  type ModuleDefinition,
  type ModuleDescriptor,
  type ModuleManifest,
} from '../types/module.js';
import type { FrameworkConfig } from '../types/config.js';
import type { EditorHost } from './editor-host.js';
import { getTemplatesDir } from '../utils/paths.js';
import { installModule, isModuleInstalled } from './module-installer.js';

let cachedManifest: ModuleManifest | null = null;

export function loadManifest(): ModuleManifest {
  if (cachedManifest) return cachedManifest;
  const manifestPath = join(getTemplatesDir(), 'module-manifest.json');
  const parsed = ModuleManifestSchema.safeParse(JSON.parse(readFileSync(manifestPath, 'utf-8')));
  if (!parsed.success) {
    throw new Error(`module-manifest.json 형식 오류: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  cachedManifest = parsed.data;
  return cachedManifest;
}

export function getModule(name: string): ModuleDefinition | undefined {
  return loadManifest().modules.find(m => m.name === name);
}

/** 대시보드 표시 순서 */
export function getAllModules(): ModuleDefinition[] {
  return loadManifest().modules;
}

export function getModuleNames(): string[] {
  return loadManifest().modules.map(m => m.name);
}

/** 알 수 없는 이름은 unknown 으로 분리. 입력 순서와 무관하게 카탈로그 순서로 정렬 */
export function resolveModules(requested: string[]): { modules: ModuleDefinition[]; unknown: string[] } {
  const wanted = new Set(requested);
  const modules = getAllModules().filter(m => wanted.has(m.name));
  const known = new Set(modules.map(m => m.name));
  return { modules, unknown: requested.filter(name => !known.has(name)) };
}

/** 모듈의 설정 에셋 경로. 카탈로그에 없으면 프로그래밍 오류 */
export function requireConfigAssetPath(moduleName: string): string {
  const path = getModule(moduleName)?.configAsset?.path;
  if (!path) {
    throw new Error(`설정 에셋이 정의되지 않은 모듈: ${moduleName}`);
  }
  return path;
}

/** 모듈 정의가 기록하는 논리 경로 (폴더 제외) */
export function getTargetFiles(mod: ModuleDefinition): string[] {
  return mod.files.map(f => f.destination);
}

/**
 * 호스트에 묶인 불변 서술자 목록을 만든다.
 * install()/isInstalled() 는 인자 없이 호출되며, 매번 파일시스템을 다시 조사한다.
 */
export function createModuleRegistry(host: EditorHost, config?: FrameworkConfig): ModuleDescriptor[] {
  return getAllModules().map(mod => Object.freeze({
    name: mod.name,
    title: mod.title,
    description: mod.description,
    icon: mod.icon,
    targetFiles: new Set(getTargetFiles(mod)),
    install: () => installModule(host, mod, config),
    isInstalled: () => isModuleInstalled(host, mod),
  }));
}
