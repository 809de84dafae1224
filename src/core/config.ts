import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { FrameworkConfigSchema, CONFIG_FILENAME, type FrameworkConfig } from '../types/config.js';
import { DEFAULT_SCENE_PATH } from './project-paths.js';
import { readFileContent, safeWriteFile } from './file-ops.js';
import { getPackageVersion } from '../utils/version.js';

export function loadConfig(projectRoot: string): FrameworkConfig | null {
  const content = readFileContent(join(projectRoot, CONFIG_FILENAME));
  if (!content) return null;
  try {
    const parsed = FrameworkConfigSchema.safeParse(JSON.parse(content));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export function saveConfig(projectRoot: string, config: FrameworkConfig): void {
  config.updatedAt = new Date().toISOString();
  safeWriteFile(join(projectRoot, CONFIG_FILENAME), JSON.stringify(config, null, 2) + '\n');
}

export function createConfig(scenePath: string = DEFAULT_SCENE_PATH): FrameworkConfig {
  const now = new Date().toISOString();
  return {
    version: getPackageVersion(),
    installedAt: now,
    updatedAt: now,
    scenePath,
    modules: [],
    files: {},
  };
}

/** 기존 설정을 읽고, 없으면 새로 만든다 (저장은 호출자 책임) */
export function loadOrCreateConfig(projectRoot: string, scenePath?: string): FrameworkConfig {
  const existing = loadConfig(projectRoot);
  if (existing) {
    if (scenePath) existing.scenePath = scenePath;
    return existing;
  }
  return createConfig(scenePath);
}

export function updateFileRecord(
  config: FrameworkConfig,
  relativePath: string,
  module: string,
  version: string,
  hash: string,
): void {
  config.files[relativePath] = { module, version, hash };
}

export function configExists(projectRoot: string): boolean {
  return existsSync(join(projectRoot, CONFIG_FILENAME));
}
