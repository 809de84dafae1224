import type { FrameworkConfig } from '../types/config.js';
import type { InstallResult } from '../types/module.js';
import {
  openEditorHost,
  runIdleCycle,
  saveEditorHost,
  type EditorHost,
  type IdleReport,
  type SaveReport,
} from './editor-host.js';
import { createModuleRegistry, resolveModules } from './module-registry.js';
import { loadOrCreateConfig, saveConfig } from './config.js';
import { logger } from '../utils/logger.js';

export interface ProjectSession {
  host: EditorHost;
  config: FrameworkConfig;
}

export interface SessionOptions {
  scenePath?: string;
}

/** 설정을 읽고(없으면 생성) 그 씬 경로로 에디터 호스트를 연다 */
export function openProjectSession(projectRoot: string, options: SessionOptions = {}): ProjectSession {
  const config = loadOrCreateConfig(projectRoot, options.scenePath);
  const host = openEditorHost(projectRoot, { scenePath: config.scenePath });
  return { host, config };
}

export interface InstallOptions {
  /** 코드만 기록하고 idle 주기를 돌리지 않는다. 에셋과 씬 배선은 다음 설치 때 채워진다 */
  codeOnly?: boolean;
}

export interface InstallSummary {
  results: InstallResult[];
  unknown: string[];
  idle: IdleReport | null;
  saved: SaveReport;
}

/**
 * 요청된 모듈을 카탈로그 순서로 설치하고, idle 주기 한 번으로 지연 단계를 마친 뒤 저장한다.
 */
export function installModules(
  session: ProjectSession,
  names: string[],
  options: InstallOptions = {},
): InstallSummary {
  const { host, config } = session;
  const { modules, unknown } = resolveModules(names);
  for (const name of unknown) {
    logger.warn(`모듈을 찾을 수 없음: ${name}`);
  }

  const wanted = new Set(modules.map(m => m.name));
  const results = createModuleRegistry(host, config)
    .filter(d => wanted.has(d.name))
    .map(d => d.install());

  const idle = options.codeOnly ? null : runIdleCycle(host);
  if (idle === null && host.deferred.size > 0) {
    logger.info(`지연 작업 ${host.deferred.size}개는 다음 설치 때 실행됩니다.`);
  }

  const saved = saveEditorHost(host);
  if (results.length > 0) {
    saveConfig(host.projectRoot, config);
  }
  return { results, unknown, idle, saved };
}
