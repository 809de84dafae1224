import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { FrameworkConfig } from '../types/config.js';
import { CONFIG_FILENAME } from '../types/config.js';
import type { EditorHost } from './editor-host.js';
import { getAllModules } from './module-registry.js';
import { getModuleState, inspectModule } from './module-installer.js';
import { resolveType } from './type-resolver.js';
import { analyzeChanges } from './diff-engine.js';
import { getTemplatesDir } from '../utils/paths.js';

export type CheckLevel = 'ok' | 'warn' | 'fail';

export interface HealthCheck {
  level: CheckLevel;
  label: string;
}

export interface HealthReport {
  checks: HealthCheck[];
  issues: number;
  warnings: number;
}

/**
 * 설치된 모듈의 산출물을 점검한다 (읽기 전용).
 * 대표 파일이 없는 모듈은 미설치로 보고 건너뛴다.
 */
export function runHealthCheck(host: EditorHost, config: FrameworkConfig | null): HealthReport {
  const checks: HealthCheck[] = [];
  const add = (level: CheckLevel, label: string): void => {
    checks.push({ level, label });
  };

  if (config) {
    add('ok', `설정 파일 (v${config.version})`);
  } else {
    add('warn', `${CONFIG_FILENAME} 없음 (해시 기록 없이 산출물만 점검)`);
  }

  const templatesDir = getTemplatesDir();
  const missingTemplates = getAllModules()
    .flatMap(m => m.files)
    .filter(f => !existsSync(join(templatesDir, f.source)));
  if (missingTemplates.length === 0) {
    add('ok', '템플릿 카탈로그');
  } else {
    for (const f of missingTemplates) add('fail', `템플릿 없음: ${f.source}`);
  }

  for (const mod of getAllModules()) {
    const state = getModuleState(host, mod);
    if (state === 'uninstalled') continue;

    const artifacts = inspectModule(host, mod);
    let moduleOk = true;

    for (const file of artifacts.files) {
      if (!file.exists) {
        add('fail', `파일 누락: ${file.path} (${mod.name})`);
        moduleOk = false;
      }
    }

    if (artifacts.configAsset && !artifacts.configAsset.exists) {
      add('fail', `설정 에셋 누락: ${artifacts.configAsset.path} (${mod.name})`);
      moduleOk = false;
    }

    for (const obj of artifacts.sceneObjects) {
      if (!obj.exists) {
        add('fail', `씬 오브젝트 누락: ${obj.name} (${mod.name})`);
        moduleOk = false;
        continue;
      }
      if (obj.expectedComponent && !obj.hasComponent) {
        const compiled = resolveType(host, obj.expectedComponent) !== null;
        add(
          'warn',
          compiled
            ? `컴포넌트 미부착: ${obj.name} ← ${obj.expectedComponent}`
            : `컴포넌트 미부착: ${obj.name} ← ${obj.expectedComponent} (타입 미컴파일)`,
        );
        moduleOk = false;
      }
    }

    if (moduleOk) {
      add('ok', `모듈: ${mod.name} (${artifacts.files.length}개 파일)`);
    }
  }

  if (config) {
    for (const change of analyzeChanges(config, host.projectRoot)) {
      if (change.status === 'USER_MODIFIED' || change.status === 'CONFLICT') {
        add('warn', `사용자 수정됨: ${change.relativePath}`);
      } else if (change.status === 'UPSTREAM_CHANGED') {
        add('warn', `템플릿이 바뀜: ${change.relativePath}`);
      }
    }
  }

  return {
    checks,
    issues: checks.filter(c => c.level === 'fail').length,
    warnings: checks.filter(c => c.level === 'warn').length,
  };
}
