import { join } from 'node:path';
import type { InstallResult, ModuleDefinition, ModuleState } from '../types/module.js';
import type { FrameworkConfig } from '../types/config.js';
import type { EditorHost } from './editor-host.js';
import { getTemplatesDir } from '../utils/paths.js';
import { ensureFolder, fileExists, readFileContent, writeFile, computeHash } from './file-ops.js';
import { createConfigAsset } from './asset-instantiator.js';
import { ensureManager, ensureMarker, markerName } from './scene-wirer.js';
import { updateFileRecord } from './config.js';
import { getPackageVersion } from '../utils/version.js';
import { logger } from '../utils/logger.js';

/**
 * 모듈 하나를 설치한다.
 *
 * 즉시 단계: 폴더 보장 → 템플릿 기록 (없는 파일만)
 * 지연 단계: 설정 에셋 생성, 씬 배선. 호스트가 재컴파일할 기회를 가진 뒤 실행된다.
 * 모든 단계가 각자 멱등이라 몇 번을 다시 호출해도 빠진 부분만 채운다.
 */
export function installModule(
  host: EditorHost,
  mod: ModuleDefinition,
  config?: FrameworkConfig,
): InstallResult {
  const result: InstallResult = { module: mod.name, created: [], skipped: [], errors: [], deferred: [] };
  const templatesDir = getTemplatesDir();
  const version = getPackageVersion();

  ensureFolder(host, mod.folder);

  for (const file of mod.files) {
    const content = readFileContent(join(templatesDir, file.source));
    if (content === null) {
      result.errors.push(`템플릿 없음: ${file.source}`);
      continue;
    }

    if (writeFile(host, file.destination, content)) {
      result.created.push(file.destination);
      if (config) {
        updateFileRecord(config, file.destination, mod.name, version, computeHash(content));
      }
    } else {
      result.skipped.push(file.destination);
    }
  }

  const configAsset = mod.configAsset;
  if (configAsset) {
    const label = `${mod.name}: ${configAsset.typeName} 에셋`;
    host.deferred.enqueue(label, () => {
      createConfigAsset(host, configAsset.typeName, configAsset.path);
    });
    result.deferred.push(label);
  }

  const scene = mod.scene;
  if (scene) {
    const label = `${mod.name}: 씬 배선`;
    host.deferred.enqueue(label, () => {
      ensureMarker(host, scene.header);
      for (const manager of scene.managers) {
        ensureManager(host, manager.objectName, manager.component);
      }
    });
    result.deferred.push(label);
  }

  if (config && !config.modules.includes(mod.name)) {
    config.modules.push(mod.name);
  }

  logger.ok(`${mod.title} 모듈 설치됨`);
  return result;
}

/** 대표 파일 존재 여부만 본다. 에셋이나 씬 배선까지 검증하지 않는다 */
export function isModuleInstalled(host: Pick<EditorHost, 'projectRoot'>, mod: ModuleDefinition): boolean {
  return fileExists(host, mod.primaryFile);
}

export interface ModuleArtifacts {
  files: { path: string; exists: boolean }[];
  configAsset: { path: string; exists: boolean } | null;
  sceneObjects: { name: string; exists: boolean; expectedComponent: string | null; hasComponent: boolean }[];
}

/** 모듈 산출물의 현재 상태를 조사한다 (읽기 전용) */
export function inspectModule(host: EditorHost, mod: ModuleDefinition): ModuleArtifacts {
  const files = mod.files.map(f => ({ path: f.destination, exists: fileExists(host, f.destination) }));

  const configAsset = mod.configAsset
    ? { path: mod.configAsset.path, exists: host.assets.loadAssetAtPath(mod.configAsset.path) !== null }
    : null;

  const sceneObjects: ModuleArtifacts['sceneObjects'] = [];
  if (mod.scene) {
    const active = host.scenes.active;
    const header = markerName(mod.scene.header);
    sceneObjects.push({ name: header, exists: active.findRoot(header) !== null, expectedComponent: null, hasComponent: true });
    for (const manager of mod.scene.managers) {
      const obj = active.findRoot(manager.objectName);
      sceneObjects.push({
        name: manager.objectName,
        exists: obj !== null,
        expectedComponent: manager.component,
        hasComponent: obj !== null && obj.components.includes(manager.component),
      });
    }
  }

  return { files, configAsset, sceneObjects };
}

/**
 * 저장된 상태 없이 산출물로부터 설치 상태를 다시 계산한다.
 * 컴포넌트 부착 여부는 상태에 반영하지 않는다 (doctor 가 따로 보고).
 */
export function getModuleState(host: EditorHost, mod: ModuleDefinition): ModuleState {
  if (!isModuleInstalled(host, mod)) return 'uninstalled';
  const artifacts = inspectModule(host, mod);
  const configReady = artifacts.configAsset === null || artifacts.configAsset.exists;
  const sceneReady = artifacts.sceneObjects.every(o => o.exists);
  return configReady && sceneReady ? 'installed' : 'code-written';
}
