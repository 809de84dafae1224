import type { SceneObject } from '../types/scene.js';
import type { EditorHost } from './editor-host.js';
import { resolveType } from './type-resolver.js';
import { logger } from '../utils/logger.js';

type WirerContext = Pick<EditorHost, 'scenes' | 'undo' | 'compiler'>;

/** 하이어라키에서 구분선으로 보이는 마커 이름 */
export function markerName(label: string): string {
  return `------ ${label} ------`;
}

/**
 * 루트 마커 오브젝트를 보장한다. 같은 이름이 이미 있으면 그대로 반환.
 */
export function ensureMarker(host: WirerContext, label: string): SceneObject {
  const scene = host.scenes.active;
  const name = markerName(label);
  const existing = scene.findRoot(name);
  if (existing) return existing;

  const obj = scene.createRoot(name);
  host.undo.registerCreatedObjectUndo(scene, obj, `Create ${name}`);
  scene.markDirty();
  return obj;
}

/**
 * 루트 매니저 오브젝트를 보장한다.
 *
 * 같은 이름이 있으면 컴포넌트 부착 여부를 확인하지 않고 그대로 반환한다.
 * 새로 만들 때 컴포넌트 타입을 아직 못 찾으면 빈 오브젝트만 만들고 경고한다 (재시도 없음).
 */
export function ensureManager(host: WirerContext, objectName: string, componentTypeName: string): SceneObject {
  const scene = host.scenes.active;
  const existing = scene.findRoot(objectName);
  if (existing) {
    logger.info(`씬에 이미 있음: ${objectName}`);
    return existing;
  }

  const obj = scene.createRoot(objectName);
  const type = resolveType(host, componentTypeName);
  if (type) {
    scene.addComponent(obj, type.name);
  } else {
    logger.warn(
      `컴포넌트 '${componentTypeName}'을(를) 아직 찾을 수 없어 '${objectName}'을(를) 컴포넌트 없이 만들었습니다. 컴파일 후 직접 부착하세요.`,
    );
  }

  host.undo.registerCreatedObjectUndo(scene, obj, `Create ${objectName}`);
  scene.markDirty();
  logger.ok(`씬 오브젝트 생성: ${objectName}`);
  return obj;
}
