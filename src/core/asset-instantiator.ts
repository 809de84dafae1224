import type { AssetHandle } from '../types/asset.js';
import type { EditorHost } from './editor-host.js';
import { resolveType } from './type-resolver.js';
import { createDefaultFields } from './config-types.js';
import { logger } from '../utils/logger.js';

/**
 * typeName 의 기본 인스턴스를 logicalPath 에 만든다.
 *
 * - 타입을 아직 못 찾으면 경고 후 null (파일은 만들지 않음, 내부 재시도 없음)
 * - 이미 에셋이 있으면 그대로 반환 (덮어쓰지 않음)
 * - 새로 만든 경우 즉시 디스크에 flush
 */
export function createConfigAsset(
  host: Pick<EditorHost, 'compiler' | 'assets'>,
  typeName: string,
  logicalPath: string,
): AssetHandle | null {
  const type = resolveType(host, typeName);
  if (!type) {
    logger.warn(`타입 '${typeName}'을(를) 아직 찾을 수 없습니다. 다음 컴파일 후 다시 설치하세요.`);
    return null;
  }

  const existing = host.assets.loadAssetAtPath(logicalPath);
  if (existing) {
    logger.fileAction('skip', logicalPath);
    return existing;
  }

  const handle = host.assets.createAsset(type.name, createDefaultFields(type.name), logicalPath);
  host.assets.saveAssets();
  logger.fileAction('create', logicalPath);
  return handle;
}
