import type { AssetHandle } from '../types/asset.js';
import type { EditorHost } from './editor-host.js';
import { BuildConfigSchema, type BuildConfig, type Environment } from './config-types.js';
import { requireConfigAssetPath } from './module-registry.js';
import { logger } from '../utils/logger.js';

export interface LoadedBuildConfig {
  handle: AssetHandle;
  config: BuildConfig;
}

/**
 * BuildConfig 에셋을 읽는다. 없거나 형식이 맞지 않으면 오류를 로그에 남기고 null.
 * 상위 작업은 null 을 받으면 부작용 없이 중단해야 한다.
 */
export function loadBuildConfig(host: Pick<EditorHost, 'assets'>): LoadedBuildConfig | null {
  const path = requireConfigAssetPath('build');
  const handle = host.assets.loadAssetAtPath(path);
  if (!handle) {
    logger.error(`BuildConfig를 찾을 수 없습니다: ${path}. Build Scripts 모듈을 먼저 설치하세요.`);
    return null;
  }
  const parsed = BuildConfigSchema.safeParse(handle.fields);
  if (!parsed.success) {
    logger.error(`BuildConfig 형식 오류: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    return null;
  }
  return { handle, config: parsed.data };
}

export interface SwitchResult {
  environment: Environment;
  changed: boolean;
  adsUpdated: boolean;
  /** BuildConfig 가 없거나 형식 오류라 건너뜀 (오류는 이미 로그에 남음) */
  buildMissing: boolean;
}

/**
 * BuildConfig 와 AdsConfig 의 activeEnvironment 를 바꾼다. 둘 중 있는 것만 바꾸고,
 * 실제로 바뀐 것이 있을 때만 저장한다.
 */
export function switchEnvironment(host: Pick<EditorHost, 'assets'>, environment: Environment): SwitchResult {
  const loaded = loadBuildConfig(host);
  const buildMissing = loaded === null;

  let changed = false;
  if (loaded && loaded.config.activeEnvironment !== environment) {
    loaded.handle.fields.activeEnvironment = environment;
    host.assets.setDirty(loaded.handle);
    changed = true;
  }

  // AdsConfig 는 Ads 모듈이 설치된 경우에만 존재
  let adsUpdated = false;
  const ads = host.assets.loadAssetAtPath(requireConfigAssetPath('ads'));
  if (ads && typeof ads.fields.activeEnvironment === 'string' && ads.fields.activeEnvironment !== environment) {
    ads.fields.activeEnvironment = environment;
    host.assets.setDirty(ads);
    adsUpdated = true;
    changed = true;
  }

  if (!changed) {
    if (!buildMissing) logger.info(`이미 ${environment} 환경입니다.`);
    return { environment, changed, adsUpdated, buildMissing };
  }

  host.assets.saveAssets();
  const adsNote = environment === 'Dev' ? 'AdMob 테스트 ID 사용' : '라이브 광고 ID 사용';
  if (loaded) {
    const identity = environment === 'Dev' ? loaded.config.dev : loaded.config.prod;
    logger.ok(`${environment} 환경으로 전환했습니다. Bundle: ${identity.bundleId}, App: ${identity.appName} | ${adsNote}`);
  } else {
    logger.ok(`AdsConfig 만 ${environment} 환경으로 전환했습니다. | ${adsNote}`);
  }
  return { environment, changed, adsUpdated, buildMissing };
}
