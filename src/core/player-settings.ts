import type { EditorHost } from './editor-host.js';
import { loadBuildConfig } from './environment-switcher.js';
import { PLAYER_SETTINGS_PATH, resolveLogicalPath } from './project-paths.js';
import { safeWriteFile } from './file-ops.js';
import { logger } from '../utils/logger.js';

export interface PlayerSettings {
  environment: string;
  productName: string;
  applicationIdentifier: string;
  bundleVersion: string;
  androidBundleVersionCode: number;
  android?: {
    useCustomKeystore: true;
    keystoreName: string;
    keystorePass: string;
    keyaliasName: string;
    keyaliasPass: string;
  };
}

export interface ApplyOptions {
  /** 적용 후 활성 identity 의 versionCode 를 1 올려 저장 (다음 빌드용) */
  bump?: boolean;
}

/**
 * 활성 환경의 identity 를 PlayerSettings 로 적용한다.
 * 네이티브 패키징은 호출하지 않는다.
 */
export function applyBuildSettings(
  host: Pick<EditorHost, 'projectRoot' | 'assets'>,
  options: ApplyOptions = {},
): PlayerSettings | null {
  const loaded = loadBuildConfig(host);
  if (!loaded) return null;

  const { handle, config } = loaded;
  const key = config.activeEnvironment === 'Dev' ? 'dev' : 'prod';
  const identity = config[key];

  const settings: PlayerSettings = {
    environment: config.activeEnvironment,
    productName: identity.appName,
    applicationIdentifier: identity.bundleId,
    bundleVersion: identity.versionName,
    androidBundleVersionCode: identity.versionCode,
  };
  if (config.keystorePath) {
    settings.android = {
      useCustomKeystore: true,
      keystoreName: config.keystorePath,
      keystorePass: config.keystorePass,
      keyaliasName: config.keyAlias,
      keyaliasPass: config.keyPass,
    };
  }

  safeWriteFile(
    resolveLogicalPath(host.projectRoot, PLAYER_SETTINGS_PATH),
    JSON.stringify(settings, null, 2) + '\n',
  );

  logger.ok(
    `빌드 설정 적용: ${config.activeEnvironment} 환경, ${identity.bundleId} v${identity.versionName} (build ${identity.versionCode})`,
  );

  if (options.bump) {
    const next = identity.versionCode + 1;
    handle.fields[key] = { ...identity, versionCode: next };
    host.assets.setDirty(handle);
    host.assets.saveAssets();
    logger.info(`${config.activeEnvironment} versionCode ${identity.versionCode} → ${next}`);
  }
  return settings;
}
