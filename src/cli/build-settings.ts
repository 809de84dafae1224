import { openEditorHost } from '../core/editor-host.js';
import { applyBuildSettings } from '../core/player-settings.js';
import { PLAYER_SETTINGS_PATH } from '../core/project-paths.js';
import { logger, printLog } from '../utils/logger.js';

interface BuildSettingsOptions {
  bump?: boolean;
}

export async function buildSettingsCommand(options: BuildSettingsOptions): Promise<void> {
  const host = openEditorHost(process.cwd());
  const settings = applyBuildSettings(host, { bump: options.bump });
  if (!settings) {
    process.exitCode = 1;
    printLog();
    return;
  }

  logger.table([
    ['productName', settings.productName],
    ['applicationIdentifier', settings.applicationIdentifier],
    ['bundleVersion', settings.bundleVersion],
    ['versionCode', String(settings.androidBundleVersionCode)],
    ['기록', PLAYER_SETTINGS_PATH],
  ]);
  printLog();
}
