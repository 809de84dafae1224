import chalk from 'chalk';
import type { ModuleState } from '../types/module.js';
import { openEditorHost } from '../core/editor-host.js';
import { loadConfig } from '../core/config.js';
import { getAllModules } from '../core/module-registry.js';
import { getModuleState, inspectModule } from '../core/module-installer.js';
import { logger, printLog } from '../utils/logger.js';

const STATE_LABELS: Record<ModuleState, string> = {
  uninstalled: chalk.dim('미설치'),
  'code-written': chalk.yellow('코드만 생성'),
  installed: chalk.green('설치됨'),
};

export async function statusCommand(): Promise<void> {
  const projectRoot = process.cwd();
  const config = loadConfig(projectRoot);
  const host = openEditorHost(projectRoot, { scenePath: config?.scenePath });

  logger.header('설치 상태');
  printLog();

  for (const mod of getAllModules()) {
    const state = getModuleState(host, mod);
    console.log(`  ${mod.icon} ${chalk.bold(mod.name.padEnd(15))} ${STATE_LABELS[state]}`);
    if (state === 'uninstalled') continue;

    const artifacts = inspectModule(host, mod);
    const presentFiles = artifacts.files.filter(f => f.exists).length;
    console.log(chalk.dim(`      파일 ${presentFiles}/${artifacts.files.length}`));
    if (artifacts.configAsset) {
      console.log(chalk.dim(`      에셋 ${artifacts.configAsset.path} ${artifacts.configAsset.exists ? '✓' : '✗'}`));
    }
    for (const obj of artifacts.sceneObjects) {
      const mark = !obj.exists ? '✗' : obj.hasComponent ? '✓' : '!';
      console.log(chalk.dim(`      씬 ${obj.name} ${mark}`));
    }
  }
  console.log('');
}
