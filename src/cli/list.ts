import chalk from 'chalk';
import { openEditorHost } from '../core/editor-host.js';
import { createModuleRegistry } from '../core/module-registry.js';
import { logger, printLog } from '../utils/logger.js';

export async function listCommand(): Promise<void> {
  const host = openEditorHost(process.cwd());

  logger.header('프레임워크 모듈');
  printLog();
  for (const mod of createModuleRegistry(host)) {
    const badge = mod.isInstalled() ? chalk.green('설치됨') : chalk.dim('미설치');
    console.log(`  ${mod.icon} ${chalk.bold(mod.name.padEnd(15))} ${mod.title}  ${badge}`);
    console.log(`  ${' '.repeat(18)} ${chalk.dim(mod.description)}`);
  }
  console.log('');
}
