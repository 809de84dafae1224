import chalk from 'chalk';
import { getModule } from '../core/module-registry.js';
import { generateModuleDiff } from '../core/diff-engine.js';
import { logger, printLog } from '../utils/logger.js';

function colorizePatch(patch: string): string {
  return patch
    .split('\n')
    .map(line => {
      if (line.startsWith('+++') || line.startsWith('---')) return chalk.bold(line);
      if (line.startsWith('+')) return chalk.green(line);
      if (line.startsWith('-')) return chalk.red(line);
      if (line.startsWith('@@')) return chalk.cyan(line);
      return line;
    })
    .join('\n');
}

export async function diffCommand(moduleName: string): Promise<void> {
  const mod = getModule(moduleName);
  if (!mod) {
    logger.error(`모듈을 찾을 수 없음: ${moduleName}`);
    printLog();
    process.exitCode = 1;
    return;
  }

  const patches = generateModuleDiff(process.cwd(), mod);
  if (patches.length === 0) {
    logger.ok(`${mod.title}: 템플릿과 동일합니다.`);
    printLog();
    return;
  }

  logger.header(`${mod.title} diff (현재 → 템플릿)`);
  printLog();
  for (const patch of patches) {
    console.log(colorizePatch(patch));
  }
}
