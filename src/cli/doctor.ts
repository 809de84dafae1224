import chalk from 'chalk';
import { openEditorHost } from '../core/editor-host.js';
import { loadConfig } from '../core/config.js';
import { runHealthCheck, type CheckLevel } from '../core/health-check.js';
import { logger, printLog } from '../utils/logger.js';

const MARKS: Record<CheckLevel, string> = {
  ok: chalk.green('✓'),
  warn: chalk.yellow('!'),
  fail: chalk.red('✗'),
};

export async function doctorCommand(): Promise<void> {
  const projectRoot = process.cwd();
  const config = loadConfig(projectRoot);
  const host = openEditorHost(projectRoot, { scenePath: config?.scenePath });

  logger.header('프레임워크 건강 진단');
  printLog();

  const report = runHealthCheck(host, config);
  for (const check of report.checks) {
    console.log(`  ${MARKS[check.level]} ${check.label}`);
  }
  console.log('');

  if (report.issues === 0 && report.warnings === 0) {
    logger.ok('문제 없음');
  } else {
    logger.info(`문제 ${report.issues}개, 경고 ${report.warnings}개`);
    if (report.issues > 0) {
      logger.info('빠진 산출물은 해당 모듈을 다시 설치하면 채워집니다.');
      process.exitCode = 1;
    }
  }
  printLog();
}
