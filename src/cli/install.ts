import chalk from 'chalk';
import { openProjectSession, installModules } from '../core/project-session.js';
import { createModuleRegistry, getModuleNames } from '../core/module-registry.js';
import { runInstallPrompts } from '../prompts/install-prompts.js';
import { CONFIG_FILENAME } from '../types/config.js';
import { logger, printLog } from '../utils/logger.js';

interface InstallOptions {
  all?: boolean;
  codeOnly?: boolean;
  scene?: string;
}

export async function installCommand(modules: string[], options: InstallOptions): Promise<void> {
  const session = openProjectSession(process.cwd(), { scenePath: options.scene });

  let names = modules;
  if (options.all) {
    names = getModuleNames();
  } else if (names.length === 0) {
    const answers = await runInstallPrompts(
      createModuleRegistry(session.host).map(d => ({
        name: d.name,
        title: d.title,
        icon: d.icon,
        installed: d.isInstalled(),
      })),
    );
    if (!answers.confirm || answers.modules.length === 0) {
      logger.info('설치가 취소되었습니다.');
      printLog();
      return;
    }
    names = answers.modules;
  }

  logger.header('프레임워크 모듈 설치');
  logger.info(`모듈: ${chalk.bold(names.join(', '))}`);

  const summary = installModules(session, names, { codeOnly: options.codeOnly });

  const created = summary.results.reduce((n, r) => n + r.created.length, 0);
  const skipped = summary.results.reduce((n, r) => n + r.skipped.length, 0);
  const errors = summary.results.flatMap(r => r.errors);
  for (const error of errors) logger.error(error);

  logger.header('설치 완료');
  logger.table([
    ['생성', `${created}개 파일`],
    ['건너뜀', `${skipped}개 파일`],
    ['에셋 저장', `${summary.saved.assets.length}개`],
    ['씬 저장', summary.saved.sceneSaved ? session.config.scenePath : '변경 없음'],
    ['오류', `${errors.length}개`],
    ['설정 파일', CONFIG_FILENAME],
  ]);
  printLog();

  if (errors.length > 0 || summary.unknown.length > 0) {
    process.exitCode = 1;
  }
}
