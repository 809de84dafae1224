import { EnvironmentSchema } from '../core/config-types.js';
import { openEditorHost } from '../core/editor-host.js';
import { switchEnvironment } from '../core/environment-switcher.js';
import { logger, printLog } from '../utils/logger.js';

const ALIASES: Record<string, string> = { dev: 'Dev', prod: 'Prod' };

export async function envCommand(target: string): Promise<void> {
  const parsed = EnvironmentSchema.safeParse(ALIASES[target.toLowerCase()] ?? target);
  if (!parsed.success) {
    logger.error(`알 수 없는 환경: ${target} (dev 또는 prod)`);
    printLog();
    process.exitCode = 1;
    return;
  }

  const host = openEditorHost(process.cwd());
  if (switchEnvironment(host, parsed.data).buildMissing) {
    process.exitCode = 1;
  }
  printLog();
}
