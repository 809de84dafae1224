import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { getModuleNames } from '../core/module-registry.js';
import { installModules, openProjectSession } from '../core/project-session.js';
import { McpResponseBuilder, errorResult } from '../types/mcp.js';
import { logger } from '../utils/logger.js';

export function registerInstallTool(server: McpServer): void {
  server.tool(
    'framework_install',
    '프레임워크 모듈을 설치합니다. 이미 있는 파일/에셋/씬 오브젝트는 건드리지 않습니다',
    {
      projectRoot: z.string().describe('프로젝트 루트 경로'),
      modules: z.array(z.string()).optional().describe('설치할 모듈 이름 (생략 시 전체)'),
      codeOnly: z.boolean().optional().describe('코드만 기록하고 에셋/씬 단계는 미룸'),
      scenePath: z.string().optional().describe('배선할 씬 논리 경로'),
    },
    async ({ projectRoot, modules, codeOnly, scenePath }) => {
      try {
        logger.clear();
        const res = new McpResponseBuilder();
        const names = modules && modules.length > 0 ? modules : getModuleNames();

        const session = openProjectSession(projectRoot, { scenePath });
        const summary = installModules(session, names, { codeOnly });

        res.header('프레임워크 모듈 설치');
        res.log(logger.flush());
        res.blank();

        const errors = summary.results.flatMap(r => r.errors);
        for (const error of errors) res.error(error);
        for (const name of summary.unknown) res.error(`알 수 없는 모듈: ${name}`);

        res.table([
          ['생성', `${summary.results.reduce((n, r) => n + r.created.length, 0)}개 파일`],
          ['건너뜀', `${summary.results.reduce((n, r) => n + r.skipped.length, 0)}개 파일`],
          ['지연 작업', `${summary.idle?.drain.ran.length ?? 0}개 실행`],
          ['씬 저장', summary.saved.sceneSaved ? '예' : '변경 없음'],
        ]);

        return res.toResult(errors.length > 0 || summary.unknown.length > 0);
      } catch (err) {
        return errorResult(`설치 실패: ${String(err)}`);
      }
    },
  );
}
