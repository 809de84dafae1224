import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { openEditorHost } from '../core/editor-host.js';
import { createModuleRegistry } from '../core/module-registry.js';
import { McpResponseBuilder, errorResult } from '../types/mcp.js';

export function registerListTool(server: McpServer): void {
  server.tool(
    'framework_list',
    '사용 가능한 프레임워크 모듈과 설치 여부를 표시합니다',
    {
      projectRoot: z.string().describe('프로젝트 루트 경로'),
    },
    async ({ projectRoot }) => {
      try {
        const res = new McpResponseBuilder();
        const host = openEditorHost(projectRoot);

        res.header('프레임워크 모듈');
        for (const mod of createModuleRegistry(host)) {
          const badge = mod.isInstalled() ? '설치됨' : '미설치';
          res.line(`  ${mod.icon} ${mod.name.padEnd(15)} ${mod.title} [${badge}]`);
          res.line(`  ${' '.repeat(18)} ${mod.description}`);
        }
        res.blank();

        return res.toResult();
      } catch (err) {
        return errorResult(`목록 조회 실패: ${String(err)}`);
      }
    },
  );
}
