import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { getModule } from '../core/module-registry.js';
import { generateModuleDiff } from '../core/diff-engine.js';
import { McpResponseBuilder, errorResult } from '../types/mcp.js';

export function registerDiffTool(server: McpServer): void {
  server.tool(
    'framework_diff',
    '모듈의 생성된 파일과 현재 템플릿을 비교합니다 (읽기 전용)',
    {
      projectRoot: z.string().describe('프로젝트 루트 경로'),
      module: z.string().describe('모듈 이름'),
    },
    async ({ projectRoot, module }) => {
      try {
        const mod = getModule(module);
        if (!mod) return errorResult(`모듈을 찾을 수 없음: ${module}`);

        const res = new McpResponseBuilder();
        const patches = generateModuleDiff(projectRoot, mod);
        if (patches.length === 0) {
          return res.ok(`${mod.title}: 템플릿과 동일합니다.`).toResult();
        }

        res.header(`${mod.title} diff (현재 → 템플릿)`);
        for (const patch of patches) res.line(patch);
        return res.toResult();
      } catch (err) {
        return errorResult(`diff 실패: ${String(err)}`);
      }
    },
  );
}
