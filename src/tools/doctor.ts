import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { openEditorHost } from '../core/editor-host.js';
import { loadConfig } from '../core/config.js';
import { runHealthCheck } from '../core/health-check.js';
import { McpResponseBuilder, errorResult } from '../types/mcp.js';

export function registerDoctorTool(server: McpServer): void {
  server.tool(
    'framework_doctor',
    '설치 건강 진단을 수행합니다 (읽기 전용)',
    {
      projectRoot: z.string().describe('프로젝트 루트 경로'),
    },
    async ({ projectRoot }) => {
      try {
        const res = new McpResponseBuilder();
        const config = loadConfig(projectRoot);
        const host = openEditorHost(projectRoot, { scenePath: config?.scenePath });
        const report = runHealthCheck(host, config);

        res.header('프레임워크 건강 진단');
        for (const check of report.checks) {
          if (check.level === 'warn') {
            res.line(`  ⚠ ${check.label}`);
          } else {
            res.check(check.level === 'ok', check.label);
          }
        }
        res.blank();

        if (report.issues === 0 && report.warnings === 0) {
          res.ok('문제 없음');
        } else {
          res.info(`문제 ${report.issues}개, 경고 ${report.warnings}개`);
        }

        return res.toResult(report.issues > 0);
      } catch (err) {
        return errorResult(`진단 실패: ${String(err)}`);
      }
    },
  );
}
