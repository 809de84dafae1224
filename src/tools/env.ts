import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { EnvironmentSchema } from '../core/config-types.js';
import { openEditorHost } from '../core/editor-host.js';
import { switchEnvironment } from '../core/environment-switcher.js';
import { applyBuildSettings } from '../core/player-settings.js';
import { McpResponseBuilder, errorResult } from '../types/mcp.js';
import { logger } from '../utils/logger.js';

export function registerEnvTools(server: McpServer): void {
  server.tool(
    'framework_env',
    'BuildConfig/AdsConfig 의 활성 환경(Dev/Prod)을 전환합니다',
    {
      projectRoot: z.string().describe('프로젝트 루트 경로'),
      environment: EnvironmentSchema.describe('전환할 환경'),
    },
    async ({ projectRoot, environment }) => {
      try {
        logger.clear();
        const host = openEditorHost(projectRoot);
        const result = switchEnvironment(host, environment);
        return new McpResponseBuilder().log(logger.flush()).toResult(result.buildMissing);
      } catch (err) {
        return errorResult(`환경 전환 실패: ${String(err)}`);
      }
    },
  );

  server.tool(
    'framework_build_settings',
    '활성 환경의 빌드 identity 를 PlayerSettings 에 적용합니다',
    {
      projectRoot: z.string().describe('프로젝트 루트 경로'),
      bump: z.boolean().optional().describe('versionCode 를 1 올린 뒤 적용'),
    },
    async ({ projectRoot, bump }) => {
      try {
        logger.clear();
        const host = openEditorHost(projectRoot);
        const settings = applyBuildSettings(host, { bump });
        const res = new McpResponseBuilder().log(logger.flush());
        if (settings) {
          res.table([
            ['productName', settings.productName],
            ['applicationIdentifier', settings.applicationIdentifier],
            ['bundleVersion', settings.bundleVersion],
            ['versionCode', String(settings.androidBundleVersionCode)],
          ]);
        }
        return res.toResult(settings === null);
      } catch (err) {
        return errorResult(`빌드 설정 실패: ${String(err)}`);
      }
    },
  );
}
