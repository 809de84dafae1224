import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { openEditorHost } from '../core/editor-host.js';
import { loadConfig } from '../core/config.js';
import { getAllModules } from '../core/module-registry.js';
import { getModuleState, inspectModule } from '../core/module-installer.js';
import { McpResponseBuilder, errorResult } from '../types/mcp.js';

export function registerStatusTool(server: McpServer): void {
  server.tool(
    'framework_status',
    '모듈별 설치 상태와 산출물 존재 여부를 표시합니다',
    {
      projectRoot: z.string().describe('프로젝트 루트 경로'),
    },
    async ({ projectRoot }) => {
      try {
        const res = new McpResponseBuilder();
        const config = loadConfig(projectRoot);
        const host = openEditorHost(projectRoot, { scenePath: config?.scenePath });

        res.header('설치 상태');
        for (const mod of getAllModules()) {
          const state = getModuleState(host, mod);
          res.line(`  ${mod.icon} ${mod.name.padEnd(15)} ${state}`);
          if (state === 'uninstalled') continue;

          const artifacts = inspectModule(host, mod);
          for (const file of artifacts.files) res.check(file.exists, file.path);
          if (artifacts.configAsset) res.check(artifacts.configAsset.exists, artifacts.configAsset.path);
          for (const obj of artifacts.sceneObjects) {
            res.check(obj.exists && obj.hasComponent, obj.name);
          }
        }

        return res.toResult();
      } catch (err) {
        return errorResult(`상태 조회 실패: ${String(err)}`);
      }
    },
  );
}
