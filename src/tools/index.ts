import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerListTool } from './list.js';
import { registerInstallTool } from './install.js';
import { registerStatusTool } from './status.js';
import { registerDoctorTool } from './doctor.js';
import { registerDiffTool } from './diff.js';
import { registerEnvTools } from './env.js';

export function registerAllTools(server: McpServer): void {
  registerListTool(server);
  registerInstallTool(server);
  registerStatusTool(server);
  registerDoctorTool(server);
  registerDiffTool(server);
  registerEnvTools(server);
}
