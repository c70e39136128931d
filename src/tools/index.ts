import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolContext } from './context.js';
import { registerInspectTool } from './inspect.js';
import { registerCleanTool } from './clean.js';
import { registerExportTool } from './export.js';
import { registerChannelListsTool } from './channels.js';

export { createToolContext, type ToolContext } from './context.js';

export function registerAllTools(server: McpServer, ctx: ToolContext): void {
  registerInspectTool(server, ctx);
  registerCleanTool(server, ctx);
  registerExportTool(server, ctx);
  registerChannelListsTool(server, ctx);
}
