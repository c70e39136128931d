import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerAllTools, createToolContext } from './tools/index.js';
import { registerAllResources } from './resources/index.js';
import type { AppConfig } from './config.js';
import { logger } from './utils/index.js';

export const SERVER_NAME = 'contact-cleaner-mcp';
export const SERVER_VERSION = '0.1.0';

export function createServer(config: AppConfig): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  const ctx = createToolContext(config);

  registerAllTools(server, ctx);
  registerAllResources(server, ctx);

  logger.info('MCP server created, default country code:', config.cleaner.defaultCountryCode);

  return server;
}
