import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolContext } from '../tools/index.js';

export function registerAllResources(server: McpServer, ctx: ToolContext): void {
  // cleaner://config - active engine options
  server.registerResource('cleaner-config', 'cleaner://config', {
    title: 'Cleaner Configuration',
    description: 'Engine options and defaults used by the cleaning tools',
    mimeType: 'application/json',
  }, async (uri) => ({
    contents: [{
      uri: uri.href,
      text: JSON.stringify({
        ...ctx.cleaner.options,
        defaultChannel: ctx.config.defaultChannel,
        greetingFallback: ctx.config.greetingFallback,
      }, null, 2),
      mimeType: 'application/json',
    }],
  }));
}
