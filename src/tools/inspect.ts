import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { jsonResult, type ToolContext } from './context.js';

export function registerInspectTool(server: McpServer, ctx: ToolContext): void {
  server.registerTool('inspect_phone', {
    description: 'Show how one raw phone field is read: tokens, candidates, normalized E.164 numbers and their country tags.',
    inputSchema: {
      value: z.string().describe('Raw phone field, e.g. "(214) 555-1212 / +52 55 1234 5678"'),
      label: z.string().optional().describe('Field label such as "Mobile" or "Home"'),
    },
  }, async ({ value, label }) => jsonResult(ctx.cleaner.inspectField(value, label)));
}
