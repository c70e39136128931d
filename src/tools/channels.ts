import { z } from 'zod';
import * as fs from 'node:fs/promises';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { buildChannelLists, channelListColumns, formatCsv, parseContactExport } from '../contacts/index.js';
import { OUTPUT_COLUMNS } from '../types/index.js';
import { errorResult, jsonResult, type ToolContext } from './context.js';

export function registerChannelListsTool(server: McpServer, ctx: ToolContext): void {
  server.registerTool('prepare_channel_lists', {
    description: 'Split a cleaned contact CSV into a WhatsApp list (every row) and an SMS list (US and MX rows), adding FirstName and GreetingName columns. Optionally writes a master list of every row as well.',
    inputSchema: {
      inputPath: z.string().describe('Cleaned CSV written by clean_contact_export'),
      whatsappPath: z.string().describe('Where to write the WhatsApp list'),
      smsPath: z.string().describe('Where to write the SMS list'),
      masterPath: z.string().optional().describe('Where to write the master list of every row'),
      greetingFallback: z.string().optional().describe('Greeting for rows without a usable first name'),
    },
  }, async ({ inputPath, whatsappPath, smsPath, masterPath, greetingFallback }) => {
    try {
      const parsed = parseContactExport(await fs.readFile(inputPath, 'utf-8'));
      const lists = buildChannelLists(parsed.rows, greetingFallback ?? ctx.config.greetingFallback);

      const base = parsed.columns.length > 0 ? parsed.columns : [...OUTPUT_COLUMNS];
      const columns = channelListColumns(base);
      await fs.writeFile(whatsappPath, formatCsv(lists.whatsapp, columns), 'utf-8');
      await fs.writeFile(smsPath, formatCsv(lists.sms, columns), 'utf-8');
      if (masterPath) await fs.writeFile(masterPath, formatCsv(lists.master, columns), 'utf-8');

      return jsonResult({
        totalRows: parsed.rows.length,
        whatsapp: lists.whatsapp.length,
        sms: lists.sms.length,
        whatsappPath,
        smsPath,
        ...(masterPath ? { masterPath } : {}),
      });
    } catch (err) {
      return errorResult(err);
    }
  });
}
