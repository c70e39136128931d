import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createContactRecord } from '../contacts/index.js';
import { logger } from '../utils/index.js';
import { cleanerFor, errorResult, jsonResult, type ToolContext } from './context.js';

const phoneFieldSchema = z.object({
  value: z.string().default(''),
  label: z.string().optional(),
});

const contactSchema = z.object({
  name: z.string().default(''),
  phones: z.array(phoneFieldSchema).max(6),
  channel: z.string().optional(),
  optIn: z.string().optional(),
});

export function registerCleanTool(server: McpServer, ctx: ToolContext): void {
  server.registerTool('clean_contacts', {
    description: 'Recover one E.164 number per contact from messy phone fields and drop repeated numbers. Returns Name, Phone_E164, Country, Channel, OptIn rows.',
    inputSchema: {
      contacts: z.array(contactSchema).describe('Contacts in input order, each with up to six phone fields'),
      channel: z.string().optional().describe('Channel for contacts that carry none'),
      optIn: z.string().optional().describe('OptIn value for contacts that carry none'),
      mexicoMobileDisambiguator: z.boolean().optional()
        .describe('Override the configured 52 to 521 insertion policy for this call'),
    },
  }, async ({ contacts, channel, optIn, mexicoMobileDisambiguator }) => {
    try {
      const cleaner = cleanerFor(ctx, mexicoMobileDisambiguator);
      const records = contacts.map(c => createContactRecord(c));
      const result = cleaner.cleanBatch(records, { channel: channel ?? ctx.config.defaultChannel, optIn });

      if (result.unresolved.length > 0) {
        logger.info(`clean_contacts: ${result.unresolved.length} contacts had no usable number`);
      }

      return jsonResult({
        totalContacts: records.length,
        cleaned: result.rows.length,
        duplicatesSkipped: result.duplicates,
        unresolved: result.unresolved.map(r => r.name),
        rows: result.rows,
      });
    } catch (err) {
      return errorResult(err);
    }
  });
}
