import { z } from 'zod';
import * as fs from 'node:fs/promises';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { formatCsv, parseContactExport, toContactRecords } from '../contacts/index.js';
import { OUTPUT_COLUMNS } from '../types/index.js';
import { logger } from '../utils/index.js';
import { cleanerFor, errorResult, jsonResult, type ToolContext } from './context.js';

export function registerExportTool(server: McpServer, ctx: ToolContext): void {
  server.registerTool('clean_contact_export', {
    description: 'Clean a contact export file (Google Contacts CSV/TSV or a single phone column list) into a Name, Phone_E164, Country, Channel, OptIn CSV.',
    inputSchema: {
      inputPath: z.string().describe('Path of the CSV or TSV export to read'),
      outputPath: z.string().optional().describe('Where to write the cleaned CSV; required unless dryRun'),
      dryRun: z.boolean().optional().default(false).describe('Report what would be written without writing'),
      channel: z.string().optional().describe('Channel for rows whose export carries none'),
      optIn: z.string().optional().describe('OptIn value for rows whose export carries none'),
      mexicoMobileDisambiguator: z.boolean().optional()
        .describe('Override the configured 52 to 521 insertion policy for this file'),
    },
  }, async ({ inputPath, outputPath, dryRun, channel, optIn, mexicoMobileDisambiguator }) => {
    try {
      if (!dryRun && !outputPath) {
        return errorResult(new Error('outputPath is required unless dryRun is set'));
      }

      const text = await fs.readFile(inputPath, 'utf-8');
      const parsed = parseContactExport(text);
      const { layout, records } = toContactRecords(parsed.rows, parsed.columns);

      const cleaner = cleanerFor(ctx, mexicoMobileDisambiguator);
      const result = cleaner.cleanBatch(records, { channel: channel ?? ctx.config.defaultChannel, optIn });

      logger.info(`clean_contact_export: ${inputPath} (${layout}) ${records.length} rows, `
        + `${result.rows.length} cleaned, ${result.unresolved.length} without a usable number`);

      const summary = {
        layout,
        totalRows: records.length,
        cleaned: result.rows.length,
        duplicatesSkipped: result.duplicates,
        unresolved: result.unresolved.map(r => r.name),
      };

      if (dryRun || !outputPath) {
        return jsonResult({ dryRun: true, ...summary, rows: result.rows });
      }

      await fs.writeFile(outputPath, formatCsv(result.rows, OUTPUT_COLUMNS), 'utf-8');
      return jsonResult({
        ...summary,
        outputPath,
        message: `Wrote ${result.rows.length} cleaned contacts to ${outputPath}`,
      });
    } catch (err) {
      return errorResult(err);
    }
  });
}
