import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import type { ExportRow } from './model.js';

const csvRowsSchema = z.array(z.array(z.string()));

export interface ParsedExport {
  columns: string[];
  rows: ExportRow[];
  delimiter: ',' | '\t';
}

/** Tab-separated when the header line has a tab, comma-separated otherwise. */
export function detectDelimiter(text: string): ',' | '\t' {
  const header = text.split(/\r?\n/, 1)[0] ?? '';
  return header.includes('\t') ? '\t' : ',';
}

/**
 * Parse a contact export into rows keyed by header. Short rows read as empty
 * strings for their missing columns.
 */
export function parseContactExport(text: string): ParsedExport {
  const body = text.replace(/^\uFEFF/, '');
  const delimiter = detectDelimiter(body);
  const records = csvRowsSchema.parse(parse(body, {
    delimiter,
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
  }));

  const [header = [], ...data] = records;
  const columns = header.map(c => c.trim());
  const rows = data.map(values => {
    const row: ExportRow = {};
    columns.forEach((column, i) => {
      row[column] = values[i] ?? '';
    });
    return row;
  });

  return { columns, rows, delimiter };
}

export function formatCsv<T extends object>(rows: readonly T[], columns: readonly string[]): string {
  return stringify([...rows], { header: true, columns: [...columns] });
}
