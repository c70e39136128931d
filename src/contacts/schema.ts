import type { ContactRecord, ExportLayout } from '../types/index.js';
import { ExportFormatError } from '../utils/index.js';
import { createContactRecord, field, googleDisplayName, googlePhoneFields, type ExportRow } from './model.js';

/** Single-phone column names, most specific first. */
export const SIMPLE_PHONE_COLUMNS = ['Phone_E164', 'Phone', 'Phone Number', 'Mobile'];

export function detectLayout(columns: readonly string[]): ExportLayout {
  if (columns.includes('Phone 1 - Value')) return 'google';
  if (SIMPLE_PHONE_COLUMNS.some(c => columns.includes(c))) return 'simple';
  throw new ExportFormatError(
    `No phone column found; expected "Phone 1 - Value" or one of ${SIMPLE_PHONE_COLUMNS.join(', ')}`,
  );
}

export function rowToContactRecord(row: ExportRow, layout: ExportLayout): ContactRecord {
  if (layout === 'google') {
    return createContactRecord({ name: googleDisplayName(row), phones: googlePhoneFields(row) });
  }

  const column = SIMPLE_PHONE_COLUMNS.find(c => row[c] !== undefined) ?? SIMPLE_PHONE_COLUMNS[0];
  return createContactRecord({
    name: field(row, 'Name'),
    phones: [{ value: field(row, column), label: column === 'Mobile' ? 'Mobile' : undefined }],
    channel: field(row, 'Channel'),
    optIn: field(row, 'OptIn'),
  });
}

/** Map every row of an export onto contact records, detecting the layout from its columns. */
export function toContactRecords(rows: readonly ExportRow[], columns: readonly string[]): {
  layout: ExportLayout;
  records: ContactRecord[];
} {
  const layout = detectLayout(columns);
  return { layout, records: rows.map(row => rowToContactRecord(row, layout)) };
}
