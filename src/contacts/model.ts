import type { ContactRecord, RawField } from '../types/index.js';

export const GOOGLE_PHONE_SLOTS = 6;
export const UNKNOWN_NAME = 'Unknown';

export type ExportRow = Record<string, string | undefined>;

export function field(row: ExportRow, column: string): string {
  return (row[column] ?? '').trim();
}

export function createContactRecord(fields: Partial<ContactRecord>): ContactRecord {
  const record: ContactRecord = {
    name: fields.name?.trim() || UNKNOWN_NAME,
    phones: (fields.phones ?? []).map(p => (p.label ? { value: p.value, label: p.label } : { value: p.value })),
  };
  if (fields.channel) record.channel = fields.channel;
  if (fields.optIn) record.optIn = fields.optIn;
  return record;
}

/**
 * Display name for a Google Contacts row: first and last name, then nickname,
 * organization and first email.
 */
export function googleDisplayName(row: ExportRow): string {
  const name = [field(row, 'First Name'), field(row, 'Last Name')].filter(Boolean).join(' ');
  return name
    || field(row, 'Nickname')
    || field(row, 'Organization Name')
    || field(row, 'E-mail 1 - Value')
    || UNKNOWN_NAME;
}

export function googlePhoneFields(row: ExportRow): RawField[] {
  const phones: RawField[] = [];
  for (let slot = 1; slot <= GOOGLE_PHONE_SLOTS; slot++) {
    const value = field(row, `Phone ${slot} - Value`);
    const label = field(row, `Phone ${slot} - Label`);
    phones.push(label ? { value, label } : { value });
  }
  return phones;
}
