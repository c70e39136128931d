import type { ChannelListRow, ChannelLists } from '../types/index.js';
import { deriveFirstName, greetingName, DEFAULT_GREETING_FALLBACK } from './greeting.js';
import type { ExportRow } from './model.js';

export const SMS_COUNTRIES = new Set(['US', 'MX']);

/** Add FirstName and GreetingName to a cleaned row, keeping its other columns. */
export function withGreeting(row: ExportRow, fallback: string = DEFAULT_GREETING_FALLBACK): ChannelListRow {
  const base: Record<string, string> = {};
  for (const [key, value] of Object.entries(row)) base[key] = value ?? '';
  const firstName = deriveFirstName(base.Name ?? '');
  return { ...base, FirstName: firstName, GreetingName: greetingName(firstName, fallback) };
}

/**
 * Split cleaned rows into send lists: WhatsApp gets every row, SMS only US
 * and MX numbers. The Channel column is forced to match the list; the master
 * list keeps each row's own Channel.
 */
export function buildChannelLists(
  rows: readonly ExportRow[],
  fallback: string = DEFAULT_GREETING_FALLBACK,
): ChannelLists {
  const enriched = rows.map(row => withGreeting(row, fallback));
  return {
    master: enriched,
    whatsapp: enriched.map(row => ({ ...row, Channel: 'WhatsApp' })),
    sms: enriched
      .filter(row => SMS_COUNTRIES.has((row.Country ?? '').trim().toUpperCase()))
      .map(row => ({ ...row, Channel: 'SMS' })),
  };
}

/** Header for a channel list: the input columns plus the greeting columns. */
export function channelListColumns(columns: readonly string[]): string[] {
  const out = [...columns];
  for (const column of ['Channel', 'FirstName', 'GreetingName']) {
    if (!out.includes(column)) out.push(column);
  }
  return out;
}
