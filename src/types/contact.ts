import type { CountryTag, RawField } from './phone.js';

export interface ContactRecord {
  name: string;
  phones: RawField[];
  channel?: string;
  optIn?: string;
}

export interface OutputRow {
  Name: string;
  Phone_E164: string;
  Country: CountryTag;
  Channel: string;
  OptIn: string;
}

export const OUTPUT_COLUMNS = ['Name', 'Phone_E164', 'Country', 'Channel', 'OptIn'] as const;

export interface RowDefaults {
  channel?: string;
  optIn?: string;
}

export interface BatchResult {
  rows: OutputRow[];
  /** Records where no field produced a usable number. */
  unresolved: ContactRecord[];
  /** Rows dropped because an earlier row already carried the number. */
  duplicates: number;
}

export type ExportLayout = 'google' | 'simple';

export interface ChannelListRow extends Record<string, string> {
  FirstName: string;
  GreetingName: string;
}

export interface ChannelLists {
  /** Every row with the greeting columns and its own Channel. */
  master: ChannelListRow[];
  whatsapp: ChannelListRow[];
  sms: ChannelListRow[];
}
