import type {
  BatchResult,
  BestNumber,
  ContactRecord,
  FieldInspection,
  OutputRow,
  ResolvedNumber,
  RowDefaults,
} from '../types/index.js';
import { Deduplicator } from './dedup.js';
import { cleanerOptionsSchema, type CleanerOptions, type CleanerOptionsInput } from './options.js';
import { inspectField, resolveField } from './resolve.js';
import { selectBestNumber } from './select.js';

export const DEFAULT_CHANNEL = 'WhatsApp';

/**
 * Turns contact records into deduplicated E.164 output rows. Options are fixed
 * at construction, so cleaners with different policies can run side by side.
 */
export class PhoneCleaner {
  readonly options: CleanerOptions;
  private readonly dedup = new Deduplicator();

  constructor(options: CleanerOptionsInput = {}) {
    this.options = cleanerOptionsSchema.parse(options);
  }

  resolveField(value: string): ResolvedNumber[] {
    return resolveField(value, this.options);
  }

  inspectField(value: string, label?: string): FieldInspection {
    return inspectField(value, label, this.options);
  }

  selectBest(record: ContactRecord): BestNumber | null {
    return selectBestNumber(record.phones, this.options);
  }

  toOutputRow(record: ContactRecord, best: BestNumber, defaults: RowDefaults = {}): OutputRow {
    return {
      Name: record.name,
      Phone_E164: best.phone,
      Country: best.country,
      Channel: record.channel || defaults.channel || DEFAULT_CHANNEL,
      OptIn: record.optIn || defaults.optIn || '',
    };
  }

  /**
   * Clean one batch in input order. The seen-set is cleared first, so batches
   * never see each other's numbers.
   */
  cleanBatch(records: Iterable<ContactRecord>, defaults: RowDefaults = {}): BatchResult {
    this.dedup.reset();
    const result: BatchResult = { rows: [], unresolved: [], duplicates: 0 };

    for (const record of records) {
      const best = this.selectBest(record);
      if (!best) {
        result.unresolved.push(record);
        continue;
      }
      const row = this.toOutputRow(record, best, defaults);
      if (this.dedup.accept(row)) {
        result.rows.push(row);
      } else {
        result.duplicates++;
      }
    }

    return result;
  }
}
