import type { OutputRow } from '../types/index.js';

/**
 * Batch-scoped record of numbers already emitted. Equality is exact string
 * equality on the E.164 form.
 */
export class Deduplicator {
  private readonly seen = new Set<string>();

  /** True when the row's number is new; the number is then marked as seen. */
  accept(row: OutputRow): boolean {
    if (this.seen.has(row.Phone_E164)) return false;
    this.seen.add(row.Phone_E164);
    return true;
  }

  has(phone: string): boolean {
    return this.seen.has(phone);
  }

  get size(): number {
    return this.seen.size;
  }

  reset(): void {
    this.seen.clear();
  }
}

/** Keep the first row for every number, dropping later ones as they are. */
export function dedupeRows(rows: readonly OutputRow[]): OutputRow[] {
  const dedup = new Deduplicator();
  return rows.filter(row => dedup.accept(row));
}
