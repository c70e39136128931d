import type { BestNumber, RawField } from '../types/index.js';
import { DEFAULT_CLEANER_OPTIONS, type CleanerOptions } from './options.js';
import { isMobileLabel } from './labels.js';
import { resolveField } from './resolve.js';

/**
 * Pick one number for a contact. A field labelled as mobile wins as soon as it
 * yields a number; otherwise the first number found in field order is used.
 */
export function selectBestNumber(
  fields: readonly RawField[],
  options: CleanerOptions = DEFAULT_CLEANER_OPTIONS,
): BestNumber | null {
  let fallback: BestNumber | null = null;

  for (const field of fields) {
    if (!field.value.trim()) continue;

    const [first] = resolveField(field.value, options);
    if (!first) continue;

    const best: BestNumber = field.label ? { ...first, label: field.label } : first;
    if (isMobileLabel(field.label, options.mobileLabelKeywords)) return best;
    fallback ??= best;
  }

  return fallback;
}
