import type { Candidate, FieldInspection, ResolvedNumber } from '../types/index.js';
import { InvalidNumberError } from '../utils/index.js';
import { classifyCountry, describeNumber } from './classify.js';
import { extractFieldCandidates } from './extract.js';
import { normalizeCandidate } from './normalize.js';
import { DEFAULT_CLEANER_OPTIONS, type CleanerOptions, type NormalizeOptions } from './options.js';
import { isMobileLabel } from './labels.js';
import { tokenizeField } from './tokenize.js';

/**
 * Every valid number recovered from one raw field, in discovery order and
 * without repeats. Candidates that fail normalization are skipped.
 */
export function resolveField(
  value: string,
  options: NormalizeOptions = DEFAULT_CLEANER_OPTIONS,
): ResolvedNumber[] {
  return resolveCandidates(extractFieldCandidates(value, options), options);
}

function resolveCandidates(candidates: Candidate[], options: NormalizeOptions): ResolvedNumber[] {
  const resolved: ResolvedNumber[] = [];
  const seen = new Set<string>();

  for (const candidate of candidates) {
    let phone: string;
    try {
      phone = normalizeCandidate(candidate, options);
    } catch (err) {
      if (err instanceof InvalidNumberError) continue;
      throw err;
    }
    if (seen.has(phone)) continue;
    seen.add(phone);
    resolved.push({ phone, country: classifyCountry(phone) });
  }

  return resolved;
}

export function inspectField(
  value: string,
  label: string | undefined,
  options: CleanerOptions = DEFAULT_CLEANER_OPTIONS,
): FieldInspection {
  const candidates = extractFieldCandidates(value, options);
  return {
    value,
    label,
    mobileLabel: isMobileLabel(label, options.mobileLabelKeywords),
    tokens: tokenizeField(value),
    candidates,
    numbers: resolveCandidates(candidates, options).map(n => describeNumber(n.phone)),
  };
}
