import type { Candidate } from '../types/index.js';
import { MAX_DIGITS, MIN_DIGITS, onlyDigits, tryNormalizePhone } from './normalize.js';
import { DEFAULT_CLEANER_OPTIONS, type NormalizeOptions } from './options.js';
import { tokenizeField } from './tokenize.js';

const DIGIT_RUN = /(\+?)(\d+)/g;

/** Fixed-width windows tried at every offset of a glued digit string. */
const SLIDING_WINDOWS: ReadonlyArray<{ width: number; prefix: string }> = [
  { width: 13, prefix: '521' },
  { width: 12, prefix: '52' },
  { width: 11, prefix: '1' },
];

/**
 * Find every phone-shaped digit sequence in a piece of text.
 *
 * Rule results are unioned in priority order: explicit `+` numbers, fixed
 * width country runs, sliding windows (only for glued or otherwise
 * unproductive text), then the whole text read as one number.
 */
export function extractCandidates(
  text: string,
  options: NormalizeOptions = DEFAULT_CLEANER_OPTIONS,
): Candidate[] {
  const explicit: Candidate[] = [];
  const bareRuns: string[] = [];

  const anchored = anchoredDigits(text);
  if (anchored) explicit.push({ digits: anchored, international: true });

  for (const match of text.matchAll(DIGIT_RUN)) {
    const run = match[2];
    if (!match[1]) {
      bareRuns.push(run);
      continue;
    }
    const { piece, rest } = splitExplicitRun(run);
    if (piece) explicit.push({ digits: piece, international: true });
    if (rest) bareRuns.push(rest);
  }

  const fixed: Candidate[] = [];
  for (const run of bareRuns) {
    if (matchesCountryRun(run)) fixed.push({ digits: run, international: false });
  }

  const found = [...explicit, ...fixed];

  const allDigits = onlyDigits(text);
  if (allDigits.length > MAX_DIGITS || found.length === 0) {
    found.push(...slidingWindows(allDigits));
  }

  const whole = tryNormalizePhone(text, options);
  if (whole) found.push({ digits: whole.slice(1), international: true, normalized: whole });

  return uniqueByDigits(found);
}

/**
 * Candidates for a whole raw field: every token is extracted on its own, and
 * the untokenized field is tried when no token produced anything.
 */
export function extractFieldCandidates(
  field: string,
  options: NormalizeOptions = DEFAULT_CLEANER_OPTIONS,
): Candidate[] {
  const fromTokens = uniqueByDigits(tokenizeField(field).flatMap(token => extractCandidates(token, options)));
  if (fromTokens.length > 0 || !field.trim()) return fromTokens;
  return extractCandidates(field, options);
}

/** Digits of text that starts with its only `+`, when they fit one number. */
function anchoredDigits(text: string): string | undefined {
  const trimmed = text.trim();
  if (!trimmed.startsWith('+') || trimmed.includes('+', 1)) return undefined;
  const digits = onlyDigits(trimmed);
  return digits.length >= MIN_DIGITS && digits.length <= MAX_DIGITS ? digits : undefined;
}

/**
 * Cut one `+` number off the front of a digit run. The width follows the
 * country code when it is known (US 11, MX 12 or 13); digits past it are
 * returned as a bare run.
 */
function splitExplicitRun(run: string): { piece?: string; rest: string } {
  if (run.length < MIN_DIGITS) return { rest: run };

  let width = MAX_DIGITS;
  if (run.startsWith('1')) width = 11;
  else if (run.startsWith('521')) width = 13;
  else if (run.startsWith('52')) width = 12;

  width = Math.min(width, run.length);
  return { piece: run.slice(0, width), rest: run.slice(width) };
}

function matchesCountryRun(run: string): boolean {
  switch (run.length) {
    case 13: return run.startsWith('521');
    case 12: return run.startsWith('52');
    case 11: return run.startsWith('1');
    case 10: return true;
    default: return false;
  }
}

function slidingWindows(digits: string): Candidate[] {
  const windows: Candidate[] = [];
  for (let offset = 0; offset < digits.length; offset++) {
    for (const { width, prefix } of SLIDING_WINDOWS) {
      if (offset + width > digits.length) continue;
      const window = digits.slice(offset, offset + width);
      if (window.startsWith(prefix)) windows.push({ digits: window, international: false });
    }
  }
  return windows;
}

function uniqueByDigits(candidates: Candidate[]): Candidate[] {
  const seen = new Set<string>();
  return candidates.filter(c => {
    if (seen.has(c.digits)) return false;
    seen.add(c.digits);
    return true;
  });
}
