import type { Candidate, NormalizedNumber } from '../types/index.js';
import { InvalidNumberError } from '../utils/index.js';
import { DEFAULT_CLEANER_OPTIONS, type NormalizeOptions } from './options.js';

export const MIN_DIGITS = 8;
export const MAX_DIGITS = 15;

const US_CODE = '+1';
const MX_PREFIX = '52';
const MX_MOBILE_PREFIX = '521';

export function onlyDigits(text: string): string {
  return text.replace(/\D/g, '');
}

/**
 * Normalize a raw phone string to E.164.
 *
 * An explicit `+` is authoritative and checked first. Bare digits are read as
 * US (11 digits with a leading 1), the default country (10 digits), Mexico
 * (52 + 10 or 521 + 10) and finally as a generic international number cut to
 * its first 15 digits.
 *
 * @throws InvalidNumberError when no rule applies
 */
export function normalizePhone(
  raw: string,
  options: NormalizeOptions = DEFAULT_CLEANER_OPTIONS,
): NormalizedNumber {
  const text = raw.trim();

  if (text.startsWith('+')) {
    const digits = onlyDigits(text);
    if (digits.length < MIN_DIGITS) {
      throw new InvalidNumberError(raw, `fewer than ${MIN_DIGITS} digits after "+"`);
    }
    if (digits.length > MAX_DIGITS) {
      throw new InvalidNumberError(raw, `more than ${MAX_DIGITS} digits after "+"`);
    }
    return '+' + applyMexicoDisambiguator(digits, options);
  }

  const digits = onlyDigits(text);

  if (digits.length === 11 && digits.startsWith('1')) {
    return US_CODE + digits.slice(1);
  }
  if (digits.length === 10) {
    return options.defaultCountryCode + digits;
  }
  if (digits.startsWith(MX_PREFIX) && (digits.length === 12 || digits.length === 13)) {
    return '+' + applyMexicoDisambiguator(digits, options);
  }
  if (digits.length >= MIN_DIGITS) {
    return '+' + digits.slice(0, MAX_DIGITS);
  }

  throw new InvalidNumberError(raw, digits ? `only ${digits.length} digits` : 'no digits');
}

/** Like {@link normalizePhone} but returns null instead of throwing. */
export function tryNormalizePhone(
  raw: string,
  options: NormalizeOptions = DEFAULT_CLEANER_OPTIONS,
): NormalizedNumber | null {
  try {
    return normalizePhone(raw, options);
  } catch (err) {
    if (err instanceof InvalidNumberError) return null;
    throw err;
  }
}

export function normalizeCandidate(
  candidate: Candidate,
  options: NormalizeOptions = DEFAULT_CLEANER_OPTIONS,
): NormalizedNumber {
  return candidate.normalized ?? normalizePhone(candidateText(candidate), options);
}

export function candidateText(candidate: Candidate): string {
  return (candidate.international ? '+' : '') + candidate.digits;
}

/** 52 + 10 digits becomes 521 + 10 digits when the policy is on. */
function applyMexicoDisambiguator(digits: string, options: NormalizeOptions): string {
  if (!options.mexicoMobileDisambiguatorEnabled) return digits;
  if (!digits.startsWith(MX_PREFIX) || digits.startsWith(MX_MOBILE_PREFIX)) return digits;
  if (digits.length - MX_PREFIX.length !== 10) return digits;
  return MX_MOBILE_PREFIX + digits.slice(MX_PREFIX.length);
}
