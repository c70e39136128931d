import { parsePhoneNumberFromString } from 'libphonenumber-js';
import type { CountryTag, NumberDetails } from '../types/index.js';

const E164 = /^\+\d{8,15}$/;

/** Coarse country tag from the E.164 prefix alone. */
export function classifyCountry(phone: string): CountryTag {
  if (!E164.test(phone)) return 'UNKNOWN';
  if (phone.startsWith('+1')) return 'US';
  if (phone.startsWith('+52')) return 'MX';
  return 'INTL';
}

/**
 * Prefix tag plus libphonenumber's reading of the number. Only used to explain
 * a result; the cleaner never decides anything on it.
 */
export function describeNumber(phone: string): NumberDetails {
  const parsed = parsePhoneNumberFromString(phone);
  return {
    phone,
    country: classifyCountry(phone),
    region: parsed?.country,
    possible: parsed?.isPossible() ?? false,
    valid: parsed?.isValid() ?? false,
  };
}
