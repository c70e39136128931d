import { describe, it, expect } from 'vitest';
import {
  normalizeCandidate,
  normalizePhone,
  tryNormalizePhone,
} from '../../src/phones/normalize.js';
import { cleanerOptionsSchema } from '../../src/phones/options.js';
import { InvalidNumberError } from '../../src/utils/errors.js';

const withDisambiguator = cleanerOptionsSchema.parse({ mexicoMobileDisambiguatorEnabled: true });

describe('normalizePhone', () => {
  it('should keep an already normalized number unchanged', () => {
    expect(normalizePhone('+14155551212')).toBe('+14155551212');
  });

  it('should prefix bare 10-digit numbers with +1', () => {
    expect(normalizePhone('2145551212')).toBe('+12145551212');
  });

  it('should read 11 digits with a leading 1 as US', () => {
    expect(normalizePhone('12145551212')).toBe('+12145551212');
  });

  it('should strip US punctuation', () => {
    expect(normalizePhone('(214) 555-1212')).toBe('+12145551212');
    expect(normalizePhone('1-214-555-1212')).toBe('+12145551212');
    expect(normalizePhone('214.555.1212')).toBe('+12145551212');
  });

  it('should strip separators after an explicit plus', () => {
    expect(normalizePhone('+44 20 7946 0958')).toBe('+442079460958');
  });

  it('should read 52 followed by 10 digits as Mexico', () => {
    expect(normalizePhone('52 55 1234 5678')).toBe('+525512345678');
  });

  it('should insert the mobile 1 after 52 when the policy is on', () => {
    expect(normalizePhone('52 55 1234 5678', withDisambiguator)).toBe('+5215512345678');
    expect(normalizePhone('+52 55 1234 5678', withDisambiguator)).toBe('+5215512345678');
  });

  it('should not insert a second 1 into a 521 number', () => {
    expect(normalizePhone('+5215512345678', withDisambiguator)).toBe('+5215512345678');
    expect(normalizePhone('5215512345678')).toBe('+5215512345678');
  });

  it('should leave +52 numbers alone when the policy is off', () => {
    expect(normalizePhone('+52 55 1234 5678')).toBe('+525512345678');
  });

  it('should use the configured default country for 10 digits', () => {
    const options = cleanerOptionsSchema.parse({ defaultCountryCode: '+52' });
    expect(normalizePhone('55 1234 5678', options)).toBe('+525512345678');
  });

  it('should read other long digit strings as international', () => {
    expect(normalizePhone('442079460958')).toBe('+442079460958');
    expect(normalizePhone('123456789')).toBe('+123456789');
  });

  it('should keep the leading 15 digits of an overlong bare number', () => {
    expect(normalizePhone('1234567890123456789')).toBe('+123456789012345');
  });

  it('should reject text without enough digits', () => {
    expect(() => normalizePhone('')).toThrow(InvalidNumberError);
    expect(() => normalizePhone('N/A')).toThrow(InvalidNumberError);
    expect(() => normalizePhone('555-1212')).toThrow(InvalidNumberError);
    expect(() => normalizePhone('+1234567')).toThrow(InvalidNumberError);
  });

  it('should reject an explicit number longer than 15 digits', () => {
    expect(() => normalizePhone('+1234567890123456')).toThrow('more than 15 digits');
  });
});

describe('tryNormalizePhone', () => {
  it('should return null instead of throwing', () => {
    expect(tryNormalizePhone('N/A')).toBeNull();
    expect(tryNormalizePhone('2145551212')).toBe('+12145551212');
  });
});

describe('normalizeCandidate', () => {
  it('should honour the international marker', () => {
    expect(normalizeCandidate({ digits: '12145551212', international: true })).toBe('+12145551212');
    expect(normalizeCandidate({ digits: '2145551212', international: false })).toBe('+12145551212');
    expect(normalizeCandidate({ digits: '2145551212', international: true })).toBe('+2145551212');
  });
});
