/** `+` followed by 8 to 15 digits. */
export type NormalizedNumber = string;

export type CountryTag = 'US' | 'MX' | 'INTL' | 'UNKNOWN';

export interface RawField {
  value: string;
  label?: string;
}

export interface Candidate {
  digits: string;
  /** The text carried an explicit `+` before these digits. */
  international: boolean;
  /** Already normalized from the whole text; used without normalizing again. */
  normalized?: NormalizedNumber;
}

export interface ResolvedNumber {
  phone: NormalizedNumber;
  country: CountryTag;
}

export interface BestNumber extends ResolvedNumber {
  label?: string;
}

export interface NumberDetails extends ResolvedNumber {
  region?: string;
  possible: boolean;
  valid: boolean;
}

export interface FieldInspection {
  value: string;
  label?: string;
  mobileLabel: boolean;
  tokens: string[];
  candidates: Candidate[];
  numbers: NumberDetails[];
}
