export { tokenizeField } from './tokenize.js';
export { extractCandidates, extractFieldCandidates } from './extract.js';
export { normalizePhone, normalizeCandidate, tryNormalizePhone, onlyDigits } from './normalize.js';
export { classifyCountry, describeNumber } from './classify.js';
export { isMobileLabel } from './labels.js';
export { resolveField, inspectField } from './resolve.js';
export { selectBestNumber } from './select.js';
export { Deduplicator, dedupeRows } from './dedup.js';
export { PhoneCleaner, DEFAULT_CHANNEL } from './engine.js';
export {
  cleanerOptionsSchema,
  DEFAULT_CLEANER_OPTIONS,
  DEFAULT_MOBILE_LABEL_KEYWORDS,
  type CleanerOptions,
  type CleanerOptionsInput,
} from './options.js';
