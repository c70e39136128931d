export const DEFAULT_GREETING_FALLBACK = 'amig@';

const PHONE_LIKE = /^[+()\-.\s0-9]+$/;
const HONORIFIC = /^(mr|mrs|ms|dr|ing\.|sr|sra|srta|ing|lic)\.?[\s,]+/i;
const EDGE_NON_LETTERS = /^[^A-Za-zÁÉÍÓÚÑáéíóúÜü]+|[^A-Za-zÁÉÍÓÚÑáéíóúÜü]+$/g;

/**
 * Best-effort first name for a greeting. Names that are really phone numbers
 * give an empty string.
 */
export function deriveFirstName(fullName: string): string {
  let name = fullName.trim();
  if (!name || PHONE_LIKE.test(name)) return '';

  name = name.replace(HONORIFIC, '');
  if (name.includes(',')) name = name.split(',', 1)[0].trim();

  const [first] = name.split(/\s+/).filter(Boolean);
  if (!first) return '';
  return first.replace(EDGE_NON_LETTERS, '');
}

export function greetingName(firstName: string, fallback: string = DEFAULT_GREETING_FALLBACK): string {
  return firstName || fallback;
}
