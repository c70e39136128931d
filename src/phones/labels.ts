/** Lowercase and drop combining accents, so "Móvil" and "movil" compare equal. */
function foldLabel(text: string): string {
  return text.normalize('NFD').replace(/[\u0300-\u036f]/g, '').toLowerCase();
}

export function isMobileLabel(label: string | undefined, keywords: readonly string[]): boolean {
  if (!label) return false;
  const folded = foldLabel(label);
  return keywords.some(k => folded.includes(foldLabel(k)));
}
