/**
 * Canonical form of a city or place name: upper case, no diacritics, single
 * spaces, punctuation dropped. "Ibagué " and "IBAGUE" share a key.
 */
export function cityKey(text: string | null | undefined): string {
  if (!text) {
    return '';
  }
  return text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, ' ')
    .trim();
}

export function sameCity(a: string | null | undefined, b: string | null | undefined): boolean {
  const key = cityKey(a);
  return key !== '' && key === cityKey(b);
}
