/**
 * Removes combining marks after NFD decomposition.
 *
 * Folds the Cyrillic letters that decompose (ё → е, й → и) along with
 * Latin accents, so "Могилёв" and "Могилев" compare equal.
 *
 * @example
 * removeDiacritics("Могилёв") // "Могилев"
 * removeDiacritics("café") // "cafe"
 */
const DIACRITIC_MARKS_PATTERN = /[\u0300-\u036f]/g;

export function removeDiacritics(text: string): string {
  return text.normalize("NFD").replace(DIACRITIC_MARKS_PATTERN, "");
}
