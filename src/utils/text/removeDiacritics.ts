/**
 * Removes diacritics from a string using Unicode normalization.
 *
 * Decomposes with NFD, then drops the combining marks in U+0300-U+036F.
 * Latin letters fold to their base letter; characters without a
 * decomposition into those marks pass through unchanged.
 *
 * @example
 * removeDiacritics("café") // "cafe"
 * removeDiacritics("niño") // "nino"
 * removeDiacritics("José") // "Jose"
 */
const DIACRITIC_MARKS_PATTERN = /[\u0300-\u036f]/g;

export function removeDiacritics(text: string): string {
  return text.normalize("NFD").replace(DIACRITIC_MARKS_PATTERN, "");
}
