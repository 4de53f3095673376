/**
 * Text helpers shared by the chunking primitives and the normalizers
 */

/**
 * Marker the wiki scraper leaves behind from "[edit]" links on section headings
 */
export const HEADING_ARTIFACT_MARKER = '[]';

/**
 * Split on runs of whitespace, ignoring leading/trailing whitespace
 */
export function splitWords(text: string): string[] {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/) : [];
}

export function countWords(text: string): number {
  return splitWords(text).length;
}

export function countWordsInItems(items: readonly string[]): number {
  return items.reduce((total, item) => total + countWords(item), 0);
}

/**
 * Remove every edit-link marker from a heading and trim it for display
 */
export function cleanHeading(heading: string): string {
  return heading.replaceAll(HEADING_ARTIFACT_MARKER, '').trim();
}

/**
 * At least one cased character and no lower-case ones ("MAP SETUP 2" is upper case)
 */
export function isUpperCase(text: string): boolean {
  return text !== text.toLowerCase() && text === text.toUpperCase();
}

/**
 * Clamp an integer into [min, max]
 */
export function clampInt(value: number, min: number, max: number): number {
  const truncated = Number.isFinite(value) ? Math.trunc(value) : min;
  return Math.min(Math.max(truncated, min), max);
}
