/**
 * Tag Utilities: Tag format normalization and conversion
 */

const TAG_PATTERN = /^x[0-9a-f]{8}$/;

/**
 * Normalize tag format to x-prefixed lower-case format (e.g., "x0020000d").
 * Accepts "x0020000D", "0020,000D", "(0020,000D)" and "0020000D".
 */
export function normalizeTag(tag: string): string {
  const cleanTag = tag.trim().replace(/^x/i, '').replace(/,/g, '').replace(/[()\s]/g, '').toLowerCase();
  return `x${cleanTag}`;
}

/**
 * True when the value normalizes to a well-formed `xggggeeee` tag.
 */
export function isValidTag(tag: string): boolean {
  return TAG_PATTERN.test(normalizeTag(tag));
}

/**
 * Format tag with comma (e.g., "0010,0010")
 */
export function formatTagWithComma(tag: string): string {
  const cleanTag = normalizeTag(tag).slice(1).toUpperCase();
  if (cleanTag.length === 8) {
    return `${cleanTag.slice(0, 4)},${cleanTag.slice(4, 8)}`;
  }
  return cleanTag;
}

/**
 * Build an `xggggeeee` tag from its numeric parts.
 */
export function tagFromNumbers(group: number, element: number): string {
  return `x${group.toString(16).padStart(4, '0')}${element.toString(16).padStart(4, '0')}`;
}

/**
 * Group number of a tag, or null when the tag is malformed.
 */
export function getGroupNumber(tag: string): number | null {
  const normalized = normalizeTag(tag);
  if (!TAG_PATTERN.test(normalized)) return null;
  return parseInt(normalized.slice(1, 5), 16);
}

/**
 * Element number of a tag, or null when the tag is malformed.
 */
export function getElementNumber(tag: string): number | null {
  const normalized = normalizeTag(tag);
  if (!TAG_PATTERN.test(normalized)) return null;
  return parseInt(normalized.slice(5, 9), 16);
}

/**
 * Private (manufacturer) tags have an odd group number.
 */
export function isPrivateTag(tag: string): boolean {
  const group = getGroupNumber(tag);
  return group !== null && group % 2 !== 0;
}
