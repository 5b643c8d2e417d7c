/**
 * Value Parsers: text access to element values
 *
 * Element values read from a file stay as raw bytes. These helpers decode them
 * on demand, honouring the dataset's Specific Character Set.
 */

import type { DicomElement } from '../core/types';

export const DEFAULT_CHARACTER_SET = 'ISO_IR 6';

/**
 * Decode string based on DICOM character set
 */
export function decodeString(bytes: Uint8Array, characterSet: string = DEFAULT_CHARACTER_SET): string {
  if (characterSet.includes('ISO_IR 192') || characterSet.includes('UTF-8')) {
    return new TextDecoder('utf-8').decode(bytes);
  }

  // Default repertoire and Latin-1: one byte per character
  let str = '';
  for (let i = 0; i < bytes.length; i++) {
    str += String.fromCharCode(bytes[i]);
  }
  return str;
}

/**
 * Remove trailing NUL and space padding.
 */
export function trimPadding(value: string): string {
  let end = value.length;
  while (end > 0 && (value.charCodeAt(end - 1) === 0 || value.charCodeAt(end - 1) === 0x20)) {
    end--;
  }
  return value.slice(0, end);
}

/**
 * Full text of an element (multiple values joined by `\`), padding removed.
 * Undefined when the element has no value or is a sequence.
 */
export function elementText(element: DicomElement, characterSet?: string): string | undefined {
  const value = element.Value;
  if (value === undefined || element.items !== undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    return trimPadding(value);
  }
  if (Array.isArray(value)) {
    return trimPadding(value.join('\\'));
  }
  return trimPadding(decodeString(value, characterSet));
}

/**
 * Individual values of a multi-valued string element, each trimmed.
 */
export function elementValues(element: DicomElement, characterSet?: string): string[] {
  const text = elementText(element, characterSet);
  if (text === undefined || text === '') {
    return [];
  }
  return text.split('\\').map((part) => part.trim());
}

/**
 * True when the element carries no data: no value, zero bytes, only padding,
 * or a sequence without items.
 */
export function isEmptyValue(element: DicomElement): boolean {
  if (element.items !== undefined) {
    return element.items.length === 0;
  }
  const value = element.Value;
  if (value === undefined) {
    return true;
  }
  if (value instanceof Uint8Array) {
    return value.every((byte) => byte === 0x00 || byte === 0x20);
  }
  return elementText(element) === '';
}
