/**
 * Private Tag Stripper
 *
 * Removes every manufacturer-private element (odd group number), including
 * those nested in sequence items, regardless of the tag selection.
 */

import type { DicomElement, SequenceItem } from './types';
import { isPrivateTag } from '../utils/tagUtils';

/**
 * Copy of `dict` without private elements. Public elements without nested
 * private content are returned as the same objects.
 */
export function stripPrivateTags(dict: Record<string, DicomElement>): Record<string, DicomElement> {
  const result: Record<string, DicomElement> = {};
  for (const tag in dict) {
    if (isPrivateTag(tag)) {
      continue;
    }
    result[tag] = stripElement(dict[tag]);
  }
  return result;
}

/**
 * Number of private elements in `dict`, nested items included.
 */
export function countPrivateTags(dict: Record<string, DicomElement>): number {
  let count = 0;
  for (const tag in dict) {
    if (isPrivateTag(tag)) {
      count++;
      continue;
    }
    for (const item of dict[tag].items ?? []) {
      count += countPrivateTags(item.elements);
    }
  }
  return count;
}

function stripElement(element: DicomElement): DicomElement {
  const items = element.items;
  if (!items || !items.some(hasPrivateContent)) {
    return element;
  }
  return {
    ...element,
    items: items.map((item): SequenceItem => ({ elements: stripPrivateTags(item.elements) })),
  };
}

function hasPrivateContent(item: SequenceItem): boolean {
  return countPrivateTags(item.elements) > 0;
}
