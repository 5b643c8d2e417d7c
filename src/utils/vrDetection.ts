/**
 * VR Detection: VR lookup for implicit VR transfer syntax
 *
 * Implicit VR files do not state each element's VR. It is taken from the tag
 * catalog, then from the data dictionary in `../data/vrDictionary.json`, then
 * from structural rules; anything else is read as UN.
 */

import vrDictionary from '../data/vrDictionary.json';
import { DEFAULT_CATALOG } from '../core/tagCatalog';
import { isKnownVr } from '../core/vr';
import { tagFromNumbers } from './tagUtils';

const VR_MAP: ReadonlyMap<string, string> = new Map(
  Object.entries(vrDictionary).filter(([, vr]) => isKnownVr(vr))
);

/**
 * Detect VR for a tag in implicit VR transfer syntax
 * @param group - Tag group (e.g., 0x0010)
 * @param element - Tag element (e.g., 0x0010)
 * @returns Detected VR or 'UN' if unknown
 */
export function detectVR(group: number, element: number): string {
  const tag = tagFromNumbers(group, element);

  const catalogEntry = DEFAULT_CATALOG.lookup(tag);
  if (catalogEntry) {
    return catalogEntry.vr;
  }

  const dictionaryVR = VR_MAP.get(tag);
  if (dictionaryVR) {
    return dictionaryVR;
  }

  // Group Length
  if (element === 0x0000) {
    return 'UL';
  }

  // Private Creator
  if (group % 2 !== 0 && element >= 0x0010 && element <= 0x00ff) {
    return 'LO';
  }

  return 'UN';
}
