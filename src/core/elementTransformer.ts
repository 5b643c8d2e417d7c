/**
 * Element Transformer
 *
 * Decides, for one data element, whether and how its value is rewritten.
 * The decision is returned as a tagged outcome; the input element is never
 * mutated and nothing is thrown for elements that cannot be handled.
 *
 * Policy:
 * 1. private (odd group) tags are removed;
 * 2. tags outside the catalog, or not selected, pass through;
 * 3. selected tags are rewritten according to their VR.
 *
 * An empty or absent value is never replaced by a dummy value.
 */

import { DEFAULT_CATALOG, type TagCatalog } from './tagCatalog';
import type { TagSelection } from './tagSelection';
import type { DicomElement } from './types';
import { cleanUid, isValidUid, type UidMappingTable } from './uidMappingTable';
import { classifyVr, type VrKind } from './vr';
import { elementValues, isEmptyValue } from '../utils/valueParsers';
import { isPrivateTag } from '../utils/tagUtils';

export const ANONYMIZED_TEXT = 'ANONYMIZED';
export const ANONYMIZED_DATE = '18000101';
export const ANONYMIZED_TIME = '000000';
export const ANONYMIZED_NUMBER = '0';

/**
 * An element that could not be rewritten safely and was blanked instead.
 */
export interface TransformSkipped {
  tag: string;
  vr: string;
  reason: string;
}

export type TransformOutcome =
  | { kind: 'keep' }
  | { kind: 'replace'; element: DicomElement }
  | { kind: 'remove' }
  | { kind: 'skipped'; element: DicomElement; skipped: TransformSkipped };

export interface TransformContext {
  selection: TagSelection;
  uidTable: UidMappingTable;
  catalog?: TagCatalog;
  characterSet?: string;
}

/**
 * Apply the anonymization policy to a single element.
 */
export function transformElement(tag: string, element: DicomElement, context: TransformContext): TransformOutcome {
  if (isPrivateTag(tag)) {
    return { kind: 'remove' };
  }

  const catalog = context.catalog ?? DEFAULT_CATALOG;
  const entry = catalog.lookup(tag);
  if (!entry || !context.selection.has(tag)) {
    return { kind: 'keep' };
  }

  // Implicit VR files and unknown encodings fall back on the catalog VR
  const declared = element.vr && element.vr !== 'UN' ? element.vr : entry.vr;
  const vrKind = classifyVr(declared);
  return applyVrPolicy(tag, element, vrKind, context);
}

function applyVrPolicy(
  tag: string,
  element: DicomElement,
  vrKind: VrKind,
  context: TransformContext
): TransformOutcome {
  switch (vrKind.kind) {
    case 'text':
      return substitute(element, vrKind.vr, ANONYMIZED_TEXT);
    case 'date':
      return substitute(element, vrKind.vr, ANONYMIZED_DATE);
    case 'time':
      return substitute(element, vrKind.vr, ANONYMIZED_TIME);
    case 'numericString':
      return substitute(element, vrKind.vr, ANONYMIZED_NUMBER);
    case 'uid':
      return remapUids(tag, element, context);
    case 'sequence':
      return { kind: 'replace', element: blank(element, vrKind.vr) };
    case 'other':
      return { kind: 'replace', element: blank(element, vrKind.vr) };
    case 'unrecognized':
      return {
        kind: 'skipped',
        element: blank(element, element.vr),
        skipped: { tag, vr: vrKind.code, reason: `unrecognized VR "${vrKind.code}", value blanked` },
      };
  }
}

function substitute(element: DicomElement, vr: string, replacement: string): TransformOutcome {
  if (isEmptyValue(element)) {
    return { kind: 'keep' };
  }
  return { kind: 'replace', element: { vr, Value: replacement } };
}

function remapUids(tag: string, element: DicomElement, context: TransformContext): TransformOutcome {
  if (isEmptyValue(element)) {
    return { kind: 'keep' };
  }
  const originals = elementValues(element, context.characterSet).map(cleanUid);
  const malformed = originals.find((uid) => !isValidUid(uid));
  if (malformed !== undefined) {
    return {
      kind: 'skipped',
      element: blank(element, 'UI'),
      skipped: { tag, vr: 'UI', reason: `malformed UID "${malformed}", value blanked` },
    };
  }
  const remapped = originals.map((uid) => context.uidTable.resolve(uid));
  return { kind: 'replace', element: { vr: 'UI', Value: remapped.length === 1 ? remapped[0] : remapped } };
}

/**
 * Empty copy of an element, keeping its type: no items for a sequence,
 * zero bytes for binary data, an empty string otherwise.
 */
function blank(element: DicomElement, vr: string): DicomElement {
  if (element.items !== undefined || vr === 'SQ') {
    return { vr: 'SQ', items: [] };
  }
  if (element.Value instanceof Uint8Array) {
    return { vr, Value: new Uint8Array(0) };
  }
  return { vr, Value: '' };
}
