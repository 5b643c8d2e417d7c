/**
 * DICOM Anonymizer (Basic Attribute Confidentiality Profile)
 *
 * Anonymizes one dataset in memory: every element goes through the Element
 * Transformer (sequence items included), private tags are stripped, and the
 * File Meta Information is kept in step with the new SOP Instance UID.
 */

import { createDataSet } from './dataset';
import { transformElement, type TransformContext, type TransformSkipped } from './elementTransformer';
import { stripPrivateTags } from './privateTagStripper';
import type { TagCatalog } from './tagCatalog';
import { TagSelection } from './tagSelection';
import type { DicomDataSet, DicomElement, SequenceItem } from './types';
import { UidMappingTable } from './uidMappingTable';
import { isEmptyValue } from '../utils/valueParsers';

const SOP_INSTANCE_UID = 'x00080018';
const MEDIA_STORAGE_SOP_INSTANCE_UID = 'x00020003';

export interface AnonymizationOptions {
  /** Tags to anonymize. Default: every catalog tag */
  selection?: TagSelection;
  /**
   * UID map shared across the files of a batch. A fresh table is used when
   * omitted, so UIDs are only consistent within this one dataset.
   */
  uidTable?: UidMappingTable;
  /** If true, keep private tags. Default: false (remove private tags) */
  keepPrivateTags?: boolean;
  catalog?: TagCatalog;
}

export interface AnonymizationOutput {
  dataset: DicomDataSet;
  /** Elements that were blanked because they could not be rewritten */
  skipped: TransformSkipped[];
}

/**
 * Anonymize a DICOM dataset.
 * Returns a NEW dataset; the original dataset and its elements are not mutated.
 */
export function anonymize(dataset: DicomDataSet, options: AnonymizationOptions = {}): AnonymizationOutput {
  const context: TransformContext = {
    selection: options.selection ?? TagSelection.all(options.catalog),
    uidTable: options.uidTable ?? new UidMappingTable(),
    catalog: options.catalog,
    characterSet: dataset.characterSet,
  };
  const skipped: TransformSkipped[] = [];
  const keepPrivateTags = options.keepPrivateTags ?? false;

  let dict = transformDict(dataset.dict, context, keepPrivateTags, skipped);
  if (!keepPrivateTags) {
    dict = stripPrivateTags(dict);
  }
  syncMediaStorageSopInstance(dataset.dict, dict);

  return {
    dataset: createDataSet(dict, dataset.transferSyntax, dataset.characterSet),
    skipped,
  };
}

function transformDict(
  dict: Record<string, DicomElement>,
  context: TransformContext,
  keepPrivateTags: boolean,
  skipped: TransformSkipped[]
): Record<string, DicomElement> {
  const result: Record<string, DicomElement> = {};
  for (const tag in dict) {
    const element = dict[tag];
    const outcome = transformElement(tag, element, context);
    switch (outcome.kind) {
      case 'keep':
        result[tag] = transformItems(element, context, keepPrivateTags, skipped);
        break;
      case 'replace':
        result[tag] = outcome.element;
        break;
      case 'skipped':
        result[tag] = outcome.element;
        skipped.push(outcome.skipped);
        break;
      case 'remove':
        if (keepPrivateTags) {
          result[tag] = element;
        }
        break;
    }
  }
  return result;
}

function transformItems(
  element: DicomElement,
  context: TransformContext,
  keepPrivateTags: boolean,
  skipped: TransformSkipped[]
): DicomElement {
  if (!element.items || element.items.length === 0) {
    return element;
  }
  return {
    ...element,
    items: element.items.map(
      (item): SequenceItem => ({ elements: transformDict(item.elements, context, keepPrivateTags, skipped) })
    ),
  };
}

/**
 * (0002,0003) must name the same instance as (0008,0018).
 */
function syncMediaStorageSopInstance(
  original: Record<string, DicomElement>,
  anonymized: Record<string, DicomElement>
): void {
  const sopInstance = anonymized[SOP_INSTANCE_UID];
  const meta = anonymized[MEDIA_STORAGE_SOP_INSTANCE_UID];
  // A blanked (malformed) SOP Instance UID leaves the required meta element as read
  if (!sopInstance || !meta || sopInstance === original[SOP_INSTANCE_UID] || isEmptyValue(sopInstance)) {
    return;
  }
  anonymized[MEDIA_STORAGE_SOP_INSTANCE_UID] = { vr: 'UI', Value: sopInstance.Value };
}
