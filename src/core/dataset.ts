/**
 * Dataset construction helpers shared by the parser and the anonymizer.
 */

import type { DicomDataSet, DicomElement } from './types';
import { normalizeTag } from '../utils/tagUtils';
import { DEFAULT_CHARACTER_SET, elementText } from '../utils/valueParsers';

export const TRANSFER_SYNTAX_IMPLICIT_VR_LITTLE_ENDIAN = '1.2.840.10008.1.2';
export const TRANSFER_SYNTAX_EXPLICIT_VR_LITTLE_ENDIAN = '1.2.840.10008.1.2.1';
export const TRANSFER_SYNTAX_DEFLATED_EXPLICIT_VR_LITTLE_ENDIAN = '1.2.840.10008.1.2.1.99';
export const TRANSFER_SYNTAX_EXPLICIT_VR_BIG_ENDIAN = '1.2.840.10008.1.2.2';

/**
 * Wrap an element mapping with the DicomDataSet accessors.
 */
export function createDataSet(
  dict: Record<string, DicomElement>,
  transferSyntax: string = TRANSFER_SYNTAX_EXPLICIT_VR_LITTLE_ENDIAN,
  characterSet: string = DEFAULT_CHARACTER_SET
): DicomDataSet {
  return {
    dict,
    transferSyntax,
    characterSet,
    string: (tag) => {
      const element = dict[normalizeTag(tag)];
      return element ? elementText(element, characterSet) : undefined;
    },
  };
}
