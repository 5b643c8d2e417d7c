/**
 * DICOM Part 10 Reader
 *
 * Reads a DICOM file into an element mapping that keeps every value as the
 * raw bytes found on disk, so that elements the anonymizer does not touch
 * are written back unchanged.
 *
 * Supported: Explicit VR Little Endian, Implicit VR Little Endian, and the
 * encapsulated (compressed) transfer syntaxes built on Explicit VR Little
 * Endian. Big Endian and Deflated files are rejected.
 */

import {
  createDataSet,
  TRANSFER_SYNTAX_DEFLATED_EXPLICIT_VR_LITTLE_ENDIAN,
  TRANSFER_SYNTAX_EXPLICIT_VR_BIG_ENDIAN,
  TRANSFER_SYNTAX_EXPLICIT_VR_LITTLE_ENDIAN,
  TRANSFER_SYNTAX_IMPLICIT_VR_LITTLE_ENDIAN,
} from './dataset';
import { createParseError, DicomParseError } from './errors';
import type { DicomDataSet, DicomElement, SequenceItem } from './types';
import { requiresExplicitLength } from './vr';
import { SafeDataView } from '../utils/SafeDataView';
import { tagFromNumbers } from '../utils/tagUtils';
import { decodeString, DEFAULT_CHARACTER_SET, trimPadding } from '../utils/valueParsers';
import { detectVR } from '../utils/vrDetection';

const PREAMBLE_LENGTH = 128;
const UNDEFINED_LENGTH = 0xffffffff;
const ITEM_GROUP = 0xfffe;
const ITEM = 0xe000;
const ITEM_DELIMITATION = 0xe00d;
const SEQUENCE_DELIMITATION = 0xe0dd;
const PIXEL_DATA = 'x7fe00010';
const TRANSFER_SYNTAX_UID = 'x00020010';
const SPECIFIC_CHARACTER_SET = 'x00080005';

/**
 * Parse context
 */
interface ParseContext {
  explicitVR: boolean;
}

/**
 * Check if byte array has the Part 10 preamble and "DICM" prefix.
 */
export function canParse(byteArray: Uint8Array): boolean {
  if (byteArray.length < PREAMBLE_LENGTH + 4) {
    return false;
  }
  const magic = byteArray.subarray(PREAMBLE_LENGTH, PREAMBLE_LENGTH + 4);
  return String.fromCharCode(...magic) === 'DICM';
}

/**
 * Parse a DICOM Part 10 file.
 *
 * @throws DicomParseError when the bytes are not a readable DICOM file
 */
export function parse(byteArray: Uint8Array): DicomDataSet {
  if (!canParse(byteArray)) {
    throw createParseError('Not a DICOM Part 10 file (missing DICM prefix)', undefined, PREAMBLE_LENGTH);
  }

  // Private copy, so element views never alias the caller's buffer
  const buffer = new ArrayBuffer(byteArray.byteLength);
  new Uint8Array(buffer).set(byteArray);
  const view = new SafeDataView(buffer);
  view.setPosition(PREAMBLE_LENGTH + 4);

  try {
    const dict = readMetaInformation(view);
    const transferSyntax = readTransferSyntax(dict);
    const context = contextFor(transferSyntax);

    while (view.getRemainingBytes() > 0) {
      const { tag, element } = readElement(view, context);
      dict[tag] = element;
    }

    return createDataSet(dict, transferSyntax, readCharacterSet(dict));
  } catch (error) {
    if (error instanceof DicomParseError) {
      throw error;
    }
    throw createParseError(
      `Data element parsing failed - ${error instanceof Error ? error.message : 'Unknown error'}`,
      undefined,
      view.getPosition(),
      error
    );
  }
}

/**
 * Read the File Meta Information group (always Explicit VR Little Endian).
 */
function readMetaInformation(view: SafeDataView): Record<string, DicomElement> {
  const dict: Record<string, DicomElement> = {};
  const metaContext: ParseContext = { explicitVR: true };

  while (view.getRemainingBytes() >= 8 && view.peekUint16() === 0x0002) {
    const { tag, element } = readElement(view, metaContext);
    dict[tag] = element;
  }

  if (!dict[TRANSFER_SYNTAX_UID]) {
    throw createParseError('File Meta Information has no Transfer Syntax UID', TRANSFER_SYNTAX_UID, view.getPosition());
  }
  return dict;
}

function readTransferSyntax(dict: Record<string, DicomElement>): string {
  const value = dict[TRANSFER_SYNTAX_UID].Value;
  const text = value instanceof Uint8Array ? decodeString(value) : String(value ?? '');
  return trimPadding(text).trim();
}

function contextFor(transferSyntax: string): ParseContext {
  switch (transferSyntax) {
    case TRANSFER_SYNTAX_IMPLICIT_VR_LITTLE_ENDIAN:
      return { explicitVR: false };
    case TRANSFER_SYNTAX_EXPLICIT_VR_BIG_ENDIAN:
    case TRANSFER_SYNTAX_DEFLATED_EXPLICIT_VR_LITTLE_ENDIAN:
      throw createParseError(`Unsupported transfer syntax ${transferSyntax}`, TRANSFER_SYNTAX_UID);
    case TRANSFER_SYNTAX_EXPLICIT_VR_LITTLE_ENDIAN:
    default:
      return { explicitVR: true };
  }
}

function readCharacterSet(dict: Record<string, DicomElement>): string {
  const value = dict[SPECIFIC_CHARACTER_SET]?.Value;
  if (!(value instanceof Uint8Array)) {
    return DEFAULT_CHARACTER_SET;
  }
  const first = trimPadding(decodeString(value)).split('\\')[0].trim();
  return first || DEFAULT_CHARACTER_SET;
}

/**
 * Parse a single element
 */
function readElement(view: SafeDataView, context: ParseContext): { tag: string; element: DicomElement } {
  const start = view.getPosition();
  const { group, element: elementNumber } = view.readTag();
  const tag = tagFromNumbers(group, elementNumber);

  if (group === ITEM_GROUP) {
    throw createParseError('Unexpected item or delimiter outside a sequence', tag, start);
  }

  let vr: string;
  let length: number;
  if (context.explicitVR) {
    vr = view.readVR();
    if (!/^[A-Z]{2}$/.test(vr)) {
      throw createParseError(`Invalid VR "${vr}"`, tag, start);
    }
    if (requiresExplicitLength(vr)) {
      view.skip(2); // Reserved
      length = view.readUint32();
    } else {
      length = view.readUint16();
    }
  } else {
    vr = detectVR(group, elementNumber);
    length = view.readUint32();
  }

  if (length === UNDEFINED_LENGTH) {
    if (tag === PIXEL_DATA) {
      return { tag, element: { vr: context.explicitVR ? vr : 'OB', Value: readEncapsulated(view, tag), encapsulated: true } };
    }
    // SQ, or UN of undefined length: an Implicit VR Little Endian encoded sequence
    const itemContext = vr === 'UN' ? { explicitVR: false } : context;
    return { tag, element: { vr: 'SQ', items: readSequence(view, itemContext, undefined) } };
  }

  if (vr === 'SQ') {
    return { tag, element: { vr, items: readSequence(view, context, view.getPosition() + length) } };
  }

  if (length > view.getRemainingBytes()) {
    throw createParseError(`Value length ${length} exceeds remaining ${view.getRemainingBytes()} bytes`, tag, start);
  }
  return { tag, element: { vr, Value: view.readBytes(length) } };
}

/**
 * Read sequence items until `end`, or until the Sequence Delimitation Item
 * when the length is undefined.
 */
function readSequence(view: SafeDataView, context: ParseContext, end: number | undefined): SequenceItem[] {
  if (end !== undefined && end > view.byteLength) {
    throw createParseError('Sequence length out of bounds', undefined, view.getPosition());
  }
  const items: SequenceItem[] = [];

  while (end === undefined || view.getPosition() < end) {
    const position = view.getPosition();
    const { group, element } = view.readTag();
    const length = view.readUint32();

    if (group === ITEM_GROUP && element === SEQUENCE_DELIMITATION) {
      break;
    }
    if (group !== ITEM_GROUP || element !== ITEM) {
      throw createParseError('Expected sequence item', tagFromNumbers(group, element), position);
    }
    items.push({ elements: readItemElements(view, context, length === UNDEFINED_LENGTH ? undefined : view.getPosition() + length) });
  }

  return items;
}

function readItemElements(view: SafeDataView, context: ParseContext, end: number | undefined): Record<string, DicomElement> {
  const elements: Record<string, DicomElement> = {};
  if (end !== undefined && end > view.byteLength) {
    throw createParseError('Sequence item length out of bounds', 'xfffee000', view.getPosition());
  }

  while (end === undefined || view.getPosition() < end) {
    if (end === undefined && view.peekUint16() === ITEM_GROUP) {
      const { element } = view.readTag();
      view.readUint32();
      if (element !== ITEM_DELIMITATION) {
        throw createParseError('Expected item delimiter', tagFromNumbers(ITEM_GROUP, element), view.getPosition() - 8);
      }
      break;
    }
    const { tag, element } = readElement(view, context);
    elements[tag] = element;
  }

  return elements;
}

/**
 * Raw fragment stream of encapsulated pixel data, from the first item up to
 * and including the Sequence Delimitation Item.
 */
function readEncapsulated(view: SafeDataView, tag: string): Uint8Array {
  const start = view.getPosition();
  for (;;) {
    const { group, element } = view.readTag();
    const length = view.readUint32();
    if (group !== ITEM_GROUP) {
      throw createParseError('Malformed encapsulated pixel data', tag, view.getPosition() - 8);
    }
    if (element === SEQUENCE_DELIMITATION) {
      return view.slice(start, view.getPosition());
    }
    view.skip(length);
  }
}
