/**
 * DICOM Writer
 *
 * Serializes a dataset to a DICOM Part 10 file in Explicit VR Little Endian.
 * Datasets read with an encapsulated transfer syntax keep it, so compressed
 * pixel data is written back as read. Byte values are written unchanged;
 * string values are encoded and padded to even length.
 *
 * Group Length elements outside the File Meta Information are retired and
 * would be stale after anonymization, so they are not written.
 */

import { TRANSFER_SYNTAX_EXPLICIT_VR_LITTLE_ENDIAN, TRANSFER_SYNTAX_IMPLICIT_VR_LITTLE_ENDIAN } from './dataset';
import type { DicomDataSet, DicomElement, ElementValue } from './types';
import { paddingByte, requiresExplicitLength } from './vr';
import { getElementNumber, getGroupNumber } from '../utils/tagUtils';

const PREAMBLE_LENGTH = 128;
const UNDEFINED_LENGTH = 0xffffffff;
const MAX_SHORT_LENGTH = 0xffff;

export const IMPLEMENTATION_CLASS_UID = '2.25.106622389114325094826437541315213425651';
export const IMPLEMENTATION_VERSION_NAME = 'DCMANON_1_0';

const encoder = new TextEncoder();

/**
 * Serialize a DicomDataSet to a Uint8Array (DICOM Part 10 file).
 */
export function write(dataset: DicomDataSet): Uint8Array {
  const chunks: Uint8Array[] = [];

  // 1. Preamble (128 bytes 0x00) and DICM prefix
  chunks.push(new Uint8Array(PREAMBLE_LENGTH));
  chunks.push(encoder.encode('DICM'));

  // 2. Separate meta and data elements
  const metaElements: Record<string, DicomElement> = {};
  const dataTags: string[] = [];
  for (const tag in dataset.dict) {
    if (tag.startsWith('x0002')) {
      if (tag !== 'x00020000') metaElements[tag] = dataset.dict[tag];
    } else if (getElementNumber(tag) !== 0x0000) {
      dataTags.push(tag);
    }
  }
  dataTags.sort();

  const encode = stringEncoderFor(dataset.characterSet);

  // 3. File Meta Information (Group 0002)
  completeMetaInformation(metaElements, dataset);
  const metaChunks = Object.keys(metaElements)
    .sort()
    .map((tag) => serializeElement(tag, metaElements[tag], encode));
  const metaLength = metaChunks.reduce((acc, c) => acc + c.length, 0);
  const groupLength = new Uint8Array(4);
  new DataView(groupLength.buffer).setUint32(0, metaLength, true);
  chunks.push(serializeElement('x00020000', { vr: 'UL', Value: groupLength }, encode));
  chunks.push(...metaChunks);

  // 4. Data set
  for (const tag of dataTags) {
    chunks.push(serializeElement(tag, dataset.dict[tag], encode));
  }

  return concatChunks(chunks);
}

/**
 * Transfer syntax a dataset is written with.
 */
export function outputTransferSyntax(dataset: DicomDataSet): string {
  if (!dataset.transferSyntax || dataset.transferSyntax === TRANSFER_SYNTAX_IMPLICIT_VR_LITTLE_ENDIAN) {
    return TRANSFER_SYNTAX_EXPLICIT_VR_LITTLE_ENDIAN;
  }
  return dataset.transferSyntax;
}

/**
 * Enforce mandatory Meta Elements
 */
function completeMetaInformation(meta: Record<string, DicomElement>, dataset: DicomDataSet): void {
  // 0002,0001 File Meta Information Version
  if (!meta['x00020001']) {
    meta['x00020001'] = { vr: 'OB', Value: new Uint8Array([0x00, 0x01]) };
  }
  // 0002,0002 Media Storage SOP Class UID (use 0008,0016)
  const sopClass = dataset.dict['x00080016'];
  if (!meta['x00020002'] && sopClass?.Value !== undefined) {
    meta['x00020002'] = { vr: 'UI', Value: sopClass.Value };
  }
  // 0002,0003 Media Storage SOP Instance UID (use 0008,0018)
  const sopInstance = dataset.dict['x00080018'];
  if (!meta['x00020003'] && sopInstance?.Value !== undefined) {
    meta['x00020003'] = { vr: 'UI', Value: sopInstance.Value };
  }
  // 0002,0010 Transfer Syntax UID
  meta['x00020010'] = { vr: 'UI', Value: outputTransferSyntax(dataset) };
  // 0002,0012 Implementation Class UID, 0002,0013 Implementation Version Name
  meta['x00020012'] = { vr: 'UI', Value: IMPLEMENTATION_CLASS_UID };
  meta['x00020013'] = { vr: 'SH', Value: IMPLEMENTATION_VERSION_NAME };
}

function concatChunks(chunks: Uint8Array[]): Uint8Array {
  let totalLength = 0;
  for (const chunk of chunks) {
    totalLength += chunk.length;
  }

  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

type StringEncoder = (text: string) => Uint8Array;

function stringEncoderFor(characterSet: string): StringEncoder {
  if (characterSet.includes('ISO_IR 192') || characterSet.includes('UTF-8')) {
    return (text) => encoder.encode(text);
  }
  // Default repertoire and Latin-1: one byte per character
  return (text) => Uint8Array.from(text, (ch) => ch.charCodeAt(0) & 0xff);
}

function serializeDataset(dict: Record<string, DicomElement>, encode: StringEncoder): Uint8Array {
  const chunks = Object.keys(dict)
    .filter((tag) => getElementNumber(tag) !== 0x0000)
    .sort()
    .map((tag) => serializeElement(tag, dict[tag], encode));
  return concatChunks(chunks);
}

function valueBytes(vr: string, value: ElementValue | undefined, encode: StringEncoder): Uint8Array {
  let bytes: Uint8Array;
  if (value === undefined) {
    bytes = new Uint8Array(0);
  } else if (value instanceof Uint8Array) {
    bytes = value;
  } else {
    bytes = encode(Array.isArray(value) ? value.join('\\') : value);
  }

  if (bytes.length % 2 === 0) {
    return bytes;
  }
  const padded = new Uint8Array(bytes.length + 1);
  padded.set(bytes);
  padded[bytes.length] = paddingByte(vr);
  return padded;
}

/**
 * Sequence as Undefined Length, items with Explicit Length, then the
 * Sequence Delimitation Item.
 */
function sequenceBytes(element: DicomElement, encode: StringEncoder): Uint8Array {
  const itemChunks: Uint8Array[] = [];
  for (const item of element.items ?? []) {
    const itemBody = serializeDataset(item.elements, encode);
    itemChunks.push(itemHeader(0xe000, itemBody.length));
    itemChunks.push(itemBody);
  }
  itemChunks.push(itemHeader(0xe0dd, 0));
  return concatChunks(itemChunks);
}

function itemHeader(element: number, length: number): Uint8Array {
  const header = new Uint8Array(8);
  const view = new DataView(header.buffer);
  view.setUint16(0, 0xfffe, true);
  view.setUint16(2, element, true);
  view.setUint32(4, length, true);
  return header;
}

function serializeElement(tagHex: string, element: DicomElement, encode: StringEncoder): Uint8Array {
  const group = getGroupNumber(tagHex);
  const elem = getElementNumber(tagHex);
  if (group === null || elem === null) {
    throw new Error(`Cannot write malformed tag ${tagHex}`);
  }

  const isSequence = element.items !== undefined;
  const vr = isSequence ? 'SQ' : (element.vr || 'UN').toUpperCase();
  const undefinedLength = isSequence || element.encapsulated === true;
  const bytes = isSequence ? sequenceBytes(element, encode) : valueBytes(vr, element.Value, encode);
  const isLongVR = requiresExplicitLength(vr);

  if (!isLongVR && bytes.length > MAX_SHORT_LENGTH) {
    throw new Error(`Value of ${tagHex} (${vr}) is too long: ${bytes.length} bytes`);
  }

  // Element Header
  const headerLen = isLongVR ? 12 : 8;
  const buffer = new Uint8Array(headerLen + bytes.length);
  const view = new DataView(buffer.buffer);
  view.setUint16(0, group, true);
  view.setUint16(2, elem, true);
  buffer[4] = vr.charCodeAt(0);
  buffer[5] = vr.charCodeAt(1);

  if (isLongVR) {
    view.setUint16(6, 0, true); // Reserved
    view.setUint32(8, undefinedLength ? UNDEFINED_LENGTH : bytes.length, true);
  } else {
    view.setUint16(6, bytes.length, true);
  }
  buffer.set(bytes, headerLen);

  return buffer;
}
