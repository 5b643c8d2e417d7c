/**
 * Type definitions for the anonymizer's in-memory DICOM model.
 *
 * A dataset is a flat mapping from `xggggeeee` tags to elements; sequence
 * elements carry their items, each item being another such mapping.
 */

/**
 * Value of a data element.
 * Values read from a file are raw bytes; values produced by the anonymizer are
 * strings (multi-valued strings as arrays, joined with `\` when written).
 */
export type ElementValue = string | string[] | Uint8Array;

/**
 * Sequence Item structure
 */
export interface SequenceItem {
  elements: Record<string, DicomElement>;
}

/**
 * DICOM Element structure
 */
export interface DicomElement {
  vr: string;
  Value?: ElementValue;
  /** Present for SQ elements */
  items?: SequenceItem[];
  /**
   * Undefined-length pixel data (fragments). `Value` then holds the raw item
   * stream, including the sequence delimiter, exactly as read.
   */
  encapsulated?: boolean;
}

/**
 * DICOM Data Set structure
 */
export interface DicomDataSet {
  dict: Record<string, DicomElement>;
  /** Transfer syntax the dataset was read with */
  transferSyntax: string;
  /** Specific Character Set (0008,0005), first value */
  characterSet: string;
  /** Trimmed string value of a tag, or undefined when absent or binary-only */
  string: (tag: string) => string | undefined;
}
