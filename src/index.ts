/**
 * dicom-anonymizer
 *
 * Batch DICOM anonymization following the Basic Application Level
 * Confidentiality Profile (DICOM PS3.15 Annex E), with UID remapping that
 * stays consistent across every file of a batch.
 *
 * @module dicom-anonymizer
 */

/** Policy engine */
export { DEFAULT_CATALOG, TagCatalog, type CatalogCategory, type CatalogEntry, type TagCategory } from './core/tagCatalog';
export { TagSelection } from './core/tagSelection';
export {
  UidMappingTable,
  generateUid,
  isValidUid,
  UUID_UID_ROOT,
  MAX_UID_LENGTH,
  type UidGenerator,
} from './core/uidMappingTable';
export {
  transformElement,
  ANONYMIZED_TEXT,
  ANONYMIZED_DATE,
  ANONYMIZED_TIME,
  ANONYMIZED_NUMBER,
  type TransformContext,
  type TransformOutcome,
  type TransformSkipped,
} from './core/elementTransformer';
export { stripPrivateTags, countPrivateTags } from './core/privateTagStripper';
export { anonymize, type AnonymizationOptions, type AnonymizationOutput } from './core/anonymizer';
export {
  anonymizeDirectory,
  OUTPUT_DIRECTORY_NAME,
  type AnonymizationResult,
  type BatchOptions,
  type BatchReport,
  type FileState,
  type ProgressCallback,
  type ResultStatus,
} from './core/batch';
export { classifyVr, isKnownVr, KNOWN_VRS, type Vr, type VrKind } from './core/vr';

/** Codec */
export { canParse, parse } from './core/parser';
export { write, outputTransferSyntax } from './core/writer';
export { createDataSet } from './core/dataset';
export type { DicomDataSet, DicomElement, ElementValue, SequenceItem } from './core/types';

/** Errors */
export {
  AnonymizerError,
  ConfigurationError,
  DicomParseError,
  DirectoryNotFoundError,
  UnreadableFileError,
  WriteFailureError,
  type AnonymizerErrorKind,
} from './core/errors';

/** Configuration and logging */
export { loadConfigFile, parseConfig, selectionFromConfig, type AnonymizerConfig } from './config';
export { createSilentLogger, getLogger, initializeLogging, Logger } from './logging';

/** Tag utilities */
export { formatTagWithComma, isPrivateTag, normalizeTag } from './utils/tagUtils';
export { elementText, elementValues } from './utils/valueParsers';
