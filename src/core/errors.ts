/**
 * Error Handling: Custom error types for the anonymizer
 *
 * Every error raised by the library extends AnonymizerError and carries a
 * `kind` so that reports can describe a failure without inspecting classes.
 */

export type AnonymizerErrorKind =
  | 'DicomParse'
  | 'UnreadableFile'
  | 'WriteFailure'
  | 'DirectoryNotFound'
  | 'Configuration';

/**
 * Base class for all anonymizer errors
 */
export abstract class AnonymizerError extends Error {
  abstract readonly kind: AnonymizerErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Custom error for DICOM parsing failures
 */
export class DicomParseError extends AnonymizerError {
  readonly kind = 'DicomParse';

  constructor(
    message: string,
    public readonly tag?: string,
    public readonly offset?: number,
    cause?: unknown
  ) {
    super(message, { cause });
  }
}

/**
 * Create a parse error with context
 */
export function createParseError(
  message: string,
  tag?: string,
  offset?: number,
  cause?: unknown
): DicomParseError {
  let fullMessage = message;
  if (tag) {
    fullMessage += ` (tag: ${tag})`;
  }
  if (offset !== undefined) {
    fullMessage += ` (offset: ${offset})`;
  }
  return new DicomParseError(fullMessage, tag, offset, cause);
}

/**
 * A source file could not be read or is not a DICOM file.
 */
export class UnreadableFileError extends AnonymizerError {
  readonly kind = 'UnreadableFile';

  constructor(public readonly path: string, reason: string, cause?: unknown) {
    super(`Unreadable file ${path}: ${reason}`, { cause });
  }
}

/**
 * The anonymized output could not be written. The source file is untouched.
 */
export class WriteFailureError extends AnonymizerError {
  readonly kind = 'WriteFailure';

  constructor(public readonly path: string, reason: string, cause?: unknown) {
    super(`Could not write ${path}: ${reason}`, { cause });
  }
}

/**
 * The batch source directory does not exist. Fatal before any file is processed.
 */
export class DirectoryNotFoundError extends AnonymizerError {
  readonly kind = 'DirectoryNotFound';

  constructor(public readonly path: string) {
    super(`Directory not found: ${path}`);
  }
}

/**
 * Invalid tag selection, configuration file or option.
 */
export class ConfigurationError extends AnonymizerError {
  readonly kind = 'Configuration';
}

/**
 * Short, human-readable reason for a failure, used in batch reports.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
