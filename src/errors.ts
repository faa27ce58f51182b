/**
 * Error hierarchy for molecule screening.
 * Every failure carries a stable code; none is turned into a default value.
 */

export type ScreeningErrorCode =
  | 'CORRUPT_RECORD'
  | 'UNPARSABLE_PAYLOAD'
  | 'FRAGMENT_LIBRARY_BUILD_FAILURE'
  | 'MOLECULE_PARSE_ERROR';

export interface ErrorContext {
  size?: number; // byte length of the offending buffer
  offset?: number; // byte offset where decoding stopped
  pattern?: string; // fragment pattern source
  input?: string; // textual input that failed to parse
  [key: string]: unknown;
}

export abstract class ScreeningError extends Error {
  public abstract readonly code: ScreeningErrorCode;
  public readonly context?: ErrorContext;

  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.context = context;
  }
}

/** A record shorter than its 8-byte fingerprint prefix. */
export class CorruptRecordError extends ScreeningError {
  public readonly code = 'CORRUPT_RECORD';

  constructor(size: number) {
    super(`Corrupt record: ${size} bytes is shorter than the 8-byte fingerprint prefix`, { size });
  }
}

/** The molecule payload could not be decoded. */
export class UnparsablePayloadError extends ScreeningError {
  public readonly code = 'UNPARSABLE_PAYLOAD';
}

/** A fragment library pattern failed to compile, or the library has the wrong shape. */
export class FragmentLibraryBuildError extends ScreeningError {
  public readonly code = 'FRAGMENT_LIBRARY_BUILD_FAILURE';
}

/** Strict SMILES entry points reject input that reported any parse error. */
export class MoleculeParseError extends ScreeningError {
  public readonly code = 'MOLECULE_PARSE_ERROR';
}
