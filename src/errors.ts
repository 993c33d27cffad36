/**
 * Error taxonomy for pack decoding, querying and extraction.
 */

/**
 * Base class for every failure raised by the pack tools.
 */
export class PackError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'PackError';
  }
}

/** The `.index` / `.archive` pair is incomplete. */
export class MissingPairError extends PackError {
  constructor(message: string, public readonly missing: readonly string[]) {
    super(message);
    this.name = 'MissingPairError';
  }
}

/** Header or root block magic/version does not match the pack format. */
export class UnrecognizedFormatError extends PackError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'UnrecognizedFormatError';
  }
}

/** A read ran past the end of the available bytes. */
export class TruncatedDataError extends PackError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'TruncatedDataError';
  }
}

/** The index structure is inconsistent. */
export class CorruptIndexError extends PackError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'CorruptIndexError';
  }
}

/** A payload could not be decoded to the size the index declares. */
export class CorruptArchiveError extends PackError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'CorruptArchiveError';
  }
}

export class NotFoundError extends PackError {
  constructor(message: string, public readonly path: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** Underlying storage could not supply or accept the requested bytes. */
export class IoFailureError extends PackError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'IoFailureError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
