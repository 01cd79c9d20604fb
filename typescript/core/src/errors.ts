export type TidalErrorKind =
  | "InvalidFormat"
  | "StreamNotFound"
  | "TruncatedInput"
  | "SourceUnavailable";

/**
 * Base class for all errors raised while reading or writing a log. Any error aborts the decode of
 * the whole source; `kind` tells callers which failure occurred.
 */
export abstract class TidalError extends Error {
  abstract readonly kind: TidalErrorKind;
  /** Offset in bytes from the start of the input of the record being read, when known */
  readonly offset: number | undefined;

  constructor(message: string, offset?: number, options?: { cause?: unknown }) {
    super(offset != undefined ? `${message} (at offset ${offset})` : message, options);
    this.offset = offset;
  }
}

/** Unrecognized marker, class or scalar type code, or labels that cannot address fields. */
export class InvalidFormatError extends TidalError {
  readonly kind = "InvalidFormat";

  constructor(message: string, offset?: number) {
    super(message, offset);
    this.name = "InvalidFormatError";
  }
}

/** A label or data record referenced a stream id with no preceding metadata record. */
export class StreamNotFoundError extends TidalError {
  readonly kind = "StreamNotFound";
  readonly streamId: number;

  constructor(streamId: number, recordType: string, offset?: number) {
    super(`${recordType} record for stream ${streamId} without prior metadata record`, offset);
    this.name = "StreamNotFoundError";
    this.streamId = streamId;
  }
}

/** The input ended inside a record, or accumulated sample data does not fill whole samples. */
export class TruncatedInputError extends TidalError {
  readonly kind = "TruncatedInput";

  constructor(message: string, offset?: number) {
    super(message, offset);
    this.name = "TruncatedInputError";
  }
}

/** The file or byte source could not be opened or read. */
export class SourceUnavailableError extends TidalError {
  readonly kind = "SourceUnavailable";
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(
      `Unable to read ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      undefined,
      { cause },
    );
    this.name = "SourceUnavailableError";
    this.path = path;
  }
}

export function isTidalError(error: unknown): error is TidalError {
  return error instanceof TidalError;
}
