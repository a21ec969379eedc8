export type EtlErrorCode =
  | "record-parse"
  | "enrichment-unavailable"
  | "orphan-rating"
  | "store-unavailable"
  | "source-unavailable"
  | "configuration";

export class EtlError extends Error {
  readonly code: EtlErrorCode;
  readonly details?: unknown;

  constructor(code: EtlErrorCode, message: string, details?: unknown, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** A raw record whose key fields cannot be interpreted. The record is skipped. */
export class RecordParseError extends EtlError {
  readonly record?: number;

  constructor(message: string, record?: number, details?: unknown) {
    super("record-parse", message, details);
    this.record = record;
  }
}

export class EnrichmentUnavailableError extends EtlError {
  constructor(message: string, details?: unknown) {
    super("enrichment-unavailable", message, details);
  }
}

export class OrphanRatingError extends EtlError {
  readonly record?: number;

  constructor(message: string, record?: number, details?: unknown) {
    super("orphan-rating", message, details);
    this.record = record;
  }
}

/** The relational store cannot be opened or written. Always fatal. */
export class StoreUnavailableError extends EtlError {
  constructor(message: string, cause?: unknown) {
    super("store-unavailable", message, undefined, cause);
  }
}

export class SourceUnavailableError extends EtlError {
  readonly path: string;

  constructor(path: string, cause?: unknown, message = `Cannot read input file: ${path}`) {
    super("source-unavailable", message, { path }, cause);
    this.path = path;
  }
}

export class ConfigurationError extends EtlError {
  constructor(message: string, details?: unknown) {
    super("configuration", message, details);
  }
}

export function isFatal(error: unknown): boolean {
  return (
    error instanceof StoreUnavailableError ||
    error instanceof SourceUnavailableError ||
    error instanceof ConfigurationError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
