export type ErrorKind =
  | "configuration"
  | "source_fetch"
  | "serialization"
  | "persistence";

/**
 * Base class for every error the hub raises on purpose. `kind` lets
 * callers branch without `instanceof` chains and ends up in `run.json`.
 */
export abstract class HubError extends Error {
  abstract readonly kind: ErrorKind;
  /** Fatal errors abort the run; the others are collected in the summary. */
  abstract readonly fatal: boolean;
}

/** Missing credential, invalid config or registry. Raised before any network call. */
export class ConfigurationError extends HubError {
  readonly kind = "configuration";
  readonly fatal = true;

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class SourceFetchError extends HubError {
  readonly kind = "source_fetch";
  readonly fatal = false;

  constructor(
    readonly repo: string,
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "SourceFetchError";
  }
}

/** One malformed item in an API response. The item is skipped. */
export class SerializationError extends HubError {
  readonly kind = "serialization";
  readonly fatal = false;

  constructor(
    readonly repo: string,
    message: string
  ) {
    super(message);
    this.name = "SerializationError";
  }
}

export class PersistenceError extends HubError {
  readonly kind = "persistence";
  readonly fatal = true;

  constructor(message: string) {
    super(message);
    this.name = "PersistenceError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
