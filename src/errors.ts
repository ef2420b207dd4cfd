// Errors module - recoverable failure taxonomy and result values
//
// Adapters return Result values instead of throwing, so the pipeline
// decides per source whether to continue.

export class DigestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A feed or a scrape target's index page could not be fetched or parsed */
export class SourceFetchError extends DigestError {
  constructor(
    readonly source: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${source}: ${message}`, options);
  }
}

/** One article page could not be fetched or parsed */
export class ExtractionError extends DigestError {
  constructor(
    readonly url: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${url}: ${message}`, options);
  }
}

export class SummarizationBatchError extends DigestError {
  constructor(
    readonly batchIndex: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`batch ${batchIndex + 1}: ${message}`, options);
  }
}

export class SummarizationItemError extends DigestError {
  constructor(
    readonly link: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${link}: ${message}`, options);
  }
}

export class SeenStoreError extends DigestError {}

export class ConfigError extends DigestError {}

export type Result<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
