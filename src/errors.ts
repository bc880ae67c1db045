export type ScrapeErrorKind = 'transport' | 'parse' | 'extraction';

export interface ScrapeFailure {
  kind: ScrapeErrorKind;
  message: string;
  cause?: unknown;
}

export type ScrapeResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: ScrapeFailure };

export function succeed<T>(value: T): ScrapeResult<T> {
  return { ok: true, value };
}

export function fail<T>(kind: ScrapeErrorKind, message: string, cause?: unknown): ScrapeResult<T> {
  return { ok: false, failure: { kind, message, cause } };
}

/**
 * The only error surfaced by the product scraper. `kind` tells a network or
 * status failure apart from markup that could not be read.
 */
export class ScrapeError extends Error {
  readonly kind: ScrapeErrorKind;

  constructor(failure: ScrapeFailure) {
    super(failure.message, { cause: failure.cause });
    this.name = 'ScrapeError';
    this.kind = failure.kind;
  }
}

export class DataQualityError extends Error {
  readonly value: unknown;

  constructor(value: unknown) {
    super(`Price is not a usable number: ${String(value)}`);
    this.name = 'DataQualityError';
    this.value = value;
  }
}
