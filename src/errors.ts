export type LookupFailureKind =
  | "network"
  | "timeout"
  | "upstream"
  | "parse"
  | "invalid-query"
  | "unknown-trade";

/**
 * Base class for everything that can go wrong between building a lookup
 * request and turning its response into candidate records.
 */
export abstract class LookupFailure extends Error {
  abstract readonly kind: LookupFailureKind;
}

export class NetworkError extends LookupFailure {
  readonly kind = "network" as const;

  constructor(message: string) {
    super(message);
    this.name = "NetworkError";
  }
}

export class TimeoutError extends LookupFailure {
  readonly kind = "timeout" as const;

  constructor(readonly timeoutMs: number) {
    super(`Lookup timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export class UpstreamError extends LookupFailure {
  readonly kind = "upstream" as const;

  constructor(
    message: string,
    readonly status: number,
    readonly bodySnippet: string | null = null
  ) {
    super(message);
    this.name = "UpstreamError";
  }
}

export class ParseError extends LookupFailure {
  readonly kind = "parse" as const;

  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

export class InvalidQueryError extends LookupFailure {
  readonly kind = "invalid-query" as const;

  constructor(message: string) {
    super(message);
    this.name = "InvalidQueryError";
  }
}

export class UnknownTradeError extends LookupFailure {
  readonly kind = "unknown-trade" as const;

  constructor(readonly trade: string) {
    super(`No lookup registered for trade: ${trade}`);
    this.name = "UnknownTradeError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Failures worth another attempt within the same run. */
export function isTransient(err: LookupFailure): boolean {
  if (err instanceof NetworkError || err instanceof TimeoutError) return true;
  if (err instanceof UpstreamError) {
    return err.status === 429 || err.status >= 500;
  }
  return false;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}
