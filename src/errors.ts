/**
 * Failure kinds reported by the LLM and channel capabilities.
 * `transient` kinds are retried with backoff; the rest fail immediately.
 */
export type ExternalFailureKind =
  | "rate_limited"
  | "timeout"
  | "server_error"
  | "network"
  | "auth"
  | "malformed"
  | "forbidden";

const TRANSIENT_KINDS: ReadonlySet<ExternalFailureKind> = new Set([
  "rate_limited",
  "timeout",
  "server_error",
  "network",
]);

export function isTransientKind(kind: ExternalFailureKind): boolean {
  return TRANSIENT_KINDS.has(kind);
}

export class ExternalCallError extends Error {
  readonly kind: ExternalFailureKind;
  readonly transient: boolean;
  readonly retryAfterMs: number | null;

  constructor(
    kind: ExternalFailureKind,
    message: string,
    options?: { readonly retryAfterMs?: number; readonly cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "ExternalCallError";
    this.kind = kind;
    this.transient = isTransientKind(kind);
    this.retryAfterMs = options?.retryAfterMs ?? null;
  }
}

export class SourceUnavailable extends Error {
  readonly sourceId: string;

  constructor(sourceId: string, message: string, options?: { readonly cause?: unknown }) {
    super(`source ${sourceId} unavailable: ${message}`, { cause: options?.cause });
    this.name = "SourceUnavailable";
    this.sourceId = sourceId;
  }
}

export type StoreViolationReason = "invalid_transition" | "missing_row" | "cycle_closed";

export class StoreInvariantViolation extends Error {
  readonly reason: StoreViolationReason;

  constructor(reason: StoreViolationReason, message: string) {
    super(message);
    this.name = "StoreInvariantViolation";
    this.reason = reason;
  }
}

/** True when the error came from a timed-out or aborted `AbortSignal`. */
export function isAbortError(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.name === "TimeoutError" || err.name === "AbortError")
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
