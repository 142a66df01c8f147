/**
 * Error types shared by the supervisor, the bridge client and every storage
 * backend.
 *
 * Storage callers only ever see `FormatError` and `NotFoundError`, and the
 * bridge client's low-level calls throw `TransientNetworkError`. The rest are
 * logged or folded into `Result` values at their module boundary.
 */

export type BridgeCoreErrorCode =
  | 'FORMAT'
  | 'NOT_FOUND'
  | 'TRANSIENT_NETWORK'
  | 'BACKEND_DEGRADED'
  | 'PROCESS_LIFECYCLE';

export class BridgeCoreError extends Error {
  readonly code: BridgeCoreErrorCode;

  constructor(code: BridgeCoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Caller passed a malformed value, eg a date filter that is not ISO-8601. */
export class FormatError extends BridgeCoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FORMAT', message, options);
  }
}

/** Referenced entity does not exist. */
export class NotFoundError extends BridgeCoreError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

/** Timeout, refused connection, or a retryable HTTP status that outlived its retries. */
export class TransientNetworkError extends BridgeCoreError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super('TRANSIENT_NETWORK', message, options);
    this.status = status;
  }
}

/** Operation requested a guarantee the backend cannot give (eg rollback over REST). */
export class BackendDegradedError extends BridgeCoreError {
  constructor(message: string) {
    super('BACKEND_DEGRADED', message);
  }
}

/** Missing executable, spawn failure or an early exit of the bridge process. */
export class ProcessLifecycleError extends BridgeCoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PROCESS_LIFECYCLE', message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
