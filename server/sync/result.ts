/**
 * Outcome of one call to an upstream collaborator. The scan driver and the
 * address client branch on `kind` instead of catching heterogeneous errors.
 */
export type FetchResult<T> =
  | { kind: "ok"; data: T }
  | { kind: "not-found" }
  | { kind: "retryable"; reason: string; status?: number }
  | { kind: "fatal"; reason: string; status?: number };

export const ok = <T>(data: T): FetchResult<T> => ({ kind: "ok", data });
export const notFound = <T>(): FetchResult<T> => ({ kind: "not-found" });
export const retryable = <T>(reason: string, status?: number): FetchResult<T> => ({ kind: "retryable", reason, status });
export const fatal = <T>(reason: string, status?: number): FetchResult<T> => ({ kind: "fatal", reason, status });

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUSES.has(status);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
