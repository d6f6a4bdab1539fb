/**
 * Creates a standardised AbortError instance. A reason that already is an
 * AbortError (such as the DOMException from `AbortController#abort()`) is
 * returned as is; any other reason is kept as the cause.
 */
export function createAbortError(reason?: unknown): Error {
  if (isAbortError(reason)) {
    return reason;
  }
  const message = reason instanceof Error ? reason.message : typeof reason === "string" ? reason : "";
  const error = new Error(message ? `Aborted: ${message}` : "Aborted", reason === undefined ? undefined : { cause: reason });
  error.name = "AbortError";
  return error;
}

export function isAbortError(value: unknown): value is Error {
  return value instanceof Error && value.name === "AbortError";
}
