/**
 * Error taxonomy shared by every vault operation.
 *
 * Operations throw DocsError internally; the DocsVault facade converts them
 * into an Outcome so callers never see a raw transport exception.
 */

export type DocsErrorKind =
  | "NotFound"
  | "RateLimited"
  | "ApiError"
  | "DecodingError"
  | "InvalidArgument";

export class DocsError extends Error {
  constructor(
    public readonly kind: DocsErrorKind,
    message: string,
    public readonly status?: number,
    public readonly body?: unknown
  ) {
    super(message);
    this.name = "DocsError";
  }
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: DocsError };

/** Wire shape of a failed operation */
export interface ErrorPayload {
  error: string;
}

export function toErrorPayload(error: DocsError): ErrorPayload {
  return { error: error.message };
}

/**
 * Wrap anything thrown by an operation as a DocsError
 */
export function toDocsError(error: unknown): DocsError {
  if (error instanceof DocsError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new DocsError("ApiError", message);
}

/**
 * Reject blank identifiers before any request goes out
 */
export function requireArgument(name: string, value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new DocsError("InvalidArgument", `Missing required parameter: ${name}`);
  }
  return trimmed;
}
