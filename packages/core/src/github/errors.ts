/**
 * Translate Octokit failures into the vault's error taxonomy
 */

import { DocsError } from "../errors";

export const SEARCH_RATE_LIMIT_MESSAGE =
  "GitHub code search rate limit exceeded. Try again later.";
export const API_RATE_LIMIT_MESSAGE = "GitHub API rate limit exceeded. Try again later.";

export interface TranslateContext {
  /** Human-readable description of what was requested, e.g. "acme/repo/doc" */
  resource: string;
  /** Search has its own, much lower quota; any 403 there is a rate limit */
  search?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readStatus(error: unknown): number | undefined {
  if (isRecord(error) && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

function readResponse(error: unknown): { data?: unknown; headers: Record<string, unknown> } {
  const response = isRecord(error) ? error.response : undefined;
  if (!isRecord(response)) {
    return { headers: {} };
  }
  return { data: response.data, headers: isRecord(response.headers) ? response.headers : {} };
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" ||
      error.name === "AbortError" ||
      /aborted due to timeout/i.test(error.message))
  );
}

function describeBody(data: unknown, fallback: string): string {
  if (typeof data === "string") return data;
  if (data === undefined) return fallback;
  return JSON.stringify(data);
}

export function translateGitHubError(error: unknown, context: TranslateContext): DocsError {
  if (error instanceof DocsError) {
    return error;
  }

  if (isTimeout(error)) {
    return new DocsError("ApiError", `GitHub request timed out: ${context.resource}`);
  }

  const status = readStatus(error);
  const message = error instanceof Error ? error.message : String(error);

  if (status === undefined) {
    return new DocsError("ApiError", `GitHub request failed for ${context.resource}: ${message}`);
  }

  const { data, headers } = readResponse(error);

  if (status === 404) {
    return new DocsError("NotFound", `Not found: ${context.resource}`, status, data);
  }

  const remaining = headers["x-ratelimit-remaining"];
  const exhausted = remaining === "0" || remaining === 0;
  if ((status === 403 || status === 429) && (context.search || exhausted)) {
    return new DocsError(
      "RateLimited",
      context.search ? SEARCH_RATE_LIMIT_MESSAGE : API_RATE_LIMIT_MESSAGE,
      status,
      data
    );
  }

  return new DocsError(
    "ApiError",
    `GitHub API error ${status}: ${describeBody(data, message)}`,
    status,
    data
  );
}
