export const GITHUB_ACCEPT = "application/vnd.github.v3+json";
export const USER_AGENT = "GitHub-Knowledge-Vault/1.0";

/**
 * Build the header set sent with every GitHub request.
 *
 * Authorization is only present when a token is configured; running without
 * one is valid but rate-limited, and the caller is expected to warn about it.
 */
export function buildHeaders(token?: string): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: GITHUB_ACCEPT,
    "User-Agent": USER_AGENT,
  };

  if (token) {
    headers.Authorization = `token ${token}`;
  }

  return headers;
}
