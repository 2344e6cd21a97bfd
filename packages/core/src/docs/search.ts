import { DocsError } from "../errors";
import { DOC_FOLDER, type SearchHit, type SearchOptions, type VaultDeps } from "./types";

export const DEFAULT_SEARCH_LIMIT = 50;
export const MAX_SEARCH_LIMIT = 100;

export function docSearchQuery(org: string, query: string): string {
  return `org:${org} path:${DOC_FOLDER} ${query}`;
}

/**
 * Search documentation across every repository of an organization.
 *
 * There is no fallback: a failed search (including the search rate limit,
 * reported as RateLimited) ends the call.
 */
export async function searchDocs(
  deps: VaultDeps,
  org: string,
  query: string,
  options: SearchOptions = {}
): Promise<SearchHit[]> {
  const { api, logger } = deps;
  const terms = query.trim();
  if (!terms) {
    throw new DocsError("InvalidArgument", "Missing required parameter: query");
  }

  const limit = Math.min(Math.max(options.limit ?? DEFAULT_SEARCH_LIMIT, 1), MAX_SEARCH_LIMIT);
  logger.info("Searching docs", { org, query: terms, limit });

  const result = await api.searchCode(docSearchQuery(org, terms), limit);
  const hits = result.items.map((item) => ({
    name: item.name,
    path: item.path,
    repository: item.repository.name,
    url: item.html_url,
    sha: item.sha,
  }));

  logger.info("Found matching files", { org, count: hits.length, totalCount: result.total_count });
  return hits;
}
