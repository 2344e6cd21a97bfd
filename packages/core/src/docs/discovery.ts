/**
 * Repository Discovery
 *
 * Enumerates an organization's repositories and flags which ones have a
 * top-level doc/ folder.
 *
 * Two strategies:
 * - search-first: one code search for files under doc/, plus the paginated
 *   repository listing. Cheap, but the search quota is small.
 * - listing: the paginated listing followed by one contents request per
 *   repository. Used when the search request fails or comes back truncated.
 */

import { DocsError } from "../errors";
import type { GitHubRepository } from "../github";
import { hasDocFolder, isInDocFolder } from "./doc-filter";
import { DOC_FOLDER, type RepoSummary, type VaultDeps } from "./types";

const SEARCH_PAGE_SIZE = 100;

export function docFolderQuery(org: string): string {
  return `path:${DOC_FOLDER} org:${org}`;
}

function toRepoSummary(repo: GitHubRepository, hasDocs: boolean): RepoSummary {
  return {
    id: String(repo.id),
    name: repo.name,
    description: repo.description ?? "",
    url: repo.html_url,
    hasDocFolder: hasDocs,
  };
}

/**
 * Names of the repositories with at least one search hit under doc/.
 * Throws when the search request fails or returns only part of the hits.
 */
async function searchDocRepos(deps: VaultDeps, org: string): Promise<Set<string>> {
  const { api, logger } = deps;
  const result = await api.searchCode(docFolderQuery(org), SEARCH_PAGE_SIZE);

  if (result.incomplete_results || result.total_count > result.items.length) {
    logger.warn("Doc-folder search returned a partial result set", {
      org,
      totalCount: result.total_count,
      returned: result.items.length,
    });
    throw new DocsError(
      "ApiError",
      `Doc-folder search for ${org} returned ${result.items.length} of ${result.total_count} hits`
    );
  }

  const names = new Set<string>();
  for (const item of result.items) {
    if (isInDocFolder(item.path)) {
      names.add(item.repository.name);
    }
  }
  return names;
}

async function checkDocFolder(deps: VaultDeps, org: string, repo: string): Promise<boolean> {
  const { api, logger } = deps;
  try {
    const contents = await api.getContents(org, repo, DOC_FOLDER);
    return Array.isArray(contents) && hasDocFolder(contents);
  } catch (error) {
    if (error instanceof DocsError && error.kind === "NotFound") {
      return false;
    }
    // Only this repository is degraded; the rest of the org is still reported
    logger.warn("Doc-folder check failed, treating repository as having no docs", {
      org,
      repo,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

async function listWithSearchHits(
  deps: VaultDeps,
  org: string,
  docRepos: Set<string>
): Promise<RepoSummary[]> {
  deps.logger.info("Found repositories with doc folder via search", { org, count: docRepos.size });
  const repos = await deps.api.listOrgRepos(org);
  return repos.map((repo) => toRepoSummary(repo, docRepos.has(repo.name)));
}

export async function discoverBySearch(deps: VaultDeps, org: string): Promise<RepoSummary[]> {
  return listWithSearchHits(deps, org, await searchDocRepos(deps, org));
}

export async function discoverByListing(deps: VaultDeps, org: string): Promise<RepoSummary[]> {
  const { api, logger } = deps;
  const repos = await api.listOrgRepos(org);
  logger.info("Checking repositories individually", { org, total: repos.length });

  const result: RepoSummary[] = [];
  for (const [index, repo] of repos.entries()) {
    logger.debug("Checking repository", { org, repo: repo.name, position: index + 1, total: repos.length });
    result.push(toRepoSummary(repo, await checkDocFolder(deps, org, repo.name)));
  }

  logger.info("Doc-folder check complete", {
    org,
    withDocs: result.filter((repo) => repo.hasDocFolder).length,
  });
  return result;
}

/**
 * Search first; fall back to the per-repository check when the search
 * request fails or is truncated. Listing failures in either strategy are fatal.
 */
export async function discoverRepositories(deps: VaultDeps, org: string): Promise<RepoSummary[]> {
  let docRepos: Set<string>;
  try {
    docRepos = await searchDocRepos(deps, org);
  } catch (error) {
    deps.logger.warn("Search API failed, falling back to listing all repositories", {
      org,
      error: error instanceof Error ? error.message : String(error),
    });
    return discoverByListing(deps, org);
  }

  return listWithSearchHits(deps, org, docRepos);
}
