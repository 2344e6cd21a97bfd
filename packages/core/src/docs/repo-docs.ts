import { DocsError } from "../errors";
import type { GitHubContents } from "../github";
import { selectDocFiles } from "./doc-filter";
import { DOC_FOLDER, type DocFile, type VaultDeps } from "./types";

/**
 * List the recognised documentation files in a repository's doc/ folder.
 *
 * A missing folder yields an empty list; a missing repository is NotFound.
 * GitHub answers 404 for both, so the repository is looked up to tell them
 * apart.
 */
export async function listRepoDocs(deps: VaultDeps, org: string, repo: string): Promise<DocFile[]> {
  const { api, logger } = deps;
  logger.info("Fetching docs", { org, repo, folder: DOC_FOLDER });

  let contents: GitHubContents;
  try {
    contents = await api.getContents(org, repo, DOC_FOLDER);
  } catch (error) {
    if (!(error instanceof DocsError) || error.kind !== "NotFound") {
      throw error;
    }

    try {
      await api.getRepository(org, repo);
    } catch (repoError) {
      if (repoError instanceof DocsError && repoError.kind === "NotFound") {
        throw new DocsError("NotFound", `Repository not found: ${org}/${repo}`, repoError.status);
      }
      throw repoError;
    }

    logger.warn("No doc folder found", { org, repo });
    return [];
  }

  // doc exists but is a file, not a folder
  if (!Array.isArray(contents)) {
    logger.warn("doc is not a directory", { org, repo });
    return [];
  }

  const docs = selectDocFiles(contents);
  logger.info("Found documentation files", {
    org,
    repo,
    count: docs.length,
    skipped: contents.length - docs.length,
  });
  return docs;
}
