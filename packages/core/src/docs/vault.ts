/**
 * DocsVault
 *
 * Boundary-facing facade over the vault operations. Every method resolves to
 * an Outcome and never rejects: upstream failures come back as a DocsError
 * value. The two view methods render to text, with failures serialised as
 * the JSON error payload.
 */

import type { VaultConfig } from "../config";
import { requireArgument, toDocsError, toErrorPayload, type Outcome } from "../errors";
import { createOctokit, GitHubApi } from "../github";
import type { Logger } from "../logging";
import { discoverRepositories } from "./discovery";
import { getFileContent } from "./file-content";
import { listRepoDocs } from "./repo-docs";
import { searchDocs } from "./search";
import type { DocFile, FileContent, RepoSummary, SearchHit, SearchOptions, VaultDeps } from "./types";
import { renderDocListing } from "./views";

export class DocsVault {
  constructor(private readonly deps: VaultDeps) {}

  /**
   * Build a vault with its own shared GitHub client
   */
  static fromConfig(config: VaultConfig, logger: Logger): DocsVault {
    const octokit = createOctokit({
      token: config.githubToken,
      baseUrl: config.apiBaseUrl,
      timeoutMs: config.requestTimeoutMs,
    });

    return new DocsVault({
      api: new GitHubApi(octokit, logger.child("github")),
      logger,
    });
  }

  listOrgRepos(org: string): Promise<Outcome<RepoSummary[]>> {
    return this.run("listOrgRepos", (deps) =>
      discoverRepositories(deps, requireArgument("org", org))
    );
  }

  listRepoDocs(org: string, repo: string): Promise<Outcome<DocFile[]>> {
    return this.run("listRepoDocs", (deps) =>
      listRepoDocs(deps, requireArgument("org", org), requireArgument("repo", repo))
    );
  }

  getFileContent(org: string, repo: string, path: string): Promise<Outcome<FileContent>> {
    return this.run("getFileContent", (deps) =>
      getFileContent(
        deps,
        requireArgument("org", org),
        requireArgument("repo", repo),
        requireArgument("path", path).replace(/^\/+/, "")
      )
    );
  }

  searchDocs(org: string, query: string, options?: SearchOptions): Promise<Outcome<SearchHit[]>> {
    return this.run("searchDocs", (deps) =>
      searchDocs(deps, requireArgument("org", org), query, options)
    );
  }

  /**
   * Human-readable listing of a repository's doc folder
   */
  async documentationView(org: string, repo: string): Promise<string> {
    const outcome = await this.listRepoDocs(org, repo);
    if (!outcome.ok) {
      return JSON.stringify(toErrorPayload(outcome.error));
    }
    return renderDocListing(org, repo, outcome.value);
  }

  /**
   * Raw decoded content of a single file
   */
  async contentView(org: string, repo: string, path: string): Promise<string> {
    const outcome = await this.getFileContent(org, repo, path);
    if (!outcome.ok) {
      return JSON.stringify(toErrorPayload(outcome.error));
    }
    return outcome.value.content;
  }

  private async run<T>(
    operation: string,
    fn: (deps: VaultDeps) => Promise<T>
  ): Promise<Outcome<T>> {
    const logger = this.deps.logger.child(operation);
    try {
      return { ok: true, value: await fn({ ...this.deps, logger }) };
    } catch (error) {
      const docsError = toDocsError(error);
      logger.warn("Operation failed", {
        kind: docsError.kind,
        status: docsError.status,
        error: docsError.message,
      });
      return { ok: false, error: docsError };
    }
  }
}
