/**
 * GitHub API client
 *
 * One Octokit instance is created per process and shared by every operation,
 * so connections are pooled for the lifetime of the server. Every call
 * translates failures into DocsError and validates the payload it returns.
 */

import { Octokit } from "@octokit/rest";
import type { Logger } from "../logging";
import { buildHeaders } from "./headers";
import { translateGitHubError } from "./errors";
import {
  GitHubCodeSearchSchema,
  GitHubContentsSchema,
  GitHubRepositorySchema,
  parseResponse,
  type GitHubCodeSearchResult,
  type GitHubContents,
  type GitHubRepository,
} from "./schemas";

export const REPO_PAGE_SIZE = 100;

export interface GitHubClientOptions {
  token?: string;
  baseUrl: string;
  timeoutMs: number;
}

/**
 * Create the shared Octokit instance.
 *
 * Headers come from buildHeaders rather than Octokit's own auth strategy so
 * the exact Authorization/Accept/User-Agent set is applied to every request.
 */
export function createOctokit(options: GitHubClientOptions): Octokit {
  const octokit = new Octokit({ baseUrl: options.baseUrl });
  const headers = buildHeaders(options.token);

  octokit.hook.before("request", (request) => {
    for (const [name, value] of Object.entries(headers)) {
      request.headers[name.toLowerCase()] = value;
    }
    request.request = {
      ...request.request,
      signal: AbortSignal.timeout(options.timeoutMs),
    };
  });

  return octokit;
}

export class GitHubApi {
  constructor(
    private readonly octokit: Octokit,
    private readonly logger: Logger
  ) {}

  /**
   * List every repository of an organization, in API order.
   *
   * Pages are requested one at a time until a page comes back short or empty.
   */
  async listOrgRepos(org: string): Promise<GitHubRepository[]> {
    const repos: GitHubRepository[] = [];

    for (let page = 1; ; page++) {
      let data: unknown;
      try {
        const response = await this.octokit.repos.listForOrg({
          org,
          per_page: REPO_PAGE_SIZE,
          page,
          sort: "updated",
        });
        data = response.data;
      } catch (error) {
        throw translateGitHubError(error, { resource: `organization ${org}` });
      }

      const batch = parseResponse(
        GitHubRepositorySchema.array(),
        data,
        `repositories of ${org}`
      );
      repos.push(...batch);
      this.logger.debug("Fetched repository page", { org, page, count: batch.length });

      if (batch.length < REPO_PAGE_SIZE) {
        break;
      }
    }

    return repos;
  }

  async getRepository(owner: string, repo: string): Promise<GitHubRepository> {
    let data: unknown;
    try {
      const response = await this.octokit.repos.get({ owner, repo });
      data = response.data;
    } catch (error) {
      throw translateGitHubError(error, { resource: `repository ${owner}/${repo}` });
    }
    return parseResponse(GitHubRepositorySchema, data, `${owner}/${repo}`);
  }

  /**
   * Directory listing or single-file metadata+content, depending on the path
   */
  async getContents(owner: string, repo: string, path: string): Promise<GitHubContents> {
    let data: unknown;
    try {
      const response = await this.octokit.repos.getContent({ owner, repo, path });
      data = response.data;
    } catch (error) {
      throw translateGitHubError(error, { resource: `${owner}/${repo}/${path}` });
    }
    return parseResponse(GitHubContentsSchema, data, `${owner}/${repo}/${path}`);
  }

  async searchCode(query: string, perPage: number): Promise<GitHubCodeSearchResult> {
    let data: unknown;
    try {
      const response = await this.octokit.search.code({ q: query, per_page: perPage });
      data = response.data;
    } catch (error) {
      throw translateGitHubError(error, { resource: `code search "${query}"`, search: true });
    }
    return parseResponse(GitHubCodeSearchSchema, data, `code search "${query}"`);
  }
}
