export { createOctokit, GitHubApi, REPO_PAGE_SIZE, type GitHubClientOptions } from "./client";
export { buildHeaders, GITHUB_ACCEPT, USER_AGENT } from "./headers";
export {
  translateGitHubError,
  SEARCH_RATE_LIMIT_MESSAGE,
  API_RATE_LIMIT_MESSAGE,
  type TranslateContext,
} from "./errors";
export * from "./schemas";
