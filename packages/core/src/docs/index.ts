/**
 * GitHub Docs Vault Module
 *
 * Read-only access to the documentation kept in the top-level doc/ folder of
 * an organization's repositories.
 *
 * Features:
 * - Repository discovery with doc-folder detection (search first, per-repo fallback)
 * - Doc-folder listings classified as markdown, mermaid, svg, openapi or postman
 * - Decoded file content and org-wide documentation search
 *
 * Usage:
 * ```typescript
 * import { DocsVault, loadConfig, createLogger } from '@knowledge-vault/core';
 *
 * const config = loadConfig();
 * const vault = DocsVault.fromConfig(config, createLogger({ level: config.logLevel }));
 *
 * const repos = await vault.listOrgRepos('acme');
 * if (repos.ok) {
 *   console.error(repos.value.filter((repo) => repo.hasDocFolder));
 * }
 * ```
 */

// Types
export * from "./types";

// Classification and filtering
export { determineType } from "./classifier";
export { isInDocFolder, hasDocFolder, selectDocFiles, toDocFile } from "./doc-filter";

// Operations
export {
  discoverRepositories,
  discoverBySearch,
  discoverByListing,
  docFolderQuery,
} from "./discovery";
export { listRepoDocs } from "./repo-docs";
export { getFileContent, decodeBase64Content, CONTENTS_API_LIMIT_BYTES } from "./file-content";
export { searchDocs, docSearchQuery, DEFAULT_SEARCH_LIMIT, MAX_SEARCH_LIMIT } from "./search";
export { renderDocListing } from "./views";

// Facade
export { DocsVault } from "./vault";
