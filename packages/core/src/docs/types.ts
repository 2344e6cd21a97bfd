/**
 * Documentation Vault Types
 *
 * Records returned by the vault operations. Each is built fresh per request
 * from a validated GitHub payload and never mutated afterwards.
 */

import type { GitHubApi } from "../github";
import type { Logger } from "../logging";

export const DOC_TYPES = ["markdown", "mermaid", "svg", "openapi", "postman", "unknown"] as const;

export type DocType = (typeof DOC_TYPES)[number];

/** Top-level folder that holds a repository's documentation */
export const DOC_FOLDER = "doc";

/**
 * A repository of an organization, flagged with doc-folder presence
 */
export interface RepoSummary {
  /** Numeric GitHub id, as a string */
  readonly id: string;
  readonly name: string;
  /** Empty when the repository has no description */
  readonly description: string;
  /** html_url of the repository */
  readonly url: string;
  readonly hasDocFolder: boolean;
}

/**
 * A documentation file inside a repository's doc/ folder
 */
export interface DocFile {
  /** Blob SHA, doubling as a stable id */
  readonly id: string;
  readonly name: string;
  readonly path: string;
  readonly type: DocType;
  readonly size: number;
  readonly url: string;
  readonly download_url: string;
  readonly sha: string;
}

/**
 * Decoded content of a single file
 */
export interface FileContent {
  readonly name: string;
  readonly path: string;
  readonly content: string;
  readonly size: number;
  readonly sha: string;
  /** Encoding GitHub reported for the payload */
  readonly encoding: string;
}

/**
 * One hit from an org-wide documentation search
 */
export interface SearchHit {
  readonly name: string;
  readonly path: string;
  /** Short repository name, without the org */
  readonly repository: string;
  readonly url: string;
  readonly sha: string;
}

export interface SearchOptions {
  /** Maximum hits to return (default: 50, max: 100) */
  limit?: number;
}

/**
 * Collaborators shared by the vault operations
 */
export interface VaultDeps {
  api: GitHubApi;
  logger: Logger;
}
