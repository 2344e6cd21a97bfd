/**
 * URI-addressable read views
 *
 *   documentation://{org}/{repo}         text listing of the repo's doc folder
 *   content://{org}/{repo}/{path}        raw decoded file content
 */

import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type { DocsVault } from "@knowledge-vault/core";

export const RESOURCE_TEMPLATES = [
  {
    uriTemplate: "documentation://{org}/{repo}",
    name: "Repository documentation",
    description: "Formatted listing of the documentation files in a repository's /doc folder",
    mimeType: "text/plain",
  },
  {
    uriTemplate: "content://{org}/{repo}/{path}",
    name: "File content",
    description: 'Decoded content of a file (path may contain "/", e.g. content://org/repo/doc/README.md)',
    mimeType: "text/plain",
  },
];

export type ResourceTarget =
  | { view: "documentation"; org: string; repo: string }
  | { view: "content"; org: string; repo: string; path: string };

const DOCUMENTATION_URI = /^documentation:\/\/([^/]+)\/([^/]+)\/?$/;
const CONTENT_URI = /^content:\/\/([^/]+)\/([^/]+)\/(.+)$/;

function decodeSegments(value: string): string {
  return value.split("/").map(decodeURIComponent).join("/");
}

export function parseResourceUri(uri: string): ResourceTarget | null {
  try {
    const documentation = DOCUMENTATION_URI.exec(uri);
    if (documentation) {
      return {
        view: "documentation",
        org: decodeURIComponent(documentation[1]),
        repo: decodeURIComponent(documentation[2]),
      };
    }

    const content = CONTENT_URI.exec(uri);
    if (content) {
      return {
        view: "content",
        org: decodeURIComponent(content[1]),
        repo: decodeURIComponent(content[2]),
        path: decodeSegments(content[3]),
      };
    }
  } catch (error) {
    // decodeURIComponent rejects malformed escapes
    if (error instanceof URIError) return null;
    throw error;
  }

  return null;
}

export async function readResource(vault: DocsVault, uri: string) {
  const target = parseResourceUri(uri);
  if (!target) {
    throw new McpError(ErrorCode.InvalidParams, `Unknown resource URI: ${uri}`);
  }

  const text =
    target.view === "documentation"
      ? await vault.documentationView(target.org, target.repo)
      : await vault.contentView(target.org, target.repo, target.path);

  return {
    contents: [{ uri, mimeType: "text/plain", text }],
  };
}
