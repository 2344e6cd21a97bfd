/**
 * MCP tool definitions and dispatch for the docs vault
 */

import { z } from "zod";
import {
  MAX_SEARCH_LIMIT,
  toErrorPayload,
  type DocsVault,
  type Outcome,
} from "@knowledge-vault/core";

export type ToolResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

const OrgArgs = z.object({
  org: z.string().trim().min(1, "org is required"),
});

const RepoArgs = OrgArgs.extend({
  repo: z.string().trim().min(1, "repo is required"),
});

const FileArgs = RepoArgs.extend({
  path: z.string().trim().min(1, "path is required"),
});

const SearchArgs = OrgArgs.extend({
  query: z.string().trim().min(1, "query is required"),
  limit: z.number().int().min(1).max(MAX_SEARCH_LIMIT).optional(),
});

export const TOOL_DEFINITIONS = [
  {
    name: "get_org_repos",
    description:
      "List every repository of a GitHub organization, flagging which ones have a top-level /doc folder. Use this first to discover where documentation lives.",
    inputSchema: {
      type: "object" as const,
      properties: {
        org: {
          type: "string",
          description: 'GitHub organization name (e.g., "microsoft", "google")',
        },
      },
      required: ["org"],
    },
  },
  {
    name: "get_repo_docs",
    description:
      "List the documentation files in a repository's /doc folder. Supported types: Markdown, Mermaid, SVG, OpenAPI (YAML/JSON) and Postman collections.",
    inputSchema: {
      type: "object" as const,
      properties: {
        org: { type: "string", description: "GitHub organization name" },
        repo: { type: "string", description: "Repository name" },
      },
      required: ["org", "repo"],
    },
  },
  {
    name: "get_file_content",
    description:
      "Get the decoded text content of a single file. Use this after get_repo_docs or search_documentation to read a document.",
    inputSchema: {
      type: "object" as const,
      properties: {
        org: { type: "string", description: "GitHub organization name" },
        repo: { type: "string", description: "Repository name" },
        path: {
          type: "string",
          description: 'File path within the repository (e.g., "doc/README.md")',
        },
      },
      required: ["org", "repo", "path"],
    },
  },
  {
    name: "search_documentation",
    description:
      "Search documentation files in /doc folders across all repositories of an organization. Uses GitHub code search, which has a low rate limit.",
    inputSchema: {
      type: "object" as const,
      properties: {
        org: { type: "string", description: "GitHub organization name" },
        query: {
          type: "string",
          description: 'Search terms (e.g., "authentication", "API", "tutorial")',
        },
        limit: {
          type: "number",
          description: `Maximum number of results to return (default: 50, max: ${MAX_SEARCH_LIMIT})`,
        },
      },
      required: ["org", "query"],
    },
  },
];

function textResponse(payload: unknown, isError = false): ToolResponse {
  const response: ToolResponse = {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
  };
  if (isError) {
    response.isError = true;
  }
  return response;
}

function fromOutcome<T>(outcome: Outcome<T>): ToolResponse {
  return outcome.ok
    ? textResponse(outcome.value)
    : textResponse(toErrorPayload(outcome.error), true);
}

function invalidArguments(error: z.ZodError): ToolResponse {
  const details = error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
  return textResponse({ error: `Invalid arguments: ${details.join("; ")}` }, true);
}

export async function callTool(
  vault: DocsVault,
  name: string,
  args: Record<string, unknown> = {}
): Promise<ToolResponse> {
  switch (name) {
    case "get_org_repos": {
      const parsed = OrgArgs.safeParse(args);
      if (!parsed.success) return invalidArguments(parsed.error);
      return fromOutcome(await vault.listOrgRepos(parsed.data.org));
    }

    case "get_repo_docs": {
      const parsed = RepoArgs.safeParse(args);
      if (!parsed.success) return invalidArguments(parsed.error);
      return fromOutcome(await vault.listRepoDocs(parsed.data.org, parsed.data.repo));
    }

    case "get_file_content": {
      const parsed = FileArgs.safeParse(args);
      if (!parsed.success) return invalidArguments(parsed.error);
      const { org, repo, path } = parsed.data;
      return fromOutcome(await vault.getFileContent(org, repo, path));
    }

    case "search_documentation": {
      const parsed = SearchArgs.safeParse(args);
      if (!parsed.success) return invalidArguments(parsed.error);
      const { org, query, limit } = parsed.data;
      return fromOutcome(await vault.searchDocs(org, query, { limit }));
    }

    default:
      return textResponse({ error: `Unknown tool: ${name}` }, true);
  }
}
