/**
 * In-process stand-in for the GitHub endpoints the vault calls.
 *
 * Test files mock "@octokit/rest" with an Octokit whose methods are the
 * vi.fn()s in OctokitMocks; installOrgFixture makes those mocks answer like
 * GitHub would for a small fixture organization.
 */

import type { Mock } from "vitest";
import { createLogger, type Logger } from "../logging";

export interface OctokitMocks {
  listForOrg: Mock;
  get: Mock;
  getContent: Mock;
  searchCode: Mock;
  hookBefore: Mock;
}

export interface FixtureRepo {
  name: string;
  description?: string | null;
  /** path -> file content */
  files: Record<string, string>;
}

export interface FixtureOrg {
  name: string;
  repos: FixtureRepo[];
}

export function httpError(
  status: number,
  message: string,
  headers: Record<string, string> = {}
): Error {
  return Object.assign(new Error(message), {
    status,
    response: { status, data: { message }, headers },
  });
}

export function createTestLogger(): { logger: Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const logger = createLogger({
    level: "debug",
    sink: (line) => {
      lines.push(JSON.parse(line));
    },
  });
  return { logger, lines };
}

/** GitHub wraps base64 payloads at 60 columns */
export function githubBase64(content: string | Buffer): string {
  const bytes = typeof content === "string" ? Buffer.from(content, "utf8") : content;
  const encoded = bytes.toString("base64");
  return (encoded.match(/.{1,60}/g) ?? []).join("\n") + "\n";
}

function basename(path: string): string {
  return path.split("/").pop() ?? path;
}

export function repoPayload(org: string, repo: FixtureRepo, index: number) {
  return {
    id: 1000 + index,
    name: repo.name,
    full_name: `${org}/${repo.name}`,
    description: repo.description ?? null,
    html_url: `https://github.com/${org}/${repo.name}`,
    private: false,
  };
}

export function entryPayload(
  org: string,
  repo: string,
  path: string,
  type: "file" | "dir",
  size = 0
) {
  return {
    type,
    name: basename(path),
    path,
    sha: `sha-${repo}-${path}`,
    size,
    url: `https://api.github.com/repos/${org}/${repo}/contents/${path}`,
    html_url: `https://github.com/${org}/${repo}/${type === "file" ? "blob" : "tree"}/main/${path}`,
    download_url:
      type === "file" ? `https://raw.githubusercontent.com/${org}/${repo}/main/${path}` : null,
  };
}

/**
 * Direct children of a directory, with deeper paths collapsed into "dir" entries
 */
function listDirectory(org: string, repo: FixtureRepo, dir: string) {
  const prefix = dir ? `${dir}/` : "";
  const seen = new Set<string>();
  const entries = [];

  for (const [path, content] of Object.entries(repo.files)) {
    if (!path.startsWith(prefix)) continue;
    const rest = path.slice(prefix.length);
    const [head, ...tail] = rest.split("/");
    const childPath = `${prefix}${head}`;
    if (seen.has(childPath)) continue;
    seen.add(childPath);
    entries.push(
      tail.length === 0
        ? entryPayload(org, repo.name, childPath, "file", Buffer.byteLength(content))
        : entryPayload(org, repo.name, childPath, "dir")
    );
  }

  return entries;
}

export function installOrgFixture(mocks: OctokitMocks, org: FixtureOrg): void {
  const findRepo = (owner: string, name: string) =>
    owner === org.name ? org.repos.find((repo) => repo.name === name) : undefined;

  mocks.listForOrg.mockImplementation(
    async ({ org: name, per_page, page }: { org: string; per_page: number; page: number }) => {
      if (name !== org.name) throw httpError(404, "Not Found");
      const start = (page - 1) * per_page;
      return {
        status: 200,
        data: org.repos
          .map((repo, index) => repoPayload(org.name, repo, index))
          .slice(start, start + per_page),
      };
    }
  );

  mocks.get.mockImplementation(async ({ owner, repo }: { owner: string; repo: string }) => {
    const found = findRepo(owner, repo);
    if (!found) throw httpError(404, "Not Found");
    return { status: 200, data: repoPayload(org.name, found, org.repos.indexOf(found)) };
  });

  mocks.getContent.mockImplementation(
    async ({ owner, repo, path }: { owner: string; repo: string; path: string }) => {
      const found = findRepo(owner, repo);
      if (!found) throw httpError(404, "Not Found");

      const content = found.files[path];
      if (content !== undefined) {
        return {
          status: 200,
          data: {
            ...entryPayload(org.name, repo, path, "file", Buffer.byteLength(content)),
            content: githubBase64(content),
            encoding: "base64",
          },
        };
      }

      const entries = listDirectory(org.name, found, path);
      if (entries.length === 0) throw httpError(404, "Not Found");
      return { status: 200, data: entries };
    }
  );

  // Like GitHub's path: qualifier, "path:doc" matches any path containing "doc"
  mocks.searchCode.mockImplementation(async ({ q, per_page }: { q: string; per_page: number }) => {
    const tokens = q.split(/\s+/).filter(Boolean);
    const qualifier = (key: string) =>
      tokens.find((token) => token.startsWith(`${key}:`))?.slice(key.length + 1);
    const terms = tokens.filter((token) => !token.includes(":"));

    const searchOrg = qualifier("org");
    const pathFilter = qualifier("path") ?? "";

    const items = [];
    if (searchOrg === org.name) {
      for (const [index, repo] of org.repos.entries()) {
        for (const [path, content] of Object.entries(repo.files)) {
          if (!path.includes(pathFilter)) continue;
          if (!terms.every((term) => content.includes(term) || path.includes(term))) continue;
          items.push({
            name: basename(path),
            path,
            sha: `sha-${repo.name}-${path}`,
            html_url: `https://github.com/${org.name}/${repo.name}/blob/main/${path}`,
            repository: repoPayload(org.name, repo, index),
          });
        }
      }
    }

    return {
      status: 200,
      data: {
        total_count: items.length,
        incomplete_results: false,
        items: items.slice(0, per_page),
      },
    };
  });
}

/** Two repositories: "a" with doc/readme.md and doc/api.yaml, "b" without docs */
export const ACME: FixtureOrg = {
  name: "acme",
  repos: [
    {
      name: "a",
      description: "Service A",
      files: {
        "README.md": "# A\n",
        "doc/readme.md": "# A docs\n\nAuthentication uses tokens.\n",
        "doc/api.yaml": "openapi: 3.0.0\ninfo:\n  title: A\n",
        "src/index.ts": "export const a = 1;\n",
      },
    },
    {
      name: "b",
      description: null,
      files: {
        "README.md": "# B\n",
        "src/main.ts": "console.log('b');\n",
      },
    },
  ],
};
