import { describe, it, expect, beforeEach, vi } from "vitest";
import { createLogger, DocsError, DocsVault, loadConfig } from "@knowledge-vault/core";
import { TOOL_DEFINITIONS, callTool, type ToolResponse } from "../tools";

function payload(response: ToolResponse): unknown {
  return JSON.parse(response.content[0]?.text ?? "null");
}

describe("TOOL_DEFINITIONS", () => {
  it("declares the four vault tools", () => {
    expect(TOOL_DEFINITIONS.map((tool) => tool.name)).toEqual([
      "get_org_repos",
      "get_repo_docs",
      "get_file_content",
      "search_documentation",
    ]);
  });

  it("marks the identifying arguments as required", () => {
    const required = Object.fromEntries(
      TOOL_DEFINITIONS.map((tool) => [tool.name, tool.inputSchema.required])
    );
    expect(required).toEqual({
      get_org_repos: ["org"],
      get_repo_docs: ["org", "repo"],
      get_file_content: ["org", "repo", "path"],
      search_documentation: ["org", "query"],
    });
  });
});

describe("callTool", () => {
  let vault: DocsVault;

  beforeEach(() => {
    vault = DocsVault.fromConfig(loadConfig({}), createLogger({ level: "error", sink: () => {} }));
  });

  it("returns results as pretty-printed JSON", async () => {
    const repos = [
      { id: "1", name: "a", description: "", url: "https://github.com/acme/a", hasDocFolder: true },
    ];
    vi.spyOn(vault, "listOrgRepos").mockResolvedValue({ ok: true, value: repos });

    const response = await callTool(vault, "get_org_repos", { org: "acme" });

    expect(response).toEqual({
      content: [{ type: "text", text: JSON.stringify(repos, null, 2) }],
    });
  });

  it("trims arguments before calling the vault", async () => {
    const spy = vi.spyOn(vault, "listRepoDocs").mockResolvedValue({ ok: true, value: [] });

    await callTool(vault, "get_repo_docs", { org: " acme ", repo: "a " });

    expect(spy).toHaveBeenCalledWith("acme", "a");
  });

  it("flags vault failures as errors with the error payload", async () => {
    vi.spyOn(vault, "getFileContent").mockResolvedValue({
      ok: false,
      error: new DocsError("NotFound", "File not found: acme/a/doc/x.md", 404),
    });

    const response = await callTool(vault, "get_file_content", {
      org: "acme",
      repo: "a",
      path: "doc/x.md",
    });

    expect(response.isError).toBe(true);
    expect(payload(response)).toEqual({ error: "File not found: acme/a/doc/x.md" });
  });

  it("passes the search limit through", async () => {
    const spy = vi.spyOn(vault, "searchDocs").mockResolvedValue({ ok: true, value: [] });

    await callTool(vault, "search_documentation", { org: "acme", query: "auth", limit: 5 });
    await callTool(vault, "search_documentation", { org: "acme", query: "auth" });

    expect(spy).toHaveBeenNthCalledWith(1, "acme", "auth", { limit: 5 });
    expect(spy).toHaveBeenNthCalledWith(2, "acme", "auth", { limit: undefined });
  });

  it("reports missing arguments without calling the vault", async () => {
    const spy = vi.spyOn(vault, "listOrgRepos");

    const response = await callTool(vault, "get_org_repos", {});

    expect(response.isError).toBe(true);
    expect(payload(response)).toEqual({ error: "Invalid arguments: org: Required" });
    expect(spy).not.toHaveBeenCalled();
  });

  it("reports blank arguments", async () => {
    const response = await callTool(vault, "get_repo_docs", { org: "acme", repo: "  " });

    expect(payload(response)).toEqual({ error: "Invalid arguments: repo: repo is required" });
  });

  it("rejects an out-of-range search limit", async () => {
    const response = await callTool(vault, "search_documentation", {
      org: "acme",
      query: "auth",
      limit: 101,
    });

    expect(response.isError).toBe(true);
    expect(payload(response)).toEqual({
      error: "Invalid arguments: limit: Number must be less than or equal to 100",
    });
  });

  it("reports unknown tools", async () => {
    const response = await callTool(vault, "delete_repo", { org: "acme" });

    expect(response).toEqual({
      content: [{ type: "text", text: JSON.stringify({ error: "Unknown tool: delete_repo" }, null, 2) }],
      isError: true,
    });
  });
});
