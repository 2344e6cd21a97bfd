import { describe, it, expect, vi } from "vitest";
import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { createLogger, DocsError, DocsVault, loadConfig } from "@knowledge-vault/core";
import { parseResourceUri, readResource } from "../resources";

function createVault(): DocsVault {
  return DocsVault.fromConfig(loadConfig({}), createLogger({ level: "error", sink: () => {} }));
}

describe("parseResourceUri", () => {
  it("parses documentation URIs", () => {
    expect(parseResourceUri("documentation://acme/a")).toEqual({
      view: "documentation",
      org: "acme",
      repo: "a",
    });
    expect(parseResourceUri("documentation://acme/a/")).toEqual({
      view: "documentation",
      org: "acme",
      repo: "a",
    });
  });

  it("keeps slashes in content paths", () => {
    expect(parseResourceUri("content://acme/a/doc/nested/guide.md")).toEqual({
      view: "content",
      org: "acme",
      repo: "a",
      path: "doc/nested/guide.md",
    });
  });

  it("decodes percent-escapes segment by segment", () => {
    expect(parseResourceUri("content://acme/a/doc/guide%20v2.md")).toEqual({
      view: "content",
      org: "acme",
      repo: "a",
      path: "doc/guide v2.md",
    });
  });

  it.each([
    "documentation://acme",
    "documentation://acme/a/extra",
    "content://acme/a",
    "content://acme/a/",
    "https://github.com/acme/a",
    "content://acme/a/doc/%E0%A4%A",
  ])("rejects %s", (uri) => {
    expect(parseResourceUri(uri)).toBeNull();
  });
});

describe("readResource", () => {
  it("renders the documentation view as plain text", async () => {
    const vault = createVault();
    vi.spyOn(vault, "listRepoDocs").mockResolvedValue({ ok: true, value: [] });

    expect(await readResource(vault, "documentation://acme/b")).toEqual({
      contents: [
        {
          uri: "documentation://acme/b",
          mimeType: "text/plain",
          text: "No documentation found in acme/b/doc folder",
        },
      ],
    });
    expect(vault.listRepoDocs).toHaveBeenCalledWith("acme", "b");
  });

  it("returns file content for content URIs", async () => {
    const vault = createVault();
    vi.spyOn(vault, "getFileContent").mockResolvedValue({
      ok: true,
      value: {
        name: "guide.md",
        path: "doc/guide.md",
        content: "# Guide\n",
        size: 8,
        sha: "sha-1",
        encoding: "base64",
      },
    });

    const result = await readResource(vault, "content://acme/a/doc/guide.md");

    expect(result.contents[0]?.text).toBe("# Guide\n");
    expect(vault.getFileContent).toHaveBeenCalledWith("acme", "a", "doc/guide.md");
  });

  it("serialises vault failures into the text", async () => {
    const vault = createVault();
    vi.spyOn(vault, "getFileContent").mockResolvedValue({
      ok: false,
      error: new DocsError("NotFound", "File not found: acme/a/doc/missing.md", 404),
    });

    const result = await readResource(vault, "content://acme/a/doc/missing.md");

    expect(result.contents[0]?.text).toBe('{"error":"File not found: acme/a/doc/missing.md"}');
  });

  it("rejects unknown URIs with InvalidParams", async () => {
    await expect(readResource(createVault(), "bogus://acme/a")).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
    });
  });
});
