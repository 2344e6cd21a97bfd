import { DocsError } from "../errors";
import type { GitHubContents } from "../github";
import type { FileContent, VaultDeps } from "./types";

/** Largest file the contents API returns inline */
export const CONTENTS_API_LIMIT_BYTES = 1024 * 1024;

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode a GitHub base64 payload to UTF-8 text.
 *
 * GitHub wraps the payload at 60 columns, so whitespace is dropped before
 * decoding. Malformed base64 and non-UTF-8 bytes both raise DecodingError.
 */
export function decodeBase64Content(encoded: string, path: string): string {
  const compact = encoded.replace(/\s+/g, "");

  if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new DocsError("DecodingError", `Content of ${path} is not valid base64`);
  }

  try {
    return utf8.decode(Buffer.from(compact, "base64"));
  } catch {
    throw new DocsError(
      "DecodingError",
      `Content of ${path} is not UTF-8 text (binary file?)`
    );
  }
}

/**
 * Fetch one file's metadata and decoded content. Single files only.
 */
export async function getFileContent(
  deps: VaultDeps,
  org: string,
  repo: string,
  path: string
): Promise<FileContent> {
  const { api, logger } = deps;
  logger.info("Fetching content", { org, repo, path });

  let data: GitHubContents;
  try {
    data = await api.getContents(org, repo, path);
  } catch (error) {
    if (error instanceof DocsError && error.kind === "NotFound") {
      throw new DocsError("NotFound", `File not found: ${org}/${repo}/${path}`, error.status);
    }
    throw error;
  }

  if (Array.isArray(data)) {
    throw new DocsError("InvalidArgument", `Path points to a directory, not a file: ${path}`);
  }
  if (data.type !== "file") {
    throw new DocsError("InvalidArgument", `Path is not a file (type: ${data.type}): ${path}`);
  }

  const encoding = data.encoding ?? "base64";
  const raw = data.content ?? "";

  // Files over 1 MB come back with encoding "none" and no inline content
  if (encoding === "none" && data.size > 0) {
    throw new DocsError(
      "ApiError",
      `Content of ${path} is too large for the contents API (${data.size} bytes, limit ${CONTENTS_API_LIMIT_BYTES})`
    );
  }

  const content = encoding === "base64" ? decodeBase64Content(raw, path) : raw;

  logger.debug("Decoded content", { org, repo, path, characters: content.length });

  return {
    name: data.name,
    path: data.path,
    content,
    size: data.size,
    sha: data.sha,
    encoding,
  };
}
