/**
 * Doc-folder membership rules.
 *
 * Presence and content filtering use different predicates:
 * a folder holding only unrecognised files still counts as a doc folder,
 * but those files never show up in a listing.
 */

import type { GitHubContentEntry } from "../github";
import { determineType } from "./classifier";
import { DOC_FOLDER, type DocFile } from "./types";

const DOC_PREFIX = `${DOC_FOLDER}/`;

export function isInDocFolder(path: string): boolean {
  return path.startsWith(DOC_PREFIX);
}

export function hasDocFolder(entries: ReadonlyArray<Pick<GitHubContentEntry, "path">>): boolean {
  return entries.some((entry) => isInDocFolder(entry.path));
}

export function toDocFile(entry: GitHubContentEntry): DocFile {
  return {
    id: entry.sha,
    name: entry.name,
    path: entry.path,
    type: determineType(entry.name),
    size: entry.size,
    url: entry.html_url ?? "",
    download_url: entry.download_url ?? "",
    sha: entry.sha,
  };
}

/**
 * Keep the files under doc/ whose type is recognised, in listing order
 */
export function selectDocFiles(entries: readonly GitHubContentEntry[]): DocFile[] {
  return entries
    .filter((entry) => entry.type === "file" && isInDocFolder(entry.path))
    .map(toDocFile)
    .filter((doc) => doc.type !== "unknown");
}
