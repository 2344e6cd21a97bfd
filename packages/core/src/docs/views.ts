/**
 * Plain-text renderings behind the read-only resource views
 */

import type { DocFile } from "./types";

const RULE = "=".repeat(50);

export function renderDocListing(org: string, repo: string, docs: readonly DocFile[]): string {
  if (docs.length === 0) {
    return `No documentation found in ${org}/${repo}/doc folder`;
  }

  const lines = [`Documentation in ${org}/${repo}`, RULE, ""];

  for (const doc of docs) {
    lines.push(`- ${doc.name}`);
    lines.push(`  Type: ${doc.type}`);
    lines.push(`  Size: ${doc.size.toLocaleString("en-US")} bytes`);
    lines.push(`  Path: ${doc.path}`);
    lines.push("");
  }

  lines.push(`Total: ${docs.length} files`);
  return lines.join("\n");
}
