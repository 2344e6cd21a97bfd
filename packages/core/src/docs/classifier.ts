import type { DocType } from "./types";

/**
 * Determine a documentation file's content type from its name.
 *
 * Matching is case-sensitive and the first rule wins. The postman rule has to
 * run before the generic .json rule, otherwise collections would classify
 * as openapi.
 */
export function determineType(filename: string): DocType {
  if (filename.startsWith("postman") && filename.endsWith(".json")) return "postman";
  if (filename.endsWith(".yml") || filename.endsWith(".yaml") || filename.endsWith(".json")) {
    return "openapi";
  }
  if (filename.endsWith(".md")) return "markdown";
  if (filename.endsWith(".mmd") || filename.endsWith(".mermaid")) return "mermaid";
  if (filename.endsWith(".svg")) return "svg";

  return "unknown";
}
