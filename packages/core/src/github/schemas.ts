/**
 * Shapes of the GitHub responses the vault relies on.
 *
 * Only the fields the vault reads are declared; anything else GitHub sends
 * is stripped during parsing.
 */

import { z } from "zod";
import { DocsError } from "../errors";

export const GitHubRepositorySchema = z.object({
  id: z.number(),
  name: z.string(),
  description: z.string().nullable().optional(),
  html_url: z.string(),
});

export const GitHubContentEntrySchema = z.object({
  type: z.string(),
  name: z.string(),
  path: z.string(),
  sha: z.string(),
  size: z.number(),
  html_url: z.string().nullable().optional(),
  download_url: z.string().nullable().optional(),
});

export const GitHubFileSchema = GitHubContentEntrySchema.extend({
  content: z.string().optional(),
  encoding: z.string().optional(),
});

export const GitHubContentsSchema = z.union([
  z.array(GitHubContentEntrySchema),
  GitHubFileSchema,
]);

export const GitHubCodeSearchItemSchema = z.object({
  name: z.string(),
  path: z.string(),
  sha: z.string(),
  html_url: z.string(),
  repository: z.object({
    id: z.number(),
    name: z.string(),
    full_name: z.string(),
  }),
});

export const GitHubCodeSearchSchema = z.object({
  total_count: z.number(),
  incomplete_results: z.boolean(),
  items: z.array(GitHubCodeSearchItemSchema),
});

export type GitHubRepository = z.infer<typeof GitHubRepositorySchema>;
export type GitHubContentEntry = z.infer<typeof GitHubContentEntrySchema>;
export type GitHubFile = z.infer<typeof GitHubFileSchema>;
export type GitHubContents = z.infer<typeof GitHubContentsSchema>;
export type GitHubCodeSearchItem = z.infer<typeof GitHubCodeSearchItemSchema>;
export type GitHubCodeSearchResult = z.infer<typeof GitHubCodeSearchSchema>;

/**
 * Validate an upstream payload, failing with an ApiError that names the
 * first offending field.
 */
export function parseResponse<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  what: string
): z.infer<S> {
  const parsed = schema.safeParse(data);
  if (parsed.success) {
    return parsed.data;
  }

  const issue = parsed.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
  throw new DocsError(
    "ApiError",
    `Unexpected GitHub response for ${what}: ${field}: ${issue?.message ?? "invalid"}`,
    undefined,
    data
  );
}
