/**
 * Smoke test against the live GitHub API
 *
 * Lists an organization's repositories, shows the doc folder of the first
 * repository that has one, and runs an optional documentation search.
 *
 * Prerequisites:
 * - GITHUB_TOKEN environment variable set (optional, but search is heavily
 *   rate limited without it)
 *
 * Usage:
 * npx tsx scripts/list-org-docs.ts <org> [search terms]
 */

// Load environment variables
import * as dotenv from "dotenv";
dotenv.config();

import { createLogger, DocsVault, loadConfig } from "../packages/core/src";

async function main() {
  const [org, ...terms] = process.argv.slice(2);
  if (!org) {
    console.error("Usage: npx tsx scripts/list-org-docs.ts <org> [search terms]");
    process.exit(1);
  }

  const config = loadConfig();
  const vault = DocsVault.fromConfig(config, createLogger({ level: config.logLevel, scope: "smoke" }));

  console.log(`📚 Documentation in ${org}\n`);

  const repos = await vault.listOrgRepos(org);
  if (!repos.ok) {
    console.error(`❌ ${repos.error.kind}: ${repos.error.message}`);
    process.exit(1);
  }

  const withDocs = repos.value.filter((repo) => repo.hasDocFolder);
  console.log(`Repositories: ${repos.value.length} (${withDocs.length} with a doc folder)`);
  for (const repo of withDocs) {
    console.log(`   - ${repo.name}${repo.description ? `: ${repo.description}` : ""}`);
  }

  const first = withDocs[0];
  if (first) {
    console.log("");
    console.log(await vault.documentationView(org, first.name));
  }

  if (terms.length > 0) {
    const query = terms.join(" ");
    console.log(`\n🔍 Searching for "${query}"...`);
    const hits = await vault.searchDocs(org, query, { limit: 10 });
    if (!hits.ok) {
      console.error(`❌ ${hits.error.kind}: ${hits.error.message}`);
      process.exit(1);
    }
    for (const hit of hits.value) {
      console.log(`   - ${hit.repository}/${hit.path}`);
    }
  }
}

main().catch((error) => {
  console.error("❌ Smoke test failed:", error);
  process.exit(1);
});
