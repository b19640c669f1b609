/**
 * List the SharePoint sites visible to the app registration
 *
 * Usage: npx tsx scripts/list-sites.ts
 */
import { readClient } from "./setup";

async function main() {
  const client = await readClient("list-sites.log");

  const sites = await client.listSites();
  if (!sites) {
    console.error("Failed to list sites");
    process.exit(1);
  }

  for (const site of sites) {
    console.log(`${site.displayName}  ${site.webUrl}`);
  }
}

main().catch((err) => {
  console.error("Error:", err);
  process.exit(1);
});
