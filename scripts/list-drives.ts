/**
 * List a site's drives with their root contents
 *
 * Usage: npx tsx scripts/list-drives.ts <site-name>
 * Example: npx tsx scripts/list-drives.ts TeamSite
 */
import { readClient, usage } from "./setup";

async function main() {
  const siteName = process.argv[2];
  if (!siteName) {
    usage([
      "Usage: npx tsx scripts/list-drives.ts <site-name>",
      "Example: npx tsx scripts/list-drives.ts TeamSite",
    ]);
  }

  const client = await readClient();

  const siteId = await client.getSiteId(siteName);
  if (!siteId) {
    console.error("Failed to get site ID");
    process.exit(1);
  }

  const drives = await client.listDrives(siteId);
  if (!drives) {
    console.error("No drives found");
    process.exit(1);
  }

  for (const { drive, rootContents } of drives) {
    console.log(`\n${drive.name} (${drive.id})`);
    for (const item of rootContents ?? []) {
      console.log(`  - ${item.name} (${item.type})`);
    }
  }
}

main().catch((err) => {
  console.error("Error:", err);
  process.exit(1);
});
