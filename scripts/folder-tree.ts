/**
 * Print every folder in a drive, then the contents of each
 *
 * Usage: npx tsx scripts/folder-tree.ts <site-name> <drive-name>
 * Example: npx tsx scripts/folder-tree.ts TeamSite Documents
 */
import { readClient, usage } from "./setup";

async function main() {
  const [siteName, driveName] = process.argv.slice(2);
  if (!(siteName && driveName)) {
    usage([
      "Usage: npx tsx scripts/folder-tree.ts <site-name> <drive-name>",
      "Example: npx tsx scripts/folder-tree.ts TeamSite Documents",
    ]);
  }

  const client = await readClient("folder-tree.log");

  const siteId = await client.getSiteId(siteName);
  if (!siteId) {
    console.error("Failed to get site ID");
    process.exit(1);
  }

  const driveId = await client.getDriveId(siteId, driveName);
  if (!driveId) {
    console.error(`Drive '${driveName}' not found`);
    process.exit(1);
  }

  console.log(`\nExploring drive: ${driveName}`);
  const folders = await client.listAllFolders(driveId);

  for (const folder of folders) {
    const contents = await client.getFolderContent(driveId, folder.id);
    if (contents === null) {
      console.log(`\n${folder.path}: could not be listed`);
      continue;
    }

    console.log(`\n${folder.path} (${contents.length} items)`);
    for (const item of contents) {
      console.log(`  - ${item.name} (${item.type}, ${item.size})`);
    }
  }
}

main().catch((err) => {
  console.error("Error:", err);
  process.exit(1);
});
