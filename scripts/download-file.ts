/**
 * Download a file from a drive's root folder
 *
 * Usage: npx tsx scripts/download-file.ts <site-name> <drive-name> <file-name> [output-path]
 */
import { writeFile } from "node:fs/promises";
import { readClient, usage } from "./setup";

async function main() {
  const [siteName, driveName, fileName, outputPath] = process.argv.slice(2);
  if (!(siteName && driveName && fileName)) {
    usage([
      "Usage: npx tsx scripts/download-file.ts <site-name> <drive-name> <file-name> [output-path]",
    ]);
  }

  const client = await readClient("download-file.log");

  const content = await client.downloadFile(fileName, siteName, driveName);
  if (!content) {
    console.error(`Failed to download ${fileName}`);
    process.exit(1);
  }

  const target = outputPath ?? fileName;
  await writeFile(target, content);
  console.log(`Saved ${content.length} bytes to ${target}`);
}

main().catch((err) => {
  console.error("Error:", err);
  process.exit(1);
});
