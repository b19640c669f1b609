/**
 * Upload a local file into a nested folder, skipping it if a file with the
 * same name is already there
 *
 * Usage: npx tsx scripts/nested-folder-upload.ts <site-name> <drive-name> <folder-path> <local-file>
 * Example: npx tsx scripts/nested-folder-upload.ts TeamSite Documents "Reports/2026/Q1" ./summary.pdf
 */
import { basename } from "node:path";
import { usage, writeClients } from "./setup";

async function main() {
  const [siteName, driveName, folderPath, localFile] = process.argv.slice(2);
  if (!(siteName && driveName && folderPath && localFile)) {
    usage([
      "Usage: npx tsx scripts/nested-folder-upload.ts <site-name> <drive-name> <folder-path> <local-file>",
      'Example: npx tsx scripts/nested-folder-upload.ts TeamSite Documents "Reports/2026/Q1" ./summary.pdf',
    ]);
  }

  const { read, write } = await writeClients("nested-folder-upload.log");

  const siteId = await read.getSiteId(siteName);
  if (!siteId) {
    console.error("Failed to get site ID");
    process.exit(1);
  }

  const driveId = await read.getDriveId(siteId, driveName);
  if (!driveId) {
    console.error("Failed to get drive ID");
    process.exit(1);
  }

  const folder = await read.getNestedFolderInfo(driveId, folderPath);
  if (!folder) {
    console.error(`Folder path not found: ${folderPath}`);
    process.exit(1);
  }

  const fileName = basename(localFile);
  if (await read.fileExistsInFolder(driveId, folder.id, fileName)) {
    console.log(`\n✅ ${fileName} already exists in ${folder.name}`);
    return;
  }

  console.log(`\nUploading to: ${folderPath}/${fileName}`);
  const fileId = await write.uploadFileToFolder(
    driveId,
    folder.id,
    fileName,
    localFile
  );
  if (!fileId) {
    console.error("Upload failed");
    process.exit(1);
  }

  console.log("\n✅ Uploaded successfully!");
  console.log(`File ID: ${fileId}`);
}

main().catch((err) => {
  console.error("Error:", err);
  process.exit(1);
});
