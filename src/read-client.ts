/**
 * Read operations: sites, drives, folder listings, nested folder lookup,
 * recursive folder walks and file download.
 *
 * Nothing here throws for a failed request. Operations log the failure and
 * return null (or [] / false where the signature has no null).
 */
import type { z } from "zod";
import type { BaseClient } from "./base-client";
import { describeError } from "./errors";
import {
  driveItemListingSchema,
  driveListingSchema,
  type GraphDriveItem,
  graphErrorSchema,
  isFile,
  isFolder,
  parseGraph,
  resourceIdSchema,
  siteListingSchema,
} from "./graph-schemas";
import { createLogger } from "./logger";
import {
  formatGraphUrl,
  joinDrivePath,
  parseFolderPath,
  ROOT_FOLDER_ID,
  sharePointHostname,
} from "./paths";
import type {
  ContentEntry,
  DriveRef,
  DriveSummary,
  FolderEntry,
  GraphJson,
  ParentFolder,
  ResolvedFolder,
  SharePointDrive,
  SharePointSite,
} from "./types";

const log = createLogger("ReadClient");

export class ReadClient {
  constructor(readonly client: BaseClient) {}

  // ============================================================================
  // Sites
  // ============================================================================

  async listSites(): Promise<SharePointSite[] | null> {
    if (!this.hasToken("listSites")) {
      return null;
    }

    const listing = await this.fetchParsed(
      formatGraphUrl("sites"),
      siteListingSchema
    );
    if (!listing) {
      log.error("Failed to retrieve sites");
      return null;
    }

    if (listing.value.length === 0) {
      log.info("No sites found");
    } else {
      log.info(`Found ${listing.value.length} sites`);
    }

    return listing.value.map((site) => ({
      id: site.id,
      name: site.name,
      displayName: site.displayName ?? site.name,
      webUrl: site.webUrl,
      description: site.description,
    }));
  }

  /**
   * Look up a site id by site name, e.g. "TeamSite" for
   * https://contoso.sharepoint.com/sites/TeamSite
   */
  async getSiteId(
    siteName: string,
    sharepointUrl?: string
  ): Promise<string | null> {
    if (!this.hasToken("getSiteId")) {
      return null;
    }

    if (!siteName) {
      log.error("Site name is required");
      return null;
    }

    const siteUrl = sharepointUrl ?? this.client.config.sharepointUrl;
    const host = sharePointHostname(siteUrl);
    if (!host) {
      log.error(`Invalid SharePoint URL: ${siteUrl}`);
      return null;
    }
    const url = formatGraphUrl(
      `sites/${host}:/sites/${encodeURIComponent(siteName)}`
    );
    const site = await this.fetchParsed(url, resourceIdSchema);
    if (!site) {
      log.error(`Failed to get site ID for: ${siteName}`);
      return null;
    }

    log.info(`Found site: ${siteName}`);
    log.info(`Site ID: ${site.id}`);
    return site.id;
  }

  // ============================================================================
  // Drives
  // ============================================================================

  /**
   * List a site's drives (document libraries) along with each drive's
   * root folder contents
   */
  async listDrives(siteId: string): Promise<DriveSummary[] | null> {
    if (!this.hasToken("listDrives")) {
      return null;
    }

    const drives = await this.fetchDrives(siteId);
    if (!drives) {
      return null;
    }

    log.info("=== Drives ===");
    const summaries: DriveSummary[] = [];
    for (const drive of drives) {
      log.info(`Drive: ${drive.name}, ID: ${drive.id}`);

      const rootContents = await this.getFolderContent(
        drive.id,
        ROOT_FOLDER_ID
      );
      if (rootContents && rootContents.length > 0) {
        log.info("Root contents:");
        for (const item of rootContents) {
          log.info(`- ${item.name} (${item.type})`);
        }
      } else {
        log.info("No items in root folder");
      }

      summaries.push({ drive, rootContents });
    }

    return summaries;
  }

  async getDriveId(siteId: string, driveName: string): Promise<string | null> {
    if (!this.hasToken("getDriveId")) {
      return null;
    }

    const drives = await this.fetchDrives(siteId);
    if (!drives) {
      return null;
    }

    const drive = drives.find((d) => d.name === driveName);
    if (!drive) {
      log.warn(`Drive '${driveName}' not found`);
      return null;
    }

    log.info(`Found drive: ${drive.name}`);
    return drive.id;
  }

  async listDriveIds(siteId: string): Promise<DriveRef[]> {
    if (!this.hasToken("listDriveIds")) {
      return [];
    }

    const drives = (await this.fetchDrives(siteId)) ?? [];
    log.info(`Found ${drives.length} drives`);
    return drives.map((d) => ({ id: d.id, name: d.name }));
  }

  // ============================================================================
  // Folders
  // ============================================================================

  /**
   * Walk every folder below parentId, depth first. Each folder comes before
   * its descendants; siblings keep the order Graph lists them in. A listing
   * that fails drops only that branch.
   */
  async listAllFolders(
    driveId: string,
    parentId = ROOT_FOLDER_ID,
    level = 0,
    parentPath = parentId
  ): Promise<FolderEntry[]> {
    if (!this.client.accessToken) {
      return [];
    }

    const children = await this.listChildren(driveId, parentId);
    if (!children) {
      return [];
    }

    const folders: FolderEntry[] = [];
    for (const item of children) {
      if (!isFolder(item)) {
        continue;
      }

      const path = joinDrivePath(
        item.parentReference?.path ?? parentPath,
        item.name
      );
      log.info(`${"  ".repeat(level)}- Folder: ${item.name} (ID: ${item.id})`);
      folders.push({ name: item.name, id: item.id, path });

      const subfolders = await this.listAllFolders(
        driveId,
        item.id,
        level + 1,
        path
      );
      folders.push(...subfolders);
    }

    return folders;
  }

  /** Top-level folders of a drive */
  async listParentFolders(driveId: string): Promise<ParentFolder[] | null> {
    if (!this.hasToken("listParentFolders")) {
      return null;
    }

    const url = formatGraphUrl("drives", driveId, "root", "children");
    const body = await this.requestJson(url);
    if (!body) {
      return null;
    }

    const graphError = graphErrorSchema.safeParse(body);
    if (graphError.success) {
      const { code, message } = graphError.data.error;
      log.error(`Error getting folder contents: ${code ?? "unknown"}`);
      log.error(`Message: ${message ?? ""}`);
      return null;
    }

    const listing = this.parse(driveItemListingSchema, body, url);
    if (!listing) {
      return null;
    }

    return listing.value.filter(isFolder).map((item) => ({
      name: item.name,
      path: joinDrivePath(
        item.parentReference?.path ?? ROOT_FOLDER_ID,
        item.name
      ),
    }));
  }

  async getRootFolderIdByName(
    driveId: string,
    folderName: string
  ): Promise<string | null> {
    if (!this.hasToken("getRootFolderIdByName")) {
      return null;
    }

    const children = await this.listChildren(driveId, ROOT_FOLDER_ID);
    if (!children) {
      log.error(`Error listing drive root while looking for: ${folderName}`);
      return null;
    }

    const match = children.find((item) => item.name === folderName);
    if (!match) {
      log.warn(`Folder '${folderName}' not found in drive root`);
      return null;
    }
    return match.id;
  }

  /**
   * One-level listing of a folder. null means the listing failed; an empty
   * array means the folder is empty.
   */
  async getFolderContent(
    driveId: string,
    folderId: string
  ): Promise<ContentEntry[] | null> {
    if (!this.hasToken("getFolderContent")) {
      return null;
    }

    const children = await this.listChildren(driveId, folderId);
    if (!children) {
      return null;
    }

    const contents = children.map(toContentEntry);
    log.info(`Found ${contents.length} items in folder`);
    return contents;
  }

  /**
   * Resolve "Folder1/FolderNest1/FolderNest2" from the drive root to the id
   * and name of its deepest folder, one listing per segment. Names match
   * exactly; the first matching folder wins. Returns null as soon as a
   * segment is missing or a listing fails.
   */
  async getNestedFolderInfo(
    driveId: string,
    folderPath: string
  ): Promise<ResolvedFolder | null> {
    if (!this.hasToken("getNestedFolderInfo")) {
      return null;
    }

    const folderNames = parseFolderPath(folderPath);
    if (folderNames.length === 0) {
      log.warn(`No folder names in path '${folderPath}'`);
      return null;
    }

    let currentId = ROOT_FOLDER_ID;
    let deepest: ResolvedFolder | null = null;

    for (const folderName of folderNames) {
      const children = await this.listChildren(driveId, currentId);
      if (!children) {
        log.error(`Error validating folder path '${folderPath}'`);
        return null;
      }

      const match = children.find(
        (item) => item.name === folderName && isFolder(item)
      );
      if (!match) {
        log.warn(`Folder '${folderName}' not found in path '${folderPath}'.`);
        return null;
      }

      currentId = match.id;
      deepest = { id: match.id, name: match.name };
    }

    return deepest;
  }

  // ============================================================================
  // Files
  // ============================================================================

  async fileExistsInFolder(
    driveId: string,
    folderId: string,
    fileName: string
  ): Promise<boolean> {
    if (!this.hasToken("fileExistsInFolder")) {
      return false;
    }

    const children = await this.listChildren(driveId, folderId);
    if (!children) {
      log.error(`Error checking file existence for: ${fileName}`);
      return false;
    }

    return children.some((item) => item.name === fileName && isFile(item));
  }

  /**
   * Download a file from a drive's root folder, resolving site and drive by
   * name first
   */
  async downloadFile(
    fileName: string,
    siteName: string,
    driveName: string
  ): Promise<Buffer | null> {
    if (!this.hasToken("downloadFile")) {
      return null;
    }

    const siteId = await this.getSiteId(siteName);
    if (!siteId) {
      log.error("Failed to get site ID");
      return null;
    }

    const driveId = await this.getDriveId(siteId, driveName);
    if (!driveId) {
      return null;
    }

    const children = await this.listChildren(driveId, ROOT_FOLDER_ID);
    if (!children) {
      log.error("Failed to list drive contents");
      return null;
    }

    const file = children.find((item) => item.name === fileName);
    if (!file) {
      log.error(`File '${fileName}' not found in drive`);
      return null;
    }

    const url = formatGraphUrl("drives", driveId, "items", file.id, "content");
    try {
      const content = await this.client.downloadContent(url);
      log.info(`Successfully downloaded: ${fileName}`);
      return content;
    } catch (error) {
      log.error(`Error downloading file: ${describeError(error)}`);
      return null;
    }
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private hasToken(operation: string): boolean {
    if (this.client.accessToken) {
      return true;
    }
    log.warn(`No access token available for ${operation}`);
    return false;
  }

  private async listChildren(
    driveId: string,
    folderId: string
  ): Promise<GraphDriveItem[] | null> {
    const url = formatGraphUrl("drives", driveId, "items", folderId, "children");
    const listing = await this.fetchParsed(url, driveItemListingSchema);
    return listing ? listing.value : null;
  }

  private async fetchDrives(siteId: string): Promise<SharePointDrive[] | null> {
    const listing = await this.fetchParsed(
      formatGraphUrl("sites", siteId, "drives"),
      driveListingSchema
    );
    if (!listing) {
      log.error("Failed to list drives");
      return null;
    }
    return listing.value;
  }

  private async fetchParsed<T extends z.ZodTypeAny>(
    url: string,
    schema: T
  ): Promise<z.infer<T> | null> {
    const body = await this.requestJson(url);
    return body ? this.parse(schema, body, url) : null;
  }

  private async requestJson(url: string): Promise<GraphJson | null> {
    try {
      return await this.client.makeGraphRequest(url);
    } catch (error) {
      log.error(`Request to ${url} failed: ${describeError(error)}`);
      return null;
    }
  }

  private parse<T extends z.ZodTypeAny>(
    schema: T,
    body: GraphJson,
    url: string
  ): z.infer<T> | null {
    try {
      return parseGraph(schema, body, url);
    } catch (error) {
      log.error(describeError(error));
      return null;
    }
  }
}

function toContentEntry(item: GraphDriveItem): ContentEntry {
  return {
    id: item.id,
    name: item.name,
    type: isFolder(item) ? "folder" : "file",
    webUrl: item.webUrl,
    size: item.size ?? "N/A",
  };
}
