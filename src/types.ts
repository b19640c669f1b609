/**
 * Type definitions for the SharePoint client
 */

export interface SharePointConfig {
  tenantId: string;
  clientId: string;
  clientSecret: string;
  /** SharePoint host, e.g. "contoso.sharepoint.com" */
  sharepointUrl: string;
  resourceUrl: string;
}

export interface SharePointSite {
  id: string;
  name: string;
  displayName: string;
  webUrl: string;
  description?: string;
}

export interface SharePointDrive {
  id: string;
  name: string;
  driveType?: string;
  webUrl?: string;
}

export interface DriveSummary {
  drive: SharePointDrive;
  /** Root folder listing, null when it could not be fetched */
  rootContents: ContentEntry[] | null;
}

export type ContentType = "folder" | "file";

export interface ContentEntry {
  id: string;
  name: string;
  type: ContentType;
  webUrl?: string;
  size: number | "N/A";
}

export interface FolderEntry {
  readonly name: string;
  readonly id: string;
  readonly path: string;
}

export interface ParentFolder {
  name: string;
  path: string;
}

export interface ResolvedFolder {
  id: string;
  name: string;
}

export interface DriveRef {
  id: string;
  name: string;
}

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/** Parsed JSON body of a Graph response */
export type GraphJson = Record<string, unknown>;

export type GraphRequestBody = Record<string, unknown> | Buffer;
