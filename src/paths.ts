/**
 * Graph URL and drive path helpers
 */

export const GRAPH_BASE_URL = "https://graph.microsoft.com/v1.0";

/** Sentinel item id of a drive's top-level folder */
export const ROOT_FOLDER_ID = "root";

/**
 * Build a Graph URL. The base path is used as given; every extra segment is
 * percent-encoded on its own, so ids and names may contain "/", ":" or spaces.
 *
 * @example
 * formatGraphUrl("drives", "b!x", "items", "root", "children")
 * // => 'https://graph.microsoft.com/v1.0/drives/b!x/items/root/children'
 *
 * formatGraphUrl("sites/contoso.sharepoint.com:/sites/Team")
 * // => 'https://graph.microsoft.com/v1.0/sites/contoso.sharepoint.com:/sites/Team'
 */
export function formatGraphUrl(basePath: string, ...segments: string[]): string {
  const base = `${GRAPH_BASE_URL}/${basePath}`;
  if (segments.length === 0) {
    return base;
  }
  return `${base}/${segments.map((s) => encodeURIComponent(s)).join("/")}`;
}

/**
 * Split a slash-delimited folder path into its folder names.
 * Leading, trailing and repeated separators produce no empty names.
 *
 * @example
 * parseFolderPath("/Folder1/FolderNest1/FolderNest2/")
 * // => ['Folder1', 'FolderNest1', 'FolderNest2']
 */
export function parseFolderPath(folderPath: string): string[] {
  return folderPath.split("/").filter((segment) => segment.length > 0);
}

/**
 * Path of a child below a parent path, as reported in FolderEntry.path
 */
export function joinDrivePath(parentPath: string, name: string): string {
  return `${parentPath}/${name}`;
}

/**
 * Host part of a configured SharePoint URL; accepts either
 * "contoso.sharepoint.com" or "https://contoso.sharepoint.com/".
 * Returns null for a URL that does not parse.
 */
export function sharePointHostname(sharepointUrl: string): string | null {
  const trimmed = sharepointUrl.trim();
  if (!trimmed.includes("://")) {
    return trimmed.replace(/\/+$/, "");
  }
  try {
    return new URL(trimmed).hostname;
  } catch {
    return null;
  }
}
