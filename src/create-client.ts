/**
 * Create operations: folders, empty files, uploads, lists and document
 * libraries. Each returns the new resource's id, or null on failure.
 */
import { readFile } from "node:fs/promises";
import type { BaseClient } from "./base-client";
import { describeError } from "./errors";
import { parseGraph, resourceIdSchema } from "./graph-schemas";
import { createLogger } from "./logger";
import { formatGraphUrl } from "./paths";
import type { GraphRequestBody } from "./types";

const log = createLogger("CreateClient");

export class CreateClient {
  constructor(readonly client: BaseClient) {}

  /**
   * Create a folder in a drive's root. Fails if the name is taken.
   */
  async createFolder(
    driveId: string,
    folderName: string
  ): Promise<string | null> {
    if (!this.hasToken("createFolder")) {
      return null;
    }

    log.info(`Creating folder: ${folderName}`);
    const id = await this.postForId(
      formatGraphUrl("drives", driveId, "root", "children"),
      {
        name: folderName,
        folder: {},
        "@microsoft.graph.conflictBehavior": "fail",
      }
    );

    if (!id) {
      log.error(`Failed to create folder: ${folderName}`);
      return null;
    }
    log.info(`Successfully created folder: ${folderName}`);
    return id;
  }

  /**
   * Create an empty file in a folder. Fails if the name is taken.
   */
  async createFile(
    driveId: string,
    folderId: string,
    fileName: string
  ): Promise<string | null> {
    if (!this.hasToken("createFile")) {
      return null;
    }

    log.info(`Creating file: ${fileName}`);
    const id = await this.postForId(
      formatGraphUrl("drives", driveId, "items", folderId, "children"),
      {
        name: fileName,
        file: {},
        "@microsoft.graph.conflictBehavior": "fail",
      }
    );

    if (!id) {
      log.error(`Failed to create file: ${fileName}`);
      return null;
    }
    log.info(`Successfully created file: ${fileName}`);
    return id;
  }

  /**
   * Upload a local file into a folder under the given name
   */
  async uploadFileToFolder(
    driveId: string,
    folderId: string,
    fileName: string,
    filePath: string
  ): Promise<string | null> {
    if (!this.hasToken("uploadFileToFolder")) {
      return null;
    }

    log.info(`Uploading file: ${fileName}`);

    let content: Buffer;
    try {
      content = await readFile(filePath);
    } catch (error) {
      log.error(`File not found: ${fileName} (${describeError(error)})`);
      return null;
    }

    const url = `${formatGraphUrl("drives", driveId, "items", folderId)}:/${encodeURIComponent(fileName)}:/content`;
    const id = await this.sendForId(url, "PUT", content, {
      "Content-Type": "application/octet-stream",
    });

    if (!id) {
      log.error(`Failed to upload file: ${fileName}`);
      return null;
    }
    log.info(`Successfully uploaded file: ${fileName}`);
    return id;
  }

  async createList(
    siteId: string,
    listName: string,
    listTemplate = "genericList"
  ): Promise<string | null> {
    if (!this.hasToken("createList")) {
      return null;
    }

    log.info(`Creating list: ${listName}`);
    const id = await this.postForId(formatGraphUrl("sites", siteId, "lists"), {
      displayName: listName,
      list: { template: listTemplate },
    });

    if (!id) {
      log.error(`Failed to create list: ${listName}`);
      return null;
    }
    log.info(`Successfully created list: ${listName}`);
    return id;
  }

  async createDocumentLibrary(
    siteId: string,
    libraryName: string
  ): Promise<string | null> {
    return this.createList(siteId, libraryName, "documentLibrary");
  }

  private hasToken(operation: string): boolean {
    if (this.client.accessToken) {
      return true;
    }
    log.warn(`No access token available for ${operation}`);
    return false;
  }

  private postForId(
    url: string,
    body: Record<string, unknown>
  ): Promise<string | null> {
    return this.sendForId(url, "POST", body, {
      "Content-Type": "application/json",
    });
  }

  private async sendForId(
    url: string,
    method: "POST" | "PUT",
    body: GraphRequestBody,
    headers: Record<string, string>
  ): Promise<string | null> {
    try {
      const response = await this.client.makeGraphRequest(
        url,
        method,
        body,
        headers
      );
      return parseGraph(resourceIdSchema, response, url).id;
    } catch (error) {
      log.error(describeError(error));
      return null;
    }
  }
}
