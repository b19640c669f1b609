/**
 * Builds read/write clients on top of one shared BaseClient.
 *
 * The base client (and its token) is created on first use. Callers that
 * arrive while that creation is in flight wait on the same promise, so the
 * token endpoint is hit once.
 */
import { BaseClient, type BaseClientOptions } from "./base-client";
import { CreateClient } from "./create-client";
import { describeError } from "./errors";
import { createLogger } from "./logger";
import { ReadClient } from "./read-client";
import type { SharePointConfig } from "./types";

const log = createLogger("ClientFactory");

export class ClientFactory {
  private baseClient: Promise<BaseClient> | null = null;

  constructor(private readonly options: BaseClientOptions = {}) {}

  getBaseClient(config: SharePointConfig): Promise<BaseClient> {
    if (!this.baseClient) {
      const pending = BaseClient.create(config, this.options).catch(
        (error: unknown) => {
          log.error(`Failed to create BaseClient: ${describeError(error)}`);
          if (this.baseClient === pending) {
            this.baseClient = null;
          }
          throw error;
        }
      );
      this.baseClient = pending;
    }
    return this.baseClient;
  }

  async createReadClient(config: SharePointConfig): Promise<ReadClient> {
    return new ReadClient(await this.getBaseClient(config));
  }

  async createWriteClient(config: SharePointConfig): Promise<CreateClient> {
    return new CreateClient(await this.getBaseClient(config));
  }

  /** Drop the shared client, e.g. after the configuration changed */
  reset(): void {
    this.baseClient = null;
  }
}

/** Process-wide factory used by the example scripts */
export const clientFactory = new ClientFactory();
