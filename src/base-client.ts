/**
 * Shared Graph plumbing for the read and create clients: config, bearer
 * token, transport and URL helpers.
 */
import type { TokenCredential } from "@azure/identity";
import { acquireAccessToken } from "./auth";
import { AuthenticationError, MissingTokenError } from "./errors";
import { createLogger } from "./logger";
import { formatGraphUrl, parseFolderPath } from "./paths";
import { type GraphTransport, SdkGraphTransport } from "./transport";
import type {
  GraphJson,
  GraphRequestBody,
  HttpMethod,
  SharePointConfig,
} from "./types";

const log = createLogger("BaseClient");

export interface BaseClientOptions {
  /** Token source; defaults to a ClientSecretCredential built from config */
  credential?: TokenCredential;
  transport?: GraphTransport;
}

export class BaseClient {
  private token: string | null;
  readonly transport: GraphTransport;

  constructor(
    readonly config: SharePointConfig,
    accessToken: string | null,
    transport?: GraphTransport
  ) {
    this.token = accessToken;
    this.transport = transport ?? new SdkGraphTransport(() => this.token);
  }

  /**
   * Acquire a token and build a client. Throws AuthenticationError when no
   * token can be obtained.
   */
  static async create(
    config: SharePointConfig,
    options: BaseClientOptions = {}
  ): Promise<BaseClient> {
    const token = await acquireAccessToken(config, options.credential);
    if (!token) {
      throw new AuthenticationError("Failed to obtain access token");
    }
    log.debug(`Client ready for ${config.sharepointUrl}`);
    return new BaseClient(config, token, options.transport);
  }

  get accessToken(): string | null {
    return this.token;
  }

  /** Forget the token; every operation then reports "no token" */
  clearAccessToken(): void {
    this.token = null;
  }

  async makeGraphRequest(
    url: string,
    method: HttpMethod = "GET",
    data?: GraphRequestBody,
    headers: Record<string, string> = {}
  ): Promise<GraphJson> {
    const token = this.requireToken();
    return this.transport.request(url, method, data, {
      Authorization: `Bearer ${token}`,
      ...headers,
    });
  }

  async downloadContent(url: string): Promise<Buffer> {
    this.requireToken();
    return this.transport.download(url);
  }

  formatGraphUrl(basePath: string, ...segments: string[]): string {
    return formatGraphUrl(basePath, ...segments);
  }

  parseFolderPath(folderPath: string): string[] {
    return parseFolderPath(folderPath);
  }

  private requireToken(): string {
    if (!this.token) {
      throw new MissingTokenError();
    }
    return this.token;
  }
}
