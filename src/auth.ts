/**
 * App-only authentication (client credentials)
 */
import { ClientSecretCredential } from "@azure/identity";
import type { TokenCredential } from "@azure/identity";
import { describeError } from "./errors";
import { createLogger } from "./logger";
import type { SharePointConfig } from "./types";

const log = createLogger("Auth");

/**
 * Graph scope for a resource URL, e.g. "https://graph.microsoft.com/.default"
 */
export function graphScope(resourceUrl: string): string {
  return `${resourceUrl.replace(/\/+$/, "")}/.default`;
}

export function createCredential(config: SharePointConfig): TokenCredential {
  return new ClientSecretCredential(
    config.tenantId,
    config.clientId,
    config.clientSecret
  );
}

/**
 * Fetch a bearer token for Graph. Returns null when the token endpoint
 * rejects the credentials or cannot be reached.
 */
export async function acquireAccessToken(
  config: SharePointConfig,
  credential: TokenCredential = createCredential(config)
): Promise<string | null> {
  try {
    const token = await credential.getToken(graphScope(config.resourceUrl));
    if (!token) {
      log.error("Token endpoint returned no access token");
      return null;
    }
    log.debug("Access token acquired");
    return token.token;
  } catch (error) {
    log.error(`Failed to obtain access token: ${describeError(error)}`);
    return null;
  }
}
