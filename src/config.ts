/**
 * Configuration loading
 *
 * Credentials come from the environment (AZURE_TENANT_ID, AZURE_CLIENT_ID,
 * AZURE_CLIENT_SECRET, SHAREPOINT_URL). Scripts may first pull them in from
 * a local .env file with loadEnvFile().
 */
import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError } from "./errors";
import { createLogger } from "./logger";
import type { SharePointConfig } from "./types";

const log = createLogger("Config");

export const DEFAULT_RESOURCE_URL = "https://graph.microsoft.com/";

const ENV_NAMES = {
  tenantId: "AZURE_TENANT_ID",
  clientId: "AZURE_CLIENT_ID",
  clientSecret: "AZURE_CLIENT_SECRET",
  sharepointUrl: "SHAREPOINT_URL",
} as const;

type RequiredField = keyof typeof ENV_NAMES;

const required = z.string().trim().min(1);

const configSchema = z.object({
  tenantId: required,
  clientId: required,
  clientSecret: required,
  sharepointUrl: required,
  resourceUrl: z.string().url(),
});

type Env = Record<string, string | undefined>;

export function loadConfigFromEnv(env: Env = process.env): SharePointConfig {
  return {
    tenantId: env[ENV_NAMES.tenantId] ?? "",
    clientId: env[ENV_NAMES.clientId] ?? "",
    clientSecret: env[ENV_NAMES.clientSecret] ?? "",
    sharepointUrl: env[ENV_NAMES.sharepointUrl] ?? "",
    resourceUrl: env.GRAPH_RESOURCE_URL || DEFAULT_RESOURCE_URL,
  };
}

/**
 * Throws ConfigError naming the env variables behind every missing field.
 */
export function validateConfig(config: SharePointConfig): SharePointConfig {
  const result = configSchema.safeParse(config);
  if (result.success) {
    log.debug("Configuration validated successfully");
    return result.data;
  }

  const missing = result.error.issues.map((issue) => {
    const field = String(issue.path[0]);
    return isRequiredField(field) ? ENV_NAMES[field] : field;
  });
  const unique = [...new Set(missing)];
  log.debug(
    `Configuration validation failed. Missing fields: ${unique.join(", ")}`
  );
  throw new ConfigError(unique);
}

function isRequiredField(field: string): field is RequiredField {
  return Object.hasOwn(ENV_NAMES, field);
}

/**
 * Load KEY=VALUE pairs into process.env. Variables already set win.
 * Returns false when the file does not exist.
 */
export function loadEnvFile(
  path = ".env",
  target: Env = process.env
): boolean {
  if (!existsSync(path)) {
    return false;
  }

  const content = readFileSync(path, "utf8");
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (trimmed && !trimmed.startsWith("#")) {
      const eqIndex = trimmed.indexOf("=");
      if (eqIndex > 0) {
        const key = trimmed.slice(0, eqIndex).trim();
        const value = unquote(trimmed.slice(eqIndex + 1).trim());
        if (target[key] === undefined) {
          target[key] = value;
        }
      }
    }
  }
  return true;
}

function unquote(value: string): string {
  const quoted = /^(["'])(.*)\1$/.exec(value);
  return quoted?.[2] ?? value;
}
