/**
 * Shared setup for the example scripts: .env loading, logging, config
 */
import {
  clientFactory,
  isLogLevel,
  loadConfigFromEnv,
  loadEnvFile,
  setupLogging,
  validateConfig,
} from "../src";
import type { CreateClient, ReadClient, SharePointConfig } from "../src";

export function loadScriptConfig(logFile?: string): SharePointConfig {
  loadEnvFile(".env");

  const level = process.env.LOG_LEVEL ?? "info";
  setupLogging({ level: isLogLevel(level) ? level : "info", logFile });

  return validateConfig(loadConfigFromEnv());
}

export async function readClient(logFile?: string): Promise<ReadClient> {
  return clientFactory.createReadClient(loadScriptConfig(logFile));
}

export async function writeClients(
  logFile?: string
): Promise<{ read: ReadClient; write: CreateClient }> {
  const config = loadScriptConfig(logFile);
  const read = await clientFactory.createReadClient(config);
  const write = await clientFactory.createWriteClient(config);
  return { read, write };
}

export function usage(lines: string[]): never {
  for (const line of lines) {
    console.log(line);
  }
  process.exit(1);
}
