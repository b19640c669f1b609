export { acquireAccessToken, createCredential, graphScope } from "./auth";
export { BaseClient, type BaseClientOptions } from "./base-client";
export { ClientFactory, clientFactory } from "./client-factory";
export {
  DEFAULT_RESOURCE_URL,
  loadConfigFromEnv,
  loadEnvFile,
  validateConfig,
} from "./config";
export { CreateClient } from "./create-client";
export {
  AuthenticationError,
  ConfigError,
  describeError,
  MalformedResponseError,
  MissingTokenError,
  SharePointError,
} from "./errors";
export {
  createLogger,
  getLogLevel,
  isLogLevel,
  type Logger,
  type LoggingOptions,
  type LogLevel,
  setupLogging,
} from "./logger";
export {
  formatGraphUrl,
  GRAPH_BASE_URL,
  parseFolderPath,
  ROOT_FOLDER_ID,
} from "./paths";
export { ReadClient } from "./read-client";
export {
  type GraphTransport,
  SdkGraphTransport,
  type TokenProvider,
} from "./transport";
export type * from "./types";
