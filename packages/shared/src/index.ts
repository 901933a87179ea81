// Types
export type * from "./types/records.js";
export type * from "./types/config.js";
export type * from "./types/deploy.js";

// Values
export { configSchema, parseConfig } from "./types/config.js";
export {
  DeploymentError,
  FetchFailure,
  MalformedRecord,
  SeedNotFound,
  PaginationProtocolViolation,
  toErrorInfo,
} from "./errors.js";

// Utils
export { createLogger, setLogLevel, isLogLevel } from "./utils/logger.js";
export type { LogLevel, Logger } from "./utils/logger.js";
