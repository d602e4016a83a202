/**
 * @knowable/core
 *
 * Shared infrastructure: configuration, logging and runtime assertions.
 */

export {
  config,
  defineConfig,
  deepMerge,
  loadConfigFromEnv,
  parseEnvValue,
  type KnowableConfig,
  type LawsConfig,
  type LogConfig,
  type LogLevel,
} from "./config.js";

export { createLogger, currentLogLevel, isLevelEnabled, type Logger } from "./logger.js";

export { invariant, unreachable } from "./safety.js";
