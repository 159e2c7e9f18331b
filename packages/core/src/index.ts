/**
 * @armada/core
 *
 * Configuration and logging shared by every control plane package.
 */

export {
  configFromEnv,
  type ControlPlaneConfig,
  type ControlPlaneConfigInput,
  ControlPlaneConfigSchema,
  LOG_LEVELS,
  type LogLevel,
  loadConfig,
  parseConfig,
} from "./config.js";
export { createLogger, type Logger, type LoggerOptions } from "./logger.js";
