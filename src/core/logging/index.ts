export { DEFAULT_LOGGER_CONFIG, getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
export {
  createContextLogger,
  createLogger,
  getComponentLogger,
  getResourceLogger,
  logger,
} from './logger.js';
export type { LoggerConfig, LoggerContext, LogLevel, OperatorLogger } from './types.js';
