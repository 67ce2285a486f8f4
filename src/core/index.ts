/**
 * Core module exports
 */
export { logger, setLogLevel, createChildLogger, isLogLevel, type LogLevel } from './Logger.js';
export {
  DnsSyncError,
  ConfigError,
  ConnectionError,
  ZoneNotFoundError,
  ProviderApiError,
  configErrorFromZod,
  formatZodError,
  getErrorCode,
  getErrorMessage,
  type ErrorCode,
} from './errors.js';
