/**
 * Colorized console logging
 *
 * Features:
 * - Five severities gated by one shared, atomically updated threshold
 * - Lines tagged with a colored level, timestamp and the caller's file:line
 * - Colors only on terminals; NO_COLOR and FORCE_COLOR respected
 * - Drop-in trace/debug/info/warn/error functions after one enableLogging() call
 * - Explicit handles via createLogging() for code that passes its logger around
 */

// Process default surface
export {
  enableLogging,
  enableLoggingFromEnv,
  disableLogging,
  resetLogging,
  getDefaultLogging,
  trace,
  debug,
  info,
  warn,
  error,
} from './global.js';

// Core exports
export { Logger } from './logger.js';
export { LoggerFactory, createLogging, createConsoleTransport } from './factory.js';
export type { LoggingHandle, LoggingOptions } from './factory.js';
export {
  LevelRegistry,
  levelFromSyslog,
  levelFromVerbosity,
  levelName,
  parseLogLevel,
  resolveSelector,
} from './levels.js';
export {
  DEFAULT_PALETTE,
  UNFORMATTABLE_MESSAGE,
  UNKNOWN_LOCATION,
  colorize,
  formatLevelTag,
  formatMessage,
  formatRecord,
  formatTimestamp,
  stripAnsi,
} from './formatter.js';
export { captureCallSite, parseStackFrame } from './call-site.js';

// Configuration
export {
  DEFAULT_ENV_PREFIX,
  LoggingConfigError,
  LoggingConfigSchema,
  loadLoggingConfigFromEnv,
  parseLoggingConfig,
} from './config.js';
export type { LoggingConfig, LoggingConfigInput } from './config.js';

// Types
export { LogLevel, LOG_LEVELS, isLogLevelName } from './types.js';

export type {
  ColorMode,
  ColorName,
  ConsoleTransportConfig,
  EmittingLevel,
  FormatOptions,
  LevelSelector,
  LogLevelName,
  LogMessage,
  LogRecord,
  LogTransport,
  LoggerConfig,
  OutputStream,
  Palette,
  SourceLocation,
  StreamMode,
  TimestampMode,
} from './types.js';

// Transports
export { ConsoleTransport, shouldUseColors } from './transports/console-transport.js';
