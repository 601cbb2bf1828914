import { LoggingConfigError, loadLoggingConfigFromEnv } from './config.js';
import { createLogging, type LoggingHandle, type LoggingOptions } from './factory.js';
import { levelName, resolveSelector } from './levels.js';
import { LogLevel, type LevelSelector, type LogMessage } from './types.js';

// Process default, built on first use with nothing enabled
let defaultHandle: LoggingHandle | undefined;

export function getDefaultLogging(): LoggingHandle {
  if (!defaultHandle) {
    defaultHandle = createLogging({ level: 'OFF' });
  }
  return defaultHandle;
}

function rebuildDefault(current: LoggingHandle, options: LoggingOptions): LoggingHandle | undefined {
  try {
    return createLogging(options, current.registry);
  } catch (err) {
    if (err instanceof LoggingConfigError) {
      return undefined;
    }
    throw err;
  }
}

/**
 * Turn on console logging for the process: the given level and everything
 * more severe. Any other options rebuild the default console output on the
 * same registry. Invalid options leave the previous output in place.
 */
export function enableLogging(
  selector: LevelSelector | number = LogLevel.INFO,
  options: Omit<LoggingOptions, 'level'> = {}
): void {
  const current = getDefaultLogging();
  const level = resolveSelector(selector);

  if (Object.keys(options).length > 0) {
    const next = rebuildDefault(current, { ...options, level: levelName(level) });
    if (next) {
      defaultHandle = next;
      // close() reports its own failures
      void current.logger.close();
      return;
    }
  }

  current.registry.enable(level);
}

/**
 * Configure the process default from TINTLOG_* variables
 */
export function enableLoggingFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  let level: LevelSelector = LogLevel.INFO;
  let options: Omit<LoggingOptions, 'level'> = { env };
  try {
    const { level: configured, ...rest } = loadLoggingConfigFromEnv(env);
    level = configured;
    options = { ...rest, env };
  } catch (err) {
    if (!(err instanceof LoggingConfigError)) {
      throw err;
    }
  }
  enableLogging(level, options);
}

export function disableLogging(): void {
  getDefaultLogging().registry.disable();
}

/**
 * Drop the default handle; the next use starts disabled again
 */
export async function resetLogging(): Promise<void> {
  const current = defaultHandle;
  defaultHandle = undefined;
  await current?.logger.close();
}

export function trace(message: LogMessage, ...args: unknown[]): void {
  getDefaultLogging().logger.logFrom(LogLevel.TRACE, trace, message, args);
}

export function debug(message: LogMessage, ...args: unknown[]): void {
  getDefaultLogging().logger.logFrom(LogLevel.DEBUG, debug, message, args);
}

export function info(message: LogMessage, ...args: unknown[]): void {
  getDefaultLogging().logger.logFrom(LogLevel.INFO, info, message, args);
}

export function warn(message: LogMessage, ...args: unknown[]): void {
  getDefaultLogging().logger.logFrom(LogLevel.WARN, warn, message, args);
}

export function error(message: LogMessage, ...args: unknown[]): void {
  getDefaultLogging().logger.logFrom(LogLevel.ERROR, error, message, args);
}
