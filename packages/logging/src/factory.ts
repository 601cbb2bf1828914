import { loadLoggingConfigFromEnv, parseLoggingConfig, type LoggingConfig, type LoggingConfigInput } from './config.js';
import { LevelRegistry } from './levels.js';
import { Logger } from './logger.js';
import { ConsoleTransport } from './transports/console-transport.js';
import type { LevelSelector, LogTransport, LoggerConfig, OutputStream } from './types.js';

/**
 * Everything `createLogging` accepts: the validated config keys plus the
 * pieces that cannot come from a config file.
 */
export type LoggingOptions = LoggingConfigInput & {
  component?: string;
  callSite?: boolean;
  /** Replaces the console transport entirely */
  transports?: LogTransport[];
  stdout?: OutputStream;
  stderr?: OutputStream;
  env?: NodeJS.ProcessEnv;
  onWriteError?: (error: Error) => void;
  onTransportError?: LoggerConfig['onTransportError'];
};

export interface LoggingHandle {
  readonly registry: LevelRegistry;
  readonly logger: Logger;
  readonly config: LoggingConfig;
}

/**
 * Build a console transport from a validated config
 */
export function createConsoleTransport(
  config: LoggingConfig,
  options: Pick<LoggingOptions, 'stdout' | 'stderr' | 'env' | 'onWriteError'> = {}
): ConsoleTransport {
  return new ConsoleTransport({
    colors: config.colors,
    timestamp: config.timestamp,
    location: config.location,
    palette: config.palette,
    stream: config.stream,
    ...(options.stdout && { stdout: options.stdout }),
    ...(options.stderr && { stderr: options.stderr }),
    ...(options.env && { env: options.env }),
    ...(options.onWriteError && { onWriteError: options.onWriteError }),
  });
}

function buildLogger(
  registry: LevelRegistry,
  config: LoggingConfig,
  options: Omit<LoggingOptions, 'level'>
): Logger {
  return new Logger(registry, {
    transports: options.transports ?? [createConsoleTransport(config, options)],
    ...(options.component !== undefined ? { component: options.component } : {}),
    ...(options.callSite !== undefined ? { callSite: options.callSite } : {}),
    ...(options.onTransportError && { onTransportError: options.onTransportError }),
  });
}

/**
 * Create an explicit logging handle. The registry is set to the configured
 * level; pass the handle to whatever needs to log.
 */
export function createLogging(
  options: LoggingOptions = {},
  registry: LevelRegistry = new LevelRegistry()
): LoggingHandle {
  const config = parseLoggingConfig(pickConfig(options));
  registry.enable(config.level);
  return { registry, logger: buildLogger(registry, config, options), config };
}

function pickConfig(options: Omit<LoggingOptions, 'level'> & { level?: string }): LoggingConfigInput {
  const { level, colors, timestamp, location, stream, palette } = options;
  return { level, colors, timestamp, location, stream, palette };
}

/**
 * Factory for creating loggers with common configurations
 */
export class LoggerFactory {
  /**
   * Create a logger with console transport only, on its own registry
   */
  static createConsoleLogger(component: string, level: LevelSelector = 'INFO'): Logger {
    const config = parseLoggingConfig({});
    return buildLogger(LevelRegistry.withThreshold(level), config, { component });
  }

  /**
   * Create a logger configured from TINTLOG_* environment variables
   */
  static fromEnvironment(component: string, env: NodeJS.ProcessEnv = process.env): Logger {
    const config = loadLoggingConfigFromEnv(env);
    const registry = new LevelRegistry();
    registry.enable(config.level);
    return buildLogger(registry, config, { component, env });
  }

  /**
   * Create a logger that gates on an existing registry, e.g. one shared
   * from another thread through its buffer
   */
  static createSharedLogger(registry: LevelRegistry, options: Omit<LoggingOptions, 'level'> = {}): Logger {
    return buildLogger(registry, parseLoggingConfig(pickConfig(options)), options);
  }
}
