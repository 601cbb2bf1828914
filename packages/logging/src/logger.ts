import { captureCallSite } from './call-site.js';
import { formatMessage } from './formatter.js';
import type { LevelRegistry } from './levels.js';
import { ConsoleTransport } from './transports/console-transport.js';
import {
  LogLevel,
  type EmittingLevel,
  type LogMessage,
  type LogRecord,
  type LogTransport,
  type LoggerConfig,
  type SourceLocation,
} from './types.js';

const discardTransportError = (): void => undefined;

/**
 * Level-gated console logger. All gating goes through the shared registry,
 * so every logger built on one registry turns on and off together.
 */
export class Logger {
  private readonly registry: LevelRegistry;
  private readonly component: string | undefined;
  private readonly callSite: boolean;
  private readonly onTransportError: NonNullable<LoggerConfig['onTransportError']>;
  private transports: LogTransport[];

  constructor(registry: LevelRegistry, config: LoggerConfig = {}) {
    this.registry = registry;
    this.component = config.component;
    this.callSite = config.callSite ?? true;
    this.onTransportError = config.onTransportError ?? discardTransportError;
    this.transports = config.transports ?? [new ConsoleTransport()];
  }

  /**
   * Create a child logger with additional context
   */
  child(component: string): Logger {
    return new Logger(this.registry, {
      component: this.component ? `${this.component}:${component}` : component,
      transports: this.transports,
      callSite: this.callSite,
      onTransportError: this.onTransportError,
    });
  }

  /**
   * Log a trace message
   */
  trace(message: LogMessage, ...args: unknown[]): void {
    this.logFrom(LogLevel.TRACE, this.trace, message, args);
  }

  /**
   * Log a debug message
   */
  debug(message: LogMessage, ...args: unknown[]): void {
    this.logFrom(LogLevel.DEBUG, this.debug, message, args);
  }

  /**
   * Log an info message
   */
  info(message: LogMessage, ...args: unknown[]): void {
    this.logFrom(LogLevel.INFO, this.info, message, args);
  }

  /**
   * Log a warning message
   */
  warn(message: LogMessage, ...args: unknown[]): void {
    this.logFrom(LogLevel.WARN, this.warn, message, args);
  }

  /**
   * Log an error message
   */
  error(message: LogMessage, ...args: unknown[]): void {
    this.logFrom(LogLevel.ERROR, this.error, message, args);
  }

  /**
   * Log at a level chosen at runtime
   */
  log(level: EmittingLevel, message: LogMessage, ...args: unknown[]): void {
    this.logFrom(level, this.log, message, args);
  }

  /**
   * Log with an explicit source location instead of a captured one
   */
  logAt(level: EmittingLevel, location: SourceLocation, message: LogMessage, ...args: unknown[]): void {
    if (!this.registry.isEnabled(level)) {
      return;
    }
    this.emit(level, location, message, args);
  }

  /**
   * Check whether a level would be written
   */
  isEnabled(level: LogLevel): boolean {
    return this.registry.isEnabled(level);
  }

  getRegistry(): LevelRegistry {
    return this.registry;
  }

  /**
   * Entry point for wrappers: `boundary` is the outermost function the host
   * called, so the location reported is the host's call site.
   * @internal
   */
  // eslint-disable-next-line @typescript-eslint/ban-types
  logFrom(level: EmittingLevel, boundary: Function, message: LogMessage, args: readonly unknown[]): void {
    if (!this.registry.isEnabled(level)) {
      return;
    }
    const location = this.callSite ? captureCallSite(boundary) : undefined;
    this.emit(level, location, message, args);
  }

  /**
   * Add a transport to the logger
   */
  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  /**
   * Remove a transport from the logger
   */
  removeTransport(transportName: string): void {
    this.transports = this.transports.filter(t => t.name !== transportName);
  }

  /**
   * Close all transports. Failures go to the transport error hook, so this
   * never rejects.
   */
  async close(): Promise<void> {
    await Promise.all(
      this.transports
        .filter((t): t is LogTransport & { close: () => Promise<void> } => !!t.close)
        .map(t => t.close().catch((err: unknown) => this.reportTransportError(err, t)))
    );
  }

  private emit(
    level: EmittingLevel,
    location: SourceLocation | undefined,
    message: LogMessage,
    args: readonly unknown[]
  ): void {
    const record: LogRecord = {
      level,
      timestamp: new Date(),
      message: formatMessage(message, args),
      ...(location ? { location } : {}),
      ...(this.component ? { component: this.component } : {}),
    };

    this.transports.forEach(transport => {
      try {
        transport.log(record).catch((err: unknown) => this.reportTransportError(err, transport));
      } catch (err) {
        this.reportTransportError(err, transport);
      }
    });
  }

  private reportTransportError(error: unknown, transport: LogTransport): void {
    try {
      this.onTransportError(error, transport);
    } catch {
      // a failing hook must not reach the caller either
      return;
    }
  }
}
