import { LOG_LEVELS, LogLevel, isLogLevelName, type LevelSelector, type LogLevelName } from './types.js';

/**
 * Display name for a level
 */
export function levelName(level: LogLevel): LogLevelName | 'OFF' {
  return level === LogLevel.OFF ? 'OFF' : LOG_LEVELS[level];
}

/**
 * Parse a level name. Case-insensitive; accepts WARNING, ALL and OFF.
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toUpperCase();

  switch (normalized) {
    case 'ALL':
      return LogLevel.TRACE;
    case 'OFF':
      return LogLevel.OFF;
    case 'WARNING':
      return LogLevel.WARN;
    default:
      return isLogLevelName(normalized) ? LogLevel[normalized] : undefined;
  }
}

/**
 * Map a count of -v flags onto a threshold: 0 info, 1 debug, 2+ trace
 */
export function levelFromVerbosity(count: number): LogLevel {
  if (!Number.isInteger(count) || count < 0) {
    return LogLevel.INFO;
  }
  if (count === 0) {
    return LogLevel.INFO;
  }
  return count === 1 ? LogLevel.DEBUG : LogLevel.TRACE;
}

/**
 * Map a syslog/kernel priority (0 emerg .. 7 debug) onto a threshold.
 * Priorities above warning have no counterpart and collapse into ERROR.
 */
export function levelFromSyslog(priority: number): LogLevel {
  switch (priority) {
    case 0:
    case 1:
    case 2:
    case 3:
      return LogLevel.ERROR;
    case 4:
      return LogLevel.WARN;
    case 5:
      return LogLevel.INFO;
    case 6:
      return LogLevel.DEBUG;
    case 7:
      return LogLevel.TRACE;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Resolve any selector to a threshold, falling back to INFO
 */
export function resolveSelector(selector: LevelSelector | string | number): LogLevel {
  if (typeof selector === 'number') {
    return Number.isInteger(selector) && selector >= LogLevel.TRACE && selector <= LogLevel.OFF
      ? selector
      : LogLevel.INFO;
  }
  return parseLogLevel(selector) ?? LogLevel.INFO;
}

/**
 * Process-wide enabled/disabled state.
 *
 * The threshold lives in shared memory so worker threads given the buffer
 * gate on the same value. A fresh registry emits nothing until enabled.
 */
export class LevelRegistry {
  private readonly cell: Int32Array;

  constructor();
  constructor(buffer: SharedArrayBuffer, attach: true);
  constructor(buffer?: SharedArrayBuffer, attach = false) {
    this.cell = new Int32Array(buffer ?? new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT), 0, 1);
    // zero-filled memory reads as TRACE
    if (!attach) {
      Atomics.store(this.cell, 0, LogLevel.OFF);
    }
  }

  /**
   * Attach to a registry created in another thread, keeping its threshold
   */
  static fromBuffer(buffer: SharedArrayBuffer): LevelRegistry {
    return new LevelRegistry(buffer, true);
  }

  static withThreshold(selector: LevelSelector | string | number): LevelRegistry {
    const registry = new LevelRegistry();
    registry.enable(selector);
    return registry;
  }

  get buffer(): SharedArrayBuffer {
    const { buffer } = this.cell;
    if (!(buffer instanceof SharedArrayBuffer)) {
      throw new Error('Level registry is not backed by shared memory');
    }
    return buffer;
  }

  /**
   * Enable the given level and everything more severe
   */
  enable(selector: LevelSelector | string | number = LogLevel.INFO): void {
    Atomics.store(this.cell, 0, resolveSelector(selector));
  }

  disable(): void {
    Atomics.store(this.cell, 0, LogLevel.OFF);
  }

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.OFF && level >= this.getThreshold();
  }

  getThreshold(): LogLevel {
    const stored = Atomics.load(this.cell, 0);
    return stored >= LogLevel.TRACE && stored <= LogLevel.OFF ? stored : LogLevel.OFF;
  }
}
