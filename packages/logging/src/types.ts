/**
 * Logging types and interfaces for colorized console logging
 */

// Use const assertion for better type inference
export const LOG_LEVELS = ['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

/**
 * Severities ordered by verbosity. OFF is only meaningful as a threshold.
 */
export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  OFF = 5,
}

export type EmittingLevel = Exclude<LogLevel, LogLevel.OFF>;

/**
 * Anything `enable()` accepts as a threshold
 */
export type LevelSelector = LogLevel | LogLevelName | Lowercase<LogLevelName> | 'all' | 'off';

export const COLOR_NAMES = [
  'black',
  'red',
  'green',
  'yellow',
  'blue',
  'magenta',
  'cyan',
  'white',
  'gray',
] as const;
export type ColorName = (typeof COLOR_NAMES)[number];

export type Palette = Readonly<Record<LogLevelName, ColorName>>;

export const TIMESTAMP_MODES = ['local', 'utc', 'none'] as const;
export type TimestampMode = (typeof TIMESTAMP_MODES)[number];

export const COLOR_MODES = ['auto', 'always', 'never'] as const;
export type ColorMode = (typeof COLOR_MODES)[number];

export const STREAM_MODES = ['split', 'stdout', 'stderr'] as const;
export type StreamMode = (typeof STREAM_MODES)[number];

export interface SourceLocation {
  readonly file: string;
  readonly line: number;
  readonly column?: number;
}

/**
 * A message is either a printf-style format string or a thunk producing one,
 * which is only called when the level is enabled.
 */
export type LogMessage = string | (() => string);

export interface LogRecord {
  readonly level: EmittingLevel;
  readonly timestamp: Date;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly component?: string;
}

export interface FormatOptions {
  readonly colors?: boolean;
  readonly timestamp?: TimestampMode;
  /** Include the `[file:line]` field */
  readonly location?: boolean;
  readonly palette?: Partial<Palette>;
}

export interface LogTransport {
  readonly name: string;
  log(record: LogRecord): Promise<void>;
  close?(): Promise<void>;
}

/**
 * Minimal view of a Node writable the console transport needs
 */
export interface OutputStream {
  readonly isTTY?: boolean;
  write(chunk: string, callback?: (error?: Error | null) => void): boolean;
  on?(event: 'error', listener: (error: Error) => void): unknown;
  removeListener?(event: 'error', listener: (error: Error) => void): unknown;
}

export interface ConsoleTransportConfig {
  readonly colors?: ColorMode | boolean;
  readonly timestamp?: TimestampMode;
  readonly location?: boolean;
  readonly palette?: Partial<Palette>;
  readonly stream?: StreamMode;
  readonly stdout?: OutputStream;
  readonly stderr?: OutputStream;
  readonly env?: NodeJS.ProcessEnv;
  readonly onWriteError?: (error: Error) => void;
}

export interface LoggerConfig {
  readonly component?: string;
  readonly transports?: LogTransport[];
  /** Capture the caller's file and line from the stack */
  readonly callSite?: boolean;
  readonly onTransportError?: (error: unknown, transport: LogTransport) => void;
}

// Type guard functions
export const isLogLevelName = (value: string): value is LogLevelName =>
  LOG_LEVELS.some(level => level === value);
