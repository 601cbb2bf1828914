import { format } from 'util';

import { levelName } from './levels.js';
import type {
  ColorName,
  FormatOptions,
  LogMessage,
  LogRecord,
  Palette,
  TimestampMode,
} from './types.js';

export const UNFORMATTABLE_MESSAGE = '<unformattable message>';
export const UNKNOWN_LOCATION = '<unknown>';

const ESC = '\x1b[';
const RESET = `${ESC}0m`;
const BOLD = '1';
// Burnt orange used for timestamps
const TIMESTAMP_STYLE = '1;38;2;159;80;1';

const COLOR_CODES: Readonly<Record<ColorName, string>> = {
  black: '30',
  red: '31',
  green: '32',
  yellow: '33',
  blue: '34',
  magenta: '35',
  cyan: '36',
  white: '37',
  gray: '90',
};

export const DEFAULT_PALETTE: Palette = {
  TRACE: 'magenta',
  DEBUG: 'cyan',
  INFO: 'green',
  WARN: 'yellow',
  ERROR: 'red',
};

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

/**
 * Wrap text in an SGR sequence, e.g. `colorize('x', '1;32')`
 */
export function colorize(text: string, sgr: string): string {
  return `${ESC}${sgr}m${text}${RESET}`;
}

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * Render `YYYY-MM-DDTHH:mm:ss` in local time or UTC
 */
export function formatTimestamp(date: Date, mode: Exclude<TimestampMode, 'none'> = 'local'): string {
  if (Number.isNaN(date.getTime())) {
    return 'invalid-date';
  }

  const utc = mode === 'utc';
  const year = utc ? date.getUTCFullYear() : date.getFullYear();
  const month = (utc ? date.getUTCMonth() : date.getMonth()) + 1;
  const day = utc ? date.getUTCDate() : date.getDate();
  const hours = utc ? date.getUTCHours() : date.getHours();
  const minutes = utc ? date.getUTCMinutes() : date.getMinutes();
  const seconds = utc ? date.getUTCSeconds() : date.getSeconds();

  return `${year}-${pad2(month)}-${pad2(day)}T${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}`;
}

/**
 * Interpolate a printf-style message the way console.log does.
 * Lazy messages are called here, and a throwing argument yields a placeholder.
 */
export function formatMessage(message: LogMessage, args: readonly unknown[] = []): string {
  try {
    const template = typeof message === 'function' ? message() : message;
    return args.length === 0 ? String(template) : format(template, ...args);
  } catch {
    return UNFORMATTABLE_MESSAGE;
  }
}

/**
 * Level tag padded to five characters, e.g. `INFO `
 */
export function formatLevelTag(level: LogRecord['level'], colors: boolean, palette?: Partial<Palette>): string {
  const name = levelName(level);
  const padded = name.padEnd(5);
  if (!colors || name === 'OFF') {
    return padded;
  }

  const color = palette?.[name] ?? DEFAULT_PALETTE[name];
  return colorize(padded, `${BOLD};${COLOR_CODES[color]}`);
}

/**
 * Render one record as a single line (no trailing newline):
 * `[INFO ][2024-05-01T09:30:00][src/app.ts:12][component] message`
 */
export function formatRecord(record: LogRecord, options: FormatOptions = {}): string {
  const colors = options.colors ?? false;
  const timestampMode = options.timestamp ?? 'local';

  let line = `[${formatLevelTag(record.level, colors, options.palette)}]`;

  if (timestampMode !== 'none') {
    const timestamp = formatTimestamp(record.timestamp, timestampMode);
    line += `[${colors ? colorize(timestamp, TIMESTAMP_STYLE) : timestamp}]`;
  }

  if (options.location ?? true) {
    const where = record.location
      ? `${record.location.file}:${record.location.line}`
      : UNKNOWN_LOCATION;
    line += `[${where}]`;
  }

  if (record.component) {
    line += `[${record.component}]`;
  }

  return `${line} ${record.message}`;
}
