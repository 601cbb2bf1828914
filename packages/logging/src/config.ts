import { z } from 'zod';

import { levelFromVerbosity, levelName, parseLogLevel } from './levels.js';
import { COLOR_MODES, COLOR_NAMES, LogLevel, STREAM_MODES, TIMESTAMP_MODES } from './types.js';

const ColorNameSchema = z.enum(COLOR_NAMES);

/**
 * Logging configuration schema
 */
export const LoggingConfigSchema = z.object({
  /** Minimum level to emit: a level name, ALL or OFF */
  level: z
    .string()
    .refine(value => parseLogLevel(value) !== undefined, {
      message: 'Expected TRACE, DEBUG, INFO, WARN, ERROR, ALL or OFF',
    })
    .transform(value => parseLogLevel(value) ?? LogLevel.INFO)
    .default('INFO'),
  /** `auto` colors terminals only; a boolean forces it either way */
  colors: z.union([z.enum(COLOR_MODES), z.boolean()]).default('auto'),
  timestamp: z.enum(TIMESTAMP_MODES).default('local'),
  /** Whether lines carry the caller's file:line */
  location: z.boolean().default(true),
  /** `split` sends WARN and ERROR to stderr, the rest to stdout */
  stream: z.enum(STREAM_MODES).default('split'),
  palette: z
    .object({
      TRACE: ColorNameSchema,
      DEBUG: ColorNameSchema,
      INFO: ColorNameSchema,
      WARN: ColorNameSchema,
      ERROR: ColorNameSchema,
    })
    .partial()
    .strict()
    .default({}),
});

export type LoggingConfigInput = z.input<typeof LoggingConfigSchema>;
export type LoggingConfig = z.output<typeof LoggingConfigSchema>;

/**
 * Configuration validation error with detailed information
 */
export class LoggingConfigError extends Error {
  constructor(
    message: string,
    public readonly errors: z.ZodError
  ) {
    super(message);
    this.name = 'LoggingConfigError';
  }

  /**
   * Get formatted error details
   */
  getFormattedErrors(): string[] {
    return this.errors.issues.map(issue => {
      const path = issue.path.join('.');
      return `${path}: ${issue.message}`;
    });
  }
}

export function parseLoggingConfig(input: unknown = {}): LoggingConfig {
  const result = LoggingConfigSchema.safeParse(input);
  if (!result.success) {
    throw new LoggingConfigError('Logging configuration validation failed', result.error);
  }
  return result.data;
}

export const DEFAULT_ENV_PREFIX = 'TINTLOG_';

const TRUE_FLAGS = new Set(['1', 'true', 'yes', 'on']);
const FALSE_FLAGS = new Set(['0', 'false', 'no', 'off']);

function parseFlag(value: string): boolean | string {
  const normalized = value.trim().toLowerCase();
  if (TRUE_FLAGS.has(normalized)) {
    return true;
  }
  if (FALSE_FLAGS.has(normalized)) {
    return false;
  }
  // left as-is so validation reports it
  return value;
}

// "INFO=blue,ERROR=red"
function parsePalette(value: string): Record<string, string> {
  const palette: Record<string, string> = {};
  for (const pair of value.split(',')) {
    const [key, color] = pair.split('=').map(part => part.trim());
    if (key && color) {
      palette[key.toUpperCase()] = color.toLowerCase();
    }
  }
  return palette;
}

/**
 * Build a configuration from `<PREFIX>LEVEL`, `<PREFIX>VERBOSITY`,
 * `<PREFIX>COLORS`, `<PREFIX>TIMESTAMP`, `<PREFIX>LOCATION`, `<PREFIX>STREAM`
 * and `<PREFIX>PALETTE`.
 */
export function loadLoggingConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  prefix: string = DEFAULT_ENV_PREFIX
): LoggingConfig {
  const read = (key: string): string | undefined => {
    const value = env[`${prefix}${key}`];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  };

  const raw: Record<string, unknown> = {};

  const level = read('LEVEL');
  const verbosity = read('VERBOSITY');
  if (level !== undefined) {
    raw.level = level;
  } else if (verbosity !== undefined) {
    raw.level = levelName(levelFromVerbosity(Number(verbosity)));
  }

  const colors = read('COLORS');
  if (colors !== undefined) {
    raw.colors = colors.toLowerCase();
  }
  const timestamp = read('TIMESTAMP');
  if (timestamp !== undefined) {
    raw.timestamp = timestamp.toLowerCase();
  }
  const location = read('LOCATION');
  if (location !== undefined) {
    raw.location = parseFlag(location);
  }
  const stream = read('STREAM');
  if (stream !== undefined) {
    raw.stream = stream.toLowerCase();
  }
  const palette = read('PALETTE');
  if (palette !== undefined) {
    raw.palette = parsePalette(palette);
  }

  return parseLoggingConfig(raw);
}
