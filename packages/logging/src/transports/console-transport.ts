import { createSupportsColor } from 'supports-color';

import { formatRecord } from '../formatter.js';
import {
  LogLevel,
  type ColorMode,
  type ConsoleTransportConfig,
  type LogRecord,
  type LogTransport,
  type OutputStream,
  type Palette,
  type StreamMode,
  type TimestampMode,
} from '../types.js';

const FALSY_FLAGS = new Set(['0', 'false', 'no', 'off']);

/**
 * Decide whether a stream gets escape codes. NO_COLOR wins over FORCE_COLOR;
 * without either, a TTY is colored when supports-color finds a capable
 * terminal (TERM, COLORTERM and CI variables of the process).
 */
export function shouldUseColors(
  mode: ColorMode | boolean,
  stream: OutputStream,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  if (typeof mode === 'boolean') {
    return mode;
  }
  if (mode !== 'auto') {
    return mode === 'always';
  }

  if (env.NO_COLOR !== undefined && env.NO_COLOR !== '') {
    return false;
  }
  const force = env.FORCE_COLOR;
  if (force !== undefined) {
    return !FALSY_FLAGS.has(force.trim().toLowerCase());
  }
  if (stream.isTTY !== true) {
    return false;
  }
  // The TTY check is done above, so supports-color only judges the terminal.
  return createSupportsColor(undefined, { sniffFlags: false }) !== false;
}

const discardWriteError = (): void => undefined;

// One 'error' listener per stream, fanning out to every open transport on it.
// An unhandled 'error' event would otherwise crash the host.
// The listener is removed again once the last transport on the stream closes.
interface StreamWatch {
  readonly listener: (error: Error) => void;
  readonly handlers: Set<(error: Error) => void>;
}

const streamWatches = new WeakMap<OutputStream, StreamWatch>();

function watchStream(stream: OutputStream, handler: (error: Error) => void): void {
  let watch = streamWatches.get(stream);
  if (!watch) {
    const handlers = new Set<(error: Error) => void>();
    const listener = (error: Error): void => handlers.forEach(notify => notify(error));
    stream.on?.('error', listener);
    watch = { listener, handlers };
    streamWatches.set(stream, watch);
  }
  watch.handlers.add(handler);
}

function unwatchStream(stream: OutputStream, handler: (error: Error) => void): void {
  const watch = streamWatches.get(stream);
  if (!watch) {
    return;
  }
  watch.handlers.delete(handler);
  if (watch.handlers.size === 0) {
    stream.removeListener?.('error', watch.listener);
    streamWatches.delete(stream);
  }
}

/**
 * Console transport writing one line per record to stdout/stderr
 */
export class ConsoleTransport implements LogTransport {
  public readonly name = 'console';
  private readonly stdout: OutputStream;
  private readonly stderr: OutputStream;
  private readonly streamMode: StreamMode;
  private readonly timestamp: TimestampMode;
  private readonly location: boolean;
  private readonly palette: Partial<Palette>;
  private readonly stdoutColors: boolean;
  private readonly stderrColors: boolean;
  private readonly onWriteError: (error: Error) => void;

  constructor(config: ConsoleTransportConfig = {}) {
    this.stdout = config.stdout ?? process.stdout;
    this.stderr = config.stderr ?? process.stderr;
    this.streamMode = config.stream ?? 'split';
    this.timestamp = config.timestamp ?? 'local';
    this.location = config.location ?? true;
    this.palette = config.palette ?? {};
    this.onWriteError = config.onWriteError ?? discardWriteError;

    const colors = config.colors ?? 'auto';
    const env = config.env ?? process.env;
    this.stdoutColors = shouldUseColors(colors, this.stdout, env);
    this.stderrColors = shouldUseColors(colors, this.stderr, env);

    watchStream(this.stdout, this.handleStreamError);
    watchStream(this.stderr, this.handleStreamError);
  }

  async log(record: LogRecord): Promise<void> {
    const stream = this.streamFor(record.level);
    const line = formatRecord(record, {
      colors: stream === this.stdout ? this.stdoutColors : this.stderrColors,
      timestamp: this.timestamp,
      location: this.location,
      palette: this.palette,
    });

    try {
      stream.write(`${line}\n`, error => {
        if (error) {
          this.handleStreamError(error);
        }
      });
    } catch (error) {
      this.handleStreamError(error instanceof Error ? error : new Error(String(error)));
    }
  }

  private streamFor(level: LogLevel): OutputStream {
    switch (this.streamMode) {
      case 'stdout':
        return this.stdout;
      case 'stderr':
        return this.stderr;
      default:
        return level >= LogLevel.WARN ? this.stderr : this.stdout;
    }
  }

  async close(): Promise<void> {
    unwatchStream(this.stdout, this.handleStreamError);
    unwatchStream(this.stderr, this.handleStreamError);
  }

  private readonly handleStreamError = (error: Error): void => {
    try {
      this.onWriteError(error);
    } catch {
      // the hook failing is as unreportable as the write itself
      return;
    }
  };
}
