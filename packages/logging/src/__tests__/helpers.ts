import { parseStackFrame } from '../call-site.js';
import type { LogRecord, LogTransport, OutputStream, SourceLocation } from '../types.js';

/**
 * In-memory stand-in for process.stdout / process.stderr
 */
export class MemoryStream implements OutputStream {
  readonly chunks: string[] = [];
  private errorListeners: Array<(error: Error) => void> = [];

  constructor(readonly isTTY: boolean = false) {}

  write(chunk: string, callback?: (error?: Error | null) => void): boolean {
    this.chunks.push(chunk);
    callback?.(null);
    return true;
  }

  on(event: 'error', listener: (error: Error) => void): this {
    this.errorListeners.push(listener);
    return this;
  }

  removeListener(event: 'error', listener: (error: Error) => void): this {
    this.errorListeners = this.errorListeners.filter(registered => registered !== listener);
    return this;
  }

  emitError(error: Error): void {
    this.errorListeners.forEach(listener => listener(error));
  }

  get listenerCount(): number {
    return this.errorListeners.length;
  }

  get output(): string {
    return this.chunks.join('');
  }

  get lines(): string[] {
    return this.output.split('\n').filter(line => line.length > 0);
  }
}

/**
 * Stream whose writes fail, either by throwing or through the callback
 */
export class FailingStream extends MemoryStream {
  constructor(private readonly mode: 'throw' | 'callback') {
    super(false);
  }

  override write(chunk: string, callback?: (error?: Error | null) => void): boolean {
    if (this.mode === 'throw') {
      throw new Error('stream closed');
    }
    callback?.(new Error(`write failed: ${chunk.length} bytes`));
    return false;
  }
}

/**
 * Transport that keeps every record it receives
 */
export class CollectingTransport implements LogTransport {
  readonly records: LogRecord[] = [];

  constructor(readonly name: string = 'collect') {}

  async log(record: LogRecord): Promise<void> {
    this.records.push(record);
  }
}

/**
 * Location of the line that calls this, read from a plain stack
 */
export function callerLocation(): SourceLocation | undefined {
  const frames = new Error().stack?.split('\n') ?? [];
  return parseStackFrame(frames[2] ?? '');
}

// Variables supports-color reads from the process environment
const TERMINAL_VARIABLES = [
  'NO_COLOR',
  'FORCE_COLOR',
  'CI',
  'TERM',
  'COLORTERM',
  'TERM_PROGRAM',
  'TEAMCITY_VERSION',
  'TF_BUILD',
  'AGENT_NAME',
] as const;
type TerminalVariable = (typeof TERMINAL_VARIABLES)[number];

/**
 * Describe the terminal through process.env, clearing every other variable
 * that affects color detection. Returns a function restoring the previous values.
 */
export function setTerminalEnv(values: Partial<Record<TerminalVariable, string>>): () => void {
  const saved = TERMINAL_VARIABLES.map(name => [name, process.env[name]] as const);
  for (const name of TERMINAL_VARIABLES) {
    const value = values[name];
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = value;
    }
  }
  return () => {
    for (const [name, value] of saved) {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
  };
}

export const flushMicrotasks = (): Promise<void> => new Promise(resolve => setImmediate(resolve));
