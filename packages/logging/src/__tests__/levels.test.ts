/**
 * Tests for level parsing and the shared level registry
 */

import { Worker } from 'worker_threads';

import { describe, it, expect } from 'vitest';

import {
  LevelRegistry,
  LogLevel,
  levelFromSyslog,
  levelFromVerbosity,
  levelName,
  parseLogLevel,
  resolveSelector,
} from '../index.js';

// Plain script: reads the shared cell, reports it, then writes a new threshold
const WORKER_SOURCE = `
const { parentPort, workerData } = require('worker_threads');
const cell = new Int32Array(workerData.buffer, 0, 1);
parentPort.postMessage(Atomics.load(cell, 0));
Atomics.store(cell, 0, workerData.next);
`;

const EMITTING = [LogLevel.TRACE, LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

describe('Level parsing', () => {
  it('should parse names case-insensitively', () => {
    expect(parseLogLevel('trace')).toBe(LogLevel.TRACE);
    expect(parseLogLevel('Debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(' INFO ')).toBe(LogLevel.INFO);
    expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
  });

  it('should accept WARNING, ALL and OFF', () => {
    expect(parseLogLevel('warning')).toBe(LogLevel.WARN);
    expect(parseLogLevel('all')).toBe(LogLevel.TRACE);
    expect(parseLogLevel('OFF')).toBe(LogLevel.OFF);
  });

  it('should return undefined for unknown names', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel('')).toBeUndefined();
  });

  it('should name every level', () => {
    expect(EMITTING.map(levelName)).toEqual(['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR']);
    expect(levelName(LogLevel.OFF)).toBe('OFF');
  });

  it('should fall back to INFO for unusable selectors', () => {
    expect(resolveSelector('nonsense')).toBe(LogLevel.INFO);
    expect(resolveSelector(42)).toBe(LogLevel.INFO);
    expect(resolveSelector(-1)).toBe(LogLevel.INFO);
    expect(resolveSelector(1.5)).toBe(LogLevel.INFO);
    expect(resolveSelector(LogLevel.WARN)).toBe(LogLevel.WARN);
    expect(resolveSelector('off')).toBe(LogLevel.OFF);
  });
});

describe('Numeric level mappings', () => {
  it('should map verbosity counts', () => {
    expect(levelFromVerbosity(0)).toBe(LogLevel.INFO);
    expect(levelFromVerbosity(1)).toBe(LogLevel.DEBUG);
    expect(levelFromVerbosity(2)).toBe(LogLevel.TRACE);
    expect(levelFromVerbosity(255)).toBe(LogLevel.TRACE);
  });

  it('should treat negative or fractional verbosity as INFO', () => {
    expect(levelFromVerbosity(-3)).toBe(LogLevel.INFO);
    expect(levelFromVerbosity(0.5)).toBe(LogLevel.INFO);
    expect(levelFromVerbosity(Number.NaN)).toBe(LogLevel.INFO);
  });

  it('should map syslog priorities', () => {
    expect([0, 1, 2, 3].map(levelFromSyslog)).toEqual([
      LogLevel.ERROR,
      LogLevel.ERROR,
      LogLevel.ERROR,
      LogLevel.ERROR,
    ]);
    expect(levelFromSyslog(4)).toBe(LogLevel.WARN);
    expect(levelFromSyslog(5)).toBe(LogLevel.INFO);
    expect(levelFromSyslog(6)).toBe(LogLevel.DEBUG);
    expect(levelFromSyslog(7)).toBe(LogLevel.TRACE);
    expect(levelFromSyslog(255)).toBe(LogLevel.INFO);
  });
});

describe('LevelRegistry', () => {
  it('should start with nothing enabled', () => {
    const registry = new LevelRegistry();

    expect(registry.getThreshold()).toBe(LogLevel.OFF);
    expect(EMITTING.some(level => registry.isEnabled(level))).toBe(false);
  });

  it('should default enable() to INFO and above', () => {
    const registry = new LevelRegistry();
    registry.enable();

    expect(EMITTING.filter(level => registry.isEnabled(level))).toEqual([
      LogLevel.INFO,
      LogLevel.WARN,
      LogLevel.ERROR,
    ]);
  });

  it('should enable a level iff it is at least as severe as the threshold', () => {
    const registry = new LevelRegistry();

    for (const threshold of EMITTING) {
      registry.enable(threshold);
      for (const level of EMITTING) {
        expect(registry.isEnabled(level)).toBe(level >= threshold);
      }
    }
  });

  it('should enable everything with all', () => {
    const registry = LevelRegistry.withThreshold('all');

    expect(EMITTING.every(level => registry.isEnabled(level))).toBe(true);
  });

  it('should stop emitting after disable()', () => {
    const registry = LevelRegistry.withThreshold(LogLevel.TRACE);
    registry.disable();

    expect(EMITTING.some(level => registry.isEnabled(level))).toBe(false);
    expect(registry.getThreshold()).toBe(LogLevel.OFF);
  });

  it('should never report OFF itself as enabled', () => {
    const registry = LevelRegistry.withThreshold('all');

    expect(registry.isEnabled(LogLevel.OFF)).toBe(false);
  });

  it('should share its threshold through the buffer', () => {
    const registry = new LevelRegistry();
    const attached = LevelRegistry.fromBuffer(registry.buffer);

    registry.enable('warn');
    expect(attached.getThreshold()).toBe(LogLevel.WARN);

    attached.disable();
    expect(registry.isEnabled(LogLevel.ERROR)).toBe(false);
  });

  it('should keep the threshold when attaching to an existing buffer', () => {
    const registry = LevelRegistry.withThreshold('warn');
    const attached = LevelRegistry.fromBuffer(registry.buffer);

    expect(attached.getThreshold()).toBe(LogLevel.WARN);
    expect(registry.getThreshold()).toBe(LogLevel.WARN);
  });

  it('should share its threshold with worker threads', async () => {
    const registry = LevelRegistry.withThreshold(LogLevel.WARN);
    const worker = new Worker(WORKER_SOURCE, {
      eval: true,
      workerData: { buffer: registry.buffer, next: LogLevel.OFF },
    });

    const seen = new Promise<unknown>((resolve, reject) => {
      worker.once('message', resolve);
      worker.once('error', reject);
    });
    const exited = new Promise<number>(resolve => worker.once('exit', resolve));

    expect(await seen).toBe(LogLevel.WARN);
    expect(await exited).toBe(0);
    expect(registry.getThreshold()).toBe(LogLevel.OFF);
    expect(registry.isEnabled(LogLevel.ERROR)).toBe(false);
  });

  it('should treat a corrupted cell as OFF', () => {
    const registry = new LevelRegistry();
    const cell = new Int32Array(registry.buffer);
    cell[0] = 99;

    expect(registry.getThreshold()).toBe(LogLevel.OFF);
  });
});
