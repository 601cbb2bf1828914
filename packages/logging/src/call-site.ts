import path from 'path';
import { fileURLToPath } from 'url';

import type { SourceLocation } from './types.js';

// "    at fn (/abs/file.ts:12:5)" or "    at /abs/file.ts:12:5"
const FRAME_PATTERN = /^\s*at (?:.*?\(|async )?(.+?):(\d+):(\d+)\)?$/;

/**
 * Parse one V8 stack frame line
 */
export function parseStackFrame(frame: string, cwd: string = process.cwd()): SourceLocation | undefined {
  const match = FRAME_PATTERN.exec(frame);
  if (!match) {
    return undefined;
  }

  const [, rawFile = '', rawLine = '', rawColumn = ''] = match;
  if (rawFile.startsWith('node:') || rawFile === 'native') {
    return undefined;
  }

  return {
    file: displayPath(rawFile, cwd),
    line: Number(rawLine),
    column: Number(rawColumn),
  };
}

/**
 * Locate the caller of `boundary`. Frames from `boundary` inward are cut
 * by V8, so the first remaining frame is the call site.
 */
// eslint-disable-next-line @typescript-eslint/ban-types
export function captureCallSite(boundary: Function, cwd?: string): SourceLocation | undefined {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, boundary);

  const frames = holder.stack?.split('\n').slice(1) ?? [];
  for (const frame of frames) {
    const location = parseStackFrame(frame, cwd);
    if (location) {
      return location;
    }
  }
  return undefined;
}

function displayPath(file: string, cwd: string): string {
  let resolved = file;
  if (file.startsWith('file://')) {
    try {
      resolved = fileURLToPath(file);
    } catch {
      return file;
    }
  }

  if (!path.isAbsolute(resolved)) {
    return resolved;
  }

  const relative = path.relative(cwd, resolved);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    return resolved;
  }
  return relative.split(path.sep).join('/');
}
