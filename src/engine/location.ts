/**
 * Source Locations
 * @module engine/location
 *
 * Finds the caller's file and line for registration calls by walking the stack
 * past frames that belong to this package or to Node internals.
 */

import { fileURLToPath } from 'url';
import type { SourceLocation } from '../errors/base.js';

const PACKAGE_SOURCE_ROOT = fileURLToPath(new URL('..', import.meta.url));

const FRAME_PATTERN = /\(?((?:file:\/\/)?[^()\s]+):(\d+):(\d+)\)?$/;

function toFilePath(file: string): string {
  return file.startsWith('file://') ? fileURLToPath(file) : file;
}

/**
 * Parse one V8 stack frame line
 */
export function parseStackFrame(frame: string): SourceLocation | undefined {
  const match = FRAME_PATTERN.exec(frame.trim());
  if (!match) {
    return undefined;
  }
  const [, file, line, column] = match;
  if (file === undefined || line === undefined || column === undefined) {
    return undefined;
  }
  return { file: toFilePath(file), line: Number(line), column: Number(column) };
}

function isInternalFrame(location: SourceLocation): boolean {
  return (
    location.file.startsWith('node:') ||
    location.file.startsWith(PACKAGE_SOURCE_ROOT) ||
    location.file.includes('/node_modules/')
  );
}

/**
 * Location of the nearest caller outside this package
 */
export function captureLocation(): SourceLocation | undefined {
  const stack = new Error().stack;
  if (!stack) {
    return undefined;
  }
  for (const frame of stack.split('\n').slice(1)) {
    const location = parseStackFrame(frame);
    if (location && !isInternalFrame(location)) {
      return location;
    }
  }
  return undefined;
}
