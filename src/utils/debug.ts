/**
 * Debug logging
 *
 * Appends timestamped lines to a file in the OS temp directory when
 * TOOL_SEARCH_DEBUG=1. Silent otherwise.
 */

import { appendFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

export type DebugLogger = (...args: unknown[]) => void;

export const DEBUG_FILE = join(tmpdir(), 'tool-search-debug.log');

export interface DebugLoggerOptions {
  /** Defaults to TOOL_SEARCH_DEBUG === '1' */
  enabled?: boolean;
  file?: string;
  /** Receives each formatted line instead of the file */
  sink?: (line: string) => void;
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.TOOL_SEARCH_DEBUG === '1';
}

export function formatDebugLine(scope: string, args: unknown[], now: Date = new Date()): string {
  const message = args
    .map((a) => (typeof a === 'object' && a !== null ? JSON.stringify(a) : String(a)))
    .join(' ');
  return `[${now.toISOString()}] [${scope}] ${message}\n`;
}

export function createDebugLogger(scope: string, options: DebugLoggerOptions = {}): DebugLogger {
  const enabled = options.enabled ?? isDebugEnabled();
  const file = options.file ?? DEBUG_FILE;
  const write = options.sink ?? ((line: string) => appendFileSync(file, line));

  return (...args: unknown[]) => {
    if (!enabled) return;
    write(formatDebugLine(scope, args));
  };
}
