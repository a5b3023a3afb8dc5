/**
 * CLI helpers: argument parsing, input reading, error handling.
 */

import { readFileSync } from 'node:fs';
import type { Task } from '@taskwire/core';
import { Priority, parseTask, parseTasks } from '@taskwire/core';
import * as out from './output.js';

/**
 * Parse a priority argument into a number for `Task.setPriority`.
 * Plain digits pass through as a number and anything else as NaN, so the core rejects them.
 */
export function parsePriorityArg(level: string): number {
  switch (level.trim().toLowerCase()) {
    case 'normal': case 'p1': return Priority.Normal;
    case 'medium': case 'p2': return Priority.Medium;
    case 'high': case 'p3': return Priority.High;
    case 'urgent': case 'p4': return Priority.Urgent;
    default: return /^\d+$/.test(level.trim()) ? Number(level) : NaN;
  }
}

/**
 * Parse a positive integer id (project or label). Returns null when invalid.
 */
export function parseIdArg(value: string): number | null {
  if (!/^\d+$/.test(value.trim())) return null;
  const id = Number(value);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

/** commander collector for repeatable options. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Read input bytes from a file, or from stdin when the path is omitted or `-`.
 */
export function readInput(file: string | undefined): Buffer {
  return readFileSync(file === undefined || file === '-' ? 0 : file);
}

/**
 * Decode either a single read-model task or an array of them.
 */
export function decodeInput(bytes: Uint8Array): Task[] {
  return firstSignificantByte(bytes) === OPEN_BRACKET ? parseTasks(bytes) : [parseTask(bytes)];
}

const OPEN_BRACKET = 0x5b;
const JSON_WHITESPACE = new Set([0x20, 0x09, 0x0a, 0x0d]);

function firstSignificantByte(bytes: Uint8Array): number | undefined {
  return bytes.find(b => !JSON_WHITESPACE.has(b));
}

/**
 * Run a command action, reporting any thrown error and flagging a failed exit.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
