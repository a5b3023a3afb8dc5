/**
 * Maps tasks to and from the service's JSON.
 *
 * Reading and writing use different shapes: the read model carries a nested
 * `due` object and server-assigned fields, the write model flattens the due
 * date into exactly one of `due_datetime`, `due_date` or `due_string` +
 * `due_lang`, and never sends server-assigned fields.
 */

import type { ZodIssue, ZodTypeAny, output } from 'zod';
import { Task } from '../model/task.js';
import type { Due } from '../model/due.js';
import type { DueVariant } from '../types/due-variant.js';
import { DeserializationError, type DecodeIssue } from '../errors.js';
import {
  TaskReadSchema,
  TaskReadListSchema,
  DUE_LANG,
  type DueWriteFields,
  type TaskWritePayload,
} from './wire-schema.js';

// --- Decode ---

/** Decode a single read-model task from an already parsed JSON value. */
export function decodeTask(value: unknown): Task {
  return Task.fromWire(validate(TaskReadSchema, value));
}

/** Decode an array of read-model tasks; one bad element fails the whole array. */
export function decodeTasks(value: unknown): Task[] {
  return validate(TaskReadListSchema, value).map(wire => Task.fromWire(wire));
}

export function parseTask(bytes: string | Uint8Array): Task {
  return decodeTask(parseJson(bytes));
}

export function parseTasks(bytes: string | Uint8Array): Task[] {
  return decodeTasks(parseJson(bytes));
}

function validate<S extends ZodTypeAny>(schema: S, value: unknown): output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DeserializationError(result.error.issues.map(toDecodeIssue));
  }
  return result.data;
}

function toDecodeIssue(issue: ZodIssue): DecodeIssue {
  return { path: issue.path.join('.'), message: issue.message };
}

function parseJson(bytes: string | Uint8Array): unknown {
  try {
    const text = typeof bytes === 'string' ? bytes : new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    return JSON.parse(text) as unknown;
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DeserializationError([{ path: '', message: `Malformed JSON: ${message}` }]);
  }
}

// --- Encode ---

/** Pick the due representation to send: datetime > date > free text > nothing. */
export function resolveDueVariant(due: Due | null): DueVariant {
  if (!due) return { kind: 'none' };

  const datetime = due.datetime();
  if (datetime !== null) return { kind: 'datetime', datetime };

  const date = due.date();
  if (date !== null) return { kind: 'date', date };

  return { kind: 'string', string: due.string() };
}

function dueWriteFields(variant: DueVariant): DueWriteFields {
  switch (variant.kind) {
    case 'datetime': return { due_datetime: variant.datetime };
    case 'date': return { due_date: variant.date };
    case 'string': return { due_string: variant.string, due_lang: DUE_LANG };
    case 'none': return {};
    default: {
      const unreachable: never = variant;
      return unreachable;
    }
  }
}

/** The write-model object, keys in the order the service documents them. */
export function encodeTask(task: Task): TaskWritePayload {
  return {
    content: task.content(),
    project_id: task.projectId(),
    order: task.order(),
    label_ids: task.labelIds(),
    priority: task.priority(),
    ...dueWriteFields(resolveDueVariant(task.due())),
  };
}

export function stringifyTask(task: Task, indent?: number): string {
  return JSON.stringify(encodeTask(task), null, indent);
}
