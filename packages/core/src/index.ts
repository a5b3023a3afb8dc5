// Types
export { Priority, PriorityName, isPriority } from './types/priority.js';
export type { DueVariant } from './types/due-variant.js';

// Errors
export { TaskwireError, DeserializationError, ValidationError } from './errors.js';
export type { DecodeIssue } from './errors.js';

// Model
export { Due } from './model/due.js';
export { Task } from './model/task.js';

// Codec
export {
  decodeTask, decodeTasks, parseTask, parseTasks,
  encodeTask, stringifyTask, resolveDueVariant,
} from './codec/task-codec.js';
export { DUE_LANG, WIRE_INT_MAX, DueReadSchema, TaskReadSchema, TaskReadListSchema } from './codec/wire-schema.js';
export type { DueRead, TaskRead, DueWriteFields, TaskWritePayload } from './codec/wire-schema.js';
