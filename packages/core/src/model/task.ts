import { Due } from './due.js';
import { ValidationError } from '../errors.js';
import { Priority, isPriority } from '../types/priority.js';
import { WIRE_INT_MAX, type TaskRead } from '../codec/wire-schema.js';

/**
 * A task as exchanged with the remote service.
 *
 * `id`, `order`, `indent`, `url` and `commentCount` are assigned by the
 * service and only ever arrive through decoding; there are no setters for them.
 */
export class Task {
  private readonly _id: number | null;
  private _projectId: number | null;
  private _content: string;
  private _completed: boolean;
  private _labelIds: number[];
  private readonly _order: number | null;
  private readonly _indent: number | null;
  private _priority: Priority;
  private _due: Due | null;
  private readonly _url: string | null;
  private readonly _commentCount: number | null;

  private constructor(fields: {
    id: number | null;
    projectId: number | null;
    content: string;
    completed: boolean;
    labelIds: number[];
    order: number | null;
    indent: number | null;
    priority: Priority;
    due: Due | null;
    url: string | null;
    commentCount: number | null;
  }) {
    this._id = fields.id;
    this._projectId = fields.projectId;
    this._content = fields.content;
    this._completed = fields.completed;
    this._labelIds = fields.labelIds;
    this._order = fields.order;
    this._indent = fields.indent;
    this._priority = fields.priority;
    this._due = fields.due;
    this._url = fields.url;
    this._commentCount = fields.commentCount;
  }

  /** A new, not yet persisted task: normal priority, not completed, no labels, no due date. */
  static create(content: string): Task {
    return new Task({
      id: null,
      projectId: null,
      content,
      completed: false,
      labelIds: [],
      order: null,
      indent: null,
      priority: Priority.Normal,
      due: null,
      url: null,
      commentCount: null,
    });
  }

  /** @internal Used by the codec on an already validated read model. */
  static fromWire(wire: TaskRead): Task {
    return new Task({
      id: wire.id ?? null,
      projectId: wire.project_id ?? null,
      content: wire.content,
      completed: wire.completed,
      labelIds: [...wire.label_ids],
      order: wire.order ?? null,
      indent: wire.indent ?? null,
      priority: wire.priority,
      due: wire.due ? Due.fromWire(wire.due) : null,
      url: wire.url ?? null,
      commentCount: wire.comment_count ?? null,
    });
  }

  // --- Mutators ---

  /**
   * Moves the task to another project; `null` leaves the choice to the service.
   * @throws ValidationError when `projectId` is not a positive 32-bit integer
   */
  setProjectId(projectId: number | null): void {
    if (projectId !== null && !(Number.isInteger(projectId) && projectId > 0 && projectId <= WIRE_INT_MAX)) {
      throw new ValidationError('project_id', projectId, `The project id must be a positive integer, got ${projectId}`);
    }
    this._projectId = projectId;
  }

  setContent(content: string): void {
    this._content = content;
  }

  setCompleted(completed: boolean): void {
    this._completed = completed;
  }

  /**
   * Sets the priority from 1 (normal) to 4 (urgent).
   * @throws ValidationError when `priority` is not one of 1, 2, 3, 4
   */
  setPriority(priority: number): void {
    if (!isPriority(priority)) {
      throw new ValidationError('priority', priority, `The priority must be a value from 1 to 4, got ${priority}`);
    }
    this._priority = priority;
  }

  /** Appends a label; duplicates are kept. */
  addLabelId(labelId: number): void {
    this._labelIds.push(labelId);
  }

  /** Removes every occurrence of the label, keeping the order of the rest. */
  removeLabelId(labelId: number): void {
    this._labelIds = this._labelIds.filter(id => id !== labelId);
  }

  /** Pass `null` to clear the due date. */
  setDue(due: Due | null): void {
    this._due = due ? due.clone() : null;
  }

  // --- Accessors ---

  id(): number | null {
    return this._id;
  }

  projectId(): number | null {
    return this._projectId;
  }

  content(): string {
    return this._content;
  }

  completed(): boolean {
    return this._completed;
  }

  labelIds(): number[] {
    return [...this._labelIds];
  }

  order(): number | null {
    return this._order;
  }

  indent(): number | null {
    return this._indent;
  }

  priority(): Priority {
    return this._priority;
  }

  /** A copy; change the due date through `setDue`. */
  due(): Due | null {
    return this._due ? this._due.clone() : null;
  }

  url(): string | null {
    return this._url;
  }

  commentCount(): number | null {
    return this._commentCount;
  }
}
