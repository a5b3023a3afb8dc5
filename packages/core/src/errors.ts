export interface DecodeIssue {
  /** Dotted path into the input, e.g. `due.string` or `3.label_ids.0`. Empty for the root. */
  readonly path: string;
  readonly message: string;
}

export class TaskwireError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed JSON, or a missing/mistyped field in a read-model payload. */
export class DeserializationError extends TaskwireError {
  readonly issues: readonly DecodeIssue[];

  constructor(issues: readonly DecodeIssue[]) {
    super(formatIssues(issues));
    this.issues = issues;
  }
}

/** A mutator was handed a value outside its domain. */
export class ValidationError extends TaskwireError {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, message: string) {
    super(message);
    this.field = field;
    this.value = value;
  }
}

function formatIssues(issues: readonly DecodeIssue[]): string {
  if (issues.length === 0) return 'Could not decode task';
  const parts = issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message));
  return `Could not decode task: ${parts.join('; ')}`;
}
