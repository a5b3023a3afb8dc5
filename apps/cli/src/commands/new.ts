import { Command } from 'commander';
import { Task, Due, stringifyTask } from '@taskwire/core';
import type { CliConfig } from '../config.js';
import { withCompact } from '../config.js';
import * as out from '../output.js';
import { parsePriorityArg, parseIdArg, collect, $try } from '../helpers.js';

export type NewTaskOptions = {
  project?: string;
  priority?: string;
  label: string[];
  due?: string;
  dueDate?: string;
  dueDatetime?: string;
};

/**
 * Build a task from command-line options. The most specific due option wins.
 * Throws the core's ValidationError for an out-of-range priority or project id.
 */
export function buildTask(content: string, opts: NewTaskOptions): Task {
  const task = Task.create(content);

  if (opts.project !== undefined) {
    const projectId = parseIdArg(opts.project);
    if (projectId === null) throw new Error(`Invalid project id: ${opts.project}`);
    task.setProjectId(projectId);
  }

  if (opts.priority !== undefined) task.setPriority(parsePriorityArg(opts.priority));

  for (const raw of opts.label) {
    const id = parseIdArg(raw);
    if (id === null) throw new Error(`Invalid label id: ${raw}`);
    task.addLabelId(id);
  }

  const textual = opts.due ?? opts.dueDate ?? opts.dueDatetime;
  if (textual !== undefined) {
    const due = Due.create(textual);
    if (opts.dueDatetime !== undefined) due.setDatetime(opts.dueDatetime);
    else if (opts.dueDate !== undefined) due.setDate(opts.dueDate);
    task.setDue(due);
  }

  return task;
}

export function createNewCommand(config: CliConfig): Command {
  return new Command('new')
    .description('Print the write payload for a new task')
    .argument('<content>', 'Task content')
    .option('--project <id>', 'Project id')
    .option('-p, --priority <level>', 'Priority (1-4, p1-p4, normal, medium, high, urgent)')
    .option('-l, --label <id>', 'Label id (repeatable)', collect, [])
    .option('--due <text>', 'Due date in free text, e.g. "tomorrow at noon"')
    .option('--due-date <date>', 'Whole-day due date (YYYY-MM-DD)')
    .option('--due-datetime <datetime>', 'Exact due time (RFC3339, UTC)')
    .action((content: string, _opts: unknown, cmd: Command) => $try(() => {
      const g = cmd.optsWithGlobals<NewTaskOptions & { compact?: boolean }>();
      const { jsonIndent } = withCompact(config, g.compact);
      out.info(stringifyTask(buildTask(content, g), jsonIndent));
    }));
}
