/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import { Priority, resolveDueVariant } from '@taskwire/core';
import type { Due, Task } from '@taskwire/core';

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case Priority.Urgent: return chalk.red.bold('!!!');
    case Priority.High: return chalk.yellow('!! ');
    case Priority.Medium: return chalk.blue('!  ');
    case Priority.Normal: return chalk.dim('·  ');
  }
}

export function formatDue(due: Due | null): string {
  const variant = resolveDueVariant(due);
  switch (variant.kind) {
    case 'none': return '';
    case 'datetime': return chalk.dim(`  Due: ${variant.datetime}`);
    case 'date': return chalk.dim(`  Due: ${variant.date}`);
    case 'string': return chalk.dim(`  Due: "${variant.string}"`);
  }
}

export function formatLabels(labelIds: readonly number[]): string {
  if (labelIds.length === 0) return '';
  return '  ' + chalk.cyan(labelIds.map(id => `#${id}`).join(' '));
}

export function formatTaskLine(task: Task): string {
  const id = task.id();
  const idPart = id === null ? chalk.dim('(new)') : chalk.dim(`(${id})`);
  return `${idPart} ${formatCheckbox(task.completed())} ${formatPriority(task.priority())} ${task.content()}`
    + formatDue(task.due())
    + formatLabels(task.labelIds());
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function warning(message: string): void {
  console.error(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
