import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { Due, ValidationError, stringifyTask, encodeTask, parseTask } from '@taskwire/core';
import { buildTask } from '../src/commands/new.js';
import { formatTaskLine, formatDue, formatLabels } from '../src/output.js';

beforeAll(() => {
  chalk.level = 0;
});

describe('new', () => {
  it('builds a task with defaults', () => {
    const task = buildTask('Buy milk', { label: [] });
    expect(stringifyTask(task)).toBe(
      '{"content":"Buy milk","project_id":null,"order":null,"label_ids":[],"priority":1}',
    );
  });

  it('applies priority and labels in order', () => {
    const task = buildTask('Buy milk', { priority: 'urgent', label: ['10', '4', '1'] });
    expect(task.priority()).toBe(4);
    expect(task.labelIds()).toEqual([10, 4, 1]);
  });

  it('rejects an out-of-range priority with the core ValidationError', () => {
    expect(() => buildTask('Buy milk', { priority: '5', label: [] })).toThrow(ValidationError);
  });

  it('sets the project', () => {
    const task = buildTask('Buy milk', { project: '2345', label: [] });
    expect(encodeTask(task)).toMatchObject({ project_id: 2345 });
  });

  it('rejects a bad project id', () => {
    expect(() => buildTask('Buy milk', { project: 'inbox', label: [] })).toThrow('Invalid project id: inbox');
    expect(() => buildTask('Buy milk', { project: '4294967296', label: [] })).toThrow(ValidationError);
  });

  it('rejects a priority not written as plain digits', () => {
    expect(() => buildTask('Buy milk', { priority: '0x4', label: [] })).toThrow(ValidationError);
  });

  it('rejects a bad label id', () => {
    expect(() => buildTask('Buy milk', { label: ['x'] })).toThrow('Invalid label id: x');
  });

  it('sends free text due dates as due_string', () => {
    const task = buildTask('Buy milk', { label: [], due: 'tomorrow at noon' });
    expect(encodeTask(task)).toMatchObject({ due_string: 'tomorrow at noon', due_lang: 'en' });
  });

  it('prefers the exact time over the date and text', () => {
    const task = buildTask('Buy milk', {
      label: [],
      due: 'tomorrow',
      dueDate: '2017-12-25',
      dueDatetime: '2017-12-25T12:00:00Z',
    });
    const payload = encodeTask(task);
    expect(Object.keys(payload).filter(k => k.startsWith('due_'))).toEqual(['due_datetime']);
    expect(task.due()?.string()).toBe('2017-12-25T12:00:00Z');
  });

  it('uses the date when no time is given', () => {
    const task = buildTask('Buy milk', { label: [], due: 'christmas', dueDate: '2017-12-25' });
    expect(encodeTask(task)).toMatchObject({ due_date: '2017-12-25' });
    expect(task.due()?.string()).toBe('2017-12-25');
  });
});

describe('decode output', () => {
  it('formats a decoded task on one line', () => {
    const task = parseTask(
      '{"id":7,"content":"Ship it","completed":true,"priority":4,"label_ids":[3,5],'
      + '"due":{"string":"friday","date":"2016-09-02"}}',
    );
    expect(formatTaskLine(task)).toBe('(7) [x] !!! Ship it  Due: 2016-09-02  #3 #5');
  });

  it('marks unsaved tasks', () => {
    expect(formatTaskLine(buildTask('Draft', { label: [] }))).toBe('(new) [ ] ·   Draft');
  });

  it('quotes free text due dates', () => {
    expect(formatDue(Due.create('next week'))).toBe('  Due: "next week"');
    expect(formatDue(null)).toBe('');
  });

  it('omits empty labels', () => {
    expect(formatLabels([])).toBe('');
  });
});
