import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Priority, DeserializationError } from '@taskwire/core';
import {
  parsePriorityArg,
  parseIdArg,
  collect,
  readInput,
  decodeInput,
  $try,
} from '../src/helpers.js';

const enc = (s: string) => new TextEncoder().encode(s);

describe('parsePriorityArg', () => {
  it('parses names', () => {
    expect(parsePriorityArg('normal')).toBe(Priority.Normal);
    expect(parsePriorityArg('medium')).toBe(Priority.Medium);
    expect(parsePriorityArg('high')).toBe(Priority.High);
    expect(parsePriorityArg('urgent')).toBe(Priority.Urgent);
  });

  it('parses "p1".."p4"', () => {
    expect(parsePriorityArg('p1')).toBe(1);
    expect(parsePriorityArg('p4')).toBe(4);
  });

  it('is case-insensitive', () => {
    expect(parsePriorityArg('URGENT')).toBe(Priority.Urgent);
  });

  it('passes numbers through for the core to check', () => {
    expect(parsePriorityArg('3')).toBe(3);
    expect(parsePriorityArg('7')).toBe(7);
  });

  it('returns NaN for numbers not written as plain digits', () => {
    expect(parsePriorityArg('0x4')).toBeNaN();
    expect(parsePriorityArg('4e0')).toBeNaN();
    expect(parsePriorityArg('4.0')).toBeNaN();
  });

  it('returns NaN for unknown words', () => {
    expect(parsePriorityArg('critical')).toBeNaN();
  });
});

describe('parseIdArg', () => {
  it('parses positive integers', () => {
    expect(parseIdArg('42')).toBe(42);
  });

  it('rejects zero, negatives and non-numbers', () => {
    expect(parseIdArg('0')).toBeNull();
    expect(parseIdArg('-3')).toBeNull();
    expect(parseIdArg('1.5')).toBeNull();
    expect(parseIdArg('abc')).toBeNull();
  });
});

describe('collect', () => {
  it('appends repeated option values', () => {
    expect(collect('2', collect('1', []))).toEqual(['1', '2']);
  });
});

describe('readInput', () => {
  it('reads a file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'taskwire-'));
    try {
      const file = join(dir, 'task.json');
      writeFileSync(file, '{"content":"x"}');
      expect(readInput(file).toString('utf8')).toBe('{"content":"x"}');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('decodeInput', () => {
  const one = '{"content":"A","completed":false,"priority":1,"label_ids":[]}';

  it('decodes a single task object', () => {
    const tasks = decodeInput(enc(one));
    expect(tasks.map(t => t.content())).toEqual(['A']);
  });

  it('decodes an array of tasks', () => {
    const tasks = decodeInput(enc(`  [${one}, ${one.replace('"A"', '"B"')}]`));
    expect(tasks.map(t => t.content())).toEqual(['A', 'B']);
  });

  it('rejects invalid UTF-8 input', () => {
    const bytes = new Uint8Array([...enc('[{"content":"'), 0xff, ...enc('","completed":false,"priority":1,"label_ids":[]}]')]);
    expect(() => decodeInput(bytes)).toThrow(DeserializationError);
  });

  it('surfaces decode failures', () => {
    expect(() => decodeInput(enc('{"content":"A"}'))).toThrow(DeserializationError);
  });
});

describe('$try', () => {
  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('calls the wrapped function', () => {
    const fn = vi.fn();
    $try(fn);
    expect(fn).toHaveBeenCalledOnce();
    expect(process.exitCode).toBeUndefined();
  });

  it('reports errors and sets a failing exit code', () => {
    const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    $try(() => {
      throw new Error('test error');
    });
    expect(consoleSpy).toHaveBeenCalledOnce();
    expect(String(consoleSpy.mock.calls[0]?.[0])).toContain('test error');
    expect(process.exitCode).toBe(1);
  });
});
