import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';

import {
  evaluateAssertion,
  isOrderedSubsequence,
  runAssertions,
  toAssertionRecord
} from '../src/assertions/evaluate.js';

const CONTEXT = {
  steps: [{ ok: true, value: 5, stdout: 'hello world\nbye\n' }],
  calls: ['init', 'load', 'play', 'stop'],
  result: { name: 'kick', size: 4 }
};

describe('assertion evaluator', () => {
  it('compares structurally with eq and ne', () => {
    expect(evaluateAssertion(CONTEXT, { op: 'eq', actual: '$.steps[0].value', expected: 5 }).pass).toBe(true);
    expect(evaluateAssertion(CONTEXT, { op: 'eq', actual: '$.result', expected: { name: 'kick', size: 4 } }).pass).toBe(
      true
    );
    expect(evaluateAssertion(CONTEXT, { op: 'eq', actual: '$.steps[0].ok', expected: 1 }).pass).toBe(false);
    expect(evaluateAssertion(CONTEXT, { op: 'ne', actual: '$.result.name', expected: 'snare' }).pass).toBe(true);
  });

  it('treats in_range bounds as inclusive', () => {
    const atMax = evaluateAssertion({ v: 5 }, { op: 'in_range', actual: '$.v', min: 0, max: 5 });
    expect(atMax.pass).toBe(true);
    expect(atMax.expected).toEqual({ min: 0, max: 5 });

    const above = evaluateAssertion({ v: 5.0001 }, { op: 'in_range', actual: '$.v', min: 0, max: 5 });
    expect(above.pass).toBe(false);
    expect(above.error).toBeNull();
  });

  it('flags non-numeric ordering operands as type_mismatch', () => {
    const outcome = evaluateAssertion(CONTEXT, { op: 'gt', actual: '$.result.name', expected: 1 });
    expect(outcome.pass).toBe(false);
    expect(outcome.error).toBe('type_mismatch');
  });

  it('checks approx against its tolerance', () => {
    const close = evaluateAssertion({}, { op: 'approx', actual: 1.05, expected: 1, tolerance: 0.1 });
    expect(close.pass).toBe(true);
    expect(close.details).toEqual({ tolerance: 0.1 });
    expect(evaluateAssertion({}, { op: 'approx', actual: 1.5, expected: 1, tolerance: 0.1 }).pass).toBe(false);
  });

  it('supports contains on lists and strings', () => {
    expect(evaluateAssertion(CONTEXT, { op: 'contains', actual: '$.calls', expected: 'play' }).pass).toBe(true);
    expect(evaluateAssertion(CONTEXT, { op: 'contains', actual: '$.steps[0].stdout', expected: 'world' }).pass).toBe(
      true
    );
    expect(evaluateAssertion(CONTEXT, { op: 'contains', actual: '$.result', expected: 'kick' }).error).toBe(
      'type_mismatch'
    );
  });

  it('lists missing keys for has_keys', () => {
    const outcome = evaluateAssertion(CONTEXT, { op: 'has_keys', actual: '$.result', expected: ['name', 'color'] });
    expect(outcome.pass).toBe(false);
    expect(outcome.details).toEqual({ missing: ['color'] });
  });

  it('matches regex patterns in multiline mode', () => {
    expect(evaluateAssertion(CONTEXT, { op: 'matches', actual: '$.steps[0].stdout', pattern: '^bye$' }).pass).toBe(true);
    expect(evaluateAssertion(CONTEXT, { op: 'not_matches', actual: '$.steps[0].stdout', expected: 'error' }).pass).toBe(
      true
    );
  });

  it('reports an invalid regex as an exception', () => {
    const outcome = evaluateAssertion(CONTEXT, { op: 'matches', actual: 'abc', pattern: '(' });
    expect(outcome.pass).toBe(false);
    expect(outcome.error).toBe('exception');
  });

  it('accepts call_order as an ordered subsequence', () => {
    expect(evaluateAssertion(CONTEXT, { op: 'call_order', actual: '$.calls', expected: ['init', 'play'] }).pass).toBe(
      true
    );
    expect(evaluateAssertion(CONTEXT, { op: 'call_order', actual: '$.calls', expected: ['play', 'init'] }).pass).toBe(
      false
    );
    expect(isOrderedSubsequence(['a', 'b', 'a'], ['a', 'a'])).toBe(true);
    expect(isOrderedSubsequence(['a', 'b'], ['a', 'a'])).toBe(false);
    expect(isOrderedSubsequence([], [])).toBe(true);
  });

  it('resolves file_exists relative to the given cwd', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cdd-assert-'));
    try {
      await fs.writeFile(path.join(dir, 'present.txt'), 'x', 'utf8');
      expect(evaluateAssertion({}, { op: 'file_exists', actual: 'present.txt' }, { cwd: dir }).pass).toBe(true);
      expect(
        evaluateAssertion({}, { op: 'file_exists', actual: 'absent.txt', expected: false }, { cwd: dir }).pass
      ).toBe(true);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('surfaces resolver and operator errors without throwing', () => {
    expect(evaluateAssertion(CONTEXT, { op: 'eq', actual: '$.calls.x', expected: 1 }).error).toBe('type_mismatch');
    expect(evaluateAssertion(CONTEXT, { op: 'eq', actual: '$.calls[', expected: 1 }).error).toBe('invalid_path');
    expect(evaluateAssertion(CONTEXT, { op: 'bogus', actual: 1, expected: 1 }).error).toBe('unknown_op');
  });

  it('evaluates every assertion and keeps custom messages', () => {
    const results = runAssertions(CONTEXT, [
      { op: 'eq', actual: 1, expected: 2, message: 'one is not two' },
      { op: 'eq', actual: 2, expected: 2 }
    ]);
    expect(results.map((r) => r.pass)).toEqual([false, true]);
    expect(toAssertionRecord(results[0])).toEqual({
      op: 'eq',
      actual: 1,
      expected: 2,
      pass: false,
      error: null,
      details: {},
      message: 'one is not two'
    });
    expect(toAssertionRecord(results[1])).not.toHaveProperty('message');
  });
});
