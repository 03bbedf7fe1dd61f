import fs from 'node:fs';
import path from 'node:path';
import { isDeepStrictEqual } from 'node:util';

import type { AssertionErrorCode, AssertionRecord } from '../contracts.js';
import { isPathQuery, resolvePath } from '../path/resolve.js';

/** One assertion as declared under a test's `assert:` list. */
export interface AssertionSpec {
  op: string;
  actual?: unknown;
  expected?: unknown;
  pattern?: unknown;
  min?: unknown;
  max?: unknown;
  tolerance?: unknown;
  message?: string;
}

export interface AssertionResult {
  op: string;
  actual: unknown;
  expected: unknown;
  pass: boolean;
  error: AssertionErrorCode | null;
  message: string | null;
  details: Record<string, unknown>;
}

export interface EvaluateOptions {
  /** Base directory for relative `file_exists` paths (defaults to the process cwd). */
  cwd?: string;
}

type Operator = (input: OperatorInput) => AssertionResult;

interface OperatorInput {
  op: string;
  actual: unknown;
  expected: unknown;
  pattern: unknown;
  spec: AssertionSpec;
  options: EvaluateOptions;
}

function result(
  op: string,
  actual: unknown,
  expected: unknown,
  pass: boolean,
  extra: { error?: AssertionErrorCode; details?: Record<string, unknown> } = {}
): AssertionResult {
  return {
    op,
    actual,
    expected,
    pass,
    error: extra.error ?? null,
    message: null,
    details: extra.details ?? {}
  };
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !Number.isNaN(value);
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export function structurallyEqual(a: unknown, b: unknown): boolean {
  return isDeepStrictEqual(a, b);
}

function numeric(compare: (a: number, e: number) => boolean): Operator {
  return ({ op, actual, expected }) => {
    if (!isNumber(actual) || !isNumber(expected)) {
      return result(op, actual, expected, false, { error: 'type_mismatch' });
    }
    return result(op, actual, expected, compare(actual, expected));
  };
}

function regexOperand(pattern: unknown, expected: unknown): unknown {
  return pattern !== undefined && pattern !== null && pattern !== '' ? pattern : expected;
}

function regexOperator(wantMatch: boolean): Operator {
  return ({ op, actual, expected, pattern }) => {
    const pat = regexOperand(pattern, expected);
    if (typeof actual !== 'string' || typeof pat !== 'string') {
      return result(op, actual, pat, false, { error: 'type_mismatch' });
    }
    const found = new RegExp(pat, 'm').test(actual);
    return result(op, actual, pat, found === wantMatch);
  };
}

/**
 * Greedy left-to-right subsequence scan: each wanted item must appear after the
 * previous one, and the cursor never moves backwards.
 */
export function isOrderedSubsequence(actual: readonly string[], expected: readonly string[]): boolean {
  let pos = 0;
  for (const want of expected) {
    while (pos < actual.length && actual[pos] !== want) pos += 1;
    if (pos >= actual.length) return false;
    pos += 1;
  }
  return true;
}

const OPERATORS: Record<string, Operator> = {
  eq: ({ op, actual, expected }) => result(op, actual, expected, structurallyEqual(actual, expected)),
  ne: ({ op, actual, expected }) => result(op, actual, expected, !structurallyEqual(actual, expected)),
  lt: numeric((a, e) => a < e),
  lte: numeric((a, e) => a <= e),
  gt: numeric((a, e) => a > e),
  gte: numeric((a, e) => a >= e),

  in_range: ({ op, actual, spec }) => {
    const bounds = { min: spec.min ?? null, max: spec.max ?? null };
    if (!isNumber(actual) || !isNumber(spec.min) || !isNumber(spec.max)) {
      return result(op, actual, bounds, false, { error: 'type_mismatch' });
    }
    return result(op, actual, bounds, spec.min <= actual && actual <= spec.max);
  },

  approx: ({ op, actual, expected, spec }) => {
    const tolerance = spec.tolerance ?? null;
    if (!isNumber(actual) || !isNumber(expected) || !isNumber(tolerance)) {
      return result(op, actual, expected, false, { error: 'type_mismatch', details: { tolerance } });
    }
    return result(op, actual, expected, Math.abs(actual - expected) <= tolerance, { details: { tolerance } });
  },

  contains: ({ op, actual, expected }) => {
    if (Array.isArray(actual)) {
      return result(op, actual, expected, actual.some((item) => structurallyEqual(item, expected)));
    }
    if (typeof actual === 'string' && typeof expected === 'string') {
      return result(op, actual, expected, actual.includes(expected));
    }
    return result(op, actual, expected, false, { error: 'type_mismatch' });
  },

  has_keys: ({ op, actual, expected }) => {
    if (!isMapping(actual) || !isStringList(expected)) {
      return result(op, actual, expected, false, { error: 'type_mismatch' });
    }
    const missing = expected.filter((key) => !Object.prototype.hasOwnProperty.call(actual, key));
    return result(op, actual, expected, missing.length === 0, missing.length > 0 ? { details: { missing } } : {});
  },

  matches: regexOperator(true),
  not_matches: regexOperator(false),

  file_exists: ({ op, actual, expected, options }) => {
    const want = expected ?? true;
    if (typeof actual !== 'string' || typeof want !== 'boolean') {
      return result(op, actual, want, false, { error: 'type_mismatch' });
    }
    const target = path.resolve(options.cwd ?? process.cwd(), actual);
    return result(op, actual, want, fs.existsSync(target) === want);
  },

  call_order: ({ op, actual, expected }) => {
    if (!isStringList(actual) || !isStringList(expected)) {
      return result(op, actual, expected, false, { error: 'type_mismatch' });
    }
    return result(op, actual, expected, isOrderedSubsequence(actual, expected));
  }
};

export const SUPPORTED_OPERATORS: readonly string[] = Object.keys(OPERATORS);

type Operand = { value: unknown; error: AssertionErrorCode | null };

function evalOperand(context: unknown, expr: unknown): Operand {
  if (isPathQuery(expr)) {
    const resolved = resolvePath(context, expr);
    return resolved.ok ? { value: resolved.value, error: null } : { value: null, error: resolved.error };
  }
  return { value: expr === undefined ? null : expr, error: null };
}

export function evaluateAssertion(
  context: unknown,
  spec: AssertionSpec,
  options: EvaluateOptions = {}
): AssertionResult {
  const op = spec.op;
  const message = spec.message ?? null;
  const actual = evalOperand(context, spec.actual);
  const expected = evalOperand(context, spec.expected);
  const pattern = spec.pattern === undefined ? { value: undefined, error: null } : evalOperand(context, spec.pattern);

  if (actual.error) return { ...result(op, null, expected.value, false, { error: actual.error }), message };
  if (expected.error) return { ...result(op, actual.value, null, false, { error: expected.error }), message };
  if (pattern.error) return { ...result(op, actual.value, pattern.value, false, { error: pattern.error }), message };

  const operator = Object.prototype.hasOwnProperty.call(OPERATORS, op) ? OPERATORS[op] : undefined;
  if (!operator) {
    return { ...result(op, actual.value, expected.value, false, { error: 'unknown_op' }), message };
  }

  try {
    const outcome = operator({
      op,
      actual: actual.value,
      expected: expected.value,
      pattern: pattern.value,
      spec,
      options
    });
    return { ...outcome, message };
  } catch (err) {
    return {
      ...result(op, actual.value, expected.value, false, {
        error: 'exception',
        details: { exception: err instanceof Error ? err.message : String(err) }
      }),
      message
    };
  }
}

/** Evaluates every assertion; one failure never stops the rest. */
export function runAssertions(
  context: unknown,
  specs: readonly AssertionSpec[],
  options: EvaluateOptions = {}
): AssertionResult[] {
  return specs.map((spec) => evaluateAssertion(context, spec, options));
}

export function toAssertionRecord(assertion: AssertionResult): AssertionRecord {
  const record: AssertionRecord = {
    op: assertion.op,
    actual: assertion.actual,
    expected: assertion.expected,
    pass: assertion.pass,
    error: assertion.error,
    details: assertion.details
  };
  if (assertion.message) record.message = assertion.message;
  return record;
}
