import fs from 'node:fs/promises';
import path from 'node:path';

import type { AssertionResult, AssertionSpec } from '../assertions/evaluate.js';
import type { TestStatus } from '../contracts.js';
import { errorMessage } from '../errors.js';
import { interpolateVars } from '../path/interpolate.js';
import { expandFiles } from '../util/glob.js';
import { stepFailure } from './types.js';
import type { Executor, RunContext, RunnerConfig, StaticAnalysis, StepResult } from './types.js';

const SNIPPET_LIMIT = 200;

export interface StaticFileTestResult {
  status: Extract<TestStatus, 'pass' | 'fail' | 'error'>;
  /** Failures only; a passing scan reports none. */
  assertions: AssertionResult[];
  filesScanned: number;
  error: string | null;
}

function failure(
  spec: AssertionSpec,
  fields: Pick<AssertionResult, 'actual' | 'expected'> & Partial<Pick<AssertionResult, 'error' | 'details'>>
): AssertionResult {
  return {
    op: spec.op,
    actual: fields.actual,
    expected: fields.expected,
    pass: false,
    error: fields.error ?? null,
    message: spec.message ?? null,
    details: fields.details ?? {}
  };
}

function scanPattern(spec: AssertionSpec): unknown {
  return spec.pattern !== undefined && spec.pattern !== null && spec.pattern !== '' ? spec.pattern : spec.expected;
}

function compile(pattern: unknown, flags: string): RegExp | string {
  if (typeof pattern !== 'string') return 'pattern must be a string';
  try {
    return new RegExp(pattern, flags);
  } catch (err) {
    return errorMessage(err);
  }
}

/**
 * Runs `matches` / `not_matches` against raw file text and returns failures
 * only. `not_matches` reports every hit with its 1-based line and column.
 */
export function scanFileAssertions(filePath: string, content: string, specs: readonly AssertionSpec[]): AssertionResult[] {
  const results: AssertionResult[] = [];
  const lines = content.split(/\r\n|\r|\n/);

  for (const spec of specs) {
    if (spec.op !== 'matches' && spec.op !== 'not_matches') {
      results.push(failure(spec, { actual: null, expected: null, error: 'unknown_op', details: { file: filePath } }));
      continue;
    }

    const pattern = scanPattern(spec);
    const regex = compile(pattern, spec.op === 'not_matches' ? 'gm' : 'm');
    if (typeof regex === 'string') {
      results.push(
        failure(spec, {
          actual: null,
          expected: pattern ?? null,
          error: typeof pattern === 'string' ? 'exception' : 'type_mismatch',
          details: { file: filePath, exception: regex }
        })
      );
      continue;
    }

    if (spec.op === 'matches') {
      if (!regex.test(content)) {
        results.push(failure(spec, { actual: null, expected: `match for /${String(pattern)}/`, details: { file: filePath } }));
      }
      continue;
    }

    for (const match of content.matchAll(regex)) {
      const start = match.index ?? 0;
      const lineNumber = content.slice(0, start).split('\n').length;
      const lineStart = content.lastIndexOf('\n', start - 1) + 1;
      const snippet = (lines[lineNumber - 1] ?? '').slice(0, SNIPPET_LIMIT).trim();
      results.push(
        failure(spec, {
          actual: match[0],
          expected: `no match for /${String(pattern)}/`,
          details: {
            file: filePath,
            line: lineNumber,
            col: start - lineStart + 1,
            match: match[0],
            snippet
          }
        })
      );
    }
  }

  return results;
}

/** File-scan test: expands `files` relative to `baseDir` and scans each match. */
export async function runStaticFileTest(
  files: readonly string[],
  specs: readonly AssertionSpec[],
  baseDir: string,
  vars: Record<string, unknown>
): Promise<StaticFileTestResult> {
  const paths = await expandFiles(files, baseDir, vars);

  if (paths.length === 0) {
    const shown = interpolateVars([...files], vars);
    return {
      status: 'error',
      assertions: [],
      filesScanned: 0,
      error: `No files matched: ${shown.length === 1 ? shown[0] : shown.join(', ')}`
    };
  }

  const failures: AssertionResult[] = [];
  for (const filePath of paths) {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (err) {
      failures.push({
        op: 'read',
        actual: filePath,
        expected: 'readable file',
        pass: false,
        error: 'exception',
        message: null,
        details: { file: filePath, exception: errorMessage(err) }
      });
      continue;
    }
    failures.push(...scanFileAssertions(filePath, content, specs));
  }

  const hasError = failures.some((item) => item.error !== null);
  return {
    status: hasError ? 'error' : failures.length > 0 ? 'fail' : 'pass',
    assertions: failures,
    filesScanned: paths.length,
    error: hasError ? `Scan error: ${failures.find((item) => item.error !== null)?.error}` : null
  };
}

/**
 * Step-free executor. Contracts on it verify through `$.ast` assertions or
 * `type: static` file-scan tests.
 */
export class StaticExecutor implements Executor {
  readonly name = 'static';

  supports(): boolean {
    return false;
  }

  async setup(): Promise<void> {}

  async executeStep(): Promise<StepResult> {
    return stepFailure(
      'static_no_steps',
      'Static executor does not execute steps; use assertions against $.ast or type: static tests'
    );
  }

  async teardown(): Promise<void> {}

  async analyze(_ctx: RunContext, runnerConfig: RunnerConfig, contractPath: string): Promise<StaticAnalysis> {
    return {
      schema_version: '1.0',
      calls: [],
      bus_reads: {},
      imports: [],
      definitions: [],
      parse_errors: [],
      parser: runnerConfig.parser ?? null,
      source_included: false,
      contract_file: path.resolve(contractPath)
    };
  }
}
