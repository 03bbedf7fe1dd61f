import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { errorMessage } from '../errors.js';
import { elapsedMs, observedDurationMs } from '../util/time.js';
import { stepFailure, stepResult } from './types.js';
import type { Executor, RunContext, RunnerConfig, StepResult, StepSpec } from './types.js';

type CallTarget = (args: Record<string, unknown>) => unknown;

interface Captured<T> {
  outcome: { ok: true; value: T } | { ok: false; error: unknown };
  stdout: string;
  stderr: string;
}

export interface CallNValue {
  n: number;
  durations_ms: number[];
  min_ms?: number;
  max_ms?: number;
  mean_ms?: number;
  p50_ms?: number;
  p95_ms?: number;
  p99_ms?: number;
}

function isCallTarget(value: unknown): value is CallTarget {
  return typeof value === 'function';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function isCallback(value: unknown): value is () => void {
  return typeof value === 'function';
}

function chunkText(chunk: unknown): string {
  if (typeof chunk === 'string') return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk).toString('utf8');
  return String(chunk);
}

/**
 * Runs `fn` with `process.stdout.write` / `process.stderr.write` redirected into
 * buffers. Only direct stream writes are seen; a test runner that swaps out
 * `console` may route console output elsewhere.
 */
async function captureOutput<T>(fn: () => Promise<T>): Promise<Captured<T>> {
  const originalOut = process.stdout.write;
  const originalErr = process.stderr.write;
  let stdout = '';
  let stderr = '';

  process.stdout.write = (chunk: unknown, ...rest: unknown[]): boolean => {
    stdout += chunkText(chunk);
    rest.find(isCallback)?.();
    return true;
  };
  process.stderr.write = (chunk: unknown, ...rest: unknown[]): boolean => {
    stderr += chunkText(chunk);
    rest.find(isCallback)?.();
    return true;
  };

  try {
    const value = await fn();
    return { outcome: { ok: true, value }, stdout, stderr };
  } catch (err) {
    return { outcome: { ok: false, error: err }, stdout, stderr };
  } finally {
    process.stdout.write = originalOut;
    process.stderr.write = originalErr;
  }
}

export function percentile(sorted: readonly number[], fraction: number, minSamples: number): number {
  if (sorted.length === 0) return 0;
  if (sorted.length < minSamples) return sorted[sorted.length - 1];
  return sorted[Math.floor(sorted.length * fraction)];
}

export function summarizeDurations(durations: number[]): CallNValue {
  const n = durations.length;
  if (n === 0) return { n, durations_ms: [] };
  const sorted = [...durations].sort((a, b) => a - b);
  return {
    n,
    durations_ms: durations,
    min_ms: sorted[0],
    max_ms: sorted[n - 1],
    mean_ms: durations.reduce((sum, d) => sum + d, 0) / n,
    p50_ms: sorted[Math.floor(n / 2)],
    p95_ms: percentile(sorted, 0.95, 20),
    p99_ms: percentile(sorted, 0.99, 100)
  };
}

/**
 * In-process executor: imports `runner.entry` (relative to the contract
 * directory) once per contract and calls the exported symbol with the step's
 * `with` map as its single argument. Promises are awaited.
 */
export class NodeExecutor implements Executor {
  readonly name = 'node';
  private module: Record<string, unknown> | null = null;
  private symbol: string | null = null;

  supports(action: string): boolean {
    return action === 'call' || action === 'call_n';
  }

  async setup(ctx: RunContext, runnerConfig: RunnerConfig): Promise<void> {
    if (!runnerConfig.entry) {
      throw new Error('node executor requires runner.entry');
    }
    const entryPath = path.resolve(ctx.workDir, runnerConfig.entry);
    if (!fs.existsSync(entryPath)) {
      throw new Error(`Entry file not found: ${entryPath}`);
    }

    const loaded: unknown = await import(pathToFileURL(entryPath).href);
    if (!isRecord(loaded)) {
      throw new Error(`Entry did not load as a module: ${entryPath}`);
    }
    this.module = loaded;
    this.symbol = runnerConfig.symbol ?? null;
  }

  async executeStep(
    _ctx: RunContext,
    _runnerConfig: RunnerConfig,
    _testId: string,
    step: StepSpec,
    _timeoutMs: number
  ): Promise<StepResult> {
    if (step.action === 'call') return this.call(step);
    if (step.action === 'call_n') return this.callN(step);
    return stepFailure('unsupported_action', `Unknown action: ${step.action}`);
  }

  async teardown(): Promise<void> {
    this.module = null;
    this.symbol = null;
  }

  private resolveTarget(step: StepSpec): { ok: true; target: CallTarget } | { ok: false; result: StepResult } {
    const symbol = step.method ?? this.symbol;
    if (!symbol) {
      return { ok: false, result: stepFailure('symbol_not_found', 'No call target: set runner.symbol or step.method') };
    }
    const target = this.module?.[symbol];
    if (!isCallTarget(target)) {
      return { ok: false, result: stepFailure('symbol_not_found', `Symbol not found: ${symbol}`) };
    }
    return { ok: true, target };
  }

  private async call(step: StepSpec): Promise<StepResult> {
    const resolved = this.resolveTarget(step);
    if (!resolved.ok) return resolved.result;

    const startNs = process.hrtime.bigint();
    const captured = await captureOutput(async () => resolved.target(step.with));
    const durationMs = observedDurationMs(startNs);
    const { stdout, stderr } = captured;

    if (!captured.outcome.ok) {
      return stepFailure('exception', errorMessage(captured.outcome.error), { stdout, stderr });
    }

    const returned = captured.outcome.value;
    if (isRecord(returned) && Object.prototype.hasOwnProperty.call(returned, 'ok')) {
      return stepResult({
        ok: Boolean(returned.ok),
        value: returned.value ?? null,
        errorCode: typeof returned.error_code === 'string' ? returned.error_code : null,
        message: typeof returned.message === 'string' ? returned.message : null,
        meta: { duration_ms: durationMs, ...(isRecord(returned.meta) ? returned.meta : {}) },
        stdout,
        stderr
      });
    }

    return stepResult({ ok: true, value: returned, meta: { duration_ms: durationMs }, stdout, stderr });
  }

  private async callN(step: StepSpec): Promise<StepResult> {
    const n = step.n ?? 1;
    if (n < 1) {
      return stepFailure('type_mismatch', 'call_n requires n >= 1', { value: { n, durations_ms: [] } });
    }

    const resolved = this.resolveTarget(step);
    if (!resolved.ok) return resolved.result;

    const durations: number[] = [];
    let firstError: { code: string; message: string } | null = null;

    for (let i = 0; i < n; i += 1) {
      const startNs = process.hrtime.bigint();
      const captured = await captureOutput(async () => resolved.target(step.with));
      if (captured.outcome.ok) {
        durations.push(elapsedMs(startNs));
      } else if (firstError === null) {
        firstError = { code: 'exception', message: errorMessage(captured.outcome.error) };
      }
    }

    if (durations.length === 0) {
      return stepFailure(firstError?.code ?? 'exception', firstError?.message ?? 'All iterations failed', {
        value: { n, durations_ms: [] }
      });
    }

    const value = { ...summarizeDurations(durations), n };
    return stepResult({
      ok: true,
      value,
      errorCode: firstError?.code ?? null,
      message: firstError?.message ?? null
    });
  }
}
