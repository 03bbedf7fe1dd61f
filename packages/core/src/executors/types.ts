import type { StepResultRecord } from '../contracts.js';

export type ExecutorName = 'node' | 'shell' | 'static' | 'sclang';

/** Contract `runner:` block. Unknown keys are kept so executors can read their own settings. */
export interface RunnerConfig {
  executor: string;
  entry?: string;
  symbol?: string;
  parser?: string;
  env?: Record<string, string>;
  timeout_ms?: number;
  [key: string]: unknown;
}

/**
 * Per-contract execution environment, exposed to assertions as
 * `$.vars` / `$.env` / `$.runner` / `$.contract`.
 */
export interface RunContext {
  artifactsDir: string;
  /** Baseline cwd for executors: the contract's own directory. */
  workDir: string;
  vars: Record<string, unknown>;
  env: Record<string, unknown>;
  runner: Record<string, unknown>;
  contract: Record<string, unknown>;
}

export interface StepSpec {
  action: string;
  with: Record<string, unknown>;
  saveAs?: string;
  method?: string;
  n?: number;
  warmup: boolean;
  command?: unknown;
  seconds?: number;
}

export interface StepResult {
  ok: boolean;
  value: unknown;
  errorCode: string | null;
  message: string | null;
  meta: Record<string, unknown>;
  stdout: string;
  stderr: string;
  artifacts: Array<Record<string, unknown>>;
}

/** Placeholder structure produced by static analysis until parser plugins exist. */
export interface StaticAnalysis {
  schema_version: string;
  calls: unknown[];
  bus_reads: Record<string, unknown>;
  imports: unknown[];
  definitions: unknown[];
  parse_errors: unknown[];
  parser: string | null;
  source_included: boolean;
  contract_file: string;
}

/**
 * Capability interface every step executor implements.
 *
 * Executors may hold per-contract state between `setup` and `teardown`; the
 * runner creates a fresh instance for every contract.
 */
export interface Executor {
  readonly name: string;
  supports(action: string): boolean;
  setup(ctx: RunContext, runnerConfig: RunnerConfig): Promise<void>;
  executeStep(
    ctx: RunContext,
    runnerConfig: RunnerConfig,
    testId: string,
    step: StepSpec,
    timeoutMs: number
  ): Promise<StepResult>;
  teardown(ctx: RunContext, runnerConfig: RunnerConfig): Promise<void>;
  /**
   * Present on step-free executors. When defined, contracts using this executor
   * may not declare steps and assertions see the result under `$.ast`.
   */
  analyze?(ctx: RunContext, runnerConfig: RunnerConfig, contractPath: string): Promise<StaticAnalysis>;
}

export function stepResult(fields: Partial<StepResult> & { ok: boolean }): StepResult {
  return {
    ok: fields.ok,
    value: fields.value ?? null,
    errorCode: fields.errorCode ?? null,
    message: fields.message ?? null,
    meta: { ...(fields.meta ?? {}) },
    stdout: fields.stdout ?? '',
    stderr: fields.stderr ?? '',
    artifacts: [...(fields.artifacts ?? [])]
  };
}

export function stepFailure(errorCode: string, message: string, extra: Partial<StepResult> = {}): StepResult {
  return stepResult({ ...extra, ok: false, errorCode, message });
}

function parseStdoutInt(stdout: string): number | null {
  const trimmed = stdout.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return null;
  const parsed = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

export function toStepResultRecord(result: StepResult): StepResultRecord {
  return {
    ok: result.ok,
    value: result.value,
    error_code: result.errorCode,
    message: result.message,
    meta: result.meta,
    stdout: result.stdout,
    stdout_int: parseStdoutInt(result.stdout),
    stderr: result.stderr,
    artifacts: result.artifacts
  };
}
