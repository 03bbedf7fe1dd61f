import fs from 'node:fs';
import type { Stats } from 'node:fs';
import fsp from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';

import { runAssertions, toAssertionRecord } from '../assertions/evaluate.js';
import type { AssertionResult } from '../assertions/evaluate.js';
import {
  TOOL_VERSION,
  schemaVersionFor,
  summarizeResults,
  type StepResultRecord,
  type TestReport,
  type TestResultRecord
} from '../contracts.js';
import {
  PROJECT_CONTRACT_FILE,
  listYamlFiles,
  loadComponentContract,
  loadProjectContract,
  readSpecVersionSidecar,
  type ComponentContract,
  type ProjectContract,
  type StepEntry,
  type TestSpec
} from '../contract/load.js';
import { ContractError, errorMessage } from '../errors.js';
import { ExecutorRegistry, createDefaultRegistry } from '../executors/registry.js';
import { runStaticFileTest } from '../executors/static.js';
import { stepFailure, stepResult, toStepResultRecord } from '../executors/types.js';
import type { Executor, RunContext, StaticAnalysis, StepResult } from '../executors/types.js';
import { sha1Hex } from '../util/hash.js';
import { silentOutput, type Output } from '../util/output.js';
import { nowIso, observedDurationMs } from '../util/time.js';
import { checkSpecVersion } from './spec-version.js';

export interface RunnerOptions {
  registry?: ExecutorRegistry;
  artifactsRoot?: string;
  requireExactSpec?: boolean;
  failFast?: boolean;
  toolVersion?: string;
  /** Freezes `started_at` and file-scan durations so reports compare byte for byte. */
  deterministic?: boolean;
  output?: Output;
}

export interface RunOptions {
  vars?: Record<string, unknown>;
  /** When non-empty, only these test ids run; the rest are neither executed nor reported. */
  only?: readonly string[];
}

interface ResolvedRunnerOptions {
  registry: ExecutorRegistry;
  artifactsRoot: string;
  requireExactSpec: boolean;
  failFast: boolean;
  toolVersion: string;
  deterministic: boolean;
  output: Output;
}

interface ContractLayout {
  /** Path used for the run id and report naming. */
  projectPath: string;
  project: ProjectContract | null;
  repoRoot: string;
  contractFiles: string[];
}

function testError(id: string, message: string, requirement: string | null = null): TestResultRecord {
  return {
    id,
    name: '',
    requirement,
    type: null,
    status: 'error',
    message,
    assertions: [],
    steps: []
  };
}

function skippedResult(test: Pick<TestSpec, 'id' | 'name' | 'requirement' | 'type'>): TestResultRecord {
  return {
    id: test.id,
    name: test.name,
    requirement: test.requirement,
    type: test.type,
    status: 'skipped',
    message: 'Skipped: fail-fast stopped this contract',
    assertions: [],
    steps: []
  };
}

export function statusFromAssertions(results: readonly AssertionResult[]): Pick<TestResultRecord, 'status' | 'message'> {
  const firstError = results.find((result) => result.error !== null);
  if (firstError) return { status: 'error', message: `Assertion error: ${firstError.error}` };
  if (results.some((result) => !result.pass)) return { status: 'fail', message: 'One or more assertions failed' };
  return { status: 'pass', message: 'All assertions passed' };
}

function osFamily(): string {
  if (process.platform === 'linux') return 'linux';
  if (process.platform === 'darwin') return 'darwin';
  if (process.platform === 'win32') return 'windows';
  return 'unknown';
}

export function environmentFacts(): Record<string, unknown> {
  const [major, minor, patch] = process.versions.node.split('.').map((part) => Number.parseInt(part, 10));
  return {
    os: `${os.type()}-${os.release()}-${os.arch()}`,
    os_family: osFamily(),
    node_major: major,
    node_minor: minor,
    node_patch: patch
  };
}

/**
 * Top-level orchestrator: spec-version gate, then every component contract in
 * order, one executor instance per contract.
 */
export class ContractRunner {
  private readonly options: ResolvedRunnerOptions;

  constructor(options: RunnerOptions = {}) {
    this.options = {
      registry: options.registry ?? createDefaultRegistry(),
      artifactsRoot: options.artifactsRoot ?? 'artifacts',
      requireExactSpec: options.requireExactSpec ?? false,
      failFast: options.failFast ?? false,
      toolVersion: options.toolVersion ?? TOOL_VERSION,
      deterministic: options.deterministic ?? false,
      output: options.output ?? silentOutput
    };
  }

  async run(contractsPath: string, runOptions: RunOptions = {}): Promise<TestReport> {
    const { toolVersion, deterministic, output } = this.options;
    const injected = { ...(runOptions.vars ?? {}) };
    const only = [...(runOptions.only ?? [])];

    const layout = await this.resolveLayout(contractsPath);
    const projectSpec = layout.project?.cddSpec ?? (await readSpecVersionSidecar(layout.repoRoot));
    const startedAt = nowIso(deterministic);
    const runId = `run_${sha1Hex(layout.projectPath + startedAt).slice(0, 10)}`;
    const runArtifacts = path.join(this.options.artifactsRoot, runId);
    const check = checkSpecVersion(projectSpec, toolVersion, this.options.requireExactSpec);

    for (const warning of check.warnings) output.warn(`${warning.code}: ${warning.message}`);

    const base = {
      schema_version: schemaVersionFor(toolVersion),
      report_type: 'single' as const,
      run_id: runId,
      tool_version: toolVersion,
      project_spec: projectSpec,
      started_at: startedAt,
      warnings: check.warnings,
      artifacts_dir: runArtifacts
    };

    if (check.errors.length > 0) {
      for (const error of check.errors) output.error(`${error.code}: ${error.message}`);
      const results = [testError('VERSION', check.errors[0].message)];
      return { ...base, contract: 'project', errors: check.errors, summary: summarizeResults(results), results };
    }

    await fsp.mkdir(runArtifacts, { recursive: true });

    const results: TestResultRecord[] = [];
    for (const contractFile of layout.contractFiles) {
      output.debug(`contract: ${contractFile}`);
      results.push(...(await this.runContractFile(contractFile, runArtifacts, runId, projectSpec, injected, only)));
    }

    return {
      ...base,
      contract: layout.project?.project ?? 'unknown',
      errors: [],
      summary: summarizeResults(results),
      results
    };
  }

  private async resolveLayout(contractsPath: string): Promise<ContractLayout> {
    const target = path.resolve(contractsPath);
    let stat: Stats;
    try {
      stat = await fsp.stat(target);
    } catch (err) {
      throw new ContractError('CONTRACT_PARSE_ERROR', `Contracts path not found: ${target}`, {
        path: target,
        error: errorMessage(err)
      });
    }

    const contractsDir = stat.isDirectory() ? target : path.dirname(target);
    const projectFile = path.join(contractsDir, PROJECT_CONTRACT_FILE);
    const project = fs.existsSync(projectFile) ? await loadProjectContract(projectFile) : null;
    const repoRoot = path.dirname(contractsDir);

    const runsWholeDir = stat.isDirectory() || path.basename(target) === PROJECT_CONTRACT_FILE;
    const candidates = runsWholeDir ? await listYamlFiles(contractsDir) : [target];

    return {
      projectPath: project ? projectFile : target,
      project,
      repoRoot,
      contractFiles: candidates.filter((file) => path.basename(file) !== PROJECT_CONTRACT_FILE)
    };
  }

  private buildContext(
    contract: ComponentContract,
    artifactsDir: string,
    runId: string,
    projectSpec: string | null,
    injected: Record<string, unknown>
  ): RunContext {
    return {
      artifactsDir,
      workDir: path.dirname(contract.path),
      // Contract vars are applied last and win on collision.
      vars: { ...injected, ...contract.vars },
      env: environmentFacts(),
      runner: {
        tool_version: this.options.toolVersion,
        require_exact_spec: this.options.requireExactSpec,
        fail_fast: this.options.failFast,
        run_id: runId
      },
      contract: {
        contract: contract.name,
        version: contract.version,
        status: contract.status,
        path: contract.path,
        project_spec: projectSpec
      }
    };
  }

  private async runContractFile(
    contractFile: string,
    runArtifacts: string,
    runId: string,
    projectSpec: string | null,
    injected: Record<string, unknown>,
    only: readonly string[]
  ): Promise<TestResultRecord[]> {
    let contract: ComponentContract;
    try {
      contract = await loadComponentContract(contractFile);
    } catch (err) {
      this.options.output.error(`${contractFile}: ${errorMessage(err)}`);
      return [testError('CONTRACT', `Failed to load ${contractFile}: ${errorMessage(err)}`)];
    }

    const ctx = this.buildContext(contract, path.join(runArtifacts, contract.name), runId, projectSpec, injected);
    await fsp.mkdir(ctx.artifactsDir, { recursive: true });

    let executor: Executor;
    try {
      executor = this.options.registry.create(contract.runner.executor);
    } catch (err) {
      return [testError('EXECUTOR', `Unknown executor '${contract.runner.executor}': ${errorMessage(err)}`)];
    }

    let ast: StaticAnalysis | null = null;
    try {
      await executor.setup(ctx, contract.runner);
      if (executor.analyze) ast = await executor.analyze(ctx, contract.runner, contract.path);
    } catch (err) {
      return [testError('EXECUTOR', `Executor setup failed: ${errorMessage(err)}`)];
    }

    const results: TestResultRecord[] = [];
    try {
      let stopped = false;
      for (const entry of contract.tests) {
        const id = entry.kind === 'test' ? entry.test.id : entry.id;
        if (only.length > 0 && !only.includes(id)) continue;
        if (stopped) {
          results.push(skippedResult(entry.kind === 'test' ? entry.test : { id, name: '', requirement: null, type: null }));
          continue;
        }

        if (entry.kind === 'invalid') {
          results.push(testError(entry.id, entry.message));
          if (this.options.failFast) stopped = true;
          continue;
        }

        const test = entry.test;
        const result = await this.runTest(ctx, contract, executor, ast, test);
        results.push(result);
        if (this.options.failFast && (result.status === 'fail' || result.status === 'error')) stopped = true;
      }
    } finally {
      try {
        await executor.teardown(ctx, contract.runner);
      } catch (err) {
        results.push(testError('TEARDOWN', `Executor teardown failed: ${errorMessage(err)}`));
      }
    }

    return results;
  }

  private async runTest(
    ctx: RunContext,
    contract: ComponentContract,
    executor: Executor,
    ast: StaticAnalysis | null,
    test: TestSpec
  ): Promise<TestResultRecord> {
    if (test.type === 'static' && test.files) {
      return this.runFileScanTest(ctx, test);
    }

    if (ast !== null && test.declaresSteps) {
      return testError(test.id, 'Static tests must have no steps', test.requirement);
    }

    const { steps, saved } = await this.executeSteps(ctx, contract, executor, test);
    const context: Record<string, unknown> = {
      vars: ctx.vars,
      env: ctx.env,
      runner: ctx.runner,
      contract: ctx.contract,
      steps,
      ast,
      ...saved
    };
    const assertions = runAssertions(context, test.assert, { cwd: ctx.workDir });

    return {
      id: test.id,
      name: test.name,
      requirement: test.requirement,
      type: test.type,
      ...statusFromAssertions(assertions),
      assertions: assertions.map(toAssertionRecord),
      steps
    };
  }

  private async runFileScanTest(ctx: RunContext, test: TestSpec): Promise<TestResultRecord> {
    const startNs = process.hrtime.bigint();
    const scan = await runStaticFileTest(test.files ?? [], test.assert, ctx.workDir, ctx.vars);
    const assertions = scan.assertions.map(toAssertionRecord);

    let message = scan.error ?? `Scanned ${scan.filesScanned} files`;
    if (scan.status === 'fail') message = `${assertions.length} failures in ${scan.filesScanned} files`;

    return {
      id: test.id,
      name: test.name,
      requirement: test.requirement,
      type: 'static',
      status: scan.status,
      message,
      assertions,
      steps: [],
      duration_ms: this.options.deterministic ? 0 : observedDurationMs(startNs),
      files_scanned: scan.filesScanned
    };
  }

  private async executeSteps(
    ctx: RunContext,
    contract: ComponentContract,
    executor: Executor,
    test: TestSpec
  ): Promise<{ steps: StepResultRecord[]; saved: Record<string, StepResultRecord> }> {
    const steps: StepResultRecord[] = [];
    const saved: Record<string, StepResultRecord> = {};

    for (const entry of test.steps) {
      const result = await this.executeStep(ctx, contract, executor, test.id, entry);
      const record = toStepResultRecord(result);
      steps.push(record);
      if (entry.kind === 'step' && entry.step.saveAs && !entry.step.warmup) {
        saved[entry.step.saveAs] = record;
      }
    }

    return { steps, saved };
  }

  private async executeStep(
    ctx: RunContext,
    contract: ComponentContract,
    executor: Executor,
    testId: string,
    entry: StepEntry
  ): Promise<StepResult> {
    if (entry.kind === 'invalid') return stepFailure('type_mismatch', entry.message);

    const step = entry.step;
    const startNs = process.hrtime.bigint();

    if (step.action === 'wait') {
      const seconds = step.seconds ?? 0;
      await sleep(Math.max(0, seconds) * 1000);
      return stepResult({ ok: true, meta: { wait_s: seconds, duration_ms: observedDurationMs(startNs) } });
    }

    let result: StepResult;
    if (!executor.supports(step.action)) {
      result = stepFailure('unsupported_action', `Action not supported: ${step.action}`);
    } else {
      try {
        result = await executor.executeStep(ctx, contract.runner, testId, step, contract.timeoutMs);
      } catch (err) {
        result = stepFailure('exception', errorMessage(err));
      }
    }

    if (result.meta.duration_ms === undefined) {
      result = { ...result, meta: { ...result.meta, duration_ms: observedDurationMs(startNs) } };
    }
    return result;
  }
}
