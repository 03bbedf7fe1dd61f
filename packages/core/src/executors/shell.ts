import fs from 'node:fs/promises';
import { spawn, type ChildProcess } from 'node:child_process';

import { interpolateVars } from '../path/interpolate.js';
import { observedDurationMs } from '../util/time.js';
import { stepFailure, stepResult } from './types.js';
import type { Executor, RunContext, RunnerConfig, StepResult, StepSpec } from './types.js';

function contextString(value: unknown): string {
  return typeof value === 'string' ? value : value === undefined || value === null ? '' : String(value);
}

/** Normalizes a step's `command` into an argv vector; null when nothing runnable was declared. */
export function commandVector(command: unknown): string[] | null {
  if (typeof command === 'string') return command.trim() ? [command] : null;
  if (!Array.isArray(command) || command.length === 0) return null;
  return command.map((part) => contextString(part));
}

function killProcessTree(child: ChildProcess): void {
  if (child.pid === undefined || process.platform === 'win32') {
    child.kill('SIGKILL');
    return;
  }
  try {
    process.kill(-child.pid, 'SIGKILL');
  } catch {
    // ESRCH: the group is gone but the direct child may still be exiting.
    child.kill('SIGKILL');
  }
}

/**
 * Runs `command` argv directly (no shell) in the contract directory with the
 * step timeout. Output is always returned, whatever the outcome.
 */
export async function runShellStep(
  ctx: RunContext,
  runnerConfig: RunnerConfig,
  step: StepSpec,
  timeoutMs: number
): Promise<StepResult> {
  const declared = commandVector(step.command);
  if (!declared) {
    return stepFailure('missing_command', "shell action requires 'command' field");
  }

  const [file, ...args] = interpolateVars(declared, ctx.vars);
  const env: NodeJS.ProcessEnv = {
    ...process.env,
    ...(runnerConfig.env ?? {}),
    CONTRACT: contextString(ctx.contract.contract),
    RUN_ID: contextString(ctx.runner.run_id),
    ARTIFACTS_DIR: ctx.artifactsDir
  };

  const startNs = process.hrtime.bigint();

  return new Promise<StepResult>((resolve) => {
    const child = spawn(file, args, {
      cwd: ctx.workDir,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
      // Own process group, so a timeout also reaches the command's subprocesses.
      detached: process.platform !== 'win32'
    });

    let timedOut = false;
    let stdout = '';
    let stderr = '';
    let settled = false;

    const settle = (fields: Omit<Parameters<typeof stepResult>[0], 'stdout' | 'stderr' | 'meta'>) => {
      if (settled) return;
      settled = true;
      resolve(stepResult({ ...fields, meta: { duration_ms: observedDurationMs(startNs) }, stdout, stderr }));
    };

    const timer = setTimeout(() => {
      timedOut = true;
      killProcessTree(child);
      // Subprocesses that inherited the pipes would otherwise hold 'close' back.
      child.stdout?.destroy();
      child.stderr?.destroy();
      settle({ ok: false, errorCode: 'timeout', message: `Command timed out after ${timeoutMs}ms` });
    }, timeoutMs);

    child.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString('utf8');
    });

    child.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString('utf8');
    });

    child.on('error', (err) => {
      clearTimeout(timer);
      settle({ ok: false, errorCode: 'exception', message: err.message });
    });

    child.on('close', (code) => {
      clearTimeout(timer);

      if (timedOut) return;

      const returncode = code ?? -1;
      settle({
        ok: returncode === 0,
        value: { returncode },
        errorCode: returncode === 0 ? null : 'nonzero_exit',
        message: returncode === 0 ? null : `Exit code: ${returncode}`
      });
    });
  });
}

export class ShellExecutor implements Executor {
  readonly name = 'shell';

  supports(action: string): boolean {
    return action === 'shell';
  }

  async setup(ctx: RunContext): Promise<void> {
    await fs.mkdir(ctx.artifactsDir, { recursive: true });
  }

  async executeStep(
    ctx: RunContext,
    runnerConfig: RunnerConfig,
    _testId: string,
    step: StepSpec,
    timeoutMs: number
  ): Promise<StepResult> {
    if (step.action !== 'shell') {
      return stepFailure('unsupported_action', `shell executor only handles 'shell', got: ${step.action}`);
    }
    return runShellStep(ctx, runnerConfig, step, timeoutMs);
  }

  async teardown(): Promise<void> {}
}
