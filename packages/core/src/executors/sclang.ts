import fs from 'node:fs/promises';

import { runShellStep } from './shell.js';
import { stepFailure } from './types.js';
import type { Executor, RunContext, RunnerConfig, StepResult, StepSpec } from './types.js';

export interface RenderNrtValue {
  wav_path: string | null;
  hash: string | null;
  metrics: {
    rms_db: number | null;
    peak_dbfs: number | null;
    dc_offset: number | null;
  };
}

/**
 * SuperCollider non-realtime render executor. `render_nrt` keeps its result
 * shape but is not implemented yet; `shell` steps run exactly as on the shell
 * executor.
 */
export class SclangExecutor implements Executor {
  readonly name = 'sclang';

  supports(action: string): boolean {
    return action === 'render_nrt' || action === 'shell';
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
    if (step.action === 'render_nrt') return this.renderNrt(step);
    if (step.action === 'shell') return runShellStep(ctx, runnerConfig, step, timeoutMs);
    return stepFailure('unsupported_action', `Unknown action: ${step.action}`);
  }

  async teardown(): Promise<void> {}

  private renderNrt(step: StepSpec): StepResult {
    const synthdef = step.with.synthdef ?? 'unknown';
    const durS = step.with.dur_s ?? 1.0;
    const value: RenderNrtValue = {
      wav_path: null,
      hash: null,
      metrics: { rms_db: null, peak_dbfs: null, dc_offset: null }
    };
    return stepFailure('not_implemented', `sclang render_nrt not yet implemented (synthdef=${String(synthdef)}, dur=${String(durS)}s)`, {
      value
    });
  }
}
