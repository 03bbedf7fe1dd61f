import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';

import { ExecutorRegistryError } from '../src/errors.js';
import { NodeExecutor, percentile, summarizeDurations } from '../src/executors/node.js';
import { ExecutorRegistry, createDefaultRegistry } from '../src/executors/registry.js';
import { SclangExecutor } from '../src/executors/sclang.js';
import { ShellExecutor, commandVector } from '../src/executors/shell.js';
import { StaticExecutor } from '../src/executors/static.js';
import { toStepResultRecord } from '../src/executors/types.js';
import type { RunContext, RunnerConfig, StepSpec } from '../src/executors/types.js';

const FIXTURES = fileURLToPath(new URL('./fixtures', import.meta.url));

function context(workDir: string, overrides: Partial<RunContext> = {}): RunContext {
  return {
    artifactsDir: path.join(workDir, 'artifacts'),
    workDir,
    vars: {},
    env: {},
    runner: { run_id: 'run_test' },
    contract: { contract: 'drums' },
    ...overrides
  };
}

function step(fields: Partial<StepSpec> & { action: string }): StepSpec {
  return { with: {}, warmup: false, ...fields };
}

async function nodeExecutor(runner: RunnerConfig = { executor: 'node', entry: 'drums.mjs', symbol: 'play' }) {
  const executor = new NodeExecutor();
  await executor.setup(context(FIXTURES), runner);
  return executor;
}

describe('node executor', () => {
  const runner: RunnerConfig = { executor: 'node', entry: 'drums.mjs', symbol: 'play' };

  it('calls the configured symbol with the step arguments and captures stdout', async () => {
    const executor = await nodeExecutor();
    const result = await executor.executeStep(
      context(FIXTURES),
      runner,
      'T1',
      step({ action: 'call', with: { sound: 'kick' } }),
      1000
    );

    expect(result.ok).toBe(true);
    expect(result.value).toEqual({ sound: 'kick', velocity: 100 });
    expect(result.stdout).toBe('playing kick\n');
    expect(typeof result.meta.duration_ms).toBe('number');
  });

  it('awaits promises and honours step.method', async () => {
    const executor = await nodeExecutor();
    const result = await executor.executeStep(
      context(FIXTURES),
      runner,
      'T1',
      step({ action: 'call', method: 'tempo', with: { bpm: 90 } }),
      1000
    );
    expect(result.ok).toBe(true);
    expect(result.value).toBe(180);
  });

  it('passes envelope-shaped returns through', async () => {
    const executor = await nodeExecutor();
    const result = await executor.executeStep(context(FIXTURES), runner, 'T1', step({ action: 'call', method: 'envelope' }), 1000);
    expect(result.ok).toBe(false);
    expect(result.errorCode).toBe('bad_input');
    expect(result.message).toBe('velocity out of range');
  });

  it('captures stderr', async () => {
    const executor = await nodeExecutor();
    const result = await executor.executeStep(context(FIXTURES), runner, 'T1', step({ action: 'call', method: 'warn' }), 1000);
    expect(result.value).toBe('done');
    expect(result.stderr).toBe('clipping\n');
  });

  it('turns thrown errors into exception results', async () => {
    const executor = await nodeExecutor();
    const result = await executor.executeStep(context(FIXTURES), runner, 'T1', step({ action: 'call', method: 'boom' }), 1000);
    expect(result.ok).toBe(false);
    expect(result.errorCode).toBe('exception');
    expect(result.message).toBe('kaboom');
  });

  it('reports missing and non-callable symbols', async () => {
    const executor = await nodeExecutor();
    const missing = await executor.executeStep(context(FIXTURES), runner, 'T1', step({ action: 'call', method: 'nope' }), 1000);
    expect(missing.errorCode).toBe('symbol_not_found');
    expect(missing.message).toBe('Symbol not found: nope');

    const notCallable = await executor.executeStep(
      context(FIXTURES),
      runner,
      'T1',
      step({ action: 'call', method: 'notCallable' }),
      1000
    );
    expect(notCallable.errorCode).toBe('symbol_not_found');

    const bare = await nodeExecutor({ executor: 'node', entry: 'drums.mjs' });
    const noTarget = await bare.executeStep(context(FIXTURES), runner, 'T1', step({ action: 'call' }), 1000);
    expect(noTarget.message).toBe('No call target: set runner.symbol or step.method');
  });

  it('times call_n iterations and summarizes them', async () => {
    const executor = await nodeExecutor();
    const result = await executor.executeStep(
      context(FIXTURES),
      runner,
      'T1',
      step({ action: 'call_n', method: 'tempo', n: 3 }),
      1000
    );
    expect(result.ok).toBe(true);
    const record = toStepResultRecord(result);
    expect(record.value).toMatchObject({ n: 3 });
    expect(result.value).toHaveProperty('durations_ms');
    expect(result.value).toHaveProperty('p95_ms');
  });

  it('keeps call_n ok when only some iterations fail', async () => {
    const executor = await nodeExecutor();
    const result = await executor.executeStep(
      context(FIXTURES),
      runner,
      'T1',
      step({ action: 'call_n', method: 'flaky', n: 3 }),
      1000
    );
    expect(result.ok).toBe(true);
    expect(result.errorCode).toBe('exception');
    expect(result.message).toBe('first call fails');
    expect(result.value).toMatchObject({ n: 3 });
  });

  it('fails call_n when every iteration throws or n is below one', async () => {
    const executor = await nodeExecutor();
    const allFail = await executor.executeStep(
      context(FIXTURES),
      runner,
      'T1',
      step({ action: 'call_n', method: 'boom', n: 2 }),
      1000
    );
    expect(allFail.ok).toBe(false);
    expect(allFail.errorCode).toBe('exception');
    expect(allFail.value).toEqual({ n: 2, durations_ms: [] });

    const zero = await executor.executeStep(context(FIXTURES), runner, 'T1', step({ action: 'call_n', n: 0 }), 1000);
    expect(zero.errorCode).toBe('type_mismatch');
    expect(zero.message).toBe('call_n requires n >= 1');
  });

  it('refuses to set up without an existing entry', async () => {
    const executor = new NodeExecutor();
    await expect(executor.setup(context(FIXTURES), { executor: 'node' })).rejects.toThrowError(
      'node executor requires runner.entry'
    );
    await expect(executor.setup(context(FIXTURES), { executor: 'node', entry: 'missing.mjs' })).rejects.toThrowError(
      `Entry file not found: ${path.join(FIXTURES, 'missing.mjs')}`
    );
  });
});

describe('duration summaries', () => {
  it('falls back to the maximum below the sample thresholds', () => {
    const summary = summarizeDurations([3, 1, 2]);
    expect(summary).toEqual({
      n: 3,
      durations_ms: [3, 1, 2],
      min_ms: 1,
      max_ms: 3,
      mean_ms: 2,
      p50_ms: 2,
      p95_ms: 3,
      p99_ms: 3
    });
  });

  it('indexes percentiles once enough samples exist', () => {
    const sorted = Array.from({ length: 20 }, (_, i) => i + 1);
    expect(percentile(sorted, 0.95, 20)).toBe(20);
    expect(percentile(sorted, 0.5, 1)).toBe(11);
    expect(percentile([], 0.95, 20)).toBe(0);
  });
});

describe('shell executor', () => {
  it('normalizes command vectors', () => {
    expect(commandVector('ls')).toEqual(['ls']);
    expect(commandVector(['echo', 3])).toEqual(['echo', '3']);
    expect(commandVector([])).toBeNull();
    expect(commandVector(undefined)).toBeNull();
  });

  it('runs argv without a shell and exposes the run environment', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cdd-shell-'));
    try {
      const executor = new ShellExecutor();
      const ctx = context(dir, { vars: { word: 'hi' } });
      await executor.setup(ctx);

      const result = await executor.executeStep(
        ctx,
        { executor: 'shell', env: { EXTRA: 'x' } },
        'T1',
        step({
          action: 'shell',
          command: [
            process.execPath,
            '-e',
            'process.stdout.write([process.argv[1], process.env.CONTRACT, process.env.RUN_ID, process.env.EXTRA].join(","))',
            '{word}'
          ]
        }),
        10_000
      );

      expect(result.ok).toBe(true);
      expect(result.stdout).toBe('hi,drums,run_test,x');
      expect(result.value).toEqual({ returncode: 0 });
      await expect(fs.stat(ctx.artifactsDir)).resolves.toBeTruthy();
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('reports nonzero exits with their output', async () => {
    const executor = new ShellExecutor();
    const result = await executor.executeStep(
      context(os.tmpdir()),
      { executor: 'shell' },
      'T1',
      step({ action: 'shell', command: [process.execPath, '-e', 'process.stderr.write("bad"); process.exit(3)'] }),
      10_000
    );
    expect(result.ok).toBe(false);
    expect(result.errorCode).toBe('nonzero_exit');
    expect(result.message).toBe('Exit code: 3');
    expect(result.value).toEqual({ returncode: 3 });
    expect(result.stderr).toBe('bad');
  });

  it('kills commands that exceed the timeout', async () => {
    const executor = new ShellExecutor();
    const result = await executor.executeStep(
      context(os.tmpdir()),
      { executor: 'shell' },
      'T1',
      step({ action: 'shell', command: [process.execPath, '-e', 'setTimeout(() => {}, 10000)'] }),
      200
    );
    expect(result.errorCode).toBe('timeout');
    expect(result.message).toBe('Command timed out after 200ms');
  });

  it('returns at the timeout even when a subprocess holds the output pipes', async () => {
    const script = [
      "require('child_process').spawn(process.execPath, ['-e', 'setTimeout(() => {}, 4000)'], { stdio: 'inherit' });",
      'setTimeout(() => {}, 4000);'
    ].join(' ');
    const executor = new ShellExecutor();
    const started = Date.now();
    const result = await executor.executeStep(
      context(os.tmpdir()),
      { executor: 'shell' },
      'T1',
      step({ action: 'shell', command: [process.execPath, '-e', script] }),
      200
    );
    expect(Date.now() - started).toBeLessThan(1500);
    expect(result.ok).toBe(false);
    expect(result.errorCode).toBe('timeout');
    expect(result.message).toBe('Command timed out after 200ms');
  });

  it('reports spawn failures and missing commands', async () => {
    const executor = new ShellExecutor();
    const spawnFail = await executor.executeStep(
      context(os.tmpdir()),
      { executor: 'shell' },
      'T1',
      step({ action: 'shell', command: ['cdd-no-such-binary-for-tests'] }),
      1000
    );
    expect(spawnFail.errorCode).toBe('exception');

    const missing = await executor.executeStep(context(os.tmpdir()), { executor: 'shell' }, 'T1', step({ action: 'shell' }), 1000);
    expect(missing.errorCode).toBe('missing_command');
    expect(missing.message).toBe("shell action requires 'command' field");
  });
});

describe('static and sclang executors', () => {
  it('static executes no steps and produces a placeholder analysis', async () => {
    const executor = new StaticExecutor();
    expect(executor.supports()).toBe(false);
    const result = await executor.executeStep();
    expect(result.errorCode).toBe('static_no_steps');

    const ast = await executor.analyze(context(FIXTURES), { executor: 'static', parser: 'scd' }, 'contracts/x.yaml');
    expect(ast).toEqual({
      schema_version: '1.0',
      calls: [],
      bus_reads: {},
      imports: [],
      definitions: [],
      parse_errors: [],
      parser: 'scd',
      source_included: false,
      contract_file: path.resolve('contracts/x.yaml')
    });
  });

  it('sclang keeps the render_nrt result shape', async () => {
    const executor = new SclangExecutor();
    const result = await executor.executeStep(
      context(os.tmpdir()),
      { executor: 'sclang' },
      'T1',
      step({ action: 'render_nrt', with: { synthdef: 'kick', dur_s: 2 } }),
      1000
    );
    expect(result.ok).toBe(false);
    expect(result.errorCode).toBe('not_implemented');
    expect(result.message).toBe('sclang render_nrt not yet implemented (synthdef=kick, dur=2s)');
    expect(result.value).toEqual({ wav_path: null, hash: null, metrics: { rms_db: null, peak_dbfs: null, dc_offset: null } });
    expect(executor.supports('shell')).toBe(true);
    expect(executor.supports('call')).toBe(false);
  });
});

describe('executor registry', () => {
  it('registers the built-in executors', () => {
    const registry = createDefaultRegistry();
    expect(registry.available()).toEqual(['node', 'sclang', 'shell', 'static']);
    expect(registry.create('shell').name).toBe('shell');
    expect(registry.create('shell')).not.toBe(registry.create('shell'));
  });

  it('rejects duplicates and unknown names', () => {
    const registry = new ExecutorRegistry().register('shell', () => new ShellExecutor());
    expect(() => registry.register('shell', () => new ShellExecutor())).toThrowError(ExecutorRegistryError);

    try {
      registry.create('python');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ExecutorRegistryError);
      if (err instanceof ExecutorRegistryError) {
        expect(err.reason).toBe('EXECUTOR_UNKNOWN');
        expect(err.details).toEqual({ name: 'python', available: ['shell'] });
      }
    }
  });
});

describe('step result records', () => {
  it('parses integer stdout', () => {
    const base = { ok: true, value: null, errorCode: null, message: null, meta: {}, stderr: '', artifacts: [] };
    expect(toStepResultRecord({ ...base, stdout: ' 42\n' }).stdout_int).toBe(42);
    expect(toStepResultRecord({ ...base, stdout: '-7' }).stdout_int).toBe(-7);
    expect(toStepResultRecord({ ...base, stdout: '4.2' }).stdout_int).toBeNull();
  });
});
