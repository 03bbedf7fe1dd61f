import fs from 'node:fs/promises';
import path from 'node:path';
import YAML from 'yaml';

import type { AssertionSpec } from '../assertions/evaluate.js';
import { ContractError, errorMessage } from '../errors.js';
import type { RunnerConfig, StepSpec } from '../executors/types.js';

export const PROJECT_CONTRACT_FILE = 'project.yaml';
export const SPEC_VERSION_SIDECAR = '.cdd-version';
export const DEFAULT_EXECUTOR = 'node';
export const DEFAULT_TIMEOUT_MS = 30_000;

const KNOWN_RUNNER_KEYS = new Set(['executor', 'entry', 'symbol', 'parser', 'env', 'timeout_ms']);

export interface ProjectContract {
  kind: 'project';
  path: string;
  project: string | null;
  version: string | null;
  status: string | null;
  goal: string | null;
  successCriteria: unknown;
  components: string[];
  cddSpec: string | null;
  raw: Record<string, unknown>;
}

export interface Requirement {
  id: string;
  priority: string | null;
  description: string | null;
  acceptanceCriteria: unknown;
}

export type StepEntry = { kind: 'step'; step: StepSpec } | { kind: 'invalid'; message: string };

export interface TestSpec {
  id: string;
  name: string;
  requirement: string | null;
  type: string | null;
  /** True when the document declares a non-empty `steps` value of any shape. */
  declaresSteps: boolean;
  steps: StepEntry[];
  assert: AssertionSpec[];
  files: string[] | null;
  raw: Record<string, unknown>;
}

export type TestEntry = { kind: 'test'; test: TestSpec } | { kind: 'invalid'; id: string; message: string };

export interface ComponentContract {
  kind: 'component';
  path: string;
  name: string;
  version: string | null;
  status: string | null;
  description: string | null;
  runner: RunnerConfig;
  timeoutMs: number;
  vars: Record<string, unknown>;
  requirements: Requirement[];
  tests: TestEntry[];
  raw: Record<string, unknown>;
}

export type ContractDocument = ProjectContract | ComponentContract;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

export function readString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ContractError('CONTRACT_INVALID', `${field} must be a non-empty string`, { field, value });
  }
  return value.trim();
}

export function readOptionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  return readString(value, field);
}

export function readInteger(value: unknown, field: string, options: { min?: number; max?: number } = {}): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || !Number.isInteger(value)) {
    throw new ContractError('CONTRACT_INVALID', `${field} must be an integer`, { field, value });
  }
  if (options.min !== undefined && value < options.min) {
    throw new ContractError('CONTRACT_INVALID', `${field} must be >= ${options.min}`, { field, value });
  }
  if (options.max !== undefined && value > options.max) {
    throw new ContractError('CONTRACT_INVALID', `${field} must be <= ${options.max}`, { field, value });
  }
  return value;
}

/** Versions are often written unquoted in YAML (`version: 1.0`), so numbers are accepted. */
function readVersionish(value: unknown): string | null {
  if (typeof value === 'string') return value.trim() || null;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

function optionalText(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function readStringMap(value: unknown, field: string): Record<string, string> {
  if (!isRecord(value)) {
    throw new ContractError('CONTRACT_INVALID', `${field} must be a mapping`, { field });
  }
  const out: Record<string, string> = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item === 'string' || typeof item === 'number' || typeof item === 'boolean') {
      out[key] = String(item);
      continue;
    }
    throw new ContractError('CONTRACT_INVALID', `${field}.${key} must be a scalar`, { field: `${field}.${key}` });
  }
  return out;
}

export async function readYamlDocument(filePath: string): Promise<Record<string, unknown>> {
  const absolute = path.resolve(filePath);

  let raw: string;
  try {
    raw = await fs.readFile(absolute, 'utf8');
  } catch (err) {
    throw new ContractError('CONTRACT_PARSE_ERROR', `Failed to read contract: ${absolute}`, {
      path: absolute,
      error: errorMessage(err)
    });
  }

  return parseYamlDocument(raw, absolute);
}

export function parseYamlDocument(raw: string, filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    throw new ContractError('CONTRACT_PARSE_ERROR', `Failed to parse contract: ${filePath}`, {
      path: filePath,
      error: errorMessage(err)
    });
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ContractError('CONTRACT_PARSE_ERROR', `${filePath} must parse to a mapping`, { path: filePath });
  }
  return parsed;
}

export function parseProjectContract(doc: Record<string, unknown>, filePath: string): ProjectContract {
  return {
    kind: 'project',
    path: filePath,
    project: optionalText(doc.project),
    version: readVersionish(doc.version),
    status: optionalText(doc.status),
    goal: optionalText(doc.goal),
    successCriteria: doc.success_criteria ?? null,
    components: Array.isArray(doc.components)
      ? doc.components.filter((item): item is string => typeof item === 'string')
      : [],
    cddSpec: readVersionish(doc.cdd_spec),
    raw: doc
  };
}

function parseRunner(value: unknown): RunnerConfig {
  if (value === undefined || value === null) return { executor: DEFAULT_EXECUTOR };
  if (!isRecord(value)) {
    throw new ContractError('CONTRACT_INVALID', 'runner must be a mapping', { field: 'runner' });
  }

  const config: RunnerConfig = {
    executor: readOptionalString(value.executor, 'runner.executor') ?? DEFAULT_EXECUTOR
  };
  for (const [key, item] of Object.entries(value)) {
    if (!KNOWN_RUNNER_KEYS.has(key)) config[key] = item;
  }
  const entry = readOptionalString(value.entry, 'runner.entry');
  const symbol = readOptionalString(value.symbol, 'runner.symbol');
  const parser = readOptionalString(value.parser, 'runner.parser');
  if (entry !== undefined) config.entry = entry;
  if (symbol !== undefined) config.symbol = symbol;
  if (parser !== undefined) config.parser = parser;
  if (value.env !== undefined && value.env !== null) config.env = readStringMap(value.env, 'runner.env');
  if (value.timeout_ms !== undefined) config.timeout_ms = readInteger(value.timeout_ms, 'runner.timeout_ms', { min: 1 });
  return config;
}

function parseRequirements(value: unknown): Requirement[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).flatMap((entry) => {
    const id = readVersionish(entry.id);
    if (id === null) return [];
    return [
      {
        id,
        priority: readVersionish(entry.priority),
        description: optionalText(entry.description),
        acceptanceCriteria: entry.acceptance_criteria ?? null
      }
    ];
  });
}

function parseStep(value: unknown): StepEntry {
  if (!isRecord(value)) return { kind: 'invalid', message: 'step must be an object' };

  const step: StepSpec = {
    action: typeof value.action === 'string' ? value.action : '',
    with: isRecord(value.with) ? value.with : {},
    warmup: value.warmup === true
  };

  if (typeof value.save_as === 'string' && value.save_as.length > 0) step.saveAs = value.save_as;
  if (typeof value.method === 'string' && value.method.length > 0) step.method = value.method;
  if (value.command !== undefined && value.command !== null) step.command = value.command;

  if (value.n !== undefined && value.n !== null) {
    if (typeof value.n !== 'number' || !Number.isInteger(value.n)) {
      return { kind: 'invalid', message: 'step n must be an integer' };
    }
    step.n = value.n;
  }

  if (value.seconds !== undefined && value.seconds !== null) {
    if (typeof value.seconds !== 'number' || !Number.isFinite(value.seconds)) {
      return { kind: 'invalid', message: 'step seconds must be a number' };
    }
    step.seconds = value.seconds;
  }

  return { kind: 'step', step };
}

function parseSteps(value: unknown): { declaresSteps: boolean; steps: StepEntry[] } {
  if (value === undefined || value === null) return { declaresSteps: false, steps: [] };
  if (!Array.isArray(value)) {
    const empty = isRecord(value) && Object.keys(value).length === 0;
    return { declaresSteps: !empty, steps: empty ? [] : [{ kind: 'invalid', message: 'steps must be a list' }] };
  }
  return { declaresSteps: value.length > 0, steps: value.map(parseStep) };
}

function parseAssertion(value: unknown): AssertionSpec {
  if (!isRecord(value)) return { op: '' };
  const spec: AssertionSpec = { op: typeof value.op === 'string' ? value.op : '' };
  for (const key of ['actual', 'expected', 'pattern', 'min', 'max', 'tolerance'] as const) {
    if (Object.prototype.hasOwnProperty.call(value, key)) spec[key] = value[key];
  }
  if (typeof value.message === 'string' && value.message.length > 0) spec.message = value.message;
  return spec;
}

function parseFiles(value: unknown): string[] | null {
  if (typeof value === 'string') return value.trim() ? [value] : null;
  if (Array.isArray(value)) {
    const files = value.filter((item): item is string => typeof item === 'string' && item.trim().length > 0);
    return files.length > 0 ? files : null;
  }
  return null;
}

function parseTest(value: unknown): TestEntry {
  if (!isRecord(value)) return { kind: 'invalid', id: 'UNKNOWN', message: 'test entry must be an object' };

  const { declaresSteps, steps } = parseSteps(value.steps);
  return {
    kind: 'test',
    test: {
      id: readVersionish(value.id) ?? '',
      name: optionalText(value.name) ?? '',
      requirement: readVersionish(value.requirement),
      type: optionalText(value.type),
      declaresSteps,
      steps,
      assert: Array.isArray(value.assert) ? value.assert.map(parseAssertion) : [],
      files: parseFiles(value.files),
      raw: value
    }
  };
}

function parseTests(value: unknown): TestEntry[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) return [{ kind: 'invalid', id: 'INVALID', message: 'tests must be a list' }];
  return value.map(parseTest);
}

export function parseComponentContract(doc: Record<string, unknown>, filePath: string): ComponentContract {
  const runner = parseRunner(doc.runner);

  let vars: Record<string, unknown> = {};
  if (doc.vars !== undefined && doc.vars !== null) {
    if (!isRecord(doc.vars)) {
      throw new ContractError('CONTRACT_INVALID', 'vars must be a mapping', { field: 'vars', path: filePath });
    }
    vars = { ...doc.vars };
  }

  return {
    kind: 'component',
    path: filePath,
    name: optionalText(doc.contract) ?? path.parse(filePath).name,
    version: readVersionish(doc.version),
    status: optionalText(doc.status),
    description: optionalText(doc.description),
    runner,
    timeoutMs: runner.timeout_ms ?? DEFAULT_TIMEOUT_MS,
    vars,
    requirements: parseRequirements(doc.requirements),
    tests: parseTests(doc.tests),
    raw: doc
  };
}

export function isProjectDocument(doc: Record<string, unknown>): boolean {
  return doc.project !== undefined && doc.contract === undefined;
}

export async function loadComponentContract(filePath: string): Promise<ComponentContract> {
  const absolute = path.resolve(filePath);
  return parseComponentContract(await readYamlDocument(absolute), absolute);
}

export async function loadProjectContract(filePath: string): Promise<ProjectContract> {
  const absolute = path.resolve(filePath);
  return parseProjectContract(await readYamlDocument(absolute), absolute);
}

/** Sorted, recursive list of `*.yaml` files under `dir`, skipping hidden entries. */
export async function listYamlFiles(dir: string): Promise<string[]> {
  const out: string[] = [];

  async function walkDir(current: string): Promise<void> {
    const entries = await fs.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walkDir(full);
        continue;
      }
      if (entry.isFile() && entry.name.endsWith('.yaml')) out.push(full);
    }
  }

  await walkDir(path.resolve(dir));
  return out.sort();
}

export async function readSpecVersionSidecar(projectRoot: string): Promise<string | null> {
  try {
    const text = await fs.readFile(path.join(projectRoot, SPEC_VERSION_SIDECAR), 'utf8');
    return text.trim() || null;
  } catch {
    return null;
  }
}
