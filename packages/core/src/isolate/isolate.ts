import { randomBytes } from 'node:crypto';
import fs from 'node:fs';
import fsp from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { isRecord, readYamlDocument } from '../contract/load.js';
import { reportHasFailures, type TestReport } from '../contracts.js';
import { IsolateError, IsolateExit, errorMessage, type IsolateExitCode } from '../errors.js';
import type { ExecutorRegistry } from '../executors/registry.js';
import { verifyPaths, type PathVerificationReport } from '../paths/verify.js';
import { ContractRunner } from '../runner/runner.js';
import { sha256Hex } from '../util/hash.js';
import { silentOutput, type Output } from '../util/output.js';
import { nowIso } from '../util/time.js';

export const MARKER_FILE = '.cdd-isolate-marker';
export const SANDBOX_CONTRACTS_DIR = 'contracts';

export interface IsolateOptions {
  /** Explicit project root; wins over detection. */
  project?: string;
  keep?: boolean;
  keepOnFail?: boolean;
  workDir?: string;
  verbose?: boolean;
  pathsOnly?: boolean;
  dryRun?: boolean;
  output?: Output;
  registry?: ExecutorRegistry;
  /** Parent of generated work directories; defaults to the OS temp dir. */
  tempRoot?: string;
}

/** Everything known before the filesystem is touched. */
export interface IsolatePlan {
  contractPath: string;
  contractName: string;
  projectRoot: string;
  workDir: string;
  linkRoots: string[];
}

export interface IsolateContext extends IsolatePlan {
  /** Empty until `setupWorkDir` has written the marker. */
  markerToken: string;
  verbose: boolean;
  dryRun: boolean;
  keep: boolean;
  keepOnFail: boolean;
  pathsOnly: boolean;
}

export interface IsolateResult {
  exitCode: IsolateExitCode;
  plan: IsolatePlan | null;
  error: string | null;
  paths: PathVerificationReport | null;
  report: TestReport | null;
  cleaned: boolean;
}

function isDir(target: string): boolean {
  try {
    return fs.statSync(target).isDirectory();
  } catch {
    return false;
  }
}

function realpathOrSelf(target: string): string {
  try {
    return fs.realpathSync(target);
  } catch {
    return path.resolve(target);
  }
}

/**
 * Walks up from the contract's directory. A directory holding `.cdd/` and
 * `contracts/` wins immediately; otherwise the nearest `.git/` + `contracts/`,
 * then the nearest `contracts/` + `src/`.
 */
export function detectProjectRoot(contractPath: string, explicitProject?: string): string | null {
  if (explicitProject) {
    const explicit = path.resolve(explicitProject);
    return isDir(explicit) ? realpathOrSelf(explicit) : null;
  }

  let gitMatch: string | null = null;
  let srcMatch: string | null = null;
  let current = path.dirname(realpathOrSelf(contractPath));

  while (current !== path.dirname(current)) {
    const hasContracts = isDir(path.join(current, 'contracts'));
    if (hasContracts && isDir(path.join(current, '.cdd'))) return current;
    if (hasContracts && gitMatch === null && isDir(path.join(current, '.git'))) gitMatch = current;
    else if (hasContracts && srcMatch === null && isDir(path.join(current, 'src'))) srcMatch = current;
    current = path.dirname(current);
  }

  return gitMatch ?? srcMatch;
}

function listOf(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/** File-like references: `files` globs, step `file` fields and shell arguments with a separator or a leading `..`. */
export function extractReferencedPaths(doc: Record<string, unknown>): Set<string> {
  const out = new Set<string>();
  for (const test of listOf(doc.tests)) {
    if (!isRecord(test)) continue;

    if (typeof test.files === 'string' && test.files) out.add(test.files);
    for (const file of listOf(test.files)) {
      if (typeof file === 'string') out.add(file);
    }

    for (const step of listOf(test.steps)) {
      if (!isRecord(step)) continue;
      if (typeof step.file === 'string') out.add(step.file);
      for (const arg of listOf(step.command)) {
        if (typeof arg === 'string' && (arg.includes('/') || arg.startsWith('..'))) out.add(arg);
      }
    }
  }
  return out;
}

/** Top-level project directories that `../` references escape into. */
export function computeLinkRoots(paths: Iterable<string>, projectRoot: string, contractDir: string): string[] {
  const roots = new Set<string>();
  for (const ref of paths) {
    if (!ref.startsWith('..')) continue;

    const resolved = path.resolve(contractDir, ref);
    const relative = path.relative(projectRoot, resolved);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new IsolateError(
        'ISOLATE_INVALID_PATH',
        `Path '${ref}' resolves outside project root.\n  Resolved: ${resolved}\n  Project:  ${projectRoot}\nConsider using --project to specify correct root.`,
        { path: ref, resolved, projectRoot }
      );
    }

    const [first] = relative.split(path.sep);
    if (first) roots.add(first);
  }
  return [...roots].sort();
}

export function computeWorkDir(contractPath: string, customWorkDir?: string, tempRoot: string = os.tmpdir()): string {
  if (customWorkDir) return path.resolve(customWorkDir);
  const hash = sha256Hex(path.resolve(contractPath)).slice(0, 8);
  return path.join(tempRoot, `cdd-isolate-${hash}-${process.pid}`);
}

/** Parses the contract and computes the sandbox layout. Writes nothing. */
export async function planIsolate(contractPath: string, options: IsolateOptions = {}): Promise<IsolatePlan> {
  const absolute = realpathOrSelf(path.resolve(contractPath));

  let doc: Record<string, unknown>;
  try {
    doc = await readYamlDocument(absolute);
  } catch (err) {
    throw new IsolateError('ISOLATE_PARSE_ERROR', `Contract parse error: ${errorMessage(err)}`, { path: absolute });
  }
  if (Object.prototype.hasOwnProperty.call(doc, 'extends')) {
    throw new IsolateError('ISOLATE_PARSE_ERROR', 'extends is not supported by cdd isolate', { path: absolute });
  }

  const projectRoot = detectProjectRoot(absolute, options.project);
  if (!projectRoot) {
    throw new IsolateError('ISOLATE_NO_PROJECT_ROOT', 'Could not detect project root. Use --project to specify.', {
      path: absolute
    });
  }

  const linkRoots = computeLinkRoots(extractReferencedPaths(doc), projectRoot, path.dirname(absolute));

  return {
    contractPath: absolute,
    contractName: typeof doc.contract === 'string' ? doc.contract : path.parse(absolute).name,
    projectRoot,
    workDir: computeWorkDir(absolute, options.workDir, options.tempRoot),
    linkRoots
  };
}

export async function readMarkerToken(workDir: string): Promise<string | null> {
  let content: string;
  try {
    content = await fsp.readFile(path.join(workDir, MARKER_FILE), 'utf8');
  } catch {
    return null;
  }
  for (const line of content.split(/\r?\n/)) {
    if (line.startsWith('token=')) return line.slice('token='.length);
  }
  return null;
}

/**
 * A work directory may only be deleted when it is not `/`, the home directory
 * or the project root, and its marker holds exactly the token from setup.
 */
export async function isSafeToCleanup(
  workDir: string,
  expectedToken: string,
  projectRoot: string,
  homeDir: string = os.homedir()
): Promise<boolean> {
  const resolved = realpathOrSelf(workDir);
  if (resolved === path.parse(resolved).root) return false;
  if (resolved === realpathOrSelf(homeDir) || resolved === realpathOrSelf(projectRoot)) return false;
  if (!expectedToken) return false;
  return (await readMarkerToken(workDir)) === expectedToken;
}

/** Creates the sandbox and returns the marker token written into it. */
export async function setupWorkDir(plan: IsolatePlan, options: Pick<IsolateOptions, 'verbose' | 'output'> = {}): Promise<string> {
  const output = options.output ?? silentOutput;
  const log = (line: string) => {
    if (options.verbose) output.info(`  ${line}`);
  };
  const { workDir } = plan;

  if (fs.existsSync(workDir)) {
    log(`rm -rf ${workDir}`);
    await fsp.rm(workDir, { recursive: true, force: true });
  }

  const contractsDir = path.join(workDir, SANDBOX_CONTRACTS_DIR);
  log(`mkdir -p ${contractsDir}`);
  await fsp.mkdir(contractsDir, { recursive: true });

  const markerPath = path.join(workDir, MARKER_FILE);
  log(`touch ${markerPath}`);
  const token = randomBytes(16).toString('hex');
  await fsp.writeFile(markerPath, `token=${token}\ncreated=${nowIso(false)}\npid=${process.pid}\n`, 'utf8');

  const dest = path.join(contractsDir, path.basename(plan.contractPath));
  log(`cp ${plan.contractPath} ${dest}`);
  await fsp.copyFile(plan.contractPath, dest);

  for (const linkRoot of plan.linkRoots) {
    const source = path.join(plan.projectRoot, linkRoot);
    const target = path.join(workDir, linkRoot);
    if (!isDir(source)) {
      throw new IsolateError('ISOLATE_SETUP_FAILED', `Link root '${linkRoot}' does not exist: ${source}`, {
        linkRoot,
        source
      });
    }
    log(`ln -s ${source} ${target}`);
    await fsp.symlink(source, target, 'dir');
  }

  return token;
}

/** Returns true when the sandbox was removed. Unsafe cleanups are skipped with a warning. */
export async function cleanupWorkDir(
  ctx: Pick<IsolateContext, 'workDir' | 'projectRoot' | 'markerToken' | 'keep' | 'keepOnFail' | 'verbose'>,
  exitCode: number,
  options: { output?: Output; homeDir?: string } = {}
): Promise<boolean> {
  const output = options.output ?? silentOutput;
  if (ctx.keep || (ctx.keepOnFail && exitCode !== 0)) return false;

  if (!(await isSafeToCleanup(ctx.workDir, ctx.markerToken, ctx.projectRoot, options.homeDir))) {
    output.warn(`Refusing to cleanup ${ctx.workDir} (safety check failed)`);
    return false;
  }

  if (ctx.verbose) output.info(`  rm -rf ${ctx.workDir}`);
  await fsp.rm(ctx.workDir, { recursive: true, force: true });
  return true;
}

/**
 * Plans, builds and runs a single contract inside a disposable sandbox, then
 * restores the working directory and cleans up.
 */
export async function runIsolate(contractPath: string, options: IsolateOptions = {}): Promise<IsolateResult> {
  const output = options.output ?? silentOutput;
  const result: IsolateResult = {
    exitCode: IsolateExit.SUCCESS,
    plan: null,
    error: null,
    paths: null,
    report: null,
    cleaned: false
  };

  let plan: IsolatePlan;
  try {
    plan = await planIsolate(contractPath, options);
  } catch (err) {
    if (err instanceof IsolateError) return { ...result, exitCode: err.exitCode, error: err.message };
    throw err;
  }
  result.plan = plan;
  if (options.dryRun) return result;

  const ctx: IsolateContext = {
    ...plan,
    markerToken: '',
    verbose: options.verbose ?? false,
    dryRun: false,
    keep: options.keep ?? false,
    keepOnFail: options.keepOnFail ?? false,
    pathsOnly: options.pathsOnly ?? false
  };

  try {
    ctx.markerToken = await setupWorkDir(ctx, { verbose: ctx.verbose, output });
  } catch (err) {
    const exitCode = err instanceof IsolateError ? err.exitCode : IsolateExit.INVALID_PATH;
    return { ...result, exitCode, error: `Error setting up work directory: ${errorMessage(err)}` };
  }

  const originalCwd = process.cwd();
  try {
    process.chdir(ctx.workDir);

    result.paths = await verifyPaths(SANDBOX_CONTRACTS_DIR);
    if (!result.paths.ok) {
      result.exitCode = IsolateExit.PATH_FAILURE;
    } else if (!ctx.pathsOnly) {
      const runner = new ContractRunner({ registry: options.registry, artifactsRoot: 'artifacts', output });
      result.report = await runner.run(SANDBOX_CONTRACTS_DIR);
      if (reportHasFailures(result.report)) result.exitCode = IsolateExit.TEST_FAILURE;
    }
  } catch (err) {
    result.exitCode = IsolateExit.TEST_FAILURE;
    result.error = `Error during execution: ${errorMessage(err)}`;
  } finally {
    process.chdir(originalCwd);
    result.cleaned = await cleanupWorkDir(ctx, result.exitCode, { output });
  }

  return result;
}
