import fs from 'node:fs';
import fsp from 'node:fs/promises';
import path from 'node:path';

import { PROJECT_CONTRACT_FILE, isRecord, readYamlDocument } from '../contract/load.js';
import { interpolateVars } from '../path/interpolate.js';
import { expandFiles, hasGlobMagic } from '../util/glob.js';

export interface MissingPath {
  path: string;
  suggestion: string | null;
}

export interface ContractPathResult {
  contract: string;
  contract_path: string;
  ok: boolean;
  passed: string[];
  failed: MissingPath[];
  total: number;
}

export interface PathVerificationReport {
  ok: boolean;
  contracts_checked: number;
  total_paths: number;
  passed_paths: number;
  failed_paths: number;
  results: ContractPathResult[];
}

/**
 * A shell argument counts as a path when it has a separator, is not a URL or
 * a flag, and either carries an extension or starts with `./` / `../`.
 */
export function looksLikePath(value: unknown): value is string {
  if (typeof value !== 'string') return false;
  if (!value.includes('/') && !value.includes('\\')) return false;
  if (value.startsWith('http://') || value.startsWith('https://')) return false;
  if (value.startsWith('-')) return false;
  return /\.\w+$/.test(value) || value.startsWith('../') || value.startsWith('./');
}

function listOf(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/** Paths from `files` fields and path-like shell arguments, in document order. */
export function extractFilePaths(doc: Record<string, unknown>): string[] {
  const out: string[] = [];
  for (const test of listOf(doc.tests)) {
    if (!isRecord(test)) continue;

    if (typeof test.files === 'string') out.push(test.files);
    for (const file of listOf(test.files)) {
      if (typeof file === 'string') out.push(file);
    }

    for (const step of listOf(test.steps)) {
      if (!isRecord(step)) continue;
      for (const arg of listOf(step.command)) {
        if (looksLikePath(arg)) out.push(arg);
      }
    }
  }
  return out;
}

/** First existing variant of `relPath` among `../x`, `x` without a leading `../`, and `../../x`. */
export function suggestFix(relPath: string, contractDir: string): string | null {
  const candidates = [`../${relPath}`];
  if (relPath.startsWith('../')) candidates.push(relPath.slice(3));
  candidates.push(`../../${relPath}`);

  for (const candidate of candidates) {
    if (fs.existsSync(path.join(contractDir, candidate))) return candidate;
  }
  return null;
}

async function pathExists(relPath: string, contractDir: string, vars: Record<string, unknown>): Promise<boolean> {
  if (hasGlobMagic(relPath)) {
    return (await expandFiles(relPath, contractDir, vars)).length > 0;
  }
  return fs.existsSync(path.resolve(contractDir, interpolateVars(relPath, vars)));
}

export async function verifyContractPaths(contractPath: string): Promise<ContractPathResult> {
  const absolute = path.resolve(contractPath);
  const contractDir = path.dirname(absolute);
  const doc = await readYamlDocument(absolute);
  const vars = isRecord(doc.vars) ? doc.vars : {};

  const unique = [...new Set(extractFilePaths(doc))];
  const passed: string[] = [];
  const failed: MissingPath[] = [];

  for (const relPath of unique) {
    if (await pathExists(relPath, contractDir, vars)) {
      passed.push(relPath);
    } else {
      failed.push({ path: relPath, suggestion: suggestFix(relPath, contractDir) });
    }
  }

  return {
    contract: typeof doc.contract === 'string' ? doc.contract : path.parse(absolute).name,
    contract_path: contractPath,
    ok: failed.length === 0,
    passed,
    failed,
    total: unique.length
  };
}

/** Checks one contract file, or every non-project `*.yaml` directly inside a directory. */
export async function verifyPaths(contractsPath: string): Promise<PathVerificationReport> {
  const stat = await fsp.stat(contractsPath);
  let contractFiles: string[];
  if (stat.isFile()) {
    contractFiles = [contractsPath];
  } else {
    const names = (await fsp.readdir(contractsPath)).filter(
      (name) => name.endsWith('.yaml') && name !== PROJECT_CONTRACT_FILE
    );
    contractFiles = names.sort().map((name) => path.join(contractsPath, name));
  }

  const results: ContractPathResult[] = [];
  for (const file of contractFiles) {
    results.push(await verifyContractPaths(file));
  }

  const passedPaths = results.reduce((sum, result) => sum + result.passed.length, 0);
  const failedPaths = results.reduce((sum, result) => sum + result.failed.length, 0);
  return {
    ok: failedPaths === 0,
    contracts_checked: contractFiles.length,
    total_paths: passedPaths + failedPaths,
    passed_paths: passedPaths,
    failed_paths: failedPaths,
    results
  };
}
