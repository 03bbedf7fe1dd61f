import fs from 'node:fs/promises';
import YAML from 'yaml';

import { CONTRACT_STATUSES, type ContractStatus, type Issue } from '../contracts.js';
import { isRecord, listYamlFiles } from '../contract/load.js';
import { errorMessage } from '../errors.js';

export type LintCode =
  | 'path_not_found'
  | 'invalid_yaml'
  | 'yaml_parse_error'
  | 'unexpected_error'
  | 'unknown_contract_type'
  | 'missing_field'
  | 'invalid_status'
  | 'missing_cdd_spec'
  | 'invalid_runner'
  | 'missing_executor'
  | 'invalid_requirements'
  | 'invalid_requirement'
  | 'invalid_tests'
  | 'invalid_test'
  | 'uncovered_requirement'
  | 'unlinked_test';

export interface LintIssue extends Issue<LintCode> {
  file: string;
}

export interface LintReport {
  ok: boolean;
  errors: LintIssue[];
  warnings: LintIssue[];
  contracts_checked: number;
}

const PROJECT_FIELDS = ['project', 'version', 'status', 'goal', 'success_criteria', 'components'] as const;
const COMPONENT_FIELDS = ['contract', 'version', 'status', 'description', 'runner', 'requirements', 'tests'] as const;
const REQUIREMENT_FIELDS = ['id', 'priority', 'description', 'acceptance_criteria'] as const;
const TEST_FIELDS = ['id', 'name', 'type', 'assert'] as const;

class IssueSink {
  readonly errors: LintIssue[] = [];
  readonly warnings: LintIssue[] = [];

  constructor(private readonly file: string) {}

  error(code: LintCode, message: string): void {
    this.errors.push({ code, message: `${this.file}: ${message}`, file: this.file });
  }

  warning(code: LintCode, message: string): void {
    this.warnings.push({ code, message: `${this.file}: ${message}`, file: this.file });
  }
}

function isStatus(value: unknown): value is ContractStatus {
  return typeof value === 'string' && CONTRACT_STATUSES.some((status) => status === value);
}

function has(doc: Record<string, unknown>, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(doc, field);
}

function requireFields(doc: Record<string, unknown>, fields: readonly string[], sink: IssueSink, prefix = ''): void {
  for (const field of fields) {
    if (!has(doc, field)) sink.error('missing_field', `${prefix}missing required field '${field}'`);
  }
}

function lintProject(doc: Record<string, unknown>, sink: IssueSink): void {
  requireFields(doc, PROJECT_FIELDS, sink);
  if (!isStatus(doc.status)) sink.error('invalid_status', 'status must be draft|frozen|deprecated');
  if (doc.status === 'frozen' && !has(doc, 'cdd_spec')) {
    sink.error('missing_cdd_spec', "frozen project requires 'cdd_spec' field");
  }
}

function lintComponent(doc: Record<string, unknown>, sink: IssueSink): void {
  requireFields(doc, COMPONENT_FIELDS, sink);
  if (!isStatus(doc.status)) sink.error('invalid_status', 'status must be draft|frozen|deprecated');

  const runner = doc.runner ?? {};
  if (!isRecord(runner)) sink.error('invalid_runner', 'runner must be an object');
  else if (!has(runner, 'executor')) sink.error('missing_executor', 'runner.executor is required');

  const requirementIds: string[] = [];
  const requirements = doc.requirements ?? [];
  if (!Array.isArray(requirements)) {
    sink.error('invalid_requirements', 'requirements must be an array');
  } else {
    for (const requirement of requirements) {
      if (!isRecord(requirement)) {
        sink.error('invalid_requirement', 'requirement must be an object');
        continue;
      }
      requireFields(requirement, REQUIREMENT_FIELDS, sink, 'requirement ');
      if (has(requirement, 'id')) requirementIds.push(String(requirement.id));
    }
  }

  const tests = doc.tests ?? [];
  if (!Array.isArray(tests)) {
    sink.error('invalid_tests', 'tests must be an array');
    return;
  }

  const linked = new Set<string>();
  for (const test of tests) {
    if (!isRecord(test)) {
      sink.error('invalid_test', 'test must be an object');
      continue;
    }
    requireFields(test, TEST_FIELDS, sink, 'test ');
    if (test.requirement !== undefined && test.requirement !== null && test.requirement !== '') {
      linked.add(String(test.requirement));
    } else if (doc.status === 'frozen') {
      sink.warning('unlinked_test', `test ${typeof test.id === 'string' ? test.id : '?'} has no requirement link`);
    }
  }

  for (const id of new Set(requirementIds)) {
    if (!linked.has(id)) sink.error('uncovered_requirement', `requirement ${id} has no linked tests`);
  }
}

async function lintFile(file: string): Promise<IssueSink> {
  const sink = new IssueSink(file);

  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (err) {
    sink.error('unexpected_error', errorMessage(err));
    return sink;
  }

  let doc: unknown;
  try {
    doc = YAML.parse(raw);
  } catch (err) {
    sink.error('yaml_parse_error', errorMessage(err));
    return sink;
  }

  if (!isRecord(doc)) {
    sink.error('invalid_yaml', 'must be a mapping');
  } else if (has(doc, 'project')) {
    lintProject(doc, sink);
  } else if (has(doc, 'contract')) {
    lintComponent(doc, sink);
  } else {
    sink.error('unknown_contract_type', "must have 'project' or 'contract' field");
  }
  return sink;
}

/** Schema and coverage gate over one file or every `*.yaml` under a directory. */
export async function lintContracts(contractsPath: string, options: { strict?: boolean } = {}): Promise<LintReport> {
  let files: string[];
  try {
    const stat = await fs.stat(contractsPath);
    files = stat.isDirectory() ? await listYamlFiles(contractsPath) : [contractsPath];
  } catch {
    return {
      ok: false,
      errors: [{ code: 'path_not_found', message: `Path not found: ${contractsPath}`, file: contractsPath }],
      warnings: [],
      contracts_checked: 0
    };
  }

  const errors: LintIssue[] = [];
  const warnings: LintIssue[] = [];
  for (const file of files) {
    const sink = await lintFile(file);
    errors.push(...sink.errors);
    warnings.push(...sink.warnings);
  }

  return {
    ok: errors.length === 0 && !(options.strict && warnings.length > 0),
    errors,
    warnings,
    contracts_checked: files.length
  };
}
