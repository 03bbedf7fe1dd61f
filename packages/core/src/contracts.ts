/**
 * CDD report and result contracts.
 *
 * These types are the stable, machine-readable shapes emitted by the runner and
 * consumed by the CLI. Field names are snake_case because they are serialized as-is.
 */

export const TOOL_VERSION = '1.1.5' as const;

export type OutputFormat = 'json' | 'table';

export type ContractStatus = 'draft' | 'frozen' | 'deprecated';

export const CONTRACT_STATUSES: readonly ContractStatus[] = ['draft', 'frozen', 'deprecated'];

export type TestStatus = 'pass' | 'fail' | 'skipped' | 'error';

/**
 * Error codes produced while resolving a path query.
 *
 * `path_not_found` is reserved: missing keys and indices resolve to null.
 */
export type ResolverErrorCode = 'path_not_found' | 'type_mismatch' | 'invalid_path';

export type AssertionErrorCode = ResolverErrorCode | 'unknown_op' | 'exception';

/**
 * Stable executor error codes.
 *
 * Notes:
 * - Executors may surface additional codes from envelope-shaped return values.
 * - Additive only.
 */
export const StepErrorCodes = [
  'symbol_not_found',
  'exception',
  'timeout',
  'nonzero_exit',
  'unsupported_action',
  'missing_command',
  'static_no_steps',
  'not_implemented',
  'type_mismatch'
] as const;

export type StepErrorCode = (typeof StepErrorCodes)[number];

export type SpecIssueCode =
  | 'spec_major_mismatch'
  | 'spec_exact_mismatch'
  | 'spec_version_mismatch'
  | 'spec_version_missing'
  | 'spec_version_parse_error';

export interface Issue<Code extends string = string> {
  code: Code;
  message: string;
}

export interface StepResultRecord {
  ok: boolean;
  value: unknown;
  error_code: string | null;
  message: string | null;
  /** Always carries `duration_ms` once the runner has seen the step. */
  meta: Record<string, unknown>;
  stdout: string;
  /** Best-effort integer parse of the trimmed stdout. */
  stdout_int: number | null;
  stderr: string;
  artifacts: Array<Record<string, unknown>>;
}

export interface AssertionRecord {
  op: string;
  actual: unknown;
  expected: unknown;
  pass: boolean;
  error: string | null;
  details: Record<string, unknown>;
  message?: string;
}

export interface TestResultRecord {
  id: string;
  name: string;
  requirement: string | null;
  type: string | null;
  status: TestStatus;
  message: string;
  assertions: AssertionRecord[];
  steps: StepResultRecord[];
  /** Present on file-scan tests. */
  duration_ms?: number;
  files_scanned?: number;
}

export interface ReportSummary {
  passed: number;
  failed: number;
  skipped: number;
  error: number;
}

export interface TestReport {
  schema_version: string;
  report_type: 'single';
  contract: string;
  run_id: string;
  tool_version: string;
  project_spec: string | null;
  /** ISO timestamp (frozen in deterministic mode). */
  started_at: string;
  warnings: Array<Issue<SpecIssueCode>>;
  errors: Array<Issue<SpecIssueCode>>;
  summary: ReportSummary;
  results: TestResultRecord[];
  artifacts_dir: string;
}

export function schemaVersionFor(toolVersion: string): string {
  const parts = toolVersion.split('.');
  return parts.length >= 2 ? `${parts[0]}.${parts[1]}` : '1.0';
}

export function summarizeResults(results: TestResultRecord[]): ReportSummary {
  return {
    passed: results.filter((r) => r.status === 'pass').length,
    failed: results.filter((r) => r.status === 'fail').length,
    skipped: results.filter((r) => r.status === 'skipped').length,
    error: results.filter((r) => r.status === 'error').length
  };
}

export function reportHasFailures(report: Pick<TestReport, 'summary'>): boolean {
  return report.summary.failed > 0 || report.summary.error > 0;
}
