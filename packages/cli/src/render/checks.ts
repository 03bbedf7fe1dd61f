import type { CoverageReport, LintReport, PathVerificationReport } from '@cdd/core';

export function renderLintTable(report: LintReport): string {
  const lines: string[] = [];
  lines.push(`status: ${report.ok ? 'PASS' : 'FAIL'}`);
  lines.push(`contracts: ${report.contracts_checked}`);
  lines.push(`errors: ${report.errors.length}`);
  lines.push(`warnings: ${report.warnings.length}`);
  for (const issue of report.errors) {
    lines.push(`- [error] ${issue.code}: ${issue.message}`);
  }
  for (const issue of report.warnings) {
    lines.push(`- [warning] ${issue.code}: ${issue.message}`);
  }
  return `${lines.join('\n')}\n`;
}

export function renderCoverageTable(report: CoverageReport): string {
  const lines: string[] = [];
  lines.push('requirement | linked_tests | status');
  for (const requirement of report.requirements) {
    const status = requirement.linked_tests > 0 ? 'covered' : 'UNCOVERED';
    lines.push(`${requirement.id} | ${requirement.linked_tests} | ${status}`);
  }
  lines.push('');
  lines.push(`uncovered: ${report.uncovered_count}`);
  lines.push(`total: ${report.total_count}`);
  return `${lines.join('\n')}\n`;
}

export function renderPathsTable(report: PathVerificationReport): string {
  const lines: string[] = [];
  for (const result of report.results) {
    lines.push(`contract: ${result.contract}`);
    lines.push(`contract_path: ${result.contract_path}`);
    for (const found of result.passed) {
      lines.push(`  ok ${found}`);
    }
    for (const missing of result.failed) {
      lines.push(`  missing ${missing.path}`);
      if (missing.suggestion) lines.push(`    did you mean: ${missing.suggestion}`);
    }
    lines.push(
      result.ok
        ? `result: PASS (${result.passed.length} files)`
        : `result: FAIL (${result.failed.length} missing, ${result.passed.length} found)`
    );
    lines.push('');
  }

  lines.push(`contracts_checked: ${report.contracts_checked}`);
  lines.push(`paths: ${report.passed_paths}/${report.total_paths} found`);
  lines.push(report.ok ? 'ALL CONTRACTS PASSED PATH VERIFICATION' : 'PATH VERIFICATION FAILED: fix paths before running cdd test');
  return `${lines.join('\n')}\n`;
}
