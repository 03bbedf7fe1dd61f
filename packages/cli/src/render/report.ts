import type { TestReport } from '@cdd/core';

const MESSAGE_WIDTH = 120;

function cell(value: string | null | undefined): string {
  return value ? value.replace(/\s*\n\s*/g, ' ') : '-';
}

export function renderTestReportTable(report: TestReport): string {
  const lines: string[] = [];
  lines.push(`contract: ${report.contract}`);
  lines.push(`run_id: ${report.run_id}`);
  lines.push(`project_spec: ${report.project_spec ?? '-'}`);
  lines.push(`passed: ${report.summary.passed}`);
  lines.push(`failed: ${report.summary.failed}`);
  lines.push(`skipped: ${report.summary.skipped}`);
  lines.push(`error: ${report.summary.error}`);

  for (const warning of report.warnings) {
    lines.push(`- [warning] ${warning.code}: ${warning.message}`);
  }
  for (const error of report.errors) {
    lines.push(`- [error] ${error.code}: ${error.message}`);
  }

  if (report.results.length > 0) {
    lines.push('');
    lines.push('test | status | requirement | message');
    for (const result of report.results) {
      lines.push(
        `${result.id} | ${result.status} | ${cell(result.requirement)} | ${cell(result.message).slice(0, MESSAGE_WIDTH)}`
      );
    }
  }

  return `${lines.join('\n')}\n`;
}
