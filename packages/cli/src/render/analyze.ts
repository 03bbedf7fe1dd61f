import type { SourceAnalysisResult, SourceComparison } from '@cdd/core';

function shortHash(hash: string | null): string {
  return hash ? `${hash.slice(0, 12)}...` : '-';
}

export function renderAnalysisTable(result: SourceAnalysisResult): string {
  const lines: string[] = [];
  lines.push(`source: ${result.source_name}`);
  lines.push(`type: ${result.file_type}`);
  lines.push(`lines: ${result.line_count}`);
  lines.push(`size: ${result.size_bytes} bytes`);
  lines.push(`hash: ${shortHash(result.hash)}`);
  lines.push(`output: ${result.output_dir}`);
  lines.push('files:');
  for (const file of result.files) {
    lines.push(`  - ${file}`);
  }
  return `${lines.join('\n')}\n`;
}

export function renderComparisonTable(diff: SourceComparison): string {
  const lines: string[] = [];
  lines.push(`match: ${diff.match}`);
  if (!diff.match) {
    lines.push(`original_hash: ${shortHash(diff.original_hash)}`);
    lines.push(`generated_hash: ${shortHash(diff.generated_hash)}`);
    lines.push(`original_lines: ${diff.original_lines ?? '-'}`);
    lines.push(`generated_lines: ${diff.generated_lines ?? '-'}`);
  }
  if (!diff.file_type_match) {
    lines.push(`file_type_mismatch: ${diff.original_type ?? '-'} vs ${diff.generated_type ?? '-'}`);
  }
  lines.push(`summary: ${diff.summary}`);
  return `${lines.join('\n')}\n`;
}
