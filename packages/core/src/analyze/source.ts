import fs from 'node:fs/promises';
import path from 'node:path';

import { isRecord } from '../contract/load.js';
import { AnalyzeError, errorMessage } from '../errors.js';
import { sha256Hex } from '../util/hash.js';
import { nowIso } from '../util/time.js';

export const STRUCTURE_FILE = 'structure.json';
export const SOURCE_REFERENCE_TYPE = 'source_reference';

const EXTENSIONS_URL = new URL('../../data/source-extensions.json', import.meta.url);

let extensionTable: Map<string, string> | null = null;

/** Lower-cased extension (with the dot) -> file type identifier. */
export async function loadSourceExtensions(): Promise<Map<string, string>> {
  if (extensionTable) return extensionTable;

  const parsed: unknown = JSON.parse(await fs.readFile(EXTENSIONS_URL, 'utf8'));
  if (!isRecord(parsed)) {
    throw new Error('source-extensions.json must be an object');
  }

  const table = new Map<string, string>();
  for (const [ext, fileType] of Object.entries(parsed)) {
    if (typeof fileType === 'string') table.set(ext.toLowerCase(), fileType);
  }
  extensionTable = table;
  return table;
}

export async function sourceFileType(filePath: string): Promise<string | null> {
  const table = await loadSourceExtensions();
  return table.get(path.extname(filePath).toLowerCase()) ?? null;
}

export async function isSourceFile(filePath: string): Promise<boolean> {
  return (await sourceFileType(filePath)) !== null;
}

/** Newline-terminated lines, plus one for a trailing unterminated line. */
export function countLines(content: string): number {
  if (!content) return 0;
  let count = 0;
  for (const char of content) {
    if (char === '\n') count += 1;
  }
  return content.endsWith('\n') ? count : count + 1;
}

export interface SourceReferenceManifest {
  type: typeof SOURCE_REFERENCE_TYPE;
  original_path: string;
  snapshot_path: string;
  hash: string;
  captured_at: string;
  file_type: string;
  size_bytes: number;
  line_count: number;
}

export interface SourceAnalysisResult {
  type: typeof SOURCE_REFERENCE_TYPE;
  source_name: string;
  file_type: string;
  hash: string;
  line_count: number;
  size_bytes: number;
  output_dir: string;
  files: string[];
}

export interface AnalyzeOptions {
  deterministic?: boolean;
}

const TYPE_SECTIONS: Record<string, string> = {
  python: `
## Python-Specific

### Classes
<!-- List key classes and their responsibilities -->

### Public API
<!-- Functions/methods that form the interface -->

### Dependencies
<!-- Required imports/packages -->

`,
  supercollider: `
## SuperCollider-Specific

### SynthDef Structure
<!-- Key UGen patterns, signal flow -->

### Bus Reads
<!-- Required control buses -->

### Post-Chain
<!-- Output stage patterns shared across SynthDefs -->

`,
  javascript: `
## JavaScript-Specific

### Exports
<!-- Module exports that form the interface -->

### Component Structure
<!-- For React/Vue, component patterns -->

### Dependencies
<!-- Required imports/packages -->

`,
  typescript: `
## TypeScript-Specific

### Exports
<!-- Module exports that form the interface -->

### Types/Interfaces
<!-- Key type definitions -->

### Dependencies
<!-- Required imports/packages -->

`
};

function shortHash(hash: string): string {
  return `${hash.slice(0, 12)}...`;
}

export function renderPatternsTemplate(manifest: SourceReferenceManifest, sourceName: string): string {
  const lines = [
    `# Reference: ${sourceName}`,
    '',
    `> Captured: ${manifest.captured_at}  `,
    `> Hash: ${shortHash(manifest.hash)}`,
    ''
  ];

  const sections: Array<[string, string]> = [
    ['Purpose', 'What does this reference file do? Why is it the reference?'],
    ['Key Patterns to Preserve', 'What structural patterns should new code follow?'],
    ['Required Elements', 'Classes, methods, functions that must exist in derived code'],
    ['Allowed Deviations', 'What can/should differ in the new code?']
  ];
  for (const [heading, prompt] of sections) {
    lines.push(`## ${heading}`, '', `<!-- ${prompt} -->`, '');
    if (heading !== 'Purpose') lines.push('- ', '- ', '- ');
    lines.push('');
  }
  lines.push('## Notes', '', '<!-- Any additional context for implementation -->', '', '');

  return lines.join('\n') + (TYPE_SECTIONS[manifest.file_type] ?? '');
}

export function renderElementsSummary(manifest: SourceReferenceManifest, sourceName: string): string {
  const snapshot = manifest.snapshot_path;
  const lines = [
    `# Source Reference: ${sourceName}`,
    '',
    '| Property | Value |',
    '|----------|-------|',
    `| Type | ${manifest.file_type} |`,
    `| Original | \`${manifest.original_path}\` |`,
    `| Hash | \`${shortHash(manifest.hash)}\` |`,
    `| Size | ${manifest.size_bytes} bytes |`,
    `| Lines | ${manifest.line_count} |`,
    `| Captured | ${manifest.captured_at} |`,
    '',
    '## Files',
    '',
    `- \`${snapshot}\` - Frozen snapshot of reference`,
    `- \`${STRUCTURE_FILE}\` - Metadata`,
    '- `PATTERNS.md` - Pattern documentation (fill in)',
    '',
    '## Next Steps',
    '',
    `1. Review \`${snapshot}\` to understand the reference`,
    '2. Fill in `PATTERNS.md` with patterns to preserve',
    '3. Write contract based on documented patterns',
    '4. Implement against contract'
  ];
  return lines.join('\n') + '\n';
}

/**
 * Captures a readable source file as a frozen reference: a verbatim snapshot,
 * `structure.json` metadata, a `PATTERNS.md` template and an `elements.md`
 * summary, all written into `outputDir`.
 */
export async function analyzeSource(
  sourcePath: string,
  outputDir: string,
  options: AnalyzeOptions = {}
): Promise<SourceAnalysisResult> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(sourcePath);
  } catch {
    throw new AnalyzeError('ANALYZE_SOURCE_NOT_FOUND', `Source file not found: ${sourcePath}`, { sourcePath });
  }

  const fileType = await sourceFileType(sourcePath);
  if (fileType === null) {
    const ext = path.extname(sourcePath);
    throw new AnalyzeError('ANALYZE_UNSUPPORTED_SOURCE', `Unsupported source type: ${ext || path.basename(sourcePath)}`, {
      sourcePath
    });
  }

  const sourceName = path.basename(sourcePath);
  const snapshotName = `source${path.extname(sourcePath)}`;
  const manifest: SourceReferenceManifest = {
    type: SOURCE_REFERENCE_TYPE,
    original_path: sourcePath,
    snapshot_path: snapshotName,
    hash: sha256Hex(bytes),
    captured_at: nowIso(options.deterministic ?? false),
    file_type: fileType,
    size_bytes: bytes.byteLength,
    line_count: countLines(bytes.toString('utf8'))
  };

  await fs.mkdir(outputDir, { recursive: true });
  await fs.copyFile(sourcePath, path.join(outputDir, snapshotName));
  await fs.writeFile(path.join(outputDir, STRUCTURE_FILE), `${JSON.stringify(manifest, null, 2)}\n`, 'utf8');
  await fs.writeFile(path.join(outputDir, 'PATTERNS.md'), renderPatternsTemplate(manifest, sourceName), 'utf8');
  await fs.writeFile(path.join(outputDir, 'elements.md'), renderElementsSummary(manifest, sourceName), 'utf8');

  return {
    type: SOURCE_REFERENCE_TYPE,
    source_name: sourceName,
    file_type: fileType,
    hash: manifest.hash,
    line_count: manifest.line_count,
    size_bytes: manifest.size_bytes,
    output_dir: outputDir,
    files: [snapshotName, STRUCTURE_FILE, 'PATTERNS.md', 'elements.md']
  };
}

/** Reads `structure.json` from an analysis directory (or the file itself). Null when absent. */
export async function loadAnalysis(target: string): Promise<Record<string, unknown> | null> {
  let file = target;
  try {
    const stat = await fs.stat(target);
    if (stat.isDirectory()) file = path.join(target, STRUCTURE_FILE);
  } catch {
    return null;
  }

  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new AnalyzeError('ANALYZE_INVALID', `Invalid analysis JSON: ${file}`, { file, error: errorMessage(err) });
  }
  if (!isRecord(parsed)) {
    throw new AnalyzeError('ANALYZE_INVALID', `Analysis is not a JSON object: ${file}`, { file });
  }
  return parsed;
}

export interface SourceComparison {
  type: typeof SOURCE_REFERENCE_TYPE;
  match: boolean;
  original_hash: string | null;
  generated_hash: string | null;
  file_type_match: boolean;
  original_type: string | null;
  generated_type: string | null;
  original_lines: number | null;
  generated_lines: number | null;
  summary: string;
}

function stringField(doc: Record<string, unknown>, key: string): string | null {
  const value = doc[key];
  return typeof value === 'string' ? value : null;
}

function numberField(doc: Record<string, unknown>, key: string): number | null {
  const value = doc[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Source references only compare by content hash and file type; structural
 * agreement is what contracts are for.
 */
export function compareSourceAnalyses(
  original: Record<string, unknown>,
  generated: Record<string, unknown>
): SourceComparison {
  const originalHash = stringField(original, 'hash');
  const generatedHash = stringField(generated, 'hash');
  const originalType = stringField(original, 'file_type');
  const generatedType = stringField(generated, 'file_type');
  const originalLines = numberField(original, 'line_count');
  const generatedLines = numberField(generated, 'line_count');

  const match = originalHash === generatedHash;
  let summary: string;
  if (match) {
    summary = 'Files are identical';
  } else {
    const lineDiff = (generatedLines ?? 0) - (originalLines ?? 0);
    const delta = lineDiff > 0 ? `+${lineDiff} lines` : lineDiff < 0 ? `${lineDiff} lines` : 'same line count';
    summary = `Files differ (${delta}) - use contracts to verify structural requirements`;
  }

  return {
    type: SOURCE_REFERENCE_TYPE,
    match,
    original_hash: originalHash,
    generated_hash: generatedHash,
    file_type_match: originalType === generatedType,
    original_type: originalType,
    generated_type: generatedType,
    original_lines: originalLines,
    generated_lines: generatedLines,
    summary
  };
}

/**
 * Loads two analyses and compares them. Both must exist and share a type;
 * only source references are understood here.
 */
export async function compareAnalysisPaths(originalPath: string, generatedPath: string): Promise<SourceComparison> {
  const original = await loadAnalysis(originalPath);
  if (!original) throw new AnalyzeError('ANALYZE_NOT_FOUND', `Not found: ${originalPath}`, { path: originalPath });
  const generated = await loadAnalysis(generatedPath);
  if (!generated) throw new AnalyzeError('ANALYZE_NOT_FOUND', `Not found: ${generatedPath}`, { path: generatedPath });

  const originalType = stringField(original, 'type') ?? 'unknown';
  const generatedType = stringField(generated, 'type') ?? 'unknown';
  if (originalType !== generatedType) {
    throw new AnalyzeError('ANALYZE_TYPE_MISMATCH', `Cannot compare ${originalType} with ${generatedType}`, {
      originalType,
      generatedType
    });
  }
  if (originalType !== SOURCE_REFERENCE_TYPE) {
    throw new AnalyzeError('ANALYZE_TYPE_MISMATCH', `Unsupported analysis type: ${originalType}`, { originalType });
  }
  return compareSourceAnalyses(original, generated);
}
