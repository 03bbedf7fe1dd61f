import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { computeCoverage } from '../src/lint/coverage.js';
import { lintContracts } from '../src/lint/lint.js';

const PROJECT = [
  'project: groovebox',
  'version: 1.0.0',
  'status: frozen',
  'goal: noise',
  'success_criteria: [loud]',
  'components: [drums]'
].join('\n');

const DRUMS = [
  'contract: drums',
  'version: 1.0.0',
  'status: frozen',
  'description: drum voices',
  'runner: { executor: node }',
  'requirements:',
  '  - { id: R1, priority: must, description: kick, acceptance_criteria: [thumps] }',
  '  - { id: R2, priority: must, description: snare }',
  'tests:',
  '  - { id: T1, name: kick, type: unit, requirement: R1, assert: [] }',
  '  - { id: T2, name: loose, type: unit, assert: [] }'
].join('\n');

const KIT = [
  'contract: kit',
  'requirements: [{ id: K1 }]',
  'tests: [{ id: X1, requirement: R1 }]'
].join('\n');

async function withContracts(files: Record<string, string>, fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cdd-lint-'));
  try {
    for (const [name, content] of Object.entries(files)) {
      await fs.writeFile(path.join(dir, name), content, 'utf8');
    }
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

describe('lint', () => {
  it('reports schema and coverage problems per file', async () => {
    await withContracts(
      { 'project.yaml': PROJECT, 'drums.yaml': DRUMS, 'broken.yaml': 'a: [\n', 'weird.yaml': 'foo: 1\n' },
      async (dir) => {
        const report = await lintContracts(dir);

        expect(report.ok).toBe(false);
        expect(report.contracts_checked).toBe(4);
        expect(report.errors.map((issue) => issue.code)).toEqual([
          'yaml_parse_error',
          'missing_field',
          'uncovered_requirement',
          'missing_cdd_spec',
          'unknown_contract_type'
        ]);

        const drums = path.join(dir, 'drums.yaml');
        expect(report.errors[1]).toEqual({
          code: 'missing_field',
          message: `${drums}: requirement missing required field 'acceptance_criteria'`,
          file: drums
        });
        expect(report.errors[2].message).toBe(`${drums}: requirement R2 has no linked tests`);
        expect(report.errors[3].message).toBe(`${path.join(dir, 'project.yaml')}: frozen project requires 'cdd_spec' field`);
        expect(report.warnings).toEqual([
          { code: 'unlinked_test', message: `${drums}: test T2 has no requirement link`, file: drums }
        ]);
      }
    );
  });

  it('fails on warnings only in strict mode', async () => {
    const contract = [
      'contract: solo',
      'version: 1.0.0',
      'status: frozen',
      'description: d',
      'runner: { executor: shell }',
      'requirements: []',
      'tests: [{ id: T1, name: t, type: unit, assert: [] }]'
    ].join('\n');

    await withContracts({ 'solo.yaml': contract }, async (dir) => {
      const relaxed = await lintContracts(dir);
      expect(relaxed.ok).toBe(true);
      expect(relaxed.warnings.map((issue) => issue.code)).toEqual(['unlinked_test']);

      const strict = await lintContracts(dir, { strict: true });
      expect(strict.ok).toBe(false);
    });
  });

  it('flags malformed runner, requirement and test entries', async () => {
    const contract = [
      'contract: odd',
      'version: 1.0.0',
      'status: active',
      'description: d',
      'runner: shell',
      'requirements: [plain]',
      'tests: {}'
    ].join('\n');

    await withContracts({ 'odd.yaml': contract }, async (dir) => {
      const report = await lintContracts(path.join(dir, 'odd.yaml'));
      expect(report.errors.map((issue) => issue.code)).toEqual([
        'invalid_status',
        'invalid_runner',
        'invalid_requirement',
        'invalid_tests'
      ]);
    });
  });

  it('reports a missing path', async () => {
    const missing = path.join(os.tmpdir(), 'cdd-lint-does-not-exist');
    expect(await lintContracts(missing)).toEqual({
      ok: false,
      errors: [{ code: 'path_not_found', message: `Path not found: ${missing}`, file: missing }],
      warnings: [],
      contracts_checked: 0
    });
  });
});

describe('coverage', () => {
  it('counts linked tests across contracts', async () => {
    await withContracts(
      { 'project.yaml': PROJECT, 'drums.yaml': DRUMS, 'kit.yaml': KIT, 'broken.yaml': 'a: [\n' },
      async (dir) => {
        expect(await computeCoverage(dir)).toEqual({
          requirements: [
            { id: 'K1', linked_tests: 0 },
            { id: 'R1', linked_tests: 2 },
            { id: 'R2', linked_tests: 0 }
          ],
          uncovered_count: 2,
          total_count: 3
        });
      }
    );
  });
});
