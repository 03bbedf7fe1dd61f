import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';

import {
  DEFAULT_TIMEOUT_MS,
  listYamlFiles,
  loadComponentContract,
  parseComponentContract,
  parseYamlDocument,
  readInteger,
  readSpecVersionSidecar
} from '../src/contract/load.js';
import { ContractError } from '../src/errors.js';

describe('contract loader', () => {
  it('parses runner, vars, requirements and tests', () => {
    const doc = parseYamlDocument(
      [
        'contract: drum_machine',
        'version: 1.2.0',
        'status: draft',
        'runner:',
        '  executor: node',
        '  entry: lib/drums.mjs',
        '  symbol: play',
        '  timeout_ms: 500',
        '  env: { MODE: 1 }',
        '  extra_flag: true',
        'vars:',
        '  bpm: 120',
        'requirements:',
        '  - id: REQ-1',
        '    priority: must',
        '    description: plays',
        'tests:',
        '  - id: T1',
        '    name: plays a kick',
        '    requirement: REQ-1',
        '    type: unit',
        '    steps:',
        '      - action: call',
        '        with: { sound: kick }',
        '        save_as: first',
        '      - action: call_n',
        '        n: 3',
        '        warmup: true',
        '    assert:',
        '      - op: eq',
        '        actual: $.first.ok',
        '        expected: true'
      ].join('\n'),
      'drums.yaml'
    );

    const contract = parseComponentContract(doc, '/tmp/drums.yaml');
    expect(contract.name).toBe('drum_machine');
    expect(contract.version).toBe('1.2.0');
    expect(contract.timeoutMs).toBe(500);
    expect(contract.runner).toEqual({
      executor: 'node',
      entry: 'lib/drums.mjs',
      symbol: 'play',
      timeout_ms: 500,
      env: { MODE: '1' },
      extra_flag: true
    });
    expect(contract.vars).toEqual({ bpm: 120 });
    expect(contract.requirements).toEqual([
      { id: 'REQ-1', priority: 'must', description: 'plays', acceptanceCriteria: null }
    ]);

    const [entry] = contract.tests;
    expect(entry.kind).toBe('test');
    if (entry.kind !== 'test') return;
    expect(entry.test.declaresSteps).toBe(true);
    expect(entry.test.steps).toEqual([
      { kind: 'step', step: { action: 'call', with: { sound: 'kick' }, warmup: false, saveAs: 'first' } },
      { kind: 'step', step: { action: 'call_n', with: {}, warmup: true, n: 3 } }
    ]);
    expect(entry.test.assert).toEqual([{ op: 'eq', actual: '$.first.ok', expected: true }]);
  });

  it('defaults the name to the file stem and the executor to node', () => {
    const contract = parseComponentContract({}, '/tmp/contracts/mixer.yaml');
    expect(contract.name).toBe('mixer');
    expect(contract.runner).toEqual({ executor: 'node' });
    expect(contract.timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
    expect(contract.tests).toEqual([]);
  });

  it('carries malformed entries instead of throwing', () => {
    const contract = parseComponentContract(
      {
        tests: [
          'not a mapping',
          { id: 'T2', steps: [42, { action: 'call_n', n: 'three' }, { action: 'wait', seconds: 'soon' }] },
          { id: 'T3', steps: { action: 'call' } },
          { id: 'T4', steps: {} }
        ]
      },
      '/tmp/bad.yaml'
    );

    expect(contract.tests[0]).toEqual({ kind: 'invalid', id: 'UNKNOWN', message: 'test entry must be an object' });

    const second = contract.tests[1];
    if (second.kind !== 'test') throw new Error('expected a test entry');
    expect(second.test.steps).toEqual([
      { kind: 'invalid', message: 'step must be an object' },
      { kind: 'invalid', message: 'step n must be an integer' },
      { kind: 'invalid', message: 'step seconds must be a number' }
    ]);

    const third = contract.tests[2];
    if (third.kind !== 'test') throw new Error('expected a test entry');
    expect(third.test.declaresSteps).toBe(true);
    expect(third.test.steps).toEqual([{ kind: 'invalid', message: 'steps must be a list' }]);

    const fourth = contract.tests[3];
    if (fourth.kind !== 'test') throw new Error('expected a test entry');
    expect(fourth.test.declaresSteps).toBe(false);
    expect(fourth.test.steps).toEqual([]);

    expect(parseComponentContract({ tests: 'nope' }, '/tmp/x.yaml').tests).toEqual([
      { kind: 'invalid', id: 'INVALID', message: 'tests must be a list' }
    ]);
  });

  it('rejects structural problems with CONTRACT_INVALID', () => {
    expect(() => parseComponentContract({ runner: 'node' }, '/tmp/x.yaml')).toThrowError(ContractError);
    expect(() => parseComponentContract({ vars: [1] }, '/tmp/x.yaml')).toThrowError('vars must be a mapping');
    expect(() => readInteger(1.5, 'n')).toThrowError('n must be an integer');
    expect(() => readInteger(0, 'n', { min: 1 })).toThrowError('n must be >= 1');
  });

  it('rejects unreadable and non-mapping documents with CONTRACT_PARSE_ERROR', async () => {
    expect(() => parseYamlDocument('- a\n- b\n', 'list.yaml')).toThrowError('list.yaml must parse to a mapping');
    expect(parseYamlDocument('', 'empty.yaml')).toEqual({});

    try {
      await loadComponentContract(path.join(os.tmpdir(), 'cdd-does-not-exist.yaml'));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ContractError);
      if (err instanceof ContractError) expect(err.reason).toBe('CONTRACT_PARSE_ERROR');
    }
  });

  it('lists yaml files recursively and reads the version sidecar', async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'cdd-load-'));
    try {
      const contracts = path.join(root, 'contracts');
      await fs.mkdir(path.join(contracts, 'nested'), { recursive: true });
      await fs.mkdir(path.join(contracts, '.hidden'), { recursive: true });
      await fs.writeFile(path.join(contracts, 'b.yaml'), '', 'utf8');
      await fs.writeFile(path.join(contracts, 'a.yaml'), '', 'utf8');
      await fs.writeFile(path.join(contracts, 'notes.md'), '', 'utf8');
      await fs.writeFile(path.join(contracts, 'nested', 'c.yaml'), '', 'utf8');
      await fs.writeFile(path.join(contracts, '.hidden', 'd.yaml'), '', 'utf8');
      await fs.writeFile(path.join(root, '.cdd-version'), '1.1.0\n', 'utf8');

      expect(await listYamlFiles(contracts)).toEqual([
        path.join(contracts, 'a.yaml'),
        path.join(contracts, 'b.yaml'),
        path.join(contracts, 'nested', 'c.yaml')
      ]);
      expect(await readSpecVersionSidecar(root)).toBe('1.1.0');
      expect(await readSpecVersionSidecar(contracts)).toBeNull();
    } finally {
      await fs.rm(root, { recursive: true, force: true });
    }
  });
});
