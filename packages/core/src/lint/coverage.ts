import fs from 'node:fs/promises';

import { isProjectDocument, isRecord, listYamlFiles, readYamlDocument } from '../contract/load.js';

export interface RequirementCoverage {
  id: string;
  linked_tests: number;
}

export interface CoverageReport {
  requirements: RequirementCoverage[];
  uncovered_count: number;
  total_count: number;
}

async function contractFiles(contractsPath: string): Promise<string[]> {
  try {
    const stat = await fs.stat(contractsPath);
    return stat.isDirectory() ? await listYamlFiles(contractsPath) : [contractsPath];
  } catch {
    return [];
  }
}

function listOf(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function idOf(value: unknown): string | null {
  if (typeof value === 'string' && value) return value;
  if (typeof value === 'number') return String(value);
  return null;
}

/**
 * Requirement id -> number of linked tests across every component contract.
 * Unreadable documents are skipped; `lint` reports them.
 */
export async function computeCoverage(contractsPath: string): Promise<CoverageReport> {
  const docs: Array<Record<string, unknown>> = [];
  for (const file of await contractFiles(contractsPath)) {
    try {
      const doc = await readYamlDocument(file);
      if (!isProjectDocument(doc)) docs.push(doc);
    } catch {
      continue;
    }
  }

  const counts = new Map<string, number>();
  for (const doc of docs) {
    for (const requirement of listOf(doc.requirements)) {
      const id = isRecord(requirement) ? idOf(requirement.id) : null;
      if (id !== null && !counts.has(id)) counts.set(id, 0);
    }
  }

  for (const doc of docs) {
    for (const test of listOf(doc.tests)) {
      const linked = isRecord(test) ? idOf(test.requirement) : null;
      const current = linked === null ? undefined : counts.get(linked);
      if (linked !== null && current !== undefined) counts.set(linked, current + 1);
    }
  }

  const requirements = [...counts.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([id, linked_tests]) => ({ id, linked_tests }));

  return {
    requirements,
    uncovered_count: requirements.filter((requirement) => requirement.linked_tests === 0).length,
    total_count: requirements.length
  };
}
