import type { IsolatePlan } from '@cdd/core';
import path from 'node:path';

export function renderIsolatePlan(plan: IsolatePlan): string {
  const lines: string[] = [];
  lines.push(`isolate: ${path.basename(plan.contractPath)}`);
  lines.push(`project: ${plan.projectRoot}`);
  lines.push(`work: ${plan.workDir}`);
  lines.push(`links: ${plan.linkRoots.length > 0 ? plan.linkRoots.join(', ') : '(none)'}`);
  return `${lines.join('\n')}\n`;
}
