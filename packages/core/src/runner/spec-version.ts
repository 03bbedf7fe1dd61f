import type { Issue, SpecIssueCode } from '../contracts.js';

export interface SpecCheck {
  warnings: Array<Issue<SpecIssueCode>>;
  errors: Array<Issue<SpecIssueCode>>;
}

export type Semver = [number, number, number];

/** Missing minor/patch parts read as 0; any non-numeric part throws. */
export function parseSemver(version: string): Semver {
  const parts = version.trim().split('.');
  while (parts.length < 3) parts.push('0');
  const numbers = parts.slice(0, 3).map((part) => {
    if (!/^\d+$/.test(part.trim())) {
      throw new Error(`invalid version component '${part}'`);
    }
    return Number.parseInt(part, 10);
  });
  return [numbers[0], numbers[1], numbers[2]];
}

/**
 * Compares a project's declared spec version with the tool's.
 *
 * - different major: error
 * - same major, different version, exact required: error
 * - same major, different version: warning
 * - missing or unparseable: warning
 */
export function checkSpecVersion(projectSpec: string | null, toolVersion: string, requireExact: boolean): SpecCheck {
  const warnings: SpecCheck['warnings'] = [];
  const errors: SpecCheck['errors'] = [];

  if (!projectSpec) {
    warnings.push({ code: 'spec_version_missing', message: 'No cdd_spec or .cdd-version found' });
    return { warnings, errors };
  }

  let projectMajor: number;
  let toolMajor: number;
  try {
    projectMajor = parseSemver(projectSpec)[0];
    toolMajor = parseSemver(toolVersion)[0];
  } catch (err) {
    warnings.push({
      code: 'spec_version_parse_error',
      message: `Could not parse cdd_spec '${projectSpec}': ${err instanceof Error ? err.message : String(err)}`
    });
    return { warnings, errors };
  }

  if (projectMajor !== toolMajor) {
    errors.push({
      code: 'spec_major_mismatch',
      message: `Project targets CDD ${projectSpec}, tooling is ${toolVersion}`
    });
  } else if (requireExact && projectSpec !== toolVersion) {
    errors.push({
      code: 'spec_exact_mismatch',
      message: `Project targets CDD ${projectSpec}, tooling is ${toolVersion} (exact required)`
    });
  } else if (projectSpec !== toolVersion) {
    warnings.push({
      code: 'spec_version_mismatch',
      message: `Project targets CDD ${projectSpec}, tooling is ${toolVersion}`
    });
  }

  return { warnings, errors };
}
