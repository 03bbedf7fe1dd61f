const BRACE_VAR = /\{([a-zA-Z_][a-zA-Z0-9_]*)\}/g;
const PATH_VAR = /\$\.vars\.([a-zA-Z_][a-zA-Z0-9_]*)/g;

function stringifyVar(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Replaces `{name}` and `$.vars.name` references inside strings, walking lists
 * and mappings. Unknown variables become the empty string.
 */
export function interpolateVars<T>(value: T, vars: Record<string, unknown>): T;
export function interpolateVars(value: unknown, vars: Record<string, unknown>): unknown {
  if (typeof value === 'string') {
    const lookup = (_match: string, name: string) =>
      stringifyVar(Object.prototype.hasOwnProperty.call(vars, name) ? vars[name] : undefined);
    return value.replace(BRACE_VAR, lookup).replace(PATH_VAR, lookup);
  }

  if (Array.isArray(value)) {
    return value.map((item) => interpolateVars(item, vars));
  }

  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = interpolateVars(item, vars);
    }
    return out;
  }

  return value;
}
