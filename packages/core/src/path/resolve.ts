import type { ResolverErrorCode } from '../contracts.js';

/**
 * Path query resolver.
 *
 * Grammar: `$.` followed by selectors, each one of
 * - `name` / `.name`          bare key
 * - `[N]`                     sequence index
 * - `["quoted.key"]` / `['quoted.key']` literal key
 *
 * Missing keys and out-of-range indices resolve to null without an error.
 * Nothing is coerced: selecting a key on a non-mapping or an index on a
 * non-sequence is a `type_mismatch`.
 */

export const PATH_ROOT = '$.';

export type Selector = { kind: 'key'; key: string } | { kind: 'index'; index: number };

export type PathResolution =
  | { ok: true; value: unknown }
  | { ok: false; error: ResolverErrorCode };

export function isPathQuery(expr: unknown): expr is string {
  return typeof expr === 'string' && expr.startsWith(PATH_ROOT);
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Returns null when the path cannot be tokenized. */
export function parsePath(path: string): Selector[] | null {
  if (!path.startsWith(PATH_ROOT)) return null;

  const body = path.slice(PATH_ROOT.length);
  const out: Selector[] = [];
  let buf = '';
  let i = 0;

  while (i < body.length) {
    const ch = body[i];

    if (ch === '.') {
      if (buf) {
        out.push({ kind: 'key', key: buf });
        buf = '';
      }
      i += 1;
      continue;
    }

    if (ch === '[') {
      if (buf) {
        out.push({ kind: 'key', key: buf });
        buf = '';
      }
      const close = body.indexOf(']', i);
      if (close === -1) return null;

      const inner = body.slice(i + 1, close).trim();
      const quoted =
        inner.length >= 2 &&
        ((inner.startsWith('"') && inner.endsWith('"')) || (inner.startsWith("'") && inner.endsWith("'")));

      if (quoted) {
        out.push({ kind: 'key', key: inner.slice(1, -1) });
      } else if (/^-?\d+$/.test(inner)) {
        out.push({ kind: 'index', index: Number.parseInt(inner, 10) });
      } else {
        return null;
      }
      i = close + 1;
      continue;
    }

    buf += ch;
    i += 1;
  }

  if (buf) out.push({ kind: 'key', key: buf });
  return out;
}

export function resolvePath(root: unknown, path: string | null | undefined): PathResolution {
  if (path === null || path === undefined) return { ok: true, value: null };

  const selectors = parsePath(path);
  if (!selectors) return { ok: false, error: 'invalid_path' };

  let cur: unknown = root;
  for (const selector of selectors) {
    if (selector.kind === 'key') {
      if (!isMapping(cur)) return { ok: false, error: 'type_mismatch' };
      if (!Object.prototype.hasOwnProperty.call(cur, selector.key)) return { ok: true, value: null };
      cur = cur[selector.key];
      continue;
    }

    if (!Array.isArray(cur)) return { ok: false, error: 'type_mismatch' };
    if (selector.index < 0 || selector.index >= cur.length) return { ok: true, value: null };
    cur = cur[selector.index];
  }

  // Absent values surface as null so assertions never see undefined.
  return { ok: true, value: cur === undefined ? null : cur };
}
