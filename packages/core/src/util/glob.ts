import type { Stats } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import { interpolateVars } from '../path/interpolate.js';

const GLOB_CHARS = /[*?[]/;

export function hasGlobMagic(pattern: string): boolean {
  return GLOB_CHARS.test(pattern);
}

function escapeRegex(ch: string): string {
  return /[\\^$.*+?()[\]{}|/]/.test(ch) ? `\\${ch}` : ch;
}

/** Compiles one path segment (no separators) into an anchored RegExp. */
export function segmentToRegExp(segment: string): RegExp {
  let out = '';
  let i = 0;
  while (i < segment.length) {
    const ch = segment[i];
    if (ch === '*') {
      out += '[^/]*';
      i += 1;
      continue;
    }
    if (ch === '?') {
      out += '[^/]';
      i += 1;
      continue;
    }
    if (ch === '[') {
      const close = segment.indexOf(']', i + 2);
      if (close === -1) {
        out += '\\[';
        i += 1;
        continue;
      }
      let body = segment.slice(i + 1, close);
      if (body.startsWith('!')) body = `^${body.slice(1)}`;
      out += `[${body.replace(/\\/g, '\\\\')}]`;
      i = close + 1;
      continue;
    }
    out += escapeRegex(ch);
    i += 1;
  }
  return new RegExp(`^${out}$`);
}

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch {
    return null;
  }
}

async function listDir(dir: string): Promise<string[]> {
  try {
    return (await fs.readdir(dir)).sort();
  } catch {
    return [];
  }
}

async function isDirectory(target: string): Promise<boolean> {
  return (await statOrNull(target))?.isDirectory() ?? false;
}

function matchesSegment(name: string, segment: string): boolean {
  if (name.startsWith('.') && !segment.startsWith('.')) return false;
  return segmentToRegExp(segment).test(name);
}

async function walk(base: string, segments: string[], out: Set<string>, seen: Set<string>): Promise<void> {
  if (segments.length === 0) {
    const stat = await statOrNull(base);
    if (stat?.isFile()) out.add(base);
    return;
  }

  const [head, ...rest] = segments;

  if (head === '**') {
    const real = await fs.realpath(base).catch(() => base);
    const key = `${real}\0${rest.join('/')}`;
    if (seen.has(key)) return;
    seen.add(key);

    await walk(base, rest, out, seen);
    for (const name of await listDir(base)) {
      if (name.startsWith('.')) continue;
      const child = path.join(base, name);
      if (await isDirectory(child)) await walk(child, segments, out, seen);
    }
    return;
  }

  if (!hasGlobMagic(head)) {
    await walk(path.join(base, head), rest, out, seen);
    return;
  }

  for (const name of await listDir(base)) {
    if (!matchesSegment(name, head)) continue;
    await walk(path.join(base, name), rest, out, seen);
  }
}

/**
 * Expands `spec` (a pattern or list of patterns, after variable interpolation)
 * relative to `baseDir` into sorted, unique absolute file paths.
 */
export async function expandFiles(
  spec: string | readonly string[],
  baseDir: string,
  vars: Record<string, unknown> = {}
): Promise<string[]> {
  const patterns = typeof spec === 'string' ? [spec] : [...spec];
  const out = new Set<string>();

  for (const raw of patterns) {
    const pattern = interpolateVars(raw, vars).trim();
    if (!pattern) continue;

    const absolute = path.isAbsolute(pattern);
    const segments = pattern.split(/[\\/]+/).filter((segment) => segment.length > 0 && segment !== '.');
    const start = absolute ? path.parse(pattern).root : path.resolve(baseDir);
    await walk(start, segments, out, new Set());
  }

  return [...out].map((file) => path.resolve(file)).sort();
}
