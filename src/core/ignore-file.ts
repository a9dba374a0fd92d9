import * as path from 'path';
import { fileExists, readFileSafe } from './fileio.js';

export const IGNORE_FILE_NAME = '.linestatignore';

function normalizePattern(value: string): string {
  let normalized = value.trim().replace(/\\/g, '/');
  while (normalized.startsWith('./')) normalized = normalized.slice(2);
  if (normalized.startsWith('/')) normalized = normalized.slice(1);
  return normalized.trim();
}

/**
 * Reduce an ignore-file line to a bare directory name. The walker matches
 * names, so globs and nested paths yield null (a leading "**\/" is dropped).
 */
export function extractDirectoryName(pattern: string): string | null {
  let normalized = normalizePattern(pattern).replace(/\/+$/, '');
  if (normalized.startsWith('**/')) normalized = normalized.slice(3);
  if (!normalized) return null;
  if (/[*?[\]{}!]/.test(normalized)) return null;
  if (normalized.includes('/')) return null;
  return normalized;
}

export function parseIgnoreFile(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'))
    .map((line) => extractDirectoryName(line))
    .filter((name): name is string => name !== null);
}

function dedupe(values: string[]): string[] {
  return [...new Set(values.map((value) => value.trim()).filter(Boolean))];
}

/**
 * Directory names from the root's .linestatignore (if any) merged with
 * `extra`, without duplicates.
 */
export async function readIgnoreNames(rootPath: string, extra: string[] = []): Promise<string[]> {
  const ignoreFile = path.join(rootPath, IGNORE_FILE_NAME);
  const fromFile = (await fileExists(ignoreFile))
    ? parseIgnoreFile(await readFileSafe(ignoreFile))
    : [];
  const fromExtra = extra.map((name) => extractDirectoryName(name)).filter((v): v is string => !!v);
  return dedupe([...fromFile, ...fromExtra]);
}
