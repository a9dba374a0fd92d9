/**
 * File I/O utilities with error handling
 */

import * as fs from 'fs';
import { promisify } from 'util';

const readFile = promisify(fs.readFile);
const access = promisify(fs.access);

export type SourceEncoding = 'utf-8' | 'latin1';

export interface SourceText {
  text: string;
  /** Physical lines without terminators; no trailing empty entry for a final newline. */
  lines: string[];
  encoding: SourceEncoding | null;
}

export type LineBreakMode = 'text' | 'script';

const TEXT_LINE_BREAK = /\r\n|[\n\r]/;
// The breaks the TypeScript scanner counts, so line numbers from its
// positions index straight into `lines`.
const SCRIPT_LINE_BREAK = /\r\n|[\n\r\u2028\u2029]/;

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

export function splitLines(text: string, mode: LineBreakMode = 'text'): string[] {
  if (text.length === 0) return [];
  const lines = text.split(mode === 'script' ? SCRIPT_LINE_BREAK : TEXT_LINE_BREAK);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Decode as strict UTF-8 and retry once as latin1, which accepts any byte
 * sequence.
 */
export function decodeSource(buffer: Buffer): { text: string; encoding: SourceEncoding } {
  try {
    return { text: strictUtf8.decode(buffer), encoding: 'utf-8' };
  } catch {
    return { text: buffer.toString('latin1'), encoding: 'latin1' };
  }
}

/**
 * Read a source file for line counting. Unreadable files come back empty with
 * a null encoding rather than throwing.
 */
export function readSourceText(filePath: string, mode: LineBreakMode = 'text'): SourceText {
  let buffer: Buffer;
  try {
    buffer = fs.readFileSync(filePath);
  } catch {
    return { text: '', lines: [], encoding: null };
  }
  const { text, encoding } = decodeSource(buffer);
  return { text, lines: splitLines(text, mode), encoding };
}

export function isBlankLine(line: string): boolean {
  return line.trim() === '';
}

export async function readFileSafe(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`);
    }
    throw error;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function readJSON(filePath: string): Promise<unknown> {
  const content = await readFileSafe(filePath);
  return JSON.parse(content);
}
