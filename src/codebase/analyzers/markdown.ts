/**
 * Markdown analyzer: headings by level, links, images, fenced code blocks and
 * tables. Markdown has no comments; every non-blank line counts as code.
 */

import type { SourceText } from '../../core/fileio.js';
import {
  createFileStatistics,
  FileStatistics,
  HeadingLevel,
  MarkdownMetadata,
} from '../models/file-statistics.js';
import { countBlankLines } from './line-classifier.js';

export const MARKDOWN_LANGUAGE = 'Markdown';
export const MARKDOWN_EXTENSIONS: ReadonlySet<string> = new Set(['.md', '.markdown']);

const FENCE = '```';
const HEADING = /^\s*(#{1,6})\s+/;
const IMAGE = /!\[[^\]]*\]\([^)]+\)/g;
const LINK = /(?<!!)\[[^\]]+\]\([^)]+\)/g;
const TABLE_DIVIDER = /^\s*\|?\s*:?-+:?\s*(\|\s*:?-+:?\s*)+\|?\s*$/;

function countMatches(line: string, pattern: RegExp): number {
  return line.match(pattern)?.length ?? 0;
}

function toHeadingLevel(hashes: string): HeadingLevel {
  switch (hashes.length) {
    case 1:
      return 1;
    case 2:
      return 2;
    case 3:
      return 3;
    case 4:
      return 4;
    case 5:
      return 5;
    default:
      return 6;
  }
}

/**
 * Inspect the lines outside fenced code blocks. A table is a line holding a
 * `|` directly followed by a divider row; that heuristic can miss tables and
 * can fire on prose, and is kept as it is.
 */
export function analyzeMarkdownLines(lines: readonly string[]): MarkdownMetadata {
  const meta: MarkdownMetadata = {
    kind: 'markdown',
    headingsByLevel: { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0, 6: 0 },
    headingCount: 0,
    linkCount: 0,
    imageCount: 0,
    codeBlockCount: 0,
    tableCount: 0,
  };
  let inFence = false;

  lines.forEach((line, index) => {
    if (line.trim().startsWith(FENCE)) {
      if (!inFence) meta.codeBlockCount += 1;
      inFence = !inFence;
      return;
    }
    if (inFence) return;

    const heading = HEADING.exec(line);
    if (heading) {
      meta.headingsByLevel[toHeadingLevel(heading[1])] += 1;
      meta.headingCount += 1;
    }

    meta.imageCount += countMatches(line, IMAGE);
    meta.linkCount += countMatches(line, LINK);

    const next = lines[index + 1];
    if (line.includes('|') && next !== undefined && TABLE_DIVIDER.test(next.trim())) {
      meta.tableCount += 1;
    }
  });

  return meta;
}

export function analyzeMarkdownFile(filePath: string, source: SourceText): FileStatistics {
  const { lines } = source;
  return createFileStatistics({
    path: filePath,
    language: MARKDOWN_LANGUAGE,
    totalLines: lines.length,
    blankLines: countBlankLines(lines),
    commentLines: 0,
    metadata: analyzeMarkdownLines(lines),
  });
}
