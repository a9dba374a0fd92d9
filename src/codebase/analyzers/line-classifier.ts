/**
 * Generic, language-agnostic comment scanner.
 *
 * A line-oriented heuristic: no string awareness and no nested comments. A
 * multi-line region ends at the first closing marker after it opened.
 */

import { isBlankLine } from '../../core/fileio.js';
import type { CommentSyntax, LanguageRegistry, MarkerPair } from '../languages/registry.js';
import { createFileStatistics, FileStatistics } from '../models/file-statistics.js';

type ScanState = { mode: 'code' } | { mode: 'comment'; end: string };

export function countBlankLines(lines: readonly string[]): number {
  let blank = 0;
  for (const line of lines) {
    if (isBlankLine(line)) blank += 1;
  }
  return blank;
}

function findOpening(line: string, pairs: readonly MarkerPair[]): MarkerPair | undefined {
  return pairs.find((pair) => line.includes(pair.start));
}

/**
 * Count the non-blank lines that are comments. Every line inside a multi-line
 * region is a comment, the line that opens it included; a region that opens
 * and closes on one line counts once. An unterminated region runs to the end
 * of the file.
 */
export function countCommentLines(lines: readonly string[], syntax: CommentSyntax): number {
  let comments = 0;
  let state: ScanState = { mode: 'code' };

  for (const raw of lines) {
    const line = raw.trim();
    if (!line) continue;

    if (state.mode === 'comment') {
      comments += 1;
      if (line.includes(state.end)) state = { mode: 'code' };
      continue;
    }

    const opening = findOpening(line, syntax.multiLine);
    if (opening) {
      comments += 1;
      if (!line.includes(opening.end)) state = { mode: 'comment', end: opening.end };
      continue;
    }

    if (syntax.singleLine.some((marker) => line.startsWith(marker))) {
      comments += 1;
    }
  }

  return comments;
}

export function analyzeGenericFile(
  filePath: string,
  language: string,
  lines: readonly string[],
  registry: LanguageRegistry,
): FileStatistics {
  return createFileStatistics({
    path: filePath,
    language,
    totalLines: lines.length,
    blankLines: countBlankLines(lines),
    commentLines: countCommentLines(lines, registry.commentSyntax(language)),
  });
}
