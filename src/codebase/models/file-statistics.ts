/**
 * Per-file line statistics
 */

import * as path from 'path';

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export const HEADING_LEVELS: readonly HeadingLevel[] = [1, 2, 3, 4, 5, 6];

export interface ScriptMetadata {
  kind: 'script';
  hasModuleDoc: boolean;
  classCount: number;
  functionCount: number;
}

export interface MarkdownMetadata {
  kind: 'markdown';
  headingsByLevel: Record<HeadingLevel, number>;
  headingCount: number;
  linkCount: number;
  imageCount: number;
  codeBlockCount: number;
  tableCount: number;
}

export type LanguageMetadata = ScriptMetadata | MarkdownMetadata;

export interface FileStatisticsInput {
  path: string;
  language: string;
  totalLines: number;
  blankLines: number;
  commentLines: number;
  metadata?: LanguageMetadata;
}

export interface FileStatisticsJSON {
  path: string;
  name: string;
  language: string;
  totalLines: number;
  codeLines: number;
  commentLines: number;
  blankLines: number;
  metadata?: LanguageMetadata;
}

export function percentageOf(part: number, total: number): number {
  if (total === 0) return 0;
  return (part / total) * 100;
}

function clampCount(value: number): number {
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}

export class FileStatistics {
  constructor(
    readonly path: string,
    readonly language: string,
    readonly totalLines: number,
    readonly codeLines: number,
    readonly commentLines: number,
    readonly blankLines: number,
    readonly metadata?: LanguageMetadata,
  ) {}

  get fileName(): string {
    return path.basename(this.path);
  }

  get codePercentage(): number {
    return percentageOf(this.codeLines, this.totalLines);
  }

  get commentPercentage(): number {
    return percentageOf(this.commentLines, this.totalLines);
  }

  get blankPercentage(): number {
    return percentageOf(this.blankLines, this.totalLines);
  }

  toString(): string {
    return (
      `${this.fileName}: ${this.totalLines} lines ` +
      `(${this.codeLines} code, ${this.commentLines} comments, ${this.blankLines} blank)`
    );
  }

  toJSON(): FileStatisticsJSON {
    const json: FileStatisticsJSON = {
      path: this.path,
      name: this.fileName,
      language: this.language,
      totalLines: this.totalLines,
      codeLines: this.codeLines,
      commentLines: this.commentLines,
      blankLines: this.blankLines,
    };
    if (this.metadata) json.metadata = this.metadata;
    return json;
  }
}

/**
 * Code lines are whatever is neither blank nor comment. Approximate comment
 * counts can overshoot, so blank and comment are clamped to what the file can
 * hold and code never goes below zero: the four counts always add up.
 */
export function createFileStatistics(input: FileStatisticsInput): FileStatistics {
  const totalLines = clampCount(input.totalLines);
  const blankLines = Math.min(clampCount(input.blankLines), totalLines);
  const commentLines = Math.min(clampCount(input.commentLines), totalLines - blankLines);
  const codeLines = totalLines - blankLines - commentLines;

  return new FileStatistics(
    input.path,
    input.language,
    totalLines,
    codeLines,
    commentLines,
    blankLines,
    input.metadata,
  );
}
