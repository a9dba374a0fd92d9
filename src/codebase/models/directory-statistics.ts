/**
 * Directory node of the statistics tree.
 *
 * Every total is summed from the current children on each access and never
 * cached, so a node always agrees with what it holds.
 */

import * as path from 'path';
import {
  FileStatistics,
  FileStatisticsJSON,
  HEADING_LEVELS,
  HeadingLevel,
  percentageOf,
} from './file-statistics.js';

export interface ScriptSummary {
  files: number;
  classes: number;
  functions: number;
  filesWithModuleDoc: number;
}

export interface MarkdownSummary {
  files: number;
  headingsByLevel: Record<HeadingLevel, number>;
  headings: number;
  links: number;
  images: number;
  codeBlocks: number;
  tables: number;
}

export interface LanguageTotals {
  language: string;
  files: number;
  lines: number;
  code: number;
  comments: number;
  blank: number;
}

export interface DirectoryStatisticsJSON {
  path: string;
  name: string;
  totalFiles: number;
  totalLines: number;
  codeLines: number;
  commentLines: number;
  blankLines: number;
  files: FileStatisticsJSON[];
  subdirectories: DirectoryStatisticsJSON[];
}

type FileMetric = 'totalLines' | 'codeLines' | 'commentLines' | 'blankLines';

function emptyHeadings(): Record<HeadingLevel, number> {
  return { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0, 6: 0 };
}

export class DirectoryStatistics {
  constructor(
    readonly path: string,
    readonly files: FileStatistics[] = [],
    readonly subdirectories: DirectoryStatistics[] = [],
  ) {}

  get name(): string {
    return path.basename(this.path) || this.path;
  }

  get totalFiles(): number {
    let count = this.files.length;
    for (const subdir of this.subdirectories) {
      count += subdir.totalFiles;
    }
    return count;
  }

  get totalLines(): number {
    return this.sumOf('totalLines');
  }

  get totalCodeLines(): number {
    return this.sumOf('codeLines');
  }

  get totalCommentLines(): number {
    return this.sumOf('commentLines');
  }

  get totalBlankLines(): number {
    return this.sumOf('blankLines');
  }

  get codePercentage(): number {
    return percentageOf(this.totalCodeLines, this.totalLines);
  }

  get commentPercentage(): number {
    return percentageOf(this.totalCommentLines, this.totalLines);
  }

  get blankPercentage(): number {
    return percentageOf(this.totalBlankLines, this.totalLines);
  }

  /** Every file in the subtree, depth-first: own files before subdirectories. */
  *allFiles(): IterableIterator<FileStatistics> {
    yield* this.files;
    for (const subdir of this.subdirectories) {
      yield* subdir.allFiles();
    }
  }

  scriptSummary(): ScriptSummary {
    const summary: ScriptSummary = { files: 0, classes: 0, functions: 0, filesWithModuleDoc: 0 };
    for (const file of this.allFiles()) {
      const meta = file.metadata;
      if (meta?.kind !== 'script') continue;
      summary.files += 1;
      summary.classes += meta.classCount;
      summary.functions += meta.functionCount;
      if (meta.hasModuleDoc) summary.filesWithModuleDoc += 1;
    }
    return summary;
  }

  markdownSummary(): MarkdownSummary {
    const summary: MarkdownSummary = {
      files: 0,
      headingsByLevel: emptyHeadings(),
      headings: 0,
      links: 0,
      images: 0,
      codeBlocks: 0,
      tables: 0,
    };
    for (const file of this.allFiles()) {
      const meta = file.metadata;
      if (meta?.kind !== 'markdown') continue;
      summary.files += 1;
      for (const level of HEADING_LEVELS) {
        summary.headingsByLevel[level] += meta.headingsByLevel[level];
      }
      summary.headings += meta.headingCount;
      summary.links += meta.linkCount;
      summary.images += meta.imageCount;
      summary.codeBlocks += meta.codeBlockCount;
      summary.tables += meta.tableCount;
    }
    return summary;
  }

  /** Per-language totals over the subtree, largest first (ties by name). */
  languageBreakdown(): LanguageTotals[] {
    const byLanguage = new Map<string, LanguageTotals>();
    for (const file of this.allFiles()) {
      let totals = byLanguage.get(file.language);
      if (!totals) {
        totals = { language: file.language, files: 0, lines: 0, code: 0, comments: 0, blank: 0 };
        byLanguage.set(file.language, totals);
      }
      totals.files += 1;
      totals.lines += file.totalLines;
      totals.code += file.codeLines;
      totals.comments += file.commentLines;
      totals.blank += file.blankLines;
    }
    return [...byLanguage.values()].sort(
      (a, b) => b.lines - a.lines || a.language.localeCompare(b.language),
    );
  }

  /**
   * Order each node's own files by line count, largest first. Array#sort is
   * stable, so files with equal counts keep the order they were found in.
   */
  sortFilesBySize(): void {
    this.files.sort((a, b) => b.totalLines - a.totalLines);
    for (const subdir of this.subdirectories) {
      subdir.sortFilesBySize();
    }
  }

  toString(): string {
    return (
      `${this.name}: ${this.totalFiles} files, ${this.totalLines} lines ` +
      `(${this.totalCodeLines} code, ${this.totalCommentLines} comments, ` +
      `${this.totalBlankLines} blank)`
    );
  }

  toJSON(): DirectoryStatisticsJSON {
    return {
      path: this.path,
      name: this.name,
      totalFiles: this.totalFiles,
      totalLines: this.totalLines,
      codeLines: this.totalCodeLines,
      commentLines: this.totalCommentLines,
      blankLines: this.totalBlankLines,
      files: this.files.map((file) => file.toJSON()),
      subdirectories: this.subdirectories.map((subdir) => subdir.toJSON()),
    };
  }

  private sumOf(metric: FileMetric): number {
    let total = 0;
    for (const file of this.files) {
      total += file[metric];
    }
    for (const subdir of this.subdirectories) {
      total += subdir.sumOf(metric);
    }
    return total;
  }
}
