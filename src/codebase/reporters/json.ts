/**
 * Structured JSON report
 */

import type {
  DirectoryStatistics,
  DirectoryStatisticsJSON,
  LanguageTotals,
  MarkdownSummary,
  ScriptSummary,
} from '../models/directory-statistics.js';

export interface JsonReport {
  project: string;
  generatedAt: string;
  summary: {
    files: number;
    lines: number;
    code: number;
    comments: number;
    blank: number;
    codePercentage: number;
    commentPercentage: number;
    blankPercentage: number;
  };
  scripts: ScriptSummary;
  markdown: MarkdownSummary;
  languages: LanguageTotals[];
  tree: DirectoryStatisticsJSON;
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

export function buildJsonReport(
  stats: DirectoryStatistics,
  projectPath: string,
  generatedAt: Date = new Date(),
): JsonReport {
  return {
    project: projectPath,
    generatedAt: generatedAt.toISOString(),
    summary: {
      files: stats.totalFiles,
      lines: stats.totalLines,
      code: stats.totalCodeLines,
      comments: stats.totalCommentLines,
      blank: stats.totalBlankLines,
      codePercentage: round(stats.codePercentage),
      commentPercentage: round(stats.commentPercentage),
      blankPercentage: round(stats.blankPercentage),
    },
    scripts: stats.scriptSummary(),
    markdown: stats.markdownSummary(),
    languages: stats.languageBreakdown(),
    tree: stats.toJSON(),
  };
}

export function renderJsonReport(
  stats: DirectoryStatistics,
  projectPath: string,
  generatedAt?: Date,
): string {
  return JSON.stringify(buildJsonReport(stats, projectPath, generatedAt), null, 2);
}
