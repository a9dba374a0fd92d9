/**
 * Human-readable console report
 */

import chalk from 'chalk';
import type { DirectoryStatistics } from '../models/directory-statistics.js';
import { FileStatistics, HEADING_LEVELS } from '../models/file-statistics.js';
import { formatNumber, formatPercentage, pluralize } from '../utils/format.js';
import { generateTree, TreeNode } from '../utils/tree.js';

export type ConsoleReportMode = 'full' | 'directories' | 'compact';

export interface ConsoleReportOptions {
  mode?: ConsoleReportMode;
  color?: boolean;
}

type Painter = chalk.Chalk;

const WIDE_RULE = '═'.repeat(60);
const NARROW_RULE = '─'.repeat(40);

function directoryLabel(dir: DirectoryStatistics, paint: Painter): string {
  const info = `(${pluralize(dir.totalFiles, 'file')}, ${pluralize(dir.totalLines, 'line')})`;
  return `${paint.bold.blue(`📁 ${dir.name}/`)} ${paint.gray(info)}`;
}

export function describeFile(file: FileStatistics): string[] {
  const meta = file.metadata;
  if (meta?.kind === 'script') {
    return [
      `${file.language} · ${pluralize(meta.classCount, 'class', 'classes')} · ` +
        `${pluralize(meta.functionCount, 'function')} · module doc ${meta.hasModuleDoc ? '✓' : '✗'}`,
    ];
  }
  if (meta?.kind === 'markdown') {
    return [
      `${file.language} · ${pluralize(meta.headingCount, 'heading')} · ` +
        `${pluralize(meta.linkCount, 'link')} · ${pluralize(meta.imageCount, 'image')} · ` +
        `${pluralize(meta.codeBlockCount, 'code block')} · ${pluralize(meta.tableCount, 'table')}`,
    ];
  }
  return [file.language];
}

function fileNode(file: FileStatistics, paint: Painter): TreeNode {
  return {
    label:
      `📄 ${file.fileName}  ${pluralize(file.totalLines, 'line')} ` +
      `(${formatNumber(file.codeLines)} code, ${formatNumber(file.commentLines)} comments, ` +
      `${formatNumber(file.blankLines)} blank)`,
    details: describeFile(file).map((detail) => paint.gray(detail)),
  };
}

export function toTreeNode(
  dir: DirectoryStatistics,
  includeFiles: boolean,
  paint: Painter,
): TreeNode {
  const files = includeFiles ? dir.files.map((file) => fileNode(file, paint)) : [];
  const subdirs = dir.subdirectories.map((subdir) => toTreeNode(subdir, includeFiles, paint));
  return { label: directoryLabel(dir, paint), children: [...files, ...subdirs] };
}

function header(projectPath: string, paint: Painter): string[] {
  return [
    paint.bold('📊 linestat - Project Analysis'),
    WIDE_RULE,
    `📁 Project: ${projectPath}`,
    WIDE_RULE,
    '',
  ];
}

function summary(stats: DirectoryStatistics, paint: Painter): string[] {
  const lines = [
    WIDE_RULE,
    paint.bold('📈 Summary'),
    WIDE_RULE,
    '',
    `Total Files: ${formatNumber(stats.totalFiles)}`,
    `Total Lines: ${formatNumber(stats.totalLines)}`,
    `  ├── Code: ${formatNumber(stats.totalCodeLines)} (${formatPercentage(stats.codePercentage)})`,
    `  ├── Comments: ${formatNumber(stats.totalCommentLines)} (${formatPercentage(stats.commentPercentage)})`,
    `  └── Blank: ${formatNumber(stats.totalBlankLines)} (${formatPercentage(stats.blankPercentage)})`,
    '',
  ];

  const scripts = stats.scriptSummary();
  if (scripts.files > 0) {
    lines.push(
      paint.bold('🔷 TypeScript / JavaScript'),
      `  ├── Files: ${formatNumber(scripts.files)}`,
      `  ├── Classes: ${formatNumber(scripts.classes)}`,
      `  ├── Functions: ${formatNumber(scripts.functions)}`,
      `  └── Files with module doc: ${formatNumber(scripts.filesWithModuleDoc)}`,
      '',
    );
  }

  const markdown = stats.markdownSummary();
  if (markdown.files > 0) {
    const byLevel = HEADING_LEVELS.filter((level) => markdown.headingsByLevel[level] > 0)
      .map((level) => `h${level}: ${markdown.headingsByLevel[level]}`)
      .join(', ');
    lines.push(
      paint.bold('📝 Markdown'),
      `  ├── Files: ${formatNumber(markdown.files)}`,
      `  ├── Headings: ${formatNumber(markdown.headings)}${byLevel ? ` (${byLevel})` : ''}`,
      `  ├── Links: ${formatNumber(markdown.links)} | Images: ${formatNumber(markdown.images)}`,
      `  └── Code blocks: ${formatNumber(markdown.codeBlocks)} | Tables: ${formatNumber(markdown.tables)}`,
      '',
    );
  }

  const languages = stats.languageBreakdown();
  if (languages.length > 0) {
    const width = Math.max(...languages.map((entry) => entry.language.length));
    lines.push(paint.bold('🗂  Languages'));
    for (const entry of languages) {
      const share = stats.totalLines === 0 ? 0 : (entry.lines / stats.totalLines) * 100;
      lines.push(
        `  ${entry.language.padEnd(width)}  ${pluralize(entry.files, 'file')}, ` +
          `${pluralize(entry.lines, 'line')} (${formatPercentage(share)})`,
      );
    }
    lines.push('');
  }

  lines.push(WIDE_RULE);
  return lines;
}

function compactSummary(stats: DirectoryStatistics, projectPath: string, paint: Painter): string[] {
  const lines = [
    paint.bold('📊 linestat - Quick Summary'),
    NARROW_RULE,
    `Project: ${projectPath}`,
    `Files: ${formatNumber(stats.totalFiles)} | Lines: ${formatNumber(stats.totalLines)}`,
    `Code: ${formatPercentage(stats.codePercentage)} | ` +
      `Comments: ${formatPercentage(stats.commentPercentage)} | ` +
      `Blank: ${formatPercentage(stats.blankPercentage)}`,
  ];
  const scripts = stats.scriptSummary();
  if (scripts.files > 0) {
    lines.push(
      `🔷 TypeScript / JavaScript: ${pluralize(scripts.files, 'file')}, ` +
        `${pluralize(scripts.classes, 'class', 'classes')}, ${pluralize(scripts.functions, 'function')}`,
    );
  }
  lines.push(NARROW_RULE);
  return lines;
}

/** The whole report as one string, lines joined with "\n". */
export function renderConsoleReport(
  stats: DirectoryStatistics,
  projectPath: string,
  options: ConsoleReportOptions = {},
): string {
  const mode = options.mode ?? 'full';
  const paint = new chalk.Instance({ level: options.color === false ? 0 : chalk.level });

  if (mode === 'compact') {
    return compactSummary(stats, projectPath, paint).join('\n');
  }

  const tree = generateTree(toTreeNode(stats, mode === 'full', paint)).trimEnd();
  return [...header(projectPath, paint), tree, '', ...summary(stats, paint)].join('\n');
}
