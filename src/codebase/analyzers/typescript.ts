/**
 * Deep analyzer for TypeScript and JavaScript.
 *
 * Two independent passes over the compiler's view of the file:
 * - structure: module doc comment, classes, functions (every scope)
 * - comments: the comment ranges attached to the parsed tokens, so comment
 *   markers inside string, template and regex literals are not counted
 *
 * Syntax errors zero the structure; lexical errors (or a failing scan) drop
 * the comment count back to the `//` line heuristic. Neither skips the file.
 */

import * as path from 'path';
import ts from 'typescript';
import { isBlankLine, SourceText } from '../../core/fileio.js';
import {
  createFileStatistics,
  FileStatistics,
  ScriptMetadata,
} from '../models/file-statistics.js';
import { countBlankLines } from './line-classifier.js';

export const SCRIPT_EXTENSIONS: ReadonlySet<string> = new Set([
  '.ts',
  '.tsx',
  '.mts',
  '.cts',
  '.js',
  '.jsx',
  '.mjs',
  '.cjs',
]);

export type ScriptStructure = Omit<ScriptMetadata, 'kind'>;

const NO_STRUCTURE: ScriptStructure = { hasModuleDoc: false, classCount: 0, functionCount: 0 };

// Unterminated string literal, '*/' expected, invalid character,
// unterminated template literal, unterminated regular expression literal.
const LEXICAL_DIAGNOSTIC_CODES: ReadonlySet<number> = new Set([1002, 1010, 1127, 1160, 1161]);

const MODULE_DOC_TAG = /@(?:packageDocumentation|module|file|fileoverview)\b/;
const BLANK_LINE_GAP = /(?:\r\n|\r|\n)[ \t]*(?:\r\n|\r|\n)/;
const LINE_COMMENT = '//';

interface ParsedScript {
  sourceFile: ts.SourceFile;
  diagnostics: readonly ts.Diagnostic[];
}

export function isScriptFile(fileName: string): boolean {
  return SCRIPT_EXTENSIONS.has(path.extname(fileName).toLowerCase());
}

export function getScriptKindFromFilePath(filePath: string): ts.ScriptKind {
  const lower = filePath.toLowerCase();
  if (lower.endsWith('.tsx')) return ts.ScriptKind.TSX;
  if (lower.endsWith('.jsx')) return ts.ScriptKind.JSX;
  if (lower.endsWith('.js') || lower.endsWith('.mjs') || lower.endsWith('.cjs')) {
    return ts.ScriptKind.JS;
  }
  return ts.ScriptKind.TS;
}

export function scriptLanguage(filePath: string): 'TypeScript' | 'JavaScript' {
  const kind = getScriptKindFromFilePath(filePath);
  return kind === ts.ScriptKind.JS || kind === ts.ScriptKind.JSX ? 'JavaScript' : 'TypeScript';
}

function parseScript(filePath: string, text: string): ParsedScript {
  const sourceFile = ts.createSourceFile(
    filePath,
    text,
    ts.ScriptTarget.Latest,
    true,
    getScriptKindFromFilePath(filePath),
  );
  // transpileModule is the public route to the parser's syntactic diagnostics.
  const { diagnostics = [] } = ts.transpileModule(text, {
    fileName: filePath,
    reportDiagnostics: true,
    compilerOptions: {
      allowJs: true,
      jsx: ts.JsxEmit.Preserve,
      target: ts.ScriptTarget.Latest,
    },
  });
  return {
    sourceFile,
    diagnostics: diagnostics.filter(
      (diagnostic) =>
        diagnostic.file !== undefined && diagnostic.category === ts.DiagnosticCategory.Error,
    ),
  };
}

function isJSDocComment(text: string, range: ts.CommentRange): boolean {
  return (
    range.kind === ts.SyntaxKind.MultiLineCommentTrivia &&
    text.startsWith('/**', range.pos) &&
    range.end - range.pos > 4
  );
}

/**
 * A `/**` comment at the top of the file documents the module when it says so
 * with a tag, when nothing follows it, or when a blank line or another comment
 * stands between it and the first statement. Otherwise it belongs to that
 * statement.
 */
export function hasModuleDoc(sourceFile: ts.SourceFile): boolean {
  const text = sourceFile.getFullText();
  const leading = ts.getLeadingCommentRanges(text, 0) ?? [];
  const firstStatement = sourceFile.statements[0];

  return leading.some((range, index) => {
    if (!isJSDocComment(text, range)) return false;
    if (MODULE_DOC_TAG.test(text.slice(range.pos, range.end))) return true;
    if (!firstStatement) return true;
    if (index < leading.length - 1) return true;
    return BLANK_LINE_GAP.test(text.slice(range.end, firstStatement.getStart(sourceFile)));
  });
}

function isNamedArrowFunction(node: ts.ArrowFunction): boolean {
  const parent = node.parent;
  if (
    ts.isVariableDeclaration(parent) ||
    ts.isPropertyDeclaration(parent) ||
    ts.isPropertyAssignment(parent)
  ) {
    return parent.initializer === node;
  }
  return false;
}

function isFunctionDefinition(node: ts.Node): boolean {
  if (ts.isArrowFunction(node)) return isNamedArrowFunction(node);
  return (
    ts.isFunctionDeclaration(node) ||
    ts.isFunctionExpression(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isConstructorDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node)
  );
}

export function analyzeStructure(sourceFile: ts.SourceFile): ScriptStructure {
  let classCount = 0;
  let functionCount = 0;

  const visit = (node: ts.Node): void => {
    if (ts.isClassDeclaration(node) || ts.isClassExpression(node)) {
      classCount += 1;
    } else if (isFunctionDefinition(node)) {
      functionCount += 1;
    }
    ts.forEachChild(node, visit);
  };
  visit(sourceFile);

  return { hasModuleDoc: hasModuleDoc(sourceFile), classCount, functionCount };
}

function isJSDocNode(node: ts.Node): boolean {
  return node.kind >= ts.SyntaxKind.FirstJSDocNode && node.kind <= ts.SyntaxKind.LastJSDocNode;
}

/**
 * Every comment in the leading or trailing trivia of a node or token, by
 * position. JSX text is content, not trivia: ranges inside it are dropped.
 */
export function collectCommentRanges(sourceFile: ts.SourceFile): ts.CommentRange[] {
  const text = sourceFile.getFullText();
  const ranges = new Map<number, ts.CommentRange>();
  const jsxText: Array<{ pos: number; end: number }> = [];

  const add = (found: ts.CommentRange[] | undefined): void => {
    for (const range of found ?? []) ranges.set(range.pos, range);
  };

  const visit = (node: ts.Node): void => {
    if (isJSDocNode(node)) return;
    if (node.kind === ts.SyntaxKind.JsxText) {
      jsxText.push({ pos: node.pos, end: node.end });
      return;
    }
    add(ts.getLeadingCommentRanges(text, node.pos));
    add(ts.getTrailingCommentRanges(text, node.end));
    for (const child of node.getChildren(sourceFile)) {
      visit(child);
    }
  };
  visit(sourceFile);

  return [...ranges.values()]
    .filter((range) => !jsxText.some((span) => range.pos >= span.pos && range.pos < span.end))
    .sort((a, b) => a.pos - b.pos);
}

/** Zero-based numbers of the non-blank lines a comment (or the shebang) touches. */
export function commentLineNumbers(sourceFile: ts.SourceFile, lines: readonly string[]): Set<number> {
  const numbers = new Set<number>();
  const mark = (pos: number, end: number): void => {
    const first = sourceFile.getLineAndCharacterOfPosition(pos).line;
    const last = sourceFile.getLineAndCharacterOfPosition(end).line;
    for (let line = first; line <= last && line < lines.length; line += 1) {
      if (!isBlankLine(lines[line])) numbers.add(line);
    }
  };

  const shebang = ts.getShebang(sourceFile.getFullText());
  if (shebang) mark(0, shebang.length);
  for (const range of collectCommentRanges(sourceFile)) {
    mark(range.pos, range.end);
  }
  return numbers;
}

export function countLineCommentsSimple(lines: readonly string[]): number {
  return lines.filter((line) => line.trim().startsWith(LINE_COMMENT)).length;
}

function hasLexicalErrors(diagnostics: readonly ts.Diagnostic[]): boolean {
  return diagnostics.some((diagnostic) => LEXICAL_DIAGNOSTIC_CODES.has(diagnostic.code));
}

export function analyzeScriptFile(filePath: string, source: SourceText): FileStatistics {
  const { text, lines } = source;
  const language = scriptLanguage(filePath);
  const blankLines = countBlankLines(lines);

  let parsed: ParsedScript | null = null;
  try {
    parsed = parseScript(filePath, text);
  } catch {
    parsed = null;
  }

  let structure = NO_STRUCTURE;
  if (parsed && parsed.diagnostics.length === 0) {
    try {
      structure = analyzeStructure(parsed.sourceFile);
    } catch {
      structure = NO_STRUCTURE;
    }
  }

  let commentLines = countLineCommentsSimple(lines);
  if (parsed && !hasLexicalErrors(parsed.diagnostics)) {
    try {
      commentLines = commentLineNumbers(parsed.sourceFile, lines).size;
    } catch {
      commentLines = countLineCommentsSimple(lines);
    }
  }

  return createFileStatistics({
    path: filePath,
    language,
    totalLines: lines.length,
    blankLines,
    commentLines,
    metadata: { kind: 'script', ...structure },
  });
}
