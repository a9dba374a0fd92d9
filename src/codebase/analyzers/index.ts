/**
 * Analyzer selection and dispatch
 */

import { readSourceText, SourceText } from '../../core/fileio.js';
import {
  extensionOf,
  LanguageRegistry,
  UNKNOWN_LANGUAGE,
} from '../languages/registry.js';
import type { FileStatistics } from '../models/file-statistics.js';
import { analyzeGenericFile } from './line-classifier.js';
import { analyzeMarkdownFile, MARKDOWN_EXTENSIONS } from './markdown.js';
import { analyzeScriptFile, SCRIPT_EXTENSIONS } from './typescript.js';

export type Analyzer =
  | { kind: 'typescript' }
  | { kind: 'markdown' }
  | { kind: 'generic'; language: string };

/**
 * Pick the analyzer for a file name, most specific first: the TypeScript
 * deep analyzer, then markdown, then the generic line classifier for any
 * extension the registry knows. Null when nothing claims the file.
 */
export function selectAnalyzer(registry: LanguageRegistry, fileName: string): Analyzer | null {
  const extension = extensionOf(fileName);
  if (SCRIPT_EXTENSIONS.has(extension)) return { kind: 'typescript' };
  if (MARKDOWN_EXTENSIONS.has(extension)) return { kind: 'markdown' };

  const language = registry.languageForExtension(extension);
  if (language === UNKNOWN_LANGUAGE) return null;
  return { kind: 'generic', language };
}

export function analyzeSource(
  analyzer: Analyzer,
  filePath: string,
  source: SourceText,
  registry: LanguageRegistry,
): FileStatistics {
  switch (analyzer.kind) {
    case 'typescript':
      return analyzeScriptFile(filePath, source);
    case 'markdown':
      return analyzeMarkdownFile(filePath, source);
    case 'generic':
      return analyzeGenericFile(filePath, analyzer.language, source.lines, registry);
  }
}

export function runAnalyzer(
  analyzer: Analyzer,
  filePath: string,
  registry: LanguageRegistry,
): FileStatistics {
  const mode = analyzer.kind === 'typescript' ? 'script' : 'text';
  return analyzeSource(analyzer, filePath, readSourceText(filePath, mode), registry);
}

/** Every extension some analyzer claims, sorted. */
export function analyzableExtensions(registry: LanguageRegistry): string[] {
  return [
    ...new Set([...registry.supportedExtensions(), ...SCRIPT_EXTENSIONS, ...MARKDOWN_EXTENSIONS]),
  ].sort();
}

export * from './line-classifier.js';
export * from './markdown.js';
export * from './typescript.js';
