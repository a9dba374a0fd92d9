/**
 * Filesystem scanner: walks a project and builds the statistics tree
 */

import * as fs from 'fs';
import * as path from 'path';
import { errorMessage, Logger, logger as defaultLogger, ProjectPathError } from '../../core/index.js';
import { Analyzer, runAnalyzer, selectAnalyzer } from '../analyzers/index.js';
import { createLanguageRegistry, extensionOf, LanguageRegistry } from '../languages/registry.js';
import { DirectoryStatistics } from '../models/directory-statistics.js';
import type { FileStatistics } from '../models/file-statistics.js';

export const DEFAULT_IGNORED_DIRS: ReadonlySet<string> = new Set([
  // Python
  'venv',
  'env',
  '.venv',
  '__pycache__',
  '.eggs',
  '.pytest_cache',
  '.tox',
  '.mypy_cache',
  // Node.js
  'node_modules',
  '.npm',
  // Version control
  '.git',
  '.svn',
  '.hg',
  '.bzr',
  // IDEs
  '.idea',
  '.vscode',
  '.vs',
  '.eclipse',
  '.settings',
  // Build output
  'build',
  'dist',
  'target',
  'out',
  'bin',
  'obj',
  // Misc
  '.cache',
  'tmp',
  'temp',
  'logs',
  'coverage',
]);

const IGNORED_DIR_SUFFIXES = ['.egg-info'];

export type FileAnalyzer = (
  analyzer: Analyzer,
  filePath: string,
  registry: LanguageRegistry,
) => FileStatistics;

export type DirectoryReader = (dir: string) => fs.Dirent[];

function readDirectoryEntries(dir: string): fs.Dirent[] {
  return fs.readdirSync(dir, { withFileTypes: true });
}

export interface AnalyzeOptions {
  registry?: LanguageRegistry;
  /** Only files with these extensions are analyzed (see normalizeExtensions). */
  extensions?: Iterable<string>;
  /** Directory names skipped on top of DEFAULT_IGNORED_DIRS. */
  ignoreDirs?: Iterable<string>;
  logger?: Logger;
  analyzeFile?: FileAnalyzer;
  readDirectory?: DirectoryReader;
}

interface WalkContext {
  registry: LanguageRegistry;
  extensions: ReadonlySet<string> | undefined;
  ignoreDirs: ReadonlySet<string>;
  logger: Logger;
  analyzeFile: FileAnalyzer;
  readDirectory: DirectoryReader;
}

/**
 * Lowercase, dot-prefixed, de-duplicated extensions ("py" → ".py").
 * Undefined when nothing is left, meaning "no restriction".
 */
export function normalizeExtensions(
  extensions: Iterable<string> | undefined,
): Set<string> | undefined {
  if (!extensions) return undefined;
  const normalized = new Set<string>();
  for (const raw of extensions) {
    const trimmed = raw.trim().toLowerCase();
    if (!trimmed || trimmed === '.') continue;
    normalized.add(trimmed.startsWith('.') ? trimmed : `.${trimmed}`);
  }
  return normalized.size > 0 ? normalized : undefined;
}

function isHidden(name: string): boolean {
  return name.startsWith('.');
}

export function shouldIgnoreDirectory(name: string, extra: ReadonlySet<string> = new Set()): boolean {
  if (isHidden(name)) return true;
  if (DEFAULT_IGNORED_DIRS.has(name) || extra.has(name)) return true;
  return IGNORED_DIR_SUFFIXES.some((suffix) => name.endsWith(suffix));
}

function compareNames(a: fs.Dirent, b: fs.Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Symlinked files are followed; symlinked directories are not, so a link
 * cycle cannot recurse forever.
 */
function entryKind(entry: fs.Dirent, fullPath: string): 'file' | 'directory' | null {
  if (entry.isFile()) return 'file';
  if (entry.isDirectory()) return 'directory';
  if (!entry.isSymbolicLink()) return null;
  const target = fs.statSync(fullPath, { throwIfNoEntry: false });
  return target?.isFile() ? 'file' : null;
}

function analyzeEntry(fullPath: string, name: string, context: WalkContext): FileStatistics | null {
  if (isHidden(name)) return null;
  if (context.extensions && !context.extensions.has(extensionOf(name))) return null;

  const analyzer = selectAnalyzer(context.registry, name);
  if (!analyzer) return null;

  try {
    return context.analyzeFile(analyzer, fullPath, context.registry);
  } catch (error) {
    context.logger.warn(`Failed to analyze ${fullPath}: ${errorMessage(error)}`);
    return null;
  }
}

function walkDirectory(dir: string, context: WalkContext): DirectoryStatistics {
  const stats = new DirectoryStatistics(dir);

  let entries: fs.Dirent[];
  try {
    entries = context.readDirectory(dir);
  } catch (error) {
    context.logger.warn(`Skipping unreadable directory ${dir}: ${errorMessage(error)}`);
    return stats;
  }

  for (const entry of entries.sort(compareNames)) {
    const fullPath = path.join(dir, entry.name);
    let kind: 'file' | 'directory' | null;
    try {
      kind = entryKind(entry, fullPath);
    } catch (error) {
      context.logger.debug(`Skipping ${fullPath}: ${errorMessage(error)}`);
      continue;
    }

    if (kind === 'file') {
      const file = analyzeEntry(fullPath, entry.name, context);
      if (file) stats.files.push(file);
    } else if (kind === 'directory') {
      if (shouldIgnoreDirectory(entry.name, context.ignoreDirs)) {
        context.logger.debug(`Ignoring directory ${fullPath}`);
        continue;
      }
      const subdir = walkDirectory(fullPath, context);
      if (subdir.totalFiles > 0) stats.subdirectories.push(subdir);
    }
  }

  return stats;
}

/**
 * Fail unless `rootPath` exists and is a directory. These are the only errors
 * a scan raises; everything below the root is contained and logged.
 */
export function assertProjectRoot(rootPath: string): void {
  const stat = fs.statSync(rootPath, { throwIfNoEntry: false });
  if (!stat) {
    throw new ProjectPathError(`Path does not exist: ${rootPath}`, rootPath, 'PATH_NOT_FOUND');
  }
  if (!stat.isDirectory()) {
    throw new ProjectPathError(
      `Path is not a directory: ${rootPath}`,
      rootPath,
      'NOT_A_DIRECTORY',
    );
  }
}

/**
 * Analyze every supported file under `rootPath`. Directories without any
 * analyzed file are pruned, and each directory's files end up ordered by line
 * count, largest first.
 */
export function analyzeProject(rootPath: string, options: AnalyzeOptions = {}): DirectoryStatistics {
  const root = path.resolve(rootPath);
  assertProjectRoot(root);

  const context: WalkContext = {
    registry: options.registry ?? createLanguageRegistry(),
    extensions: normalizeExtensions(options.extensions),
    ignoreDirs: new Set(options.ignoreDirs ?? []),
    logger: options.logger ?? defaultLogger,
    analyzeFile: options.analyzeFile ?? runAnalyzer,
    readDirectory: options.readDirectory ?? readDirectoryEntries,
  };

  const stats = walkDirectory(root, context);
  stats.sortFilesBySize();
  return stats;
}
