import * as path from 'path';
import { createLogger, loadConfig, readIgnoreNames } from '../core/index.js';
import {
  analyzeProject,
  ConsoleReportMode,
  createLanguageRegistry,
  normalizeExtensions,
  renderConsoleReport,
  renderExtensionList,
  renderJsonReport,
} from '../codebase/index.js';

export interface AnalyzeCommandOptions {
  ext?: string[];
  ignore?: string[];
  quiet?: boolean;
  verbose?: boolean;
  json?: boolean;
  dirsOnly?: boolean;
  config?: string;
  listExtensions?: boolean;
}

const NO_FILES_ADVICE = [
  'No files analyzed.',
  '  Suggestions:',
  '  - Check that the directory contains source files',
  '  - Use --ext to pick specific extensions',
  '  - Use --list-extensions to see the supported types',
];

function reportMode(quiet: boolean, dirsOnly: boolean): ConsoleReportMode {
  if (quiet) return 'compact';
  return dirsOnly ? 'directories' : 'full';
}

/**
 * Analyze a project and print the report. CLI flags win over the config
 * file, which wins over the defaults; ignore names from the config file,
 * .linestatignore and --ignore are all applied.
 */
export async function runAnalyzeCommand(
  targetPath: string | undefined,
  options: AnalyzeCommandOptions,
): Promise<void> {
  const registry = createLanguageRegistry();

  if (options.listExtensions) {
    console.log(renderExtensionList(registry));
    return;
  }

  const projectPath = path.resolve(targetPath ?? '.');
  const config = await loadConfig(projectPath, options.config);
  const json = options.json ?? false;
  const quiet = options.quiet ?? config.quiet;
  const log = createLogger({
    verbose: !json && (options.verbose ?? false),
    quiet: quiet || json,
  });

  const extensions = options.ext && options.ext.length > 0 ? options.ext : config.extensions;
  const ignoreDirs = await readIgnoreNames(projectPath, [...config.ignore, ...(options.ignore ?? [])]);

  log.info(`Analyzing project: ${projectPath}`);
  const allowed = normalizeExtensions(extensions);
  if (allowed) log.info(`Extensions: ${[...allowed].sort().join(', ')}`);
  if (ignoreDirs.length > 0) log.debug(`Extra ignored directories: ${ignoreDirs.join(', ')}`);

  const stats = analyzeProject(projectPath, { registry, extensions, ignoreDirs, logger: log });

  if (json) {
    console.log(renderJsonReport(stats, projectPath));
    return;
  }

  if (stats.totalFiles === 0) {
    log.warn(NO_FILES_ADVICE.join('\n'));
    return;
  }

  console.log(
    renderConsoleReport(stats, projectPath, { mode: reportMode(quiet, options.dirsOnly ?? false) }),
  );
}
