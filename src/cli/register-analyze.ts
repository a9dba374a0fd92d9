import type { Command } from 'commander';
import { withCliErrorHandling } from '../core/index.js';
import { runAnalyzeCommand } from './handlers.js';

export function registerAnalyzeCommand(program: Command): void {
  program
    .argument('[path]', 'Project directory to analyze', '.')
    .option('-e, --ext <ext...>', 'Only analyze files with these extensions (e.g. --ext ts md)')
    .option('-i, --ignore <dir...>', 'Extra directory names to skip')
    .option('-q, --quiet', 'Print the compact summary only')
    .option('-v, --verbose', 'Print debug output')
    .option('--dirs-only', 'Show directories only in the tree')
    .option('--json', 'Output the report as JSON')
    .option('-c, --config <file>', 'Config file (default: .linestatrc.json in the project)')
    .option('--list-extensions', 'List the supported extensions and exit')
    .action(withCliErrorHandling('analyze', runAnalyzeCommand));
}
