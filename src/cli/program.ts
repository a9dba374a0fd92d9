import { Command } from 'commander';
import { registerAnalyzeCommand } from './register-analyze.js';

export const VERSION = '1.0.0';

export function createProgram(): Command {
  const program = new Command();
  program
    .name('linestat')
    .description('Count code, comment and blank lines across a project')
    .version(VERSION);
  registerAnalyzeCommand(program);
  return program;
}
