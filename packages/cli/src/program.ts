import { Command } from 'commander';
import { registerCompareCommand } from './commands/compare-cmd.js';

export function createProgram(version: string): Command {
  const program = new Command();
  program
    .name('perf-compare')
    .description('Compare benchmark timings against a baseline and report regressions')
    .version(version);

  registerCompareCommand(program);

  return program;
}
