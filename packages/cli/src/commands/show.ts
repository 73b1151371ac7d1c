import { Command } from 'commander';
import chalk from 'chalk';
import { commandContext } from '../context.js';
import { formatAnalysisList, formatRecord } from '../reporter/format.js';

export function registerShowCommand(program: Command): void {
  program
    .command('show')
    .description('Print a stored analysis')
    .argument('<analysisId>', 'Analysis id printed by analyze')
    .action((analysisId: string, _options: unknown, command: Command) => {
      const ctx = commandContext(command);

      const record = ctx.store().load(analysisId);
      if (!record) {
        ctx.fail(`Analysis not found: ${analysisId}`);
        return;
      }
      ctx.print(record, () => formatRecord(record));
    });
}

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List stored analyses, newest first')
    .action((_options: unknown, command: Command) => {
      const ctx = commandContext(command);

      const summaries = ctx.store().list((file, error) => {
        if (!ctx.json) console.error(chalk.yellow(`Skipping ${file}: ${error.message}`));
      });
      ctx.print(summaries, () => formatAnalysisList(summaries));
    });
}
