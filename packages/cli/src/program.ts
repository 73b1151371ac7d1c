import { Command } from 'commander';
import chalk from 'chalk';
import { hasAnyApiKey, loadConfigWithMeta } from './config/index.js';
import { setConfig, type GlobalOptions } from './context.js';
import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerShowCommand, registerListCommand } from './commands/show.js';
import { registerAgentsCommand } from './commands/agents.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('factsieve')
    .description('Multi-agent fact extraction and verification for documents')
    .version(VERSION)
    .option('-v, --verbose', 'Print each verified claim')
    .option('--json', 'Machine-readable JSON output')
    .option('-c, --config <path>', 'Path to config file');

  registerAnalyzeCommand(program);
  registerShowCommand(program);
  registerListCommand(program);
  registerAgentsCommand(program);

  program.hook('preAction', (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals<GlobalOptions>();
    const { config, configFileExists, envKeysUsed } = loadConfigWithMeta({ configPath: opts.config });

    if (!configFileExists && envKeysUsed.length > 0 && !opts.json) {
      console.error(chalk.cyan(`  Using ${envKeysUsed.join(', ')} from environment.`));
    }

    if (actionCommand.name() === 'analyze' && !hasAnyApiKey(config)) {
      console.error(chalk.red('No API key found.\n'));
      console.error(chalk.white('Set one of:'));
      console.error(chalk.green('  export ANTHROPIC_API_KEY=...'));
      console.error(chalk.green('  export OPENAI_API_KEY=...'));
      console.error(chalk.green('  export GEMINI_API_KEY=...\n'));
      console.error(chalk.white('or add providers.<name>.api_key to factsieve.config.yaml.'));
      process.exit(1);
    }

    setConfig(config);
  });

  return program;
}
