import type { Command } from 'commander';
import chalk from 'chalk';
import { ConfigError, type Config } from './config/index.js';
import { AnalysisStore } from './store.js';

export interface GlobalOptions {
  verbose?: boolean;
  json?: boolean;
  config?: string;
}

/**
 * Everything a command action needs: the config loaded by the preAction
 * hook, the global flags, and output that honors `--json`.
 */
export interface CommandContext {
  config: Config;
  verbose: boolean;
  json: boolean;
  /** Store under `outputDir`, or the configured output directory. */
  store(outputDir?: string): AnalysisStore;
  /** Writes `value` as JSON under `--json`, otherwise the formatted lines. */
  print(value: unknown, lines: () => string[]): void;
  /** Reports an error on stderr and sets exit code 1. */
  fail(message: string): void;
}

let loadedConfig: Config | undefined;

export function setConfig(config: Config): void {
  loadedConfig = config;
}

export function resetConfig(): void {
  loadedConfig = undefined;
}

export function commandContext(command: Command): CommandContext {
  const config = loadedConfig;
  if (!config) {
    throw new ConfigError(`Config not loaded before "${command.name()}" ran.`);
  }
  const opts = command.optsWithGlobals<GlobalOptions>();
  const json = Boolean(opts.json);

  return {
    config,
    verbose: Boolean(opts.verbose),
    json,
    store: (outputDir) => new AnalysisStore(outputDir ?? config.defaults.output_dir),
    print(value, lines) {
      if (json) {
        console.log(JSON.stringify(value, null, 2));
        return;
      }
      for (const line of lines()) console.log(line);
    },
    fail(message) {
      console.error(json ? JSON.stringify({ error: message }) : chalk.red(message));
      process.exitCode = 1;
    },
  };
}
