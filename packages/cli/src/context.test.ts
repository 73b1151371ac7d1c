import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { resolve } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from './config/index.js';
import { commandContext, resetConfig, setConfig } from './context.js';

function parsedCommand(...flags: string[]): Command {
  const program = new Command().option('-v, --verbose').option('--json');
  const child = program.command('show').action(() => {});
  program.parse(['node', 'factsieve', ...flags, 'show']);
  return child;
}

beforeEach(() => {
  chalk.level = 0;
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  resetConfig();
  process.exitCode = undefined;
});

describe('commandContext', () => {
  it('refuses to run before the config is loaded', () => {
    expect(() => commandContext(parsedCommand())).toThrow('Config not loaded before "show" ran.');
  });

  it('exposes the config and global flags', () => {
    const config = loadConfig({ configPath: '/nonexistent/factsieve.config.yaml' });
    setConfig(config);

    const ctx = commandContext(parsedCommand('--verbose'));

    expect(ctx.config).toBe(config);
    expect(ctx.verbose).toBe(true);
    expect(ctx.json).toBe(false);
    expect(ctx.store().dir).toBe(resolve(config.defaults.output_dir));
    expect(ctx.store('/tmp/elsewhere').dir).toBe('/tmp/elsewhere');
  });

  it('prints formatted lines, or JSON under --json', () => {
    setConfig(loadConfig({ configPath: '/nonexistent/factsieve.config.yaml' }));

    commandContext(parsedCommand()).print({ id: 1 }, () => ['id 1']);
    commandContext(parsedCommand('--json')).print({ id: 1 }, () => ['id 1']);

    expect(vi.mocked(console.log).mock.calls).toEqual([['id 1'], ['{\n  "id": 1\n}']]);
  });

  it('reports failures in the output mode and sets exit code 1', () => {
    setConfig(loadConfig({ configPath: '/nonexistent/factsieve.config.yaml' }));

    commandContext(parsedCommand()).fail('Analysis not found: a-1');
    commandContext(parsedCommand('--json')).fail('Analysis not found: a-1');

    expect(vi.mocked(console.error).mock.calls).toEqual([
      ['Analysis not found: a-1'],
      ['{"error":"Analysis not found: a-1"}'],
    ]);
    expect(process.exitCode).toBe(1);
  });
});
