import { Command } from 'commander';
import chalk from 'chalk';
import { randomUUID } from 'node:crypto';
import { resolve } from 'node:path';
import {
  AgentRegistry,
  ProviderRegistry,
  ToolSessionProvider,
  WorkflowOrchestrator,
  createLLMRunner,
  loadMCPServers,
  toAnalysisRecord,
} from '@factsieve/core';
import { commandContext } from '../context.js';
import type { Config } from '../config/index.js';
import { intakeDocument, type IntakeResult } from '../intake.js';
import { attachHeadlessReporter } from '../reporter/headless.js';
import { formatSummary } from '../reporter/format.js';

interface AnalyzeOptions {
  concurrency?: string;
  outputDir?: string;
}

/** Builds the orchestrator once per process from the loaded config. */
export function createOrchestrator(config: Config, overrides: { verificationConcurrency?: number } = {}): WorkflowOrchestrator {
  const registry = AgentRegistry.load(resolve(config.workflow.agents_file), { defaultModel: config.defaults.model });
  const servers = loadMCPServers(resolve(config.workflow.mcp_servers_file));
  const tools = ToolSessionProvider.fromServers(servers, (serverName, error) => {
    console.error(chalk.yellow(`Warning: MCP server "${serverName}" failed to close: ${error.message}`));
  });

  const providers = new ProviderRegistry({
    providers: {
      anthropic: { apiKey: config.providers.anthropic.api_key },
      openai: { apiKey: config.providers.openai.api_key },
      google: { apiKey: config.providers.google.api_key },
    },
  });

  return new WorkflowOrchestrator(registry, tools, {
    runner: createLLMRunner(providers, { maxToolSteps: config.workflow.max_tool_steps }),
    timeoutMs: config.workflow.timeout_ms,
    verificationConcurrency: overrides.verificationConcurrency ?? config.workflow.verification_concurrency,
    retention: {
      maxEntries: config.workflow.retention.max_entries,
      ttlMs: config.workflow.retention.ttl_ms,
    },
  });
}

function parseConcurrency(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`--concurrency must be a positive integer, got "${value}"`);
  }
  return n;
}

export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Run the five-phase analysis workflow on a document')
    .argument('<file>', 'Document to analyze')
    .option('--concurrency <n>', 'Claims verified at once')
    .option('--output-dir <dir>', 'Where the analysis JSON is written')
    .action(async (file: string, options: AnalyzeOptions, command: Command) => {
      const ctx = commandContext(command);
      const { config } = ctx;

      let orchestrator: WorkflowOrchestrator;
      let intake: IntakeResult;
      try {
        const verificationConcurrency = parseConcurrency(options.concurrency);
        intake = intakeDocument(resolve(file), resolve(config.defaults.documents_dir));
        orchestrator = createOrchestrator(config, { verificationConcurrency });
      } catch (err) {
        ctx.fail(err instanceof Error ? err.message : String(err));
        return;
      }

      if (!ctx.json) {
        for (const skipped of orchestrator.skippedExecutors) {
          console.error(chalk.yellow(`Warning: agent "${skipped.agent}" skipped: ${skipped.error.message}`));
        }
        console.log('');
        console.log(chalk.cyan.bold('factsieve') + chalk.dim(` | ${intake.fileName}`));
        console.log('');
      }

      const detach = ctx.json ? () => {} : attachHeadlessReporter(orchestrator, { verbose: ctx.verbose });
      const store = ctx.store(options.outputDir);

      try {
        const state = await orchestrator.executeAnalysis({
          analysisId: randomUUID(),
          documentId: intake.documentId,
          documentPath: intake.storedPath,
          documentContent: intake.content,
        });

        const savedPath = store.save(state);
        const record = toAnalysisRecord(state);

        ctx.print(record, () => ['', ...formatSummary(record, savedPath), '']);

        if (state.status === 'failed') {
          process.exitCode = 1;
        }
      } finally {
        detach();
        await orchestrator.close();
      }
    });
}
