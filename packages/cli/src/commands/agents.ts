import { Command } from 'commander';
import { resolve } from 'node:path';
import { AgentRegistry, toolsForRole } from '@factsieve/core';
import { commandContext } from '../context.js';
import { formatAgent } from '../reporter/format.js';

export function registerAgentsCommand(program: Command): void {
  program
    .command('agents')
    .description('List configured agents with their models, sub-agents and tools')
    .action((_options: unknown, command: Command) => {
      const ctx = commandContext(command);
      const { config } = ctx;

      let registry: AgentRegistry;
      try {
        registry = AgentRegistry.load(resolve(config.workflow.agents_file), { defaultModel: config.defaults.model });
      } catch (err) {
        ctx.fail(err instanceof Error ? err.message : String(err));
        return;
      }

      const agents = registry.list().map(agent => ({ ...agent, tools: toolsForRole(agent.name) }));

      ctx.print(agents, () => agents.flatMap(agent => formatAgent(agent, agent.tools)));
    });
}
