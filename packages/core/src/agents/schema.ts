import { z } from 'zod';

export const DEFAULT_AGENT_MODEL = 'anthropic/claude-sonnet-4-0';

export const AgentEntrySchema = z.object({
  model: z.string().min(1).optional(),
  instruction: z.string().optional(),
  sub_agents: z.array(z.string()).optional(),
}).strict();

export const AgentsFileSchema = z.object({
  agents: z.record(z.string(), AgentEntrySchema.nullable()),
});

export type AgentEntry = z.infer<typeof AgentEntrySchema>;
export type AgentsFile = z.infer<typeof AgentsFileSchema>;

export interface AgentDefinition {
  name: string;
  /** Model id; `provider/model` or a bare model name. */
  model: string;
  instruction: string;
  subAgents: string[];
}
