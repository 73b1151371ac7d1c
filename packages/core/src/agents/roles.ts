export const AGENT_ROLES = [
  'root',
  'document_processor',
  'fact_extractor',
  'verification_specialist',
  'report_writer',
  'quality_reviewer',
] as const;

export type AgentRole = typeof AGENT_ROLES[number];

/** Wildcard entry meaning "every tool any server exposes". */
export const ALL_TOOLS = 'all';

export const ROLE_TOOLS: Record<AgentRole, readonly string[]> = {
  root: [ALL_TOOLS],
  document_processor: ['read_file', 'list_directory'],
  fact_extractor: ['read_file', 'search'],
  verification_specialist: ['search', 'query_health_data'],
  report_writer: ['write_file', 'create_issue'],
  quality_reviewer: ['read_file', 'search'],
};

export function isAgentRole(value: string): value is AgentRole {
  return AGENT_ROLES.some(role => role === value);
}

/** Tool names a role may invoke. Unknown roles get none. */
export function toolsForRole(role: string): string[] {
  return isAgentRole(role) ? [...ROLE_TOOLS[role]] : [];
}
