// Errors
export {
  FactsieveError,
  ConfigMissingError,
  ConfigInvalidError,
  NotFoundError,
  ExecutorNotConfiguredError,
  ExecutionFailedError,
  DecodeError,
  InvalidTransitionError,
  messageOf,
  toError,
} from './errors.js';
export type { FactsieveErrorCode } from './errors.js';

// Agents
export { AgentRegistry } from './agents/registry.js';
export type { RegistryLoadOptions } from './agents/registry.js';
export { DEFAULT_AGENT_MODEL, AgentsFileSchema } from './agents/schema.js';
export type { AgentDefinition, AgentEntry, AgentsFile } from './agents/schema.js';
export { AGENT_ROLES, ALL_TOOLS, ROLE_TOOLS, isAgentRole, toolsForRole } from './agents/roles.js';
export type { AgentRole } from './agents/roles.js';

// Tools
export { ToolSessionProvider } from './tools/provider.js';
export { loadMCPServers, parseMCPServers, MCPServersFileSchema } from './tools/servers.js';

// Router
export { ProviderRegistry, parseModelId, detectProvider } from './router/providers.js';
export type { ProviderConfig, ProviderId, ModelRef } from './router/providers.js';
export { callLLM } from './router/llm.js';
export type { LLMCallOptions, LLMResponse, LLMToolCall } from './router/llm.js';
export { DeadlineError } from './router/retry.js';
export type { RetryPolicy } from './router/retry.js';

// Executor
export { AgentExecutor, DEFAULT_TASK_TIMEOUT_MS, renderContext } from './executor/executor.js';
export type { AgentExecutorOptions, TaskContext } from './executor/executor.js';
export { createLLMRunner } from './executor/runner.js';
export type { AgentRunner, AgentRunRequest, LLMRunnerOptions } from './executor/runner.js';

// Analysis
export {
  AnalysisState,
  ANALYSIS_STATUSES,
  isTerminalStatus,
  canTransition,
} from './analysis/state.js';
export type {
  AnalysisStatus,
  DocumentMetadata,
  ExtractedClaim,
  VerificationResult,
  QualityReview,
  AgentLogEntry,
  Clock,
} from './analysis/state.js';
export {
  extractJson,
  decodeMetadata,
  decodeClaims,
  decodeVerification,
  decodeQualityReview,
} from './analysis/decode.js';
export type { ClaimDraft } from './analysis/decode.js';

// Workflow
export { WorkflowOrchestrator, PHASES } from './workflow/orchestrator.js';
export type {
  AnalysisRequest,
  OrchestratorOptions,
  PhaseName,
  PhaseDefinition,
  SkippedExecutor,
  WorkflowEvents,
  AnalysisStartEvent,
  PhaseStartEvent,
  PhaseCompleteEvent,
  PhaseErrorEvent,
  ClaimVerifiedEvent,
  AnalysisCompleteEvent,
  ToolUnavailableEvent,
} from './workflow/orchestrator.js';
export { ActiveAnalyses, DEFAULT_RETENTION } from './workflow/active-table.js';
export type { RetentionPolicy } from './workflow/active-table.js';
export { Semaphore } from './workflow/semaphore.js';

// Output
export {
  AnalysisRecordSchema,
  toAnalysisRecord,
  formatAnalysisJson,
  parseAnalysisJson,
} from './output/json.js';
export type { AnalysisRecord } from './output/json.js';
