import { EventEmitter } from 'eventemitter3';
import type { AgentRegistry } from '../agents/registry.js';
import type { AgentRole } from '../agents/roles.js';
import type { AgentDefinition } from '../agents/schema.js';
import {
  decodeClaims,
  decodeMetadata,
  decodeQualityReview,
  decodeVerification,
} from '../analysis/decode.js';
import {
  AnalysisState,
  type AnalysisStatus,
  type Clock,
  type ExtractedClaim,
  type VerificationResult,
} from '../analysis/state.js';
import { ExecutorNotConfiguredError, messageOf, toError } from '../errors.js';
import { AgentExecutor, DEFAULT_TASK_TIMEOUT_MS } from '../executor/executor.js';
import type { AgentRunner } from '../executor/runner.js';
import { parseModelId } from '../router/providers.js';
import type { ToolSessionProvider } from '../tools/provider.js';
import { ActiveAnalyses, type RetentionPolicy } from './active-table.js';
import {
  claimExtractionPrompt,
  documentProcessingPrompt,
  qualityReviewPrompt,
  reportContext,
  reportPrompt,
  verificationPrompt,
} from './prompts.js';
import { Semaphore } from './semaphore.js';

// ---------------------------------------------------------------------------
// Phases
// ---------------------------------------------------------------------------

export type PhaseName =
  | 'document_processing'
  | 'claim_extraction'
  | 'verification'
  | 'report_generation'
  | 'quality_review';

export interface PhaseDefinition {
  name: PhaseName;
  label: string;
  status: AnalysisStatus;
  agent: AgentRole;
  errorPrefix: string;
}

export const PHASES: readonly PhaseDefinition[] = [
  { name: 'document_processing', label: 'Document processing', status: 'document_parsing', agent: 'document_processor', errorPrefix: 'Document processing failed' },
  { name: 'claim_extraction', label: 'Fact extraction', status: 'claim_extraction', agent: 'fact_extractor', errorPrefix: 'Fact extraction failed' },
  { name: 'verification', label: 'Verification', status: 'verification', agent: 'verification_specialist', errorPrefix: 'Verification failed' },
  { name: 'report_generation', label: 'Report generation', status: 'report_generation', agent: 'report_writer', errorPrefix: 'Report generation failed' },
  { name: 'quality_review', label: 'Quality review', status: 'quality_review', agent: 'quality_reviewer', errorPrefix: 'Quality review failed' },
];

const ORCHESTRATOR_LOG = 'orchestrator';

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface AnalysisStartEvent {
  analysisId: string;
  documentId: string;
}

export interface PhaseStartEvent {
  analysisId: string;
  phase: PhaseName;
  agent: string;
  model: string;
  phaseIndex: number;
  totalPhases: number;
}

export interface PhaseCompleteEvent {
  analysisId: string;
  phase: PhaseName;
  agent: string;
  durationMs: number;
}

export interface PhaseErrorEvent {
  analysisId: string;
  phase: PhaseName;
  agent: string;
  error: Error;
}

export interface ClaimVerifiedEvent {
  analysisId: string;
  claim: ExtractedClaim;
  result: VerificationResult;
  index: number;
  total: number;
}

export interface AnalysisCompleteEvent {
  analysisId: string;
  status: AnalysisStatus;
  errors: string[];
  durationMs: number;
}

export interface ToolUnavailableEvent {
  agent: string;
  serverName: string;
  error: Error;
}

export interface WorkflowEvents {
  'analysis:start': (event: AnalysisStartEvent) => void;
  'phase:start': (event: PhaseStartEvent) => void;
  'phase:complete': (event: PhaseCompleteEvent) => void;
  'phase:error': (event: PhaseErrorEvent) => void;
  'claim:verified': (event: ClaimVerifiedEvent) => void;
  'analysis:complete': (event: AnalysisCompleteEvent) => void;
  'tool:unavailable': (event: ToolUnavailableEvent) => void;
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export interface AnalysisRequest {
  analysisId: string;
  documentId: string;
  documentPath: string;
  documentContent: string;
}

export interface OrchestratorOptions {
  runner: AgentRunner;
  /** Deadline per agent task (default: 120s). */
  timeoutMs?: number;
  /** Claims verified at once (default: 1). */
  verificationConcurrency?: number;
  retention?: RetentionPolicy;
  clock?: Clock;
}

export interface SkippedExecutor {
  agent: string;
  error: Error;
}

/** Marks an error the failing phase has already recorded in the state. */
class PhaseFailedError extends Error {
  constructor(readonly phase: PhaseName, cause: Error) {
    super(cause.message, { cause });
    this.name = 'PhaseFailedError';
  }
}

/**
 * Drives analyses through the five phases. `executeAnalysis` never
 * rejects: failure is reported as a `failed` state with recorded errors.
 */
export class WorkflowOrchestrator extends EventEmitter<WorkflowEvents> {
  private readonly executors = new Map<string, AgentExecutor>();
  private readonly active: ActiveAnalyses;
  private readonly verificationConcurrency: number;
  private readonly clock: Clock;
  private readonly _skipped: SkippedExecutor[] = [];
  private closed = false;

  constructor(
    readonly registry: AgentRegistry,
    private readonly tools: ToolSessionProvider,
    options: OrchestratorOptions,
  ) {
    super();
    this.clock = options.clock ?? (() => new Date());
    this.verificationConcurrency = options.verificationConcurrency ?? 1;
    if (!Number.isInteger(this.verificationConcurrency) || this.verificationConcurrency < 1) {
      throw new Error('verificationConcurrency must be a positive integer');
    }
    this.active = new ActiveAnalyses(options.retention, () => this.clock().getTime());

    for (const agent of registry.list()) {
      try {
        this.executors.set(agent.name, this.createExecutor(agent, options));
      } catch (err) {
        this._skipped.push({ agent: agent.name, error: toError(err) });
      }
    }
  }

  private createExecutor(agent: AgentDefinition, options: OrchestratorOptions): AgentExecutor {
    // Rejects model ids no provider can serve.
    parseModelId(agent.model);
    return new AgentExecutor({
      agent,
      tools: this.tools,
      runner: options.runner,
      timeoutMs: options.timeoutMs ?? DEFAULT_TASK_TIMEOUT_MS,
      onToolError: (serverName, error) => {
        this.emit('tool:unavailable', { agent: agent.name, serverName, error });
      },
    });
  }

  /** Agents whose executor could not be created. */
  get skippedExecutors(): readonly SkippedExecutor[] {
    return this._skipped;
  }

  executorFor(agentName: string): AgentExecutor | undefined {
    return this.executors.get(agentName);
  }

  private requireExecutor(agentName: string): AgentExecutor {
    const executor = this.executors.get(agentName);
    if (!executor) throw new ExecutorNotConfiguredError(agentName);
    return executor;
  }

  getAnalysisState(analysisId: string): AnalysisState | undefined {
    return this.active.get(analysisId);
  }

  /** Drops a finished analysis from memory. Running ones are kept. */
  evictAnalysis(analysisId: string): boolean {
    return this.active.evict(analysisId);
  }

  async executeAnalysis(request: AnalysisRequest): Promise<AnalysisState> {
    const state = new AnalysisState(request.analysisId, request.documentId, this.clock);

    if (!this.active.register(state)) {
      state.addError(`Analysis ${request.analysisId} is already running`);
      state.fail();
      return state;
    }

    this.shielded(state, 'analysis:start', () => {
      this.emit('analysis:start', { analysisId: state.analysisId, documentId: state.documentId });
    });

    try {
      state.advance('processing');
      state.addLog(ORCHESTRATOR_LOG, 'Analysis workflow started');

      for (const [index, phase] of PHASES.entries()) {
        await this.runPhase(phase, index, state, request);
      }

      state.complete();
      state.addLog(ORCHESTRATOR_LOG, 'Analysis workflow completed');
    } catch (err) {
      if (!(err instanceof PhaseFailedError)) {
        state.addError(`Workflow execution failed: ${messageOf(err)}`);
      }
      if (!state.isTerminal) state.fail();
      state.addLog(ORCHESTRATOR_LOG, 'Analysis workflow failed');
    }

    this.shielded(state, 'analysis:complete', () => {
      this.emit('analysis:complete', {
        analysisId: state.analysisId,
        status: state.status,
        errors: [...state.errors],
        durationMs: (state.completedAt ?? this.clock()).getTime() - state.startedAt.getTime(),
      });
    });
    return state;
  }

  /** A throwing listener is logged on the analysis and does not change its outcome. */
  private shielded(state: AnalysisState, event: keyof WorkflowEvents, emit: () => void): void {
    try {
      emit();
    } catch (err) {
      state.addLog(ORCHESTRATOR_LOG, `Listener for ${event} failed: ${messageOf(err)}`);
    }
  }

  private async runPhase(
    phase: PhaseDefinition,
    index: number,
    state: AnalysisState,
    request: AnalysisRequest,
  ): Promise<void> {
    state.advance(phase.status);
    const executor = this.requireExecutor(phase.agent);

    state.addLog(phase.agent, `Starting ${phase.label.toLowerCase()}`);
    this.emit('phase:start', {
      analysisId: state.analysisId,
      phase: phase.name,
      agent: executor.name,
      model: executor.model,
      phaseIndex: index,
      totalPhases: PHASES.length,
    });
    const started = Date.now();

    try {
      switch (phase.name) {
        case 'document_processing':
          await this.processDocument(executor, state, request);
          break;
        case 'claim_extraction':
          await this.extractClaims(executor, state, request);
          break;
        case 'verification':
          await this.verifyClaims(executor, state);
          break;
        case 'report_generation':
          await this.writeReport(executor, state);
          break;
        case 'quality_review':
          await this.reviewQuality(executor, state);
          break;
      }
    } catch (err) {
      const error = toError(err);
      state.addLog(phase.agent, `${phase.label} failed: ${error.message}`);
      state.addError(`${phase.errorPrefix}: ${error.message}`);
      this.emit('phase:error', { analysisId: state.analysisId, phase: phase.name, agent: executor.name, error });
      throw new PhaseFailedError(phase.name, error);
    }

    this.emit('phase:complete', {
      analysisId: state.analysisId,
      phase: phase.name,
      agent: executor.name,
      durationMs: Date.now() - started,
    });
  }

  // -------------------------------------------------------------------------
  // Phase bodies
  // -------------------------------------------------------------------------

  private async processDocument(executor: AgentExecutor, state: AnalysisState, request: AnalysisRequest): Promise<void> {
    const prompt = documentProcessingPrompt(request.documentPath, request.documentContent);
    const output = await executor.runTask(prompt, { path: request.documentPath });

    state.documentMetadata = decodeMetadata(executor.name, output);
    state.addLog(executor.name, `Extracted metadata: ${state.documentMetadata.title ?? 'untitled'}`);
  }

  private async extractClaims(executor: AgentExecutor, state: AnalysisState, request: AnalysisRequest): Promise<void> {
    const output = await executor.runTask(claimExtractionPrompt(state), {
      path: request.documentPath,
      metadata: state.documentMetadata,
    });

    const drafts = decodeClaims(executor.name, output);
    drafts.forEach((draft, i) => {
      state.addClaim({ id: `claim-${i + 1}`, ...draft });
    });
    state.addLog(executor.name, `Extracted ${drafts.length} claims`);
  }

  /**
   * One task per claim, at most `verificationConcurrency` at a time.
   * Results land in claim order; the first failed claim in that order
   * stops the phase and no further claims are started.
   */
  private async verifyClaims(executor: AgentExecutor, state: AnalysisState): Promise<void> {
    const claims = [...state.extractedClaims];
    const total = claims.length;
    const results: Array<VerificationResult | undefined> = new Array<VerificationResult | undefined>(total);
    const semaphore = new Semaphore(this.verificationConcurrency);
    const outcome: { failure?: { index: number; error: Error } } = {};
    let flushed = 0;

    const flush = () => {
      while (flushed < total) {
        const result = results[flushed];
        if (!result) break;
        state.addVerification(result);
        this.emit('claim:verified', { analysisId: state.analysisId, claim: claims[flushed], result, index: flushed, total });
        flushed++;
      }
    };

    await Promise.all(claims.map((claim, index) => semaphore.run(async () => {
      if (outcome.failure) return;
      state.addLog(executor.name, `Verifying claim ${index + 1}/${total}: ${claim.id}`);
      try {
        const output = await executor.runTask(verificationPrompt(claim), { claimId: claim.id, claim: claim.text });
        results[index] = decodeVerification(executor.name, output, claim);
        flush();
      } catch (err) {
        if (!outcome.failure || index < outcome.failure.index) {
          outcome.failure = { index, error: toError(err) };
        }
      }
    })));

    if (outcome.failure) throw outcome.failure.error;
    state.addLog(executor.name, `Verified ${state.verifications.length} claims`);
  }

  private async writeReport(executor: AgentExecutor, state: AnalysisState): Promise<void> {
    state.reportContent = await executor.runTask(reportPrompt(state), reportContext(state));
    state.addLog(executor.name, 'Report generation completed');
  }

  private async reviewQuality(executor: AgentExecutor, state: AnalysisState): Promise<void> {
    const output = await executor.runTask(qualityReviewPrompt(state), { report: state.reportContent });
    const review = decodeQualityReview(executor.name, output);
    state.applyQualityReview(review);
    state.addLog(executor.name, `Quality review completed, confidence: ${review.confidence ?? 'n/a'}`);
  }

  // -------------------------------------------------------------------------
  // Shutdown
  // -------------------------------------------------------------------------

  /** Releases every tool session. Safe to call more than once. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.tools.closeAll();
  }
}
