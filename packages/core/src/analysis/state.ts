import { InvalidTransitionError } from '../errors.js';

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

/** Workflow progress, in order. `failed` may follow any non-terminal status. */
export const ANALYSIS_STATUSES = [
  'queued',
  'processing',
  'document_parsing',
  'claim_extraction',
  'verification',
  'report_generation',
  'quality_review',
  'completed',
  'failed',
] as const;

export type AnalysisStatus = typeof ANALYSIS_STATUSES[number];

export function isTerminalStatus(status: AnalysisStatus): boolean {
  return status === 'completed' || status === 'failed';
}

export function canTransition(from: AnalysisStatus, to: AnalysisStatus): boolean {
  if (isTerminalStatus(from)) return false;
  if (to === 'failed') return true;
  return ANALYSIS_STATUSES.indexOf(to) > ANALYSIS_STATUSES.indexOf(from);
}

// ---------------------------------------------------------------------------
// Phase outputs
// ---------------------------------------------------------------------------

export interface DocumentMetadata {
  title: string | null;
  authors: string[];
  publicationDate: string | null;
  institution: string | null;
  abstract: string | null;
  keywords: string[];
}

export interface ExtractedClaim {
  /** `claim-<n>`, assigned in extraction order. */
  id: string;
  text: string;
  /** Open tag such as quantitative, qualitative or causal. */
  type: string;
  location: string | null;
  /** In [0, 1]. */
  confidence: number;
  supportingText: string | null;
}

export interface VerificationResult {
  claimId: string;
  claimText: string;
  /** Open tag: supported, contradicted, uncertain, unverifiable or agent-specific. */
  verificationStatus: string;
  /** In [0, 100], unlike claim confidence. */
  confidence: number;
  supportingSources: string[];
  contradictingSources: string[];
  notes: string | null;
}

export interface QualityReview {
  feedback: string | null;
  confidence: number | null;
  approvedForPublication: boolean;
}

export interface AgentLogEntry {
  timestamp: Date;
  /** Per-analysis counter; orders entries that share a timestamp. */
  sequence: number;
  message: string;
}

export type Clock = () => Date;

// ---------------------------------------------------------------------------
// Analysis state
// ---------------------------------------------------------------------------

/**
 * Mutable record of one analysis. Owned by a single orchestrator run until
 * it reaches a terminal status, then handed to the caller.
 */
export class AnalysisState {
  readonly analysisId: string;
  readonly documentId: string;
  readonly startedAt: Date;

  documentMetadata: DocumentMetadata | null = null;
  readonly extractedClaims: ExtractedClaim[] = [];
  readonly verifications: VerificationResult[] = [];
  reportContent: string | null = null;
  qaFeedback: string | null = null;
  qaConfidence: number | null = null;
  approvedForPublication = false;
  readonly errors: string[] = [];
  readonly agentLogs: Record<string, AgentLogEntry[]> = {};

  private _status: AnalysisStatus = 'queued';
  private _completedAt: Date | null = null;
  private sequence = 0;
  private readonly clock: Clock;

  constructor(analysisId: string, documentId: string, clock: Clock = () => new Date()) {
    this.analysisId = analysisId;
    this.documentId = documentId;
    this.clock = clock;
    this.startedAt = clock();
  }

  get status(): AnalysisStatus {
    return this._status;
  }

  get completedAt(): Date | null {
    return this._completedAt;
  }

  get isTerminal(): boolean {
    return isTerminalStatus(this._status);
  }

  /** Moves to a later status. Use complete() and fail() for terminal ones. */
  advance(next: AnalysisStatus): void {
    if (isTerminalStatus(next) || !canTransition(this._status, next)) {
      throw new InvalidTransitionError(this._status, next);
    }
    this._status = next;
  }

  complete(): void {
    this.finish('completed');
  }

  fail(): void {
    this.finish('failed');
  }

  private finish(status: 'completed' | 'failed'): void {
    if (!canTransition(this._status, status)) {
      throw new InvalidTransitionError(this._status, status);
    }
    this._status = status;
    this._completedAt = this.clock();
  }

  addLog(agent: string, message: string): void {
    const entry: AgentLogEntry = { timestamp: this.clock(), sequence: this.sequence++, message };
    (this.agentLogs[agent] ??= []).push(entry);
  }

  addError(message: string): void {
    this.errors.push(message);
  }

  addClaim(claim: ExtractedClaim): void {
    if (this.verifications.length > 0) {
      throw new Error('Cannot add claims after verification has started');
    }
    this.extractedClaims.push(claim);
  }

  /** Appends the verification of the next unverified claim. */
  addVerification(result: VerificationResult): void {
    const expected = this.extractedClaims[this.verifications.length];
    if (!expected || expected.id !== result.claimId) {
      throw new Error(`Verification for ${result.claimId} is out of claim order`);
    }
    this.verifications.push(result);
  }

  applyQualityReview(review: QualityReview): void {
    this.qaFeedback = review.feedback;
    this.qaConfidence = review.confidence;
    this.approvedForPublication = review.approvedForPublication;
  }

  /** Every log entry across agents, in the order it was recorded. */
  timeline(): Array<AgentLogEntry & { agent: string }> {
    return Object.entries(this.agentLogs)
      .flatMap(([agent, entries]) => entries.map(e => ({ ...e, agent })))
      .sort((a, b) => a.sequence - b.sequence);
  }
}
