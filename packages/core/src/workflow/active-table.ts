import type { AnalysisState } from '../analysis/state.js';

export interface RetentionPolicy {
  /** Upper bound on retained analyses; only finished ones are dropped to meet it. */
  maxEntries?: number;
  /** Finished analyses older than this (by completion time) are dropped. */
  ttlMs?: number;
}

export const DEFAULT_RETENTION: Required<RetentionPolicy> = {
  maxEntries: 1000,
  ttlMs: 60 * 60 * 1000,
};

/**
 * In-memory index of running and recently finished analyses. Pruning is
 * lazy: it runs on registration and lookup. Running analyses are never
 * pruned.
 */
export class ActiveAnalyses {
  private readonly entries = new Map<string, AnalysisState>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;

  constructor(policy: RetentionPolicy = {}, private readonly now: () => number = Date.now) {
    this.maxEntries = policy.maxEntries ?? DEFAULT_RETENTION.maxEntries;
    this.ttlMs = policy.ttlMs ?? DEFAULT_RETENTION.ttlMs;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Adds a state under its analysis id. Returns false, leaving the table
   * untouched, when an analysis with that id is still running.
   */
  register(state: AnalysisState): boolean {
    const existing = this.entries.get(state.analysisId);
    if (existing && !existing.isTerminal) return false;

    this.entries.delete(state.analysisId);
    this.entries.set(state.analysisId, state);
    this.prune();
    return true;
  }

  get(analysisId: string): AnalysisState | undefined {
    this.prune();
    return this.entries.get(analysisId);
  }

  /** Removes a finished analysis. Running analyses stay put. */
  evict(analysisId: string): boolean {
    const existing = this.entries.get(analysisId);
    if (!existing || !existing.isTerminal) return false;
    return this.entries.delete(analysisId);
  }

  /** Applies the retention policy; returns how many entries were dropped. */
  prune(): number {
    let dropped = 0;
    const now = this.now();

    for (const [id, state] of this.entries) {
      const completedAt = state.completedAt;
      if (completedAt && now - completedAt.getTime() > this.ttlMs) {
        this.entries.delete(id);
        dropped++;
      }
    }

    if (this.entries.size > this.maxEntries) {
      const finished = [...this.entries.values()]
        .filter(s => s.completedAt !== null)
        .sort((a, b) => completedTime(a) - completedTime(b));
      for (const state of finished) {
        if (this.entries.size <= this.maxEntries) break;
        this.entries.delete(state.analysisId);
        dropped++;
      }
    }

    return dropped;
  }
}

function completedTime(state: AnalysisState): number {
  return state.completedAt?.getTime() ?? Number.POSITIVE_INFINITY;
}
