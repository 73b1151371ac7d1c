import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import {
  formatAnalysisJson,
  parseAnalysisJson,
  type AnalysisRecord,
  type AnalysisState,
} from '@factsieve/core';

export interface StoredAnalysisSummary {
  analysisId: string;
  documentId: string;
  status: AnalysisRecord['status'];
  startedAt: string;
  claims: number;
  errors: number;
}

/** File-backed store: one `<analysisId>.json` per finished analysis. */
export class AnalysisStore {
  readonly dir: string;

  constructor(outputDir: string) {
    this.dir = resolve(outputDir);
  }

  pathFor(analysisId: string): string {
    return join(this.dir, `${analysisId}.json`);
  }

  save(state: AnalysisState): string {
    mkdirSync(this.dir, { recursive: true });
    const path = this.pathFor(state.analysisId);
    writeFileSync(path, formatAnalysisJson(state) + '\n', 'utf-8');
    return path;
  }

  load(analysisId: string): AnalysisRecord | undefined {
    const path = this.pathFor(analysisId);
    if (!existsSync(path)) return undefined;
    return parseAnalysisJson(readFileSync(path, 'utf-8'));
  }

  /** Stored analyses, newest first. Files that do not parse are skipped. */
  list(onInvalid?: (file: string, error: Error) => void): StoredAnalysisSummary[] {
    if (!existsSync(this.dir)) return [];

    const summaries: StoredAnalysisSummary[] = [];
    for (const file of readdirSync(this.dir).filter(f => f.endsWith('.json')).sort()) {
      try {
        const record = parseAnalysisJson(readFileSync(join(this.dir, file), 'utf-8'));
        summaries.push({
          analysisId: record.analysisId,
          documentId: record.documentId,
          status: record.status,
          startedAt: record.startedAt,
          claims: record.extractedClaims.length,
          errors: record.errors.length,
        });
      } catch (err) {
        onInvalid?.(file, err instanceof Error ? err : new Error(String(err)));
      }
    }
    return summaries.sort((a, b) => b.startedAt.localeCompare(a.startedAt));
  }
}
