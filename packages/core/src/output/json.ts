/**
 * JSON form of an analysis, as handed to persistence and read back by
 * the CLI. Dates are ISO strings.
 */

import { z } from 'zod';
import { ANALYSIS_STATUSES, type AnalysisState } from '../analysis/state.js';

const LogEntrySchema = z.object({
  timestamp: z.string(),
  sequence: z.number().int(),
  message: z.string(),
});

export const AnalysisRecordSchema = z.object({
  analysisId: z.string(),
  documentId: z.string(),
  status: z.enum(ANALYSIS_STATUSES),
  documentMetadata: z.object({
    title: z.string().nullable(),
    authors: z.array(z.string()),
    publicationDate: z.string().nullable(),
    institution: z.string().nullable(),
    abstract: z.string().nullable(),
    keywords: z.array(z.string()),
  }).nullable(),
  extractedClaims: z.array(z.object({
    id: z.string(),
    text: z.string(),
    type: z.string(),
    location: z.string().nullable(),
    confidence: z.number(),
    supportingText: z.string().nullable(),
  })),
  verifications: z.array(z.object({
    claimId: z.string(),
    claimText: z.string(),
    verificationStatus: z.string(),
    confidence: z.number(),
    supportingSources: z.array(z.string()),
    contradictingSources: z.array(z.string()),
    notes: z.string().nullable(),
  })),
  reportContent: z.string().nullable(),
  qaFeedback: z.string().nullable(),
  qaConfidence: z.number().nullable(),
  approvedForPublication: z.boolean(),
  errors: z.array(z.string()),
  startedAt: z.string(),
  completedAt: z.string().nullable(),
  agentLogs: z.record(z.string(), z.array(LogEntrySchema)),
});

export type AnalysisRecord = z.infer<typeof AnalysisRecordSchema>;

export function toAnalysisRecord(state: AnalysisState): AnalysisRecord {
  const agentLogs: AnalysisRecord['agentLogs'] = {};
  for (const [agent, entries] of Object.entries(state.agentLogs)) {
    agentLogs[agent] = entries.map(e => ({
      timestamp: e.timestamp.toISOString(),
      sequence: e.sequence,
      message: e.message,
    }));
  }

  return {
    analysisId: state.analysisId,
    documentId: state.documentId,
    status: state.status,
    documentMetadata: state.documentMetadata ? { ...state.documentMetadata } : null,
    extractedClaims: state.extractedClaims.map(c => ({ ...c })),
    verifications: state.verifications.map(v => ({ ...v })),
    reportContent: state.reportContent,
    qaFeedback: state.qaFeedback,
    qaConfidence: state.qaConfidence,
    approvedForPublication: state.approvedForPublication,
    errors: [...state.errors],
    startedAt: state.startedAt.toISOString(),
    completedAt: state.completedAt ? state.completedAt.toISOString() : null,
    agentLogs,
  };
}

export function formatAnalysisJson(state: AnalysisState): string {
  return JSON.stringify(toAnalysisRecord(state), null, 2);
}

/** Parses a stored analysis; throws with the first issues when it does not match. */
export function parseAnalysisJson(text: string): AnalysisRecord {
  const result = AnalysisRecordSchema.safeParse(JSON.parse(text));
  if (!result.success) {
    const issues = result.error.issues.slice(0, 3).map(i => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid analysis record: ${issues.join('; ')}`);
  }
  return result.data;
}
