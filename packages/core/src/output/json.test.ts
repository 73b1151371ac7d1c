import { describe, it, expect } from 'vitest';
import { formatAnalysisJson, parseAnalysisJson, toAnalysisRecord } from './json.js';
import { AnalysisState } from '../analysis/state.js';

function makeState(): AnalysisState {
  let t = Date.UTC(2025, 5, 1, 12, 0, 0);
  const state = new AnalysisState('analysis-7', 'doc-7', () => new Date(t++));
  state.advance('processing');
  state.addLog('orchestrator', 'Analysis workflow started');
  state.documentMetadata = {
    title: 'Coffee and Focus',
    authors: ['J. Doe'],
    publicationDate: null,
    institution: null,
    abstract: null,
    keywords: [],
  };
  state.addClaim({
    id: 'claim-1',
    text: 'Coffee improves focus.',
    type: 'causal',
    location: 'p. 1',
    confidence: 0.7,
    supportingText: null,
  });
  state.addError('Verification failed: timeout');
  state.fail();
  return state;
}

describe('toAnalysisRecord', () => {
  it('serializes dates as ISO strings', () => {
    const record = toAnalysisRecord(makeState());

    expect(record.status).toBe('failed');
    expect(record.startedAt).toBe('2025-06-01T12:00:00.000Z');
    expect(record.completedAt).toBe('2025-06-01T12:00:00.002Z');
    expect(record.agentLogs).toEqual({
      orchestrator: [{ timestamp: '2025-06-01T12:00:00.001Z', sequence: 0, message: 'Analysis workflow started' }],
    });
    expect(record.errors).toEqual(['Verification failed: timeout']);
  });

  it('keeps a null completion time for unfinished analyses', () => {
    expect(toAnalysisRecord(new AnalysisState('a', 'd')).completedAt).toBeNull();
  });
});

describe('formatAnalysisJson / parseAnalysisJson', () => {
  it('reads back what it writes', () => {
    const state = makeState();
    const text = formatAnalysisJson(state);

    expect(text.startsWith('{\n  "analysisId": "analysis-7",')).toBe(true);
    expect(parseAnalysisJson(text)).toEqual(toAnalysisRecord(state));
  });

  it('rejects records with the wrong shape', () => {
    expect(() => parseAnalysisJson('{"analysisId": 3}')).toThrow(/^Invalid analysis record: analysisId: /);
  });

  it('rejects unknown statuses', () => {
    const record = { ...toAnalysisRecord(makeState()), status: 'paused' };
    expect(() => parseAnalysisJson(JSON.stringify(record))).toThrow('Invalid analysis record: status:');
  });
});
