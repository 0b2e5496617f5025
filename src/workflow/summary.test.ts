/**
 * Tests for result summaries (src/workflow/summary.ts)
 */

import { describe, it, expect } from 'vitest';
import { EMPTY_SUMMARY, buildSummaryData, summarizeResults } from './summary.js';
import type { StageResult } from './types.js';

function result(overrides: Partial<StageResult>): StageResult {
  return {
    stage: 'data_collection',
    success: true,
    elapsedMs: 1,
    startedAt: '2026-01-01T00:00:00.000Z',
    completedAt: '2026-01-01T00:00:00.001Z',
    ...overrides,
  };
}

describe('summarizeResults', () => {
  it('should join outputs as agent blocks', () => {
    const summary = summarizeResults([
      result({ agent: 'browser', payload: { text: 'AAPL 190', data: null, dataParts: [] } }),
      result({ stage: 'analysis', agent: 'executor', payload: { text: 'Uptrend', data: null, dataParts: [] } }),
    ]);

    expect(summary).toBe('[BROWSER]\nAAPL 190\n\n[EXECUTOR]\nUptrend');
  });

  it('should label by stage when no agent is known', () => {
    expect(summarizeResults([result({ payload: { text: 'rows', data: null, dataParts: [] } })])).toBe(
      '[DATA_COLLECTION]\nrows'
    );
  });

  it('should preview data when a stage has no text', () => {
    const summary = summarizeResults([
      result({ agent: 'browser', payload: { text: '', data: null, dataParts: [{ a: 1 }, { b: 2 }] } }),
    ]);

    expect(summary).toBe('[BROWSER]\n{"b":2}');
  });

  it('should skip failed and empty stages', () => {
    const summary = summarizeResults([
      result({ agent: 'browser', payload: { text: '', data: null, dataParts: [] } }),
      result({ stage: 'analysis', agent: 'executor', success: false, error: 'boom' }),
    ]);

    expect(summary).toBe(EMPTY_SUMMARY);
  });
});

describe('buildSummaryData', () => {
  it('should collect data of successful stages', () => {
    const data = buildSummaryData([
      result({ agent: 'browser', payload: { text: 'x', data: { a: 1 }, dataParts: [{ a: 1 }] } }),
      result({ stage: 'analysis', agent: 'executor', success: false, error: 'boom' }),
    ]);

    expect(data).toEqual({
      workflow_summary: { stages_executed: ['data_collection'], total_stages: 1 },
      stage_results: { data_collection: { agent: 'browser', data: { a: 1 }, data_parts: [{ a: 1 }] } },
    });
  });
});
