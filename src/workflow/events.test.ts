/**
 * Tests for workflow event descriptions (src/workflow/events.ts)
 */

import { describe, it, expect } from 'vitest';
import { ErrorCategory } from '../utils/error-handler.js';
import { describeEvent, type WorkflowEvent } from './events.js';
import type { WorkflowResult } from './types.js';

const base = { workflowId: 'wf-1', contextId: 'ctx-1', at: '2026-01-01T00:00:00.000Z' };

const result: WorkflowResult = {
  workflowId: 'wf-1',
  contextId: 'ctx-1',
  pattern: 'DATA_ANALYSIS',
  phase: 'complete',
  success: true,
  results: [],
  errors: [],
  summary: 'done',
  classification: {
    pattern: 'DATA_ANALYSIS',
    ambiguous: false,
    reason: 'analysis requested',
    signals: { collection: true, analysis: true, trading: false },
  },
};

describe('describeEvent', () => {
  it('should describe each event type', () => {
    const events: WorkflowEvent[] = [
      {
        ...base,
        type: 'started',
        pattern: 'DATA_ANALYSIS',
        classification: result.classification,
        stages: ['data_collection', 'analysis'],
      },
      { ...base, type: 'progress', stage: 'data_collection', agent: 'browser', status: 'running', index: 1, total: 2 },
      { ...base, type: 'progress', stage: 'analysis', status: 'succeeded', index: 2, total: 2, text: 'ok' },
      { ...base, type: 'completed', result },
      {
        ...base,
        type: 'failed',
        error: {
          kind: 'StageInvocationError',
          stage: 'analysis',
          agent: 'executor',
          message: 'Stage analysis failed',
          category: ErrorCategory.TIMEOUT,
          at: base.at,
        },
        result: { ...result, phase: 'failed', success: false },
      },
    ];

    expect(events.map(describeEvent)).toEqual([
      'Workflow wf-1 started (DATA_ANALYSIS: data_collection -> analysis)',
      '[BROWSER] data_collection started (1/2)',
      '[ANALYSIS] analysis completed (2/2)',
      'Workflow wf-1 completed (0 stages)',
      '[EXECUTOR] analysis failed: Stage analysis failed',
    ]);
  });
});
