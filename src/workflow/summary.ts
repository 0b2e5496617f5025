/**
 * Merge stage outputs into the final response.
 *
 * @module workflow/summary
 */

import type { StageResult } from './types.js';

export const EMPTY_SUMMARY = 'Workflow completed.';

function previewText(result: StageResult): string {
  const payload = result.payload;
  if (!payload) {
    return '';
  }
  if (payload.text) {
    return payload.text;
  }
  const preview = payload.data ?? payload.dataParts[payload.dataParts.length - 1];
  return preview === undefined ? '' : JSON.stringify(preview);
}

/**
 * Join successful stage outputs as `[AGENT]` blocks. A stage without text
 * is previewed by its data.
 */
export function summarizeResults(results: readonly StageResult[]): string {
  const blocks = results
    .filter((result) => result.success)
    .map((result) => ({ name: result.agent ?? result.stage, text: previewText(result) }))
    .filter((block) => block.text.length > 0)
    .map((block) => `[${block.name.toUpperCase()}]\n${block.text}`);

  return blocks.length > 0 ? blocks.join('\n\n') : EMPTY_SUMMARY;
}

export interface SummaryData {
  workflow_summary: {
    stages_executed: string[];
    total_stages: number;
  };
  stage_results: Record<string, { agent?: string; data: unknown; data_parts: unknown[] }>;
}

/**
 * Structured companion to {@link summarizeResults}.
 */
export function buildSummaryData(results: readonly StageResult[]): SummaryData {
  const successful = results.filter((result) => result.success);
  const stageResults: SummaryData['stage_results'] = {};
  for (const result of successful) {
    stageResults[result.stage] = {
      agent: result.agent,
      data: result.payload?.data ?? null,
      data_parts: result.payload?.dataParts ?? [],
    };
  }
  return {
    workflow_summary: {
      stages_executed: successful.map((result) => result.stage),
      total_stages: successful.length,
    },
    stage_results: stageResults,
  };
}
