/**
 * Stage sequences per workflow pattern.
 *
 * @module workflow/stages
 */

import type {
  InvocableStage,
  TerminalPhase,
  WorkflowPattern,
  WorkflowPhase,
} from './types.js';

/**
 * Fixed stage sequence for each pattern.
 */
export const STAGE_SEQUENCES: Readonly<Record<WorkflowPattern, readonly WorkflowPhase[]>> = {
  DATA_ONLY: ['process_input', 'data_collection', 'complete'],
  DATA_ANALYSIS: ['process_input', 'data_collection', 'analysis', 'complete'],
  FULL_WORKFLOW: ['process_input', 'data_collection', 'analysis', 'trading', 'complete'],
};

export function getStageSequence(pattern: WorkflowPattern): readonly WorkflowPhase[] {
  return STAGE_SEQUENCES[pattern];
}

/**
 * Invocable stages of a pattern, in execution order.
 */
export function getInvocableStages(pattern: WorkflowPattern): InvocableStage[] {
  return getStageSequence(pattern).filter(isInvocableStage);
}

export function isInvocableStage(phase: WorkflowPhase): phase is InvocableStage {
  return phase === 'data_collection' || phase === 'analysis' || phase === 'trading';
}

export function isTerminalPhase(phase: WorkflowPhase): phase is TerminalPhase {
  return phase === 'complete' || phase === 'failed';
}
