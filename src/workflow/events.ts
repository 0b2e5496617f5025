/**
 * Workflow lifecycle events.
 *
 * @module workflow/events
 */

import type {
  ClassificationResult,
  InvocableStage,
  StageErrorRecord,
  WorkflowPattern,
  WorkflowResult,
} from './types.js';

interface EventBase {
  workflowId: string;
  contextId: string;
  at: string;
}

export interface WorkflowStartedEvent extends EventBase {
  type: 'started';
  pattern: WorkflowPattern;
  classification: ClassificationResult;
  stages: InvocableStage[];
}

export interface WorkflowProgressEvent extends EventBase {
  type: 'progress';
  stage: InvocableStage;
  agent?: string;
  status: 'running' | 'succeeded';
  /** 1-based position of the stage among the invocable stages */
  index: number;
  total: number;
  /** Stage output text once the stage succeeded */
  text?: string;
}

export interface WorkflowCompletedEvent extends EventBase {
  type: 'completed';
  result: WorkflowResult;
}

export interface WorkflowFailedEvent extends EventBase {
  type: 'failed';
  error: StageErrorRecord;
  result: WorkflowResult;
}

export type WorkflowEvent =
  | WorkflowStartedEvent
  | WorkflowProgressEvent
  | WorkflowCompletedEvent
  | WorkflowFailedEvent;

export type WorkflowEventListener = (event: WorkflowEvent) => void | Promise<void>;

function label(stage: InvocableStage, agent?: string): string {
  return `[${(agent ?? stage).toUpperCase()}]`;
}

/**
 * One human-readable line per event.
 */
export function describeEvent(event: WorkflowEvent): string {
  switch (event.type) {
    case 'started':
      return `Workflow ${event.workflowId} started (${event.pattern}: ${event.stages.join(' -> ')})`;
    case 'progress':
      return event.status === 'running'
        ? `${label(event.stage, event.agent)} ${event.stage} started (${event.index}/${event.total})`
        : `${label(event.stage, event.agent)} ${event.stage} completed (${event.index}/${event.total})`;
    case 'completed':
      return `Workflow ${event.workflowId} completed (${event.result.results.length} stages)`;
    case 'failed':
      return `${label(event.error.stage, event.error.agent)} ${event.error.stage} failed: ${event.error.message}`;
  }
}
