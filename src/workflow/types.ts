/**
 * Workflow type definitions.
 *
 * @module workflow/types
 */

import type { ErrorCategory } from '../utils/error-handler.js';

/**
 * Workflow patterns, each with a fixed stage sequence.
 */
export type WorkflowPattern = 'DATA_ONLY' | 'DATA_ANALYSIS' | 'FULL_WORKFLOW';

export const WORKFLOW_PATTERNS: readonly WorkflowPattern[] = [
  'DATA_ONLY',
  'DATA_ANALYSIS',
  'FULL_WORKFLOW',
];

/**
 * Every phase a workflow can be in.
 */
export type WorkflowPhase =
  | 'process_input'
  | 'data_collection'
  | 'analysis'
  | 'trading'
  | 'complete'
  | 'failed';

/**
 * Phases that call a worker agent.
 */
export type InvocableStage = 'data_collection' | 'analysis' | 'trading';

export const INVOCABLE_STAGES: readonly InvocableStage[] = ['data_collection', 'analysis', 'trading'];

export type TerminalPhase = 'complete' | 'failed';

/**
 * Worker agent kinds reachable over A2A.
 */
export type AgentType = 'planner' | 'knowledge' | 'browser' | 'executor';

export const AGENT_TYPES: readonly AgentType[] = ['planner', 'knowledge', 'browser', 'executor'];

export interface ConversationMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * A validated workflow request. Frozen after validation.
 */
export interface WorkflowRequest {
  readonly instruction: string;
  readonly contextId?: string;
  readonly workflowId?: string;
  /** Forces a pattern instead of classifying the instruction */
  readonly pattern?: WorkflowPattern;
  /** Replaces the stored conversation history for the context */
  readonly history?: readonly ConversationMessage[];
  /** Structured input forwarded to every stage */
  readonly data?: Readonly<Record<string, unknown>>;
}

/**
 * Output produced by a stage handler.
 */
export interface StagePayload {
  /** Merged text from the agent response */
  text: string;
  /** Merged structured data, null when the agent returned none */
  data: Record<string, unknown> | null;
  /** Raw data parts in arrival order */
  dataParts: Record<string, unknown>[];
}

/**
 * Record of one stage invocation. Never mutated after creation.
 */
export interface StageResult {
  readonly stage: InvocableStage;
  readonly agent?: string;
  readonly success: boolean;
  readonly payload?: StagePayload;
  readonly error?: string;
  readonly elapsedMs: number;
  readonly startedAt: string;
  readonly completedAt: string;
}

export interface StageErrorRecord {
  readonly kind: 'StageInvocationError';
  readonly stage: InvocableStage;
  readonly agent?: string;
  readonly message: string;
  readonly category: ErrorCategory;
  readonly at: string;
}

/**
 * What `advance` appends to the state while moving the phase.
 */
export type StageOutcome =
  | { type: 'result'; result: StageResult }
  | { type: 'error'; error: StageErrorRecord; result?: StageResult };

/**
 * Per-workflow progress record kept by the task state store.
 */
export interface TaskState {
  workflowId: string;
  contextId: string;
  pattern: WorkflowPattern;
  phase: WorkflowPhase;
  /** Count of non-failure transitions so far */
  step: number;
  results: StageResult[];
  errors: StageErrorRecord[];
  createdAt: string;
  updatedAt: string;
}

export interface ClassificationResult {
  pattern: WorkflowPattern;
  /** True when no clear intent was found and the default was used */
  ambiguous: boolean;
  reason: string;
  signals: {
    collection: boolean;
    analysis: boolean;
    trading: boolean;
  };
}

export interface WorkflowResult {
  workflowId: string;
  contextId: string;
  pattern: WorkflowPattern;
  phase: TerminalPhase;
  success: boolean;
  results: StageResult[];
  errors: StageErrorRecord[];
  /** Stage outputs merged as `[AGENT]` blocks */
  summary: string;
  classification: ClassificationResult;
}

/**
 * Input passed to a stage handler.
 */
export interface StageInvocation {
  workflowId: string;
  contextId: string;
  stage: InvocableStage;
  request: WorkflowRequest;
  /** Results of the stages that already ran, in order */
  previousResults: readonly StageResult[];
  /** Copy of the conversation history for the context */
  history: ConversationMessage[];
  signal?: AbortSignal;
}

export type StageHandler = (invocation: StageInvocation) => Promise<StagePayload>;

/**
 * A handler together with the agent it talks to, for logs and results.
 */
export interface StageHandlerDefinition {
  agent?: string;
  handle: StageHandler;
}

/**
 * Stage handlers composed by configuration. A stage without a handler
 * fails when reached.
 */
export type StageHandlers = Partial<Record<InvocableStage, StageHandler | StageHandlerDefinition>>;
