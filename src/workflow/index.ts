/**
 * Workflow module - classification, stage sequences and dispatch.
 *
 * Usage:
 * ```typescript
 * import { TaskStateStore, WorkflowDispatcher } from './workflow/index.js';
 *
 * const dispatcher = new WorkflowDispatcher({
 *   store: new TaskStateStore(),
 *   handlers: { data_collection: async ({ request }) => collect(request.instruction) },
 * });
 * const result = await dispatcher.run({ instruction: 'collect market data' });
 * ```
 */

export * from './types.js';
export * from './stages.js';
export * from './events.js';
export { classifyRequest, detectIntents } from './classifier.js';
export { TaskStateStore, type TaskStateStoreOptions, type CreateTaskStateInput } from './task-state-store.js';
export { ConversationHistory, type ConversationHistoryOptions } from './conversation-history.js';
export {
  parseWorkflowRequest,
  parseStagePayload,
  toValidationIssues,
  workflowRequestSchema,
  stagePayloadSchema,
  MAX_INSTRUCTION_LENGTH,
} from './request.js';
export { summarizeResults, buildSummaryData, EMPTY_SUMMARY, type SummaryData } from './summary.js';
export { WorkflowDispatcher, type WorkflowDispatcherOptions, type RunOptions } from './dispatcher.js';
