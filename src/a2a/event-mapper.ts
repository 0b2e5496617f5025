/**
 * Translation between workflow objects and A2A events.
 *
 * @module a2a/event-mapper
 */

import { randomUUID } from 'crypto';
import { describeEvent, type WorkflowEvent } from '../workflow/events.js';
import { parseWorkflowRequest } from '../workflow/request.js';
import { buildSummaryData } from '../workflow/summary.js';
import type { WorkflowRequest, WorkflowResult } from '../workflow/types.js';
import { isRecord, mergeDataParts } from './parts.js';
import type { Message, Task, TaskArtifactUpdateEvent, TaskState, TaskStatusUpdateEvent } from './types.js';

function agentMessage(text: string, contextId: string, taskId: string, messageId: string): Message {
  return { kind: 'message', messageId, role: 'agent', parts: [{ kind: 'text', text }], contextId, taskId };
}

/**
 * The task published before any work starts.
 */
export function toSubmittedTask(taskId: string, contextId: string, userMessage: Message, timestamp: string): Task {
  return {
    kind: 'task',
    id: taskId,
    contextId,
    status: { state: 'submitted', timestamp },
    history: [userMessage],
  };
}

/**
 * A final `status-update` outside the workflow lifecycle, such as a request
 * that never became a workflow.
 */
export function toFinalStatusUpdate(
  taskId: string,
  contextId: string,
  state: Extract<TaskState, 'failed' | 'rejected'>,
  text: string,
  options: { timestamp: string; idGenerator?: () => string }
): TaskStatusUpdateEvent {
  const idGenerator = options.idGenerator ?? randomUUID;
  return {
    kind: 'status-update',
    taskId,
    contextId,
    status: { state, message: agentMessage(text, contextId, taskId, idGenerator()), timestamp: options.timestamp },
    final: true,
  };
}

/**
 * Map a workflow event to an A2A `status-update`.
 */
export function toStatusUpdateEvent(
  event: WorkflowEvent,
  idGenerator: () => string = randomUUID
): TaskStatusUpdateEvent {
  let state: TaskState = 'working';
  let text = describeEvent(event);
  if (event.type === 'completed') {
    state = 'completed';
    text = event.result.summary;
  } else if (event.type === 'failed') {
    state = 'failed';
  }

  const update: TaskStatusUpdateEvent = {
    kind: 'status-update',
    taskId: event.workflowId,
    contextId: event.contextId,
    status: {
      state,
      message: agentMessage(text, event.contextId, event.workflowId, idGenerator()),
      timestamp: event.at,
    },
    final: event.type === 'completed' || event.type === 'failed',
  };
  if (event.type === 'progress') {
    update.metadata = { stage: event.stage, index: event.index, total: event.total };
  } else if (event.type === 'failed') {
    update.metadata = { pattern: event.result.pattern, errors: event.result.errors };
  }
  return update;
}

/**
 * The `workflow_result` artifact: summary text plus structured summary
 * data. Undefined when no stage succeeded.
 */
export function toResultArtifactEvent(result: WorkflowResult): TaskArtifactUpdateEvent | undefined {
  if (!result.results.some((stage) => stage.success)) {
    return undefined;
  }

  const data = buildSummaryData(result.results);
  return {
    kind: 'artifact-update',
    taskId: result.workflowId,
    contextId: result.contextId,
    artifact: {
      artifactId: `${result.workflowId}-result`,
      name: 'workflow_result',
      parts: [
        { kind: 'text', text: result.summary },
        { kind: 'data', data: { workflow_summary: data.workflow_summary, stage_results: data.stage_results } },
      ],
    },
    lastChunk: true,
  };
}

function readString(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function lastUserContent(messages: unknown): string | undefined {
  if (!Array.isArray(messages)) {
    return undefined;
  }
  for (const entry of [...messages].reverse()) {
    if (isRecord(entry) && entry.role === 'user' && typeof entry.content === 'string') {
      return entry.content;
    }
  }
  return undefined;
}

/**
 * Turn an inbound A2A message into a validated workflow request.
 *
 * Text parts are joined into the instruction. A data part may carry
 * `messages` (used when there is no text), `context_id` or
 * `conversation_id`, `history` and `pattern`.
 *
 * @throws WorkflowValidationError
 */
export function parseIncomingMessage(message: Message): WorkflowRequest {
  const text = message.parts
    .flatMap((part) => (part.kind === 'text' ? [part.text] : []))
    .join('\n')
    .trim();
  const dataParts = message.parts.flatMap((part) => (part.kind === 'data' ? [part.data] : []));
  const data = mergeDataParts(dataParts, 'last');

  const instruction = text || lastUserContent(data.messages) || '';
  const contextId = message.contextId ?? readString(data, 'context_id') ?? readString(data, 'conversation_id');

  return parseWorkflowRequest({
    instruction,
    ...(contextId ? { contextId } : {}),
    ...(data.history !== undefined ? { history: data.history } : {}),
    ...(data.pattern !== undefined ? { pattern: data.pattern } : {}),
    ...(dataParts.length > 0 ? { data } : {}),
  });
}
