/**
 * A2A protocol types.
 *
 * Wire types come from `@a2a-js/sdk`; this module adds the supervisor's
 * reduced view of an agent response.
 *
 * @module a2a/types
 */

import type { TaskState } from '@a2a-js/sdk';

export type {
  AgentCard,
  AgentSkill,
  Artifact,
  DataPart,
  Message,
  MessageSendParams,
  Part,
  Task,
  TaskArtifactUpdateEvent,
  TaskState,
  TaskStatusUpdateEvent,
  TextPart,
} from '@a2a-js/sdk';

export const TERMINAL_TASK_STATES: readonly TaskState[] = ['completed', 'canceled', 'failed', 'rejected'];

/**
 * Unified view of an agent response: merged text, merged data and the raw
 * data parts.
 */
export interface UnifiedResponse {
  taskId?: string;
  contextId?: string;
  state: TaskState;
  text: string;
  data: Record<string, unknown> | null;
  dataParts: Record<string, unknown>[];
  final: boolean;
}
