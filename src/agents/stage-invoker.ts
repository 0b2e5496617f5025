/**
 * A2A stage handlers.
 *
 * Builds the {@link StageHandlers} object the dispatcher runs: each stage is
 * routed to a worker agent, given a prompt that carries the previous stage's
 * output, and sent as one `message/send` call.
 *
 * @module agents/stage-invoker
 */

import type { DataMergeMode } from '../a2a/parts.js';
import type { Part, UnifiedResponse } from '../a2a/types.js';
import { DEFAULT_ROUTING } from '../config/constants.js';
import {
  INVOCABLE_STAGES,
  type AgentType,
  type InvocableStage,
  type StageHandlerDefinition,
  type StageHandlers,
  type StageInvocation,
  type StagePayload,
} from '../workflow/types.js';
import type { AgentRegistry } from './registry.js';

export type StageRouting = Record<InvocableStage, AgentType>;

export interface A2AStageHandlerOptions {
  registry: AgentRegistry;
  /** Overrides for the default stage-to-agent routing */
  routing?: Partial<StageRouting>;
  mergeMode?: DataMergeMode;
}

/**
 * Prompt for an agent, with the previous stage's output as context.
 */
export function buildStagePrompt(agent: AgentType, instruction: string, previousText?: string): string {
  const context = previousText?.trim();
  if (!context) {
    return instruction;
  }

  switch (agent) {
    case 'knowledge':
      return `Request: ${instruction}\n\nPlan:\n${context}\n\nSearch for and provide the information this plan needs.`;
    case 'browser':
      return `Search request: ${instruction}\n\nPrevious step:\n${context}\n\nUse the above to find the required information on the web.`;
    case 'executor':
      return `Task: ${instruction}\n\nContext:\n${context}\n\nCarry out the requested task based on the information above.`;
    default:
      return instruction;
  }
}

/**
 * Reduce an agent response to a stage payload. An empty text falls back to
 * the merged data as JSON.
 */
export function toStagePayload(response: UnifiedResponse): StagePayload {
  const text = response.text || (response.data ? JSON.stringify(response.data) : '');
  return { text, data: response.data, dataParts: response.dataParts };
}

function lastOutput(invocation: StageInvocation): string | undefined {
  const previous = invocation.previousResults[invocation.previousResults.length - 1];
  return previous?.payload?.text;
}

function createHandler(agent: AgentType, options: A2AStageHandlerOptions): StageHandlerDefinition {
  return {
    agent,
    handle: async (invocation) => {
      const prompt = buildStagePrompt(agent, invocation.request.instruction, lastOutput(invocation));
      const input: Record<string, unknown> = {
        messages: [{ role: 'user', content: prompt }],
        context_id: invocation.contextId,
        conversation_id: invocation.contextId,
        history: invocation.history,
        ...(invocation.request.data ? { input: invocation.request.data } : {}),
      };
      const parts: Part[] = [
        { kind: 'text', text: prompt },
        { kind: 'data', data: input },
      ];

      const response = await options.registry.getClient(agent).sendParts(parts, {
        contextId: invocation.contextId,
        mergeMode: options.mergeMode,
        signal: invocation.signal,
      });
      return toStagePayload(response);
    },
  };
}

/**
 * Handlers for every invocable stage, routed per `options.routing`.
 *
 * @throws ConfigurationError when a routed agent has no URL
 */
export function createA2AStageHandlers(options: A2AStageHandlerOptions): StageHandlers {
  const routing: StageRouting = { ...DEFAULT_ROUTING, ...options.routing };
  const handlers: StageHandlers = {};

  for (const stage of INVOCABLE_STAGES) {
    const agent = routing[stage];
    options.registry.getUrl(agent);
    handlers[stage] = createHandler(agent, options);
  }
  return handlers;
}
