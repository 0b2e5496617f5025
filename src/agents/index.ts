/**
 * Agents module - worker agents reached over A2A.
 *
 * Provides:
 * - AgentRegistry: agent URLs, shared clients and reachability checks
 * - createA2AStageHandlers: stage handlers that call the routed agent
 */

export {
  AgentRegistry,
  type AgentClient,
  type AgentClientFactory,
  type AgentRegistryOptions,
  type AgentStatus,
  type SharedClientOptions,
} from './registry.js';

export {
  createA2AStageHandlers,
  buildStagePrompt,
  toStagePayload,
  type A2AStageHandlerOptions,
  type StageRouting,
} from './stage-invoker.js';
