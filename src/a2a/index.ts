/**
 * A2A protocol layer.
 *
 * Usage:
 * ```typescript
 * import { A2AClient, SupervisorServer, createSupervisorCard } from './a2a/index.js';
 *
 * // Call a worker agent
 * const client = new A2AClient({ baseUrl: 'http://localhost:8003' });
 * const response = await client.sendText('collect market data');
 *
 * // Expose the supervisor
 * const server = new SupervisorServer({ dispatcher, card: createSupervisorCard({ host, port }), port });
 * await server.start();
 * ```
 */

export * from './types.js';
export * from './parts.js';
export {
  A2AClient,
  rewriteDockerUrl,
  isRetryableStatus,
  DOCKER_HOSTNAMES,
  type A2AClientOptions,
  type SendOptions,
} from './client.js';
export { SupervisorServer, type SupervisorServerConfig } from './server.js';
export { WorkflowExecutor, type WorkflowExecutorOptions } from './executor.js';
export { createSupervisorCard, resolvePublicUrl, SUPERVISOR_NAME, type SupervisorCardOptions } from './agent-card.js';
export {
  toStatusUpdateEvent,
  toResultArtifactEvent,
  toSubmittedTask,
  toFinalStatusUpdate,
  parseIncomingMessage,
} from './event-mapper.js';
