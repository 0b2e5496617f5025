/**
 * Supervisor Runner.
 *
 * Wires the resolved configuration into the task state store, the agent
 * registry, the stage handlers, the dispatcher and the A2A server.
 */

import type { Logger } from 'pino';
import { SupervisorServer } from '../a2a/server.js';
import { createSupervisorCard } from '../a2a/agent-card.js';
import { AgentRegistry, type AgentClientFactory } from '../agents/registry.js';
import { createA2AStageHandlers } from '../agents/stage-invoker.js';
import type { ResolvedConfig } from '../config/types.js';
import { createLogger } from '../utils/logger.js';
import { ConversationHistory } from '../workflow/conversation-history.js';
import { WorkflowDispatcher } from '../workflow/dispatcher.js';
import { describeEvent } from '../workflow/events.js';
import { TaskStateStore } from '../workflow/task-state-store.js';
import type { StageHandlers } from '../workflow/types.js';

const logger = createLogger('SupervisorRunner');

export interface SupervisorOptions {
  config: ResolvedConfig;
  /** Replaces the A2A stage handlers */
  handlers?: StageHandlers;
  /** Replaces the A2A client construction */
  clientFactory?: AgentClientFactory;
  logger?: Logger;
}

export interface Supervisor {
  config: ResolvedConfig;
  store: TaskStateStore;
  history: ConversationHistory;
  registry: AgentRegistry;
  dispatcher: WorkflowDispatcher;
}

export interface ServeOptions extends SupervisorOptions {
  host?: string;
  port?: number;
}

export interface RunningSupervisor extends Supervisor {
  server: SupervisorServer;
  /** Base URL the server answers on */
  url: string;
  stop(): Promise<void>;
}

/**
 * Build the supervisor components from configuration.
 *
 * @throws ConfigurationError when a routed agent has no URL
 */
export function createSupervisor(options: SupervisorOptions): Supervisor {
  const { config } = options;
  const log = options.logger ?? logger;

  const store = new TaskStateStore({ maxEntries: config.workflow.maxTasks });
  const history = new ConversationHistory({ maxMessagesPerContext: config.workflow.maxHistoryMessages });
  const registry = new AgentRegistry({
    urls: config.agents,
    client: {
      ...config.client,
      authToken: config.server.authToken,
      isDocker: config.isDocker,
    },
    clientFactory: options.clientFactory,
  });
  const handlers = options.handlers ?? createA2AStageHandlers({ registry, routing: config.workflow.routing });

  const dispatcher = new WorkflowDispatcher({
    store,
    handlers,
    history,
    stageTimeoutMs: config.workflow.stageTimeoutMs,
    onEvent: (event) => {
      log.debug({ workflowId: event.workflowId, event: event.type }, describeEvent(event));
    },
  });

  return { config, store, history, registry, dispatcher };
}

/**
 * Create the supervisor and start its A2A server.
 */
export async function startSupervisor(options: ServeOptions): Promise<RunningSupervisor> {
  const supervisor = createSupervisor(options);
  const { config } = supervisor;
  const host = options.host ?? config.server.host;
  const port = options.port ?? config.server.port;

  const server = new SupervisorServer({
    dispatcher: supervisor.dispatcher,
    card: createSupervisorCard({ host, port, isDocker: config.isDocker }),
    host,
    port,
    authToken: config.server.authToken,
  });
  await server.start();

  const url = `http://${host === '0.0.0.0' ? 'localhost' : host}:${server.port}`;
  logger.info({ url, agents: config.agents, routing: config.workflow.routing }, 'Supervisor started');

  return {
    ...supervisor,
    server,
    url,
    stop: () => server.stop(),
  };
}

/**
 * Start the supervisor and stop it on SIGINT or SIGTERM.
 */
export async function runSupervisor(options: ServeOptions): Promise<RunningSupervisor> {
  const running = await startSupervisor(options);

  console.log(`Supervisor listening on ${running.url}`);
  console.log('Endpoints:');
  console.log('  GET  /.well-known/agent-card.json - Agent card');
  console.log('  GET  /health                      - Health check');
  console.log('  POST /                            - A2A JSON-RPC');
  console.log();

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Shutting down supervisor');
    running.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Failed to stop supervisor');
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return running;
}
