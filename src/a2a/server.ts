/**
 * SupervisorServer - A2A endpoint in front of the dispatcher.
 *
 * Routes:
 * ```
 * GET  /.well-known/agent-card.json   agent card
 * GET  /health                        liveness
 * POST /                              JSON-RPC: message/send, message/stream,
 *                                     tasks/get, tasks/cancel
 * ```
 *
 * JSON-RPC is served by the `@a2a-js/sdk` request handler over its
 * in-memory task store; workflows run in a {@link WorkflowExecutor}.
 *
 * Usage:
 * ```typescript
 * const server = new SupervisorServer({ dispatcher, card, port: 8000 });
 * await server.start();
 * // ...
 * await server.stop();
 * ```
 */

import type { Server } from 'node:http';
import { AGENT_CARD_PATH } from '@a2a-js/sdk';
import { DefaultRequestHandler, InMemoryTaskStore, type TaskStore } from '@a2a-js/sdk/server';
import { agentCardHandler, jsonRpcHandler, UserBuilder } from '@a2a-js/sdk/server/express';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import type { WorkflowDispatcher } from '../workflow/dispatcher.js';
import { WorkflowExecutor } from './executor.js';
import type { AgentCard } from './types.js';

export interface SupervisorServerConfig {
  dispatcher: WorkflowDispatcher;
  card: AgentCard;
  /** Port to bind (default: 8000, 0 for an ephemeral port) */
  port?: number;
  /** Host to bind (default: 'localhost') */
  host?: string;
  /** Required as a bearer token on JSON-RPC calls when set */
  authToken?: string;
  /** Holds A2A tasks (default: in memory) */
  taskStore?: TaskStore;
  logger?: Logger;
}

export class SupervisorServer {
  private readonly config: SupervisorServerConfig & { port: number; host: string };
  private readonly logger: Logger;
  private readonly app: Express;
  private server?: Server;
  private running = false;

  constructor(config: SupervisorServerConfig) {
    this.config = {
      port: 8000,
      host: 'localhost',
      ...config,
    };
    this.logger = config.logger ?? createLogger('SupervisorServer');
    this.app = this.createApp();
  }

  async start(): Promise<void> {
    if (this.running) {
      this.logger.warn('SupervisorServer already running');
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        this.logger.error({ err }, 'Supervisor server error');
        reject(err);
      };
      const server = this.app.listen(this.config.port, this.config.host, () => {
        server.off('error', onError);
        this.server = server;
        resolve();
      });
      server.once('error', onError);
    });

    this.running = true;
    this.logger.info({ host: this.config.host, port: this.port, url: this.config.card.url }, 'Supervisor listening');
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!this.running || !server) {
      return;
    }

    this.running = false;
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
    this.server = undefined;
    this.logger.info('Supervisor stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Bound port; differs from the configured one when that was 0 */
  get port(): number {
    const address = this.server?.address();
    return typeof address === 'object' && address !== null ? address.port : this.config.port;
  }

  private createApp(): Express {
    const { card, dispatcher } = this.config;
    const requestHandler = new DefaultRequestHandler(
      card,
      this.config.taskStore ?? new InMemoryTaskStore(),
      new WorkflowExecutor({ dispatcher })
    );

    const app = express();
    app.use((req, _res, next) => {
      this.logger.debug({ method: req.method, path: req.path }, 'Received request');
      next();
    });

    app.get('/health', (_req, res) => {
      res.json({ status: 'ok', name: card.name });
    });
    app.use(`/${AGENT_CARD_PATH}`, agentCardHandler({ agentCardProvider: requestHandler }));
    app.post('/', (req, res, next) => this.authenticate(req, res, next));
    app.use('/', jsonRpcHandler({ requestHandler, userBuilder: UserBuilder.noAuthentication }));

    return app;
  }

  private authenticate(req: Request, res: Response, next: NextFunction): void {
    const { authToken } = this.config;
    if (authToken && req.headers.authorization !== `Bearer ${authToken}`) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  }
}
