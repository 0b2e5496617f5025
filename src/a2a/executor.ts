/**
 * WorkflowExecutor - runs supervisor workflows for the A2A request handler.
 *
 * Each A2A task is one workflow: the task id becomes the workflow id and
 * every {@link WorkflowEvent} is published on the task's event bus. The
 * SDK's task store then answers `tasks/get` and streams the same events to
 * `message/stream` subscribers.
 *
 * @module a2a/executor
 */

import { randomUUID } from 'crypto';
import { A2AError, type AgentExecutor, type ExecutionEventBus, type RequestContext } from '@a2a-js/sdk/server';
import type { Logger } from 'pino';
import { WorkflowValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { WorkflowDispatcher } from '../workflow/dispatcher.js';
import type { WorkflowEvent } from '../workflow/events.js';
import type { WorkflowRequest } from '../workflow/types.js';
import {
  parseIncomingMessage,
  toFinalStatusUpdate,
  toResultArtifactEvent,
  toStatusUpdateEvent,
  toSubmittedTask,
} from './event-mapper.js';
import type { TaskStatusUpdateEvent } from './types.js';

export interface WorkflowExecutorOptions {
  dispatcher: WorkflowDispatcher;
  idGenerator?: () => string;
  now?: () => Date;
  logger?: Logger;
}

export class WorkflowExecutor implements AgentExecutor {
  private readonly dispatcher: WorkflowDispatcher;
  private readonly idGenerator: () => string;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: WorkflowExecutorOptions) {
    this.dispatcher = options.dispatcher;
    this.idGenerator = options.idGenerator ?? randomUUID;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('WorkflowExecutor');
  }

  async execute(requestContext: RequestContext, eventBus: ExecutionEventBus): Promise<void> {
    const { taskId, contextId, userMessage } = requestContext;
    const logger = this.logger.child({ taskId, contextId });

    if (!requestContext.task) {
      eventBus.publish(toSubmittedTask(taskId, contextId, userMessage, this.now().toISOString()));
    }

    let request: WorkflowRequest;
    try {
      request = parseIncomingMessage({ ...userMessage, contextId });
    } catch (error) {
      if (!(error instanceof WorkflowValidationError)) {
        throw error;
      }
      logger.info({ issues: error.issues }, 'Rejected invalid request');
      this.finish(eventBus, toFinalStatusUpdate(taskId, contextId, 'rejected', error.message, this.statusOptions()));
      return;
    }

    try {
      await this.dispatcher.run(
        { ...request, workflowId: taskId },
        { onEvent: (event) => this.publish(event, eventBus) }
      );
      eventBus.finished();
    } catch (error) {
      // Stage failures arrive as a `failed` event; a throw means the workflow never started
      logger.error({ err: error }, 'Workflow could not start');
      const message = error instanceof Error ? error.message : String(error);
      this.finish(eventBus, toFinalStatusUpdate(taskId, contextId, 'failed', message, this.statusOptions()));
    }
  }

  /**
   * Stages run to completion once started, so a running workflow cannot be
   * canceled.
   */
  async cancelTask(taskId: string): Promise<void> {
    this.logger.info({ taskId }, 'Refused to cancel workflow');
    throw A2AError.taskNotCancelable(taskId);
  }

  private publish(event: WorkflowEvent, eventBus: ExecutionEventBus): void {
    if (event.type === 'completed' || event.type === 'failed') {
      const artifact = toResultArtifactEvent(event.result);
      if (artifact) {
        eventBus.publish(artifact);
      }
    }
    eventBus.publish(toStatusUpdateEvent(event, this.idGenerator));
  }

  private finish(eventBus: ExecutionEventBus, update: TaskStatusUpdateEvent): void {
    eventBus.publish(update);
    eventBus.finished();
  }

  private statusOptions(): { timestamp: string; idGenerator: () => string } {
    return { timestamp: this.now().toISOString(), idGenerator: this.idGenerator };
  }
}
