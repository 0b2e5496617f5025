/**
 * Workflow Dispatcher
 *
 * Validates a request, classifies it, and walks the pattern's stage sequence.
 * Stages run strictly one after another; every transition is committed to the
 * injected {@link TaskStateStore} so status pollers can follow the run.
 *
 * Failure semantics:
 * - Invalid input throws before any state exists
 * - A failing stage moves the workflow to `failed` and stops the run; the
 *   returned result keeps the successful stages that came before it
 * - There are no retries at this level
 *
 * @module workflow/dispatcher
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import { ConfigurationError, MalformedResponseError, StageInvocationError, TimeoutError } from '../utils/errors.js';
import { classifyError } from '../utils/error-handler.js';
import { classifyRequest } from './classifier.js';
import { ConversationHistory } from './conversation-history.js';
import type { WorkflowEvent, WorkflowEventListener } from './events.js';
import { parseStagePayload, parseWorkflowRequest } from './request.js';
import { getInvocableStages } from './stages.js';
import { summarizeResults } from './summary.js';
import type { TaskStateStore } from './task-state-store.js';
import type {
  ClassificationResult,
  ConversationMessage,
  InvocableStage,
  StageErrorRecord,
  StageHandlerDefinition,
  StageHandlers,
  StageOutcome,
  StageResult,
  TaskState,
  WorkflowRequest,
  WorkflowResult,
} from './types.js';

export interface WorkflowDispatcherOptions {
  store: TaskStateStore;
  handlers: StageHandlers;
  /** Shared history; a private one is created when omitted */
  history?: ConversationHistory;
  /** Upper bound for a single stage invocation (disabled when unset or 0) */
  stageTimeoutMs?: number;
  /** Receives events of every run */
  onEvent?: WorkflowEventListener;
  idGenerator?: () => string;
  now?: () => Date;
  logger?: Logger;
}

export interface RunOptions {
  /** Receives events of this run only */
  onEvent?: WorkflowEventListener;
}

interface RunContext {
  workflowId: string;
  contextId: string;
  request: WorkflowRequest;
  classification: ClassificationResult;
  logger: Logger;
  listener?: WorkflowEventListener;
}

type StageAttempt =
  | { ok: true; result: StageResult }
  | { ok: false; result: StageResult; error: StageInvocationError };

export class WorkflowDispatcher {
  private readonly store: TaskStateStore;
  private readonly handlers: StageHandlers;
  private readonly history: ConversationHistory;
  private readonly stageTimeoutMs: number;
  private readonly onEvent?: WorkflowEventListener;
  private readonly idGenerator: () => string;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: WorkflowDispatcherOptions) {
    this.store = options.store;
    this.handlers = options.handlers;
    this.history = options.history ?? new ConversationHistory();
    this.stageTimeoutMs = options.stageTimeoutMs ?? 0;
    this.onEvent = options.onEvent;
    this.idGenerator = options.idGenerator ?? randomUUID;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('Dispatcher');
  }

  /**
   * Run one workflow to a terminal phase.
   *
   * @throws WorkflowValidationError when the input is invalid
   * @throws DuplicateWorkflowError when `workflowId` is already in use
   */
  async run(input: unknown, options: RunOptions = {}): Promise<WorkflowResult> {
    const request = parseWorkflowRequest(input);
    const workflowId = request.workflowId ?? this.idGenerator();
    const contextId = request.contextId ?? workflowId;
    const classification = classifyRequest(request);
    const { pattern } = classification;

    this.store.create(workflowId, { pattern, contextId });

    const ctx: RunContext = {
      workflowId,
      contextId,
      request,
      classification,
      logger: this.logger.child({ workflowId }),
      listener: options.onEvent,
    };
    const stages = getInvocableStages(pattern);

    ctx.logger.info(
      { pattern, ambiguous: classification.ambiguous, reason: classification.reason },
      'Workflow started'
    );
    this.emit(ctx, { type: 'started', pattern, classification, stages, ...this.eventBase(ctx) });

    // process_input
    if (request.history) {
      this.history.replace(contextId, request.history);
    }
    this.history.append(contextId, { role: 'user', content: request.instruction });

    const results: StageResult[] = [];
    let pending: StageOutcome | undefined;

    for (const [position, stage] of stages.entries()) {
      this.store.advance(workflowId, stage, pending);
      const agent = this.resolveHandler(stage)?.agent;
      this.emit(ctx, {
        type: 'progress',
        stage,
        agent,
        status: 'running',
        index: position + 1,
        total: stages.length,
        ...this.eventBase(ctx),
      });

      const attempt = await this.invokeStage(ctx, stage, results);

      if (!attempt.ok) {
        return this.fail(ctx, results, attempt.result, attempt.error);
      }

      results.push(attempt.result);
      pending = { type: 'result', result: attempt.result };
      this.emit(ctx, {
        type: 'progress',
        stage,
        agent,
        status: 'succeeded',
        index: position + 1,
        total: stages.length,
        text: attempt.result.payload?.text,
        ...this.eventBase(ctx),
      });
    }

    this.store.advance(workflowId, 'complete', pending);

    const summary = summarizeResults(results);
    this.history.append(contextId, { role: 'assistant', content: summary });

    const result = this.buildResult(ctx, 'complete', results, [], summary);
    ctx.logger.info({ pattern, stages: results.length }, 'Workflow completed');
    this.emit(ctx, { type: 'completed', result, ...this.eventBase(ctx) });
    return result;
  }

  /**
   * Snapshot of a workflow's current state.
   *
   * @throws UnknownWorkflowError
   */
  getStatus(workflowId: string): TaskState {
    return this.store.get(workflowId);
  }

  /**
   * Copy of the conversation history of a context.
   */
  getHistory(contextId: string): ConversationMessage[] {
    return this.history.get(contextId);
  }

  private resolveHandler(stage: InvocableStage): StageHandlerDefinition | undefined {
    const entry = this.handlers[stage];
    if (entry === undefined) {
      return undefined;
    }
    return typeof entry === 'function' ? { handle: entry } : entry;
  }

  private async invokeStage(
    ctx: RunContext,
    stage: InvocableStage,
    previousResults: readonly StageResult[]
  ): Promise<StageAttempt> {
    const definition = this.resolveHandler(stage);
    const agent = definition?.agent;
    const startedAt = this.now();
    const controller = new AbortController();

    const finish = (fields: Pick<StageResult, 'success' | 'payload' | 'error'>): StageResult => {
      const completedAt = this.now();
      return {
        stage,
        agent,
        ...fields,
        elapsedMs: completedAt.getTime() - startedAt.getTime(),
        startedAt: startedAt.toISOString(),
        completedAt: completedAt.toISOString(),
      };
    };

    try {
      if (!definition) {
        throw new ConfigurationError(`No handler configured for stage ${stage}`, stage);
      }

      ctx.logger.debug({ stage, agent }, 'Invoking stage');
      const output = await this.withTimeout(
        definition.handle({
          workflowId: ctx.workflowId,
          contextId: ctx.contextId,
          stage,
          request: ctx.request,
          previousResults: [...previousResults],
          history: this.history.get(ctx.contextId),
          signal: controller.signal,
        }),
        stage,
        controller
      );

      const { payload, issues } = parseStagePayload(output);
      if (!payload) {
        throw new MalformedResponseError(`Stage ${stage} returned a malformed payload`, issues);
      }

      const result = finish({ success: true, payload });
      ctx.logger.info({ stage, agent, elapsedMs: result.elapsedMs }, 'Stage completed');
      return { ok: true, result };
    } catch (error) {
      const wrapped =
        error instanceof StageInvocationError
          ? error
          : new StageInvocationError(`Stage ${stage} failed`, {
              stage,
              agent,
              workflowId: ctx.workflowId,
              cause: error,
            });
      return { ok: false, result: finish({ success: false, error: wrapped.message }), error: wrapped };
    }
  }

  private withTimeout<T>(operation: Promise<T>, stage: InvocableStage, controller: AbortController): Promise<T> {
    const timeoutMs = this.stageTimeoutMs;
    if (timeoutMs <= 0) {
      return operation;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TimeoutError(`Stage ${stage} timed out after ${timeoutMs}ms`, timeoutMs, stage));
      }, timeoutMs);
    });

    return Promise.race([operation, timeout]).finally(() => clearTimeout(timer));
  }

  private fail(
    ctx: RunContext,
    results: StageResult[],
    failed: StageResult,
    error: StageInvocationError
  ): WorkflowResult {
    const record: StageErrorRecord = {
      kind: 'StageInvocationError',
      stage: error.stage,
      agent: error.agent,
      message: error.message,
      category: classifyError(error),
      at: failed.completedAt,
    };

    this.store.advance(ctx.workflowId, 'failed', { type: 'error', error: record, result: failed });

    ctx.logger.error(
      { err: error, stage: error.stage, agent: error.agent, category: record.category },
      'Workflow failed'
    );

    const result = this.buildResult(
      ctx,
      'failed',
      [...results, failed],
      [record],
      summarizeResults(results)
    );
    this.emit(ctx, { type: 'failed', error: record, result, ...this.eventBase(ctx) });
    return result;
  }

  private buildResult(
    ctx: RunContext,
    phase: WorkflowResult['phase'],
    results: StageResult[],
    errors: StageErrorRecord[],
    summary: string
  ): WorkflowResult {
    return {
      workflowId: ctx.workflowId,
      contextId: ctx.contextId,
      pattern: ctx.classification.pattern,
      phase,
      success: phase === 'complete',
      results,
      errors,
      summary,
      classification: ctx.classification,
    };
  }

  private eventBase(ctx: RunContext): { workflowId: string; contextId: string; at: string } {
    return { workflowId: ctx.workflowId, contextId: ctx.contextId, at: this.now().toISOString() };
  }

  private emit(ctx: RunContext, event: WorkflowEvent): void {
    for (const listener of [this.onEvent, ctx.listener]) {
      if (!listener) {
        continue;
      }
      try {
        const pending = listener(event);
        if (pending instanceof Promise) {
          pending.catch((err: unknown) => {
            ctx.logger.warn({ err, event: event.type }, 'Workflow event listener failed');
          });
        }
      } catch (err) {
        ctx.logger.warn({ err, event: event.type }, 'Workflow event listener failed');
      }
    }
  }
}
