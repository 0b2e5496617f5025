/**
 * Task state store.
 *
 * Keyed, in-process record of every workflow's progress. Injected into the
 * dispatcher and the A2A server; there is no module-level instance.
 *
 * Each `advance` validates and commits in one synchronous step, so a
 * concurrent `get` observes either the previous or the next state and
 * never a partial one.
 *
 * @module workflow/task-state-store
 */

import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import {
  DuplicateWorkflowError,
  InvalidTransitionError,
  UnknownWorkflowError,
} from '../utils/errors.js';
import { getStageSequence, isTerminalPhase } from './stages.js';
import type {
  StageOutcome,
  TaskState,
  WorkflowPattern,
  WorkflowPhase,
} from './types.js';

export interface TaskStateStoreOptions {
  /**
   * Upper bound on stored workflows. When reached, the oldest finished
   * workflows are evicted; in-flight workflows are never evicted.
   */
  maxEntries?: number;
  /** Clock used for timestamps */
  now?: () => Date;
  logger?: Logger;
}

export interface CreateTaskStateInput {
  pattern: WorkflowPattern;
  contextId: string;
}

const DEFAULT_MAX_ENTRIES = 1000;

export class TaskStateStore {
  private readonly states = new Map<string, TaskState>();
  private readonly maxEntries: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: TaskStateStoreOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('TaskStateStore');
  }

  /**
   * Register a new workflow in `process_input` at step 0.
   */
  create(workflowId: string, input: CreateTaskStateInput): TaskState {
    if (this.states.has(workflowId)) {
      throw new DuplicateWorkflowError(workflowId);
    }

    this.evictIfFull();

    const timestamp = this.now().toISOString();
    const state: TaskState = {
      workflowId,
      contextId: input.contextId,
      pattern: input.pattern,
      phase: 'process_input',
      step: 0,
      results: [],
      errors: [],
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.states.set(workflowId, state);

    this.logger.debug({ workflowId, pattern: input.pattern }, 'Task state created');
    return structuredClone(state);
  }

  /**
   * Move a workflow to `newPhase` and append the outcome.
   *
   * Allowed moves are the next phase of the workflow's sequence, or
   * `failed` from any non-terminal phase.
   */
  advance(workflowId: string, newPhase: WorkflowPhase, outcome?: StageOutcome): TaskState {
    const current = this.states.get(workflowId);
    if (!current) {
      throw new UnknownWorkflowError(workflowId);
    }

    this.assertTransition(current, newPhase);

    const next: TaskState = {
      ...current,
      phase: newPhase,
      step: newPhase === 'failed' ? current.step : current.step + 1,
      results: [...current.results],
      errors: [...current.errors],
      updatedAt: this.now().toISOString(),
    };

    if (outcome?.type === 'result') {
      next.results.push(outcome.result);
    } else if (outcome?.type === 'error') {
      if (outcome.result) {
        next.results.push(outcome.result);
      }
      next.errors.push(outcome.error);
    }

    this.states.set(workflowId, next);

    this.logger.debug(
      { workflowId, from: current.phase, to: newPhase, step: next.step },
      'Task state advanced'
    );
    return structuredClone(next);
  }

  /**
   * Snapshot of the last committed state.
   */
  get(workflowId: string): TaskState {
    const state = this.states.get(workflowId);
    if (!state) {
      throw new UnknownWorkflowError(workflowId);
    }
    return structuredClone(state);
  }

  has(workflowId: string): boolean {
    return this.states.has(workflowId);
  }

  /**
   * Snapshots of all workflows, oldest first.
   */
  list(): TaskState[] {
    return [...this.states.values()].map((state) => structuredClone(state));
  }

  get size(): number {
    return this.states.size;
  }

  private assertTransition(current: TaskState, to: WorkflowPhase): void {
    const { workflowId, phase: from, pattern } = current;

    if (isTerminalPhase(from)) {
      throw new InvalidTransitionError(workflowId, from, to, 'phase is terminal');
    }
    if (to === 'failed') {
      return;
    }

    const sequence = getStageSequence(pattern);
    const toIndex = sequence.indexOf(to);
    if (toIndex === -1) {
      throw new InvalidTransitionError(workflowId, from, to, `phase is not part of ${pattern}`);
    }

    const fromIndex = sequence.indexOf(from);
    if (toIndex <= fromIndex) {
      throw new InvalidTransitionError(workflowId, from, to, 'transition must move forward');
    }
    if (toIndex !== fromIndex + 1) {
      throw new InvalidTransitionError(workflowId, from, to, `expected ${sequence[fromIndex + 1]}`);
    }
  }

  private evictIfFull(): void {
    if (this.states.size < this.maxEntries) {
      return;
    }

    for (const [workflowId, state] of this.states) {
      if (isTerminalPhase(state.phase)) {
        this.states.delete(workflowId);
        this.logger.debug({ workflowId }, 'Evicted finished task state');
        return;
      }
    }

    this.logger.warn(
      { size: this.states.size, maxEntries: this.maxEntries },
      'Task state store is full of in-flight workflows'
    );
  }
}
