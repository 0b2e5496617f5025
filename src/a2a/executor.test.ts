/**
 * Tests for WorkflowExecutor on the SDK event bus.
 */

import {
  A2AError,
  DefaultExecutionEventBus,
  RequestContext,
  type AgentExecutionEvent,
} from '@a2a-js/sdk/server';
import { describe, it, expect, beforeEach } from 'vitest';
import { WorkflowDispatcher } from '../workflow/dispatcher.js';
import { TaskStateStore } from '../workflow/task-state-store.js';
import type { StagePayload } from '../workflow/types.js';
import { WorkflowExecutor } from './executor.js';
import type { Message } from './types.js';

const AT = '2026-01-05T09:00:00.000Z';

function userMessage(text: string): Message {
  return { kind: 'message', messageId: 'm-1', role: 'user', parts: [{ kind: 'text', text }], contextId: 'ctx-1' };
}

function payload(text: string): StagePayload {
  return { text, data: null, dataParts: [] };
}

describe('WorkflowExecutor', () => {
  let store: TaskStateStore;
  let executor: WorkflowExecutor;
  let bus: DefaultExecutionEventBus;
  let events: AgentExecutionEvent[];
  let finished: number;

  beforeEach(() => {
    store = new TaskStateStore();
    const dispatcher = new WorkflowDispatcher({
      store,
      handlers: { data_collection: async () => payload('AAPL closed at 190') },
    });
    executor = new WorkflowExecutor({ dispatcher, idGenerator: () => 'msg-1', now: () => new Date(AT) });
    bus = new DefaultExecutionEventBus();
    events = [];
    finished = 0;
    bus.on('event', (event: AgentExecutionEvent) => events.push(event));
    bus.on('finished', () => finished++);
  });

  it('should publish the workflow lifecycle under the task id', async () => {
    await executor.execute(new RequestContext(userMessage('collect market data'), 'task-1', 'ctx-1'), bus);

    expect(events.map((event) => event.kind)).toEqual([
      'task',
      'status-update',
      'status-update',
      'status-update',
      'artifact-update',
      'status-update',
    ]);
    expect(events[0]).toEqual({
      kind: 'task',
      id: 'task-1',
      contextId: 'ctx-1',
      status: { state: 'submitted', timestamp: AT },
      history: [userMessage('collect market data')],
    });
    expect(events[5]).toMatchObject({ taskId: 'task-1', final: true, status: { state: 'completed' } });
    expect(store.get('task-1').phase).toBe('complete');
    expect(finished).toBe(1);
  });

  it('should not publish a new task when one already exists', async () => {
    const context = new RequestContext(userMessage('collect market data'), 'task-1', 'ctx-1', {
      kind: 'task',
      id: 'task-1',
      contextId: 'ctx-1',
      status: { state: 'input-required' },
    });

    await executor.execute(context, bus);

    expect(events[0].kind).toBe('status-update');
  });

  it('should reject a request without an instruction', async () => {
    await executor.execute(new RequestContext(userMessage('  '), 'task-2', 'ctx-1'), bus);

    expect(events).toHaveLength(2);
    expect(events[1]).toEqual({
      kind: 'status-update',
      taskId: 'task-2',
      contextId: 'ctx-1',
      status: {
        state: 'rejected',
        message: {
          kind: 'message',
          messageId: 'msg-1',
          role: 'agent',
          parts: [{ kind: 'text', text: 'Invalid workflow request (instruction: instruction must not be empty)' }],
          contextId: 'ctx-1',
          taskId: 'task-2',
        },
        timestamp: AT,
      },
      final: true,
    });
    expect(store.has('task-2')).toBe(false);
    expect(finished).toBe(1);
  });

  it('should fail the task when the workflow cannot start', async () => {
    store.create('task-3', { pattern: 'DATA_ONLY', contextId: 'ctx-1' });

    await executor.execute(new RequestContext(userMessage('collect market data'), 'task-3', 'ctx-1'), bus);

    expect(events).toHaveLength(2);
    expect(events[1]).toMatchObject({
      final: true,
      status: {
        state: 'failed',
        message: { parts: [{ kind: 'text', text: 'Workflow already exists: task-3' }] },
      },
    });
    expect(finished).toBe(1);
  });

  it('should refuse cancellation', async () => {
    await expect(executor.cancelTask('task-1')).rejects.toBeInstanceOf(A2AError);
  });
});
