/**
 * Tests for A2AClient against an in-process stub agent behind a fake fetch.
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { A2AClientError, TimeoutError } from '../utils/errors.js';
import { A2AClient, isRetryableStatus, rewriteDockerUrl } from './client.js';
import type { Task } from './types.js';

const BASE_URL = 'http://agent.test:8003';
const CARD_URL = `${BASE_URL}/.well-known/agent-card.json`;

const rpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number()]),
  method: z.string(),
  params: z.unknown(),
});

interface RpcCall {
  url: string;
  method: string;
  params: unknown;
  authorization: string | null;
}

interface StubReply {
  status?: number;
  result?: unknown;
  error?: { code: number; message: string };
}

interface StubOptions {
  cardHost?: string;
  /** Status of the first card request; later ones succeed */
  firstCardStatus?: number;
}

interface StubAgent {
  fetchImpl: typeof fetch;
  calls: RpcCall[];
  cardRequests: string[];
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function stubAgent(respond: (call: RpcCall) => StubReply, options: StubOptions = {}): StubAgent {
  const calls: RpcCall[] = [];
  const cardRequests: string[] = [];

  const fetchImpl: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const headers = new Headers(init?.headers);

    if ((init?.method ?? 'GET') === 'GET') {
      cardRequests.push(url);
      if (cardRequests.length === 1 && options.firstCardStatus) {
        return json({ error: 'unavailable' }, options.firstCardStatus);
      }
      return json({
        name: 'StubAgent',
        description: 'Answers from a script',
        url: `http://${options.cardHost ?? 'agent.test'}:8003/`,
        version: '1.0.0',
        protocolVersion: '0.3.0',
        capabilities: { streaming: false },
        defaultInputModes: ['text/plain'],
        defaultOutputModes: ['text/plain'],
        skills: [],
      });
    }

    const request = rpcRequestSchema.parse(JSON.parse(typeof init?.body === 'string' ? init.body : '{}'));
    const call: RpcCall = { url, method: request.method, params: request.params, authorization: headers.get('Authorization') };
    calls.push(call);

    const reply = respond(call);
    if (reply.status && reply.status !== 200) {
      return json({ error: 'unavailable' }, reply.status);
    }
    return json(
      reply.error
        ? { jsonrpc: '2.0', id: request.id, error: reply.error }
        : { jsonrpc: '2.0', id: request.id, result: reply.result }
    );
  };

  return { fetchImpl, calls, cardRequests };
}

function task(state: Task['status']['state'], overrides: Partial<Task> = {}): Task {
  return { kind: 'task', id: 'task-1', contextId: 'ctx-1', status: { state }, ...overrides };
}

function createClient(agent: StubAgent, overrides: Partial<ConstructorParameters<typeof A2AClient>[0]> = {}): A2AClient {
  return new A2AClient({
    baseUrl: BASE_URL,
    retryDelayMs: 1,
    pollIntervalMs: 5,
    maxWaitMs: 2000,
    idGenerator: () => 'msg-1',
    fetchImpl: agent.fetchImpl,
    ...overrides,
  });
}

describe('rewriteDockerUrl', () => {
  it('should map a compose hostname to localhost', () => {
    expect(rewriteDockerUrl('http://browser-agent:8003/')).toBe('http://localhost:8003/');
  });

  it('should leave other hosts alone', () => {
    expect(rewriteDockerUrl('http://example.test:8003/')).toBe('http://example.test:8003/');
  });
});

describe('isRetryableStatus', () => {
  it('should retry throttling and server errors only', () => {
    expect(isRetryableStatus(429)).toBe(true);
    expect(isRetryableStatus(503)).toBe(true);
    expect(isRetryableStatus(404)).toBe(false);
  });
});

describe('A2AClient', () => {
  describe('agent card', () => {
    it('should fetch the card once and cache it', async () => {
      const agent = stubAgent(() => ({ result: task('completed') }));
      const client = createClient(agent);

      const first = await client.getAgentCard();
      await client.getAgentCard();

      expect(first.name).toBe('StubAgent');
      expect(agent.cardRequests).toEqual([CARD_URL]);
    });

    it('should fetch the card again after a failed attempt', async () => {
      const agent = stubAgent(() => ({ result: task('completed') }), { firstCardStatus: 503 });
      const client = createClient(agent);

      await expect(client.getAgentCard()).rejects.toThrow(`HTTP 503 from ${CARD_URL}`);
      const card = await client.getAgentCard();

      expect(card.name).toBe('StubAgent');
      expect(agent.cardRequests).toEqual([CARD_URL, CARD_URL]);
    });

    it('should rewrite a Docker hostname outside Docker', async () => {
      const agent = stubAgent(() => ({ result: task('completed') }), { cardHost: 'browser-agent' });
      const client = createClient(agent);

      const card = await client.getAgentCard();
      await client.sendText('collect');

      expect(card.url).toBe('http://localhost:8003/');
      expect(agent.calls[0].url).toBe('http://localhost:8003/');
    });

    it('should keep the Docker hostname inside Docker', async () => {
      const agent = stubAgent(() => ({ result: task('completed') }), { cardHost: 'browser-agent' });
      const client = createClient(agent, { isDocker: true });

      const card = await client.getAgentCard();
      await client.sendText('collect');

      expect(card.url).toBe('http://browser-agent:8003/');
      expect(agent.calls[0].url).toBe('http://browser-agent:8003/');
    });
  });

  describe('sendText', () => {
    it('should send a user message and merge the completed task', async () => {
      const agent = stubAgent(() => ({
        result: task('completed', {
          artifacts: [
            {
              artifactId: 'a1',
              parts: [
                { kind: 'text', text: 'Collected 3 quotes' },
                { kind: 'data', data: { quotes: 3 } },
              ],
            },
          ],
        }),
      }));

      const response = await createClient(agent).sendText('collect quotes', { contextId: 'ctx-1' });

      expect(response.text).toBe('Collected 3 quotes');
      expect(response.data).toEqual({ quotes: 3 });
      expect(agent.calls).toHaveLength(1);
      expect(agent.calls[0].method).toBe('message/send');
      expect(agent.calls[0].params).toEqual({
        message: {
          kind: 'message',
          messageId: 'msg-1',
          role: 'user',
          parts: [{ kind: 'text', text: 'collect quotes' }],
          contextId: 'ctx-1',
        },
        configuration: { blocking: true },
      });
    });

    it('should send the bearer token', async () => {
      const agent = stubAgent(() => ({ result: task('completed') }));

      await createClient(agent, { authToken: 'test-secret' }).sendText('hello');

      expect(agent.calls[0].authorization).toBe('Bearer test-secret');
    });

    it('should accept a direct message reply', async () => {
      const agent = stubAgent(() => ({
        result: { kind: 'message', messageId: 'r1', role: 'agent', parts: [{ kind: 'text', text: 'hi' }] },
      }));

      const response = await createClient(agent).sendText('hello');

      expect(response.text).toBe('hi');
      expect(response.state).toBe('completed');
    });

    it('should poll a working task until it completes', async () => {
      let polls = 0;
      const agent = stubAgent((call) => {
        if (call.method === 'message/send') {
          return { result: task('working') };
        }
        polls++;
        return {
          result:
            polls < 2
              ? task('working')
              : task('completed', {
                  history: [{ kind: 'message', messageId: 'h1', role: 'agent', parts: [{ kind: 'text', text: 'done' }] }],
                }),
        };
      });

      const response = await createClient(agent).sendText('analyze');

      expect(response.text).toBe('done');
      expect(agent.calls.map((call) => call.method)).toEqual(['message/send', 'tasks/get', 'tasks/get']);
      expect(agent.calls[1].params).toEqual({ id: 'task-1' });
    });

    it('should poll an accepted task without sending the message again', async () => {
      const agent = stubAgent((call) => (call.method === 'message/send' ? { result: task('working') } : { status: 503 }));
      const client = createClient(agent, { maxRetries: 2, maxPollFailures: 2 });

      const error = await client.sendText('buy 10 AAPL').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(A2AClientError);
      expect(error).toHaveProperty('options.status', 503);
      expect(agent.calls.map((call) => call.method)).toEqual(['message/send', 'tasks/get', 'tasks/get']);
    });

    it('should stop polling as soon as the signal aborts', async () => {
      const controller = new AbortController();
      const agent = stubAgent(() => {
        setTimeout(() => controller.abort(new Error('Stage trading timed out')), 10);
        return { result: task('working') };
      });
      const client = createClient(agent, { pollIntervalMs: 60000, maxWaitMs: 120000 });

      await expect(client.sendText('analyze', { signal: controller.signal })).rejects.toThrow('Stage trading timed out');
      expect(agent.calls.map((call) => call.method)).toEqual(['message/send']);
    });

    it('should time out when the task never settles', async () => {
      const agent = stubAgent(() => ({ result: task('working') }));
      const client = createClient(agent, { pollIntervalMs: 20, maxWaitMs: 30, maxRetries: 0 });

      await expect(client.sendText('analyze')).rejects.toBeInstanceOf(TimeoutError);
    });

    it('should throw when the task fails', async () => {
      const agent = stubAgent(() => ({
        result: task('failed', {
          status: {
            state: 'failed',
            message: { kind: 'message', messageId: 's1', role: 'agent', parts: [{ kind: 'text', text: 'no market data' }] },
          },
        }),
      }));

      const error = await createClient(agent)
        .sendText('collect')
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(A2AClientError);
      expect(error).toHaveProperty('message', 'Agent task task-1 ended in state failed: no market data');
      expect(agent.calls).toHaveLength(1);
    });

    it('should not retry a JSON-RPC error', async () => {
      const agent = stubAgent(() => ({ error: { code: -32602, message: 'Invalid params' } }));

      const error = await createClient(agent)
        .sendText('collect')
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(A2AClientError);
      expect(error).toHaveProperty('message', 'Agent returned error -32602: Invalid params');
      expect(error).toHaveProperty('options.rpcCode', -32602);
      expect(agent.calls).toHaveLength(1);
    });

    it('should stop polling on a JSON-RPC error', async () => {
      const agent = stubAgent((call) =>
        call.method === 'message/send' ? { result: task('working') } : { error: { code: -32001, message: 'Task not found' } }
      );

      await expect(createClient(agent).sendText('analyze')).rejects.toThrow('Agent returned error -32001: Task not found');
      expect(agent.calls.map((call) => call.method)).toEqual(['message/send', 'tasks/get']);
    });

    it('should retry server errors', async () => {
      let attempts = 0;
      const agent = stubAgent(() => {
        attempts++;
        return attempts < 3 ? { status: 503 } : { result: task('completed') };
      });

      const response = await createClient(agent, { maxRetries: 3 }).sendText('collect');

      expect(response.state).toBe('completed');
      expect(agent.calls).toHaveLength(3);
    });

    it('should give up after the configured retries', async () => {
      const agent = stubAgent(() => ({ status: 500 }));

      const error = await createClient(agent, { maxRetries: 1 })
        .sendText('collect')
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(A2AClientError);
      expect(error).toHaveProperty('options.status', 500);
      expect(agent.calls).toHaveLength(2);
    });
  });
});
