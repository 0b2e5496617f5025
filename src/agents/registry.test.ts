/**
 * Tests for AgentRegistry (src/agents/registry.ts)
 */

import { describe, it, expect, vi } from 'vitest';
import type { AgentCard } from '../a2a/types.js';
import { ConfigurationError } from '../utils/errors.js';
import { AgentRegistry, type AgentClient, type AgentClientFactory } from './registry.js';

function card(name: string, url: string): AgentCard {
  return {
    name,
    description: `${name} agent`,
    url,
    version: '1.0.0',
    protocolVersion: '0.3.0',
    capabilities: {},
    defaultInputModes: ['text'],
    defaultOutputModes: ['text'],
    skills: [],
  };
}

function fakeClient(getAgentCard: AgentClient['getAgentCard']): AgentClient {
  return { getAgentCard, sendParts: vi.fn() };
}

describe('AgentRegistry', () => {
  const urls = {
    browser: 'http://localhost:8003',
    executor: 'http://localhost:8004',
  };

  it('should return configured URLs', () => {
    const registry = new AgentRegistry({ urls });

    expect(registry.getUrl('browser')).toBe('http://localhost:8003');
    expect(registry.getAgents()).toEqual(['browser', 'executor']);
  });

  it('should throw ConfigurationError for an agent without a URL', () => {
    const registry = new AgentRegistry({ urls });

    expect(() => registry.getUrl('planner')).toThrow(ConfigurationError);
    expect(() => registry.getUrl('planner')).toThrow('No URL configured for agent planner');
  });

  it('should create one client per agent', () => {
    const factory = vi.fn<Parameters<AgentClientFactory>, AgentClient>(() =>
      fakeClient(async () => card('x', 'http://x/'))
    );
    const registry = new AgentRegistry({ urls, clientFactory: factory });

    const first = registry.getClient('browser');
    const second = registry.getClient('browser');
    registry.getClient('executor');

    expect(second).toBe(first);
    expect(factory).toHaveBeenCalledTimes(2);
    expect(factory).toHaveBeenNthCalledWith(1, 'browser', 'http://localhost:8003');
    expect(factory).toHaveBeenNthCalledWith(2, 'executor', 'http://localhost:8004');
  });

  it('should build A2A clients by default', () => {
    const registry = new AgentRegistry({ urls, client: { maxRetries: 0 } });

    expect(typeof registry.getClient('browser').sendParts).toBe('function');
  });

  it('should report reachable and unreachable agents', async () => {
    const registry = new AgentRegistry({
      urls,
      clientFactory: (agent, url) =>
        agent === 'browser'
          ? fakeClient(async () => card('BrowserAgent', url))
          : fakeClient(async () => {
              throw new Error('connect ECONNREFUSED 127.0.0.1:8004');
            }),
    });

    const statuses = await registry.checkAgents();

    expect(statuses).toEqual([
      { agent: 'browser', url: 'http://localhost:8003', reachable: true, name: 'BrowserAgent', version: '1.0.0' },
      {
        agent: 'executor',
        url: 'http://localhost:8004',
        reachable: false,
        error: 'connect ECONNREFUSED 127.0.0.1:8004',
      },
    ]);
  });
});
