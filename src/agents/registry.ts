/**
 * Agent Registry - worker agent URLs and their A2A clients.
 *
 * One client is created per agent type on first use and reused afterwards,
 * so each agent card is fetched once per process.
 *
 * @module agents/registry
 */

import type { Logger } from 'pino';
import { A2AClient, type A2AClientOptions, type SendOptions } from '../a2a/client.js';
import type { AgentCard, Part, UnifiedResponse } from '../a2a/types.js';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { AGENT_TYPES, type AgentType } from '../workflow/types.js';

/**
 * The part of {@link A2AClient} the supervisor depends on.
 */
export interface AgentClient {
  getAgentCard(): Promise<AgentCard>;
  sendParts(parts: Part[], options?: SendOptions): Promise<UnifiedResponse>;
}

export type AgentClientFactory = (agent: AgentType, url: string) => AgentClient;

/** Client settings shared by every agent */
export type SharedClientOptions = Omit<A2AClientOptions, 'baseUrl' | 'logger'>;

export interface AgentRegistryOptions {
  urls: Partial<Record<AgentType, string>>;
  client?: SharedClientOptions;
  /** Replaces the default {@link A2AClient} construction */
  clientFactory?: AgentClientFactory;
  logger?: Logger;
}

/**
 * Reachability of one agent, as reported by {@link AgentRegistry.checkAgents}.
 */
export interface AgentStatus {
  agent: AgentType;
  url: string;
  reachable: boolean;
  /** Name from the agent card */
  name?: string;
  version?: string;
  error?: string;
}

export class AgentRegistry {
  private readonly urls: Partial<Record<AgentType, string>>;
  private readonly clients = new Map<AgentType, AgentClient>();
  private readonly factory: AgentClientFactory;
  private readonly logger: Logger;

  constructor(options: AgentRegistryOptions) {
    this.urls = { ...options.urls };
    this.logger = options.logger ?? createLogger('AgentRegistry');
    this.factory =
      options.clientFactory ??
      ((agent, url) =>
        new A2AClient({
          ...options.client,
          baseUrl: url,
          logger: this.logger.child({ agent, agentUrl: url }),
        }));
  }

  /**
   * Agent types that have a URL.
   */
  getAgents(): AgentType[] {
    return AGENT_TYPES.filter((agent) => this.urls[agent] !== undefined);
  }

  /**
   * @throws ConfigurationError when no URL is configured for the agent
   */
  getUrl(agent: AgentType): string {
    const url = this.urls[agent];
    if (!url) {
      throw new ConfigurationError(`No URL configured for agent ${agent}`, agent);
    }
    return url;
  }

  /**
   * Client for an agent, created on first use.
   *
   * @throws ConfigurationError when no URL is configured for the agent
   */
  getClient(agent: AgentType): AgentClient {
    const existing = this.clients.get(agent);
    if (existing) {
      return existing;
    }

    const client = this.factory(agent, this.getUrl(agent));
    this.clients.set(agent, client);
    return client;
  }

  /**
   * Fetch every configured agent's card. Never throws; unreachable agents
   * are reported with the error message.
   */
  async checkAgents(): Promise<AgentStatus[]> {
    return Promise.all(
      this.getAgents().map(async (agent): Promise<AgentStatus> => {
        const url = this.getUrl(agent);
        try {
          const card = await this.getClient(agent).getAgentCard();
          return { agent, url, reachable: true, name: card.name, version: card.version };
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.warn({ agent, url, error: message }, 'Agent is not reachable');
          return { agent, url, reachable: false, error: message };
        }
      })
    );
  }
}
