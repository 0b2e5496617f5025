/**
 * The supervisor's own agent card.
 *
 * @module a2a/agent-card
 */

import type { AgentCard } from './types.js';

export const SUPERVISOR_NAME = 'SupervisorAgent';
export const SUPERVISOR_DOCKER_HOST = 'supervisor-agent';

export interface SupervisorCardOptions {
  host: string;
  port: number;
  isDocker?: boolean;
  version?: string;
}

/**
 * URL other containers use to reach the supervisor. Inside Docker the
 * compose service name replaces the bind address.
 */
export function resolvePublicUrl(options: Pick<SupervisorCardOptions, 'host' | 'port' | 'isDocker'>): string {
  const host = options.isDocker ? SUPERVISOR_DOCKER_HOST : options.host === '0.0.0.0' ? 'localhost' : options.host;
  return `http://${host}:${options.port}/`;
}

export function createSupervisorCard(options: SupervisorCardOptions): AgentCard {
  return {
    name: SUPERVISOR_NAME,
    description: 'Classifies requests and walks worker agents through data, analysis and trading stages',
    url: resolvePublicUrl(options),
    version: options.version ?? '1.0.0',
    protocolVersion: '0.3.0',
    preferredTransport: 'JSONRPC',
    capabilities: {
      streaming: true,
      pushNotifications: false,
      stateTransitionHistory: false,
    },
    defaultInputModes: ['text/plain', 'application/json'],
    defaultOutputModes: ['text/plain', 'application/json'],
    skills: [
      {
        id: 'workflow_orchestration',
        name: 'Workflow orchestration',
        description: 'Picks a workflow pattern for the request and runs its stages in order',
        tags: ['supervisor', 'orchestration', 'workflow'],
        examples: ["collect today's market data", 'collect and analyze market trends'],
      },
    ],
  };
}
