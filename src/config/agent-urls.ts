/**
 * Default worker agent URLs.
 */

import type { AgentType } from '../workflow/types.js';
import { AGENT_PORTS } from './constants.js';

/** Environment variable overriding each agent's URL */
export const AGENT_URL_ENV: Readonly<Record<AgentType, string>> = {
  planner: 'PLANNER_URL',
  knowledge: 'KNOWLEDGE_URL',
  browser: 'BROWSER_URL',
  executor: 'EXECUTOR_URL',
};

function agentUrl(agent: AgentType, isDocker: boolean): string {
  const host = isDocker ? `${agent}-agent` : 'localhost';
  return `http://${host}:${AGENT_PORTS[agent]}`;
}

/**
 * Compose service names inside Docker, localhost otherwise.
 */
export function defaultAgentUrls(isDocker: boolean): Record<AgentType, string> {
  return {
    planner: agentUrl('planner', isDocker),
    knowledge: agentUrl('knowledge', isDocker),
    browser: agentUrl('browser', isDocker),
    executor: agentUrl('executor', isDocker),
  };
}
