/**
 * Application-wide constants.
 */

import type { AgentType, InvocableStage } from '../workflow/types.js';

/**
 * Configuration file names to search for, in priority order.
 */
export const CONFIG_FILE_NAMES = ['a2a-supervisor.config.yaml', 'a2a-supervisor.config.yml'] as const;

/**
 * Supervisor HTTP server defaults
 */
export const SERVER = {
  /** Port of the supervisor's A2A endpoint */
  PORT: 8000,
  LOCAL_HOST: 'localhost',
  DOCKER_HOST: '0.0.0.0',
} as const;

/**
 * Worker agent ports, shared by the local and Docker URL defaults
 */
export const AGENT_PORTS: Readonly<Record<AgentType, number>> = {
  planner: 8001,
  knowledge: 8002,
  browser: 8003,
  executor: 8004,
};

/**
 * Default stage -> agent routing
 */
export const DEFAULT_ROUTING: Readonly<Record<InvocableStage, AgentType>> = {
  data_collection: 'browser',
  analysis: 'executor',
  trading: 'executor',
};

/**
 * Workflow limits
 */
export const WORKFLOW = {
  /** Upper bound for one stage invocation (milliseconds) */
  STAGE_TIMEOUT_MS: 5 * 60 * 1000, // 5 minutes

  /** Task states kept in memory before the oldest finished ones are evicted */
  MAX_TASKS: 1000,

  /** Messages kept per conversation context */
  MAX_HISTORY_MESSAGES: 50,
} as const;

/**
 * A2A client defaults
 */
export const CLIENT = {
  REQUEST_TIMEOUT_MS: 60 * 1000,
  MAX_RETRIES: 3,
  RETRY_DELAY_MS: 1000,
  POLL_INTERVAL_MS: 10 * 1000,
  MAX_WAIT_MS: 2 * 60 * 1000, // 2 minutes
} as const;
