/**
 * Configuration types.
 *
 * The file schema mirrors `a2a-supervisor.config.yaml`; every field is
 * optional and filled from environment variables or defaults when the
 * configuration is resolved.
 */

import { z } from 'zod';
import type { AgentType, InvocableStage } from '../workflow/types.js';

const agentTypeSchema = z.enum(['planner', 'knowledge', 'browser', 'executor']);
const urlSchema = z.string().url();
const positiveInt = z.number().int().positive();

export const configFileSchema = z
  .object({
    server: z
      .object({
        host: z.string().min(1).optional(),
        port: z.number().int().min(0).max(65535).optional(),
        authToken: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    deployment: z
      .object({
        docker: z.boolean().optional(),
      })
      .strict()
      .optional(),
    agents: z
      .object({
        planner: urlSchema.optional(),
        knowledge: urlSchema.optional(),
        browser: urlSchema.optional(),
        executor: urlSchema.optional(),
      })
      .strict()
      .optional(),
    workflow: z
      .object({
        /** 0 disables the stage timeout */
        stageTimeoutMs: z.number().int().min(0).optional(),
        maxTasks: positiveInt.optional(),
        maxHistoryMessages: positiveInt.optional(),
        routing: z
          .object({
            data_collection: agentTypeSchema.optional(),
            analysis: agentTypeSchema.optional(),
            trading: agentTypeSchema.optional(),
          })
          .strict()
          .optional(),
      })
      .strict()
      .optional(),
    client: z
      .object({
        requestTimeoutMs: positiveInt.optional(),
        maxRetries: z.number().int().min(0).optional(),
        retryDelayMs: z.number().int().min(0).optional(),
        pollIntervalMs: positiveInt.optional(),
        maxWaitMs: positiveInt.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/**
 * Configuration as written in the YAML file.
 */
export type SupervisorFileConfig = z.infer<typeof configFileSchema>;

/**
 * Configuration file information.
 */
export interface ConfigFileInfo {
  path: string;
  exists: boolean;
}

/**
 * Result of reading the configuration file.
 */
export interface LoadedConfig {
  config: SupervisorFileConfig;
  /** Absolute path of the file, when one was read */
  source?: string;
  fromFile: boolean;
}

export interface ServerSettings {
  host: string;
  port: number;
  authToken?: string;
}

export interface WorkflowSettings {
  stageTimeoutMs: number;
  maxTasks: number;
  maxHistoryMessages: number;
  routing: Record<InvocableStage, AgentType>;
}

export interface ClientSettings {
  requestTimeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  pollIntervalMs: number;
  maxWaitMs: number;
}

/**
 * Fully resolved configuration: file values overridden by the environment,
 * gaps filled with defaults.
 */
export interface ResolvedConfig {
  server: ServerSettings;
  isDocker: boolean;
  agents: Record<AgentType, string>;
  workflow: WorkflowSettings;
  client: ClientSettings;
  /** Path of the configuration file, when one was read */
  source?: string;
}
