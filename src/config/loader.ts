/**
 * Configuration file loader and resolver.
 *
 * Precedence: environment variables, then the YAML file, then defaults.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import * as yaml from 'js-yaml';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { toValidationIssues } from '../workflow/request.js';
import { AGENT_TYPES } from '../workflow/types.js';
import { AGENT_URL_ENV, defaultAgentUrls } from './agent-urls.js';
import { CLIENT, CONFIG_FILE_NAMES, DEFAULT_ROUTING, SERVER, WORKFLOW } from './constants.js';
import {
  configFileSchema,
  type ConfigFileInfo,
  type LoadedConfig,
  type ResolvedConfig,
  type SupervisorFileConfig,
} from './types.js';

const logger = createLogger('ConfigLoader');

type Env = Record<string, string | undefined>;

/**
 * Search paths for configuration files: the working directory, the project
 * root and the home directory.
 */
function getSearchPaths(): string[] {
  const moduleDir = dirname(fileURLToPath(import.meta.url));
  return [
    process.cwd(),
    // src/config or dist/config -> project root
    resolve(moduleDir, '..', '..'),
    process.env.HOME || '',
  ].filter(Boolean);
}

/**
 * Find the configuration file in the search paths.
 */
export function findConfigFile(): ConfigFileInfo {
  for (const searchPath of getSearchPaths()) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = resolve(searchPath, fileName);
      if (existsSync(filePath)) {
        logger.debug({ filePath }, 'Found configuration file');
        return { path: filePath, exists: true };
      }
    }
  }

  logger.debug('No configuration file found, using defaults');
  return { path: '', exists: false };
}

/**
 * Load, parse and validate the configuration file.
 *
 * An explicit path that does not exist is an error; a missing file found by
 * searching is not. A file that is not valid YAML is ignored with a warning.
 *
 * @throws ConfigurationError when the file content does not match the schema
 */
export function loadConfigFile(filePath?: string): LoadedConfig {
  const fileInfo = filePath ? { path: resolve(filePath), exists: existsSync(resolve(filePath)) } : findConfigFile();

  if (!fileInfo.exists) {
    if (filePath) {
      throw new ConfigurationError(`Configuration file not found: ${fileInfo.path}`);
    }
    return { config: {}, fromFile: false };
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(fileInfo.path, 'utf-8'));
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.warn({ path: fileInfo.path, error: errorMessage }, 'Failed to parse configuration file');
    return { config: {}, fromFile: false };
  }

  if (parsed === null || parsed === undefined) {
    logger.warn({ path: fileInfo.path }, 'Configuration file is empty');
    return { config: {}, source: fileInfo.path, fromFile: true };
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    const [first] = toValidationIssues(result.error);
    throw new ConfigurationError(
      `Invalid configuration in ${fileInfo.path}: ${first ? `${first.path}: ${first.message}` : 'unknown problem'}`,
      first?.path
    );
  }

  logger.info({ path: fileInfo.path, keys: Object.keys(result.data) }, 'Configuration file loaded successfully');
  return { config: result.data, source: fileInfo.path, fromFile: true };
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return value.toLowerCase() === 'true';
}

function parsePort(value: string | undefined, key: string): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`${key} must be a port number, got "${value}"`, key);
  }
  return port;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

/**
 * Merge file values, environment overrides and defaults.
 *
 * @throws ConfigurationError when an environment value is malformed
 */
export function resolveConfig(fileConfig: SupervisorFileConfig = {}, env: Env = process.env, source?: string): ResolvedConfig {
  const isDocker = parseBoolean(env.IS_DOCKER) ?? fileConfig.deployment?.docker ?? false;
  const defaults = defaultAgentUrls(isDocker);

  const agents = { ...defaults };
  for (const agent of AGENT_TYPES) {
    agents[agent] = nonEmpty(env[AGENT_URL_ENV[agent]]) ?? fileConfig.agents?.[agent] ?? defaults[agent];
  }

  return {
    server: {
      host: nonEmpty(env.AGENT_HOST) ?? fileConfig.server?.host ?? (isDocker ? SERVER.DOCKER_HOST : SERVER.LOCAL_HOST),
      port: parsePort(env.AGENT_PORT, 'AGENT_PORT') ?? fileConfig.server?.port ?? SERVER.PORT,
      authToken: nonEmpty(env.A2A_AUTH_TOKEN) ?? fileConfig.server?.authToken,
    },
    isDocker,
    agents,
    workflow: {
      stageTimeoutMs: fileConfig.workflow?.stageTimeoutMs ?? WORKFLOW.STAGE_TIMEOUT_MS,
      maxTasks: fileConfig.workflow?.maxTasks ?? WORKFLOW.MAX_TASKS,
      maxHistoryMessages: fileConfig.workflow?.maxHistoryMessages ?? WORKFLOW.MAX_HISTORY_MESSAGES,
      routing: { ...DEFAULT_ROUTING, ...fileConfig.workflow?.routing },
    },
    client: {
      requestTimeoutMs: fileConfig.client?.requestTimeoutMs ?? CLIENT.REQUEST_TIMEOUT_MS,
      maxRetries: fileConfig.client?.maxRetries ?? CLIENT.MAX_RETRIES,
      retryDelayMs: fileConfig.client?.retryDelayMs ?? CLIENT.RETRY_DELAY_MS,
      pollIntervalMs: fileConfig.client?.pollIntervalMs ?? CLIENT.POLL_INTERVAL_MS,
      maxWaitMs: fileConfig.client?.maxWaitMs ?? CLIENT.MAX_WAIT_MS,
    },
    source,
  };
}
