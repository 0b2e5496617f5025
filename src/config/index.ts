/**
 * Configuration management for the supervisor.
 *
 * Sources, highest precedence first:
 * - Environment variables (IS_DOCKER, *_URL, AGENT_HOST, AGENT_PORT, ...)
 * - YAML configuration file (a2a-supervisor.config.yaml)
 * - Built-in defaults
 *
 * The environment is read once, on the first `Config.load()`.
 */
import { createLogger } from '../utils/logger.js';
import { loadConfigFile, resolveConfig } from './loader.js';
import type { ResolvedConfig } from './types.js';

// Export constants and types
export * from './constants.js';
export * from './agent-urls.js';
export * from './types.js';
export * from './loader.js';

const logger = createLogger('Config');

export interface ConfigLoadOptions {
  /** Explicit configuration file; searched for when omitted */
  configPath?: string;
  env?: Record<string, string | undefined>;
}

/**
 * Memoised access to the resolved configuration.
 */
export class Config {
  private static cached: ResolvedConfig | null = null;

  /**
   * Resolve the configuration, or return the one resolved earlier.
   *
   * @throws ConfigurationError when the file or an environment value is invalid
   */
  static load(options: ConfigLoadOptions = {}): ResolvedConfig {
    if (this.cached) {
      return this.cached;
    }

    const loaded = loadConfigFile(options.configPath);
    const resolved = resolveConfig(loaded.config, options.env ?? process.env, loaded.source);

    logger.debug(
      {
        source: resolved.source ?? 'defaults',
        isDocker: resolved.isDocker,
        host: resolved.server.host,
        port: resolved.server.port,
        agents: resolved.agents,
      },
      'Configuration resolved'
    );

    this.cached = resolved;
    return resolved;
  }

  /**
   * Forget the memoised configuration.
   */
  static reset(): void {
    this.cached = null;
  }

  /**
   * Check if a configuration file was loaded.
   */
  static hasConfigFile(): boolean {
    return this.load().source !== undefined;
  }
}
