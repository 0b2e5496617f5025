/**
 * Command line interface for the supervisor.
 *
 * Commands:
 * - serve: start the A2A server
 * - run: run one workflow and print its summary
 * - classify: show the pattern an instruction maps to
 * - agents: check that the worker agents answer
 */

import type { AgentClientFactory } from '../agents/registry.js';
import { Config } from '../config/index.js';
import type { ResolvedConfig } from '../config/types.js';
import { createSupervisor, runSupervisor, type RunningSupervisor } from '../runners/supervisor-runner.js';
import { handleError } from '../utils/error-handler.js';
import { createLogger } from '../utils/logger.js';
import { classifyRequest } from '../workflow/classifier.js';
import { describeEvent } from '../workflow/events.js';
import { getStageSequence } from '../workflow/stages.js';

const logger = createLogger('CLI');

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

/**
 * Display colored text.
 */
function color(text: string, colorName: keyof typeof colors): string {
  return `${colors[colorName]}${text}${colors.reset}`;
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'serve'; host?: string; port?: number; configPath?: string }
  | { kind: 'run'; prompt: string; contextId?: string; json: boolean; configPath?: string }
  | { kind: 'classify'; text: string; json: boolean }
  | { kind: 'agents'; json: boolean; configPath?: string };

export type CliOutcome = { kind: 'exit'; code: number } | { kind: 'serving'; supervisor: RunningSupervisor };

/**
 * Seams for tests and embedding.
 */
export interface CliDependencies {
  loadConfig?: (configPath?: string) => ResolvedConfig;
  clientFactory?: AgentClientFactory;
}

/**
 * Invalid command line.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

interface ParsedFlags {
  positionals: string[];
  values: Map<string, string>;
  switches: Set<string>;
}

const VALUE_FLAGS = ['--host', '--port', '--config', '--prompt', '--context'];
const SWITCH_FLAGS = ['--json', '--help', '-h'];

function parseFlags(args: string[]): ParsedFlags {
  const parsed: ParsedFlags = { positionals: [], values: new Map(), switches: new Set() };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.includes(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new CliUsageError(`Missing value for ${arg}`);
      }
      parsed.values.set(arg, value);
      i++;
    } else if (SWITCH_FLAGS.includes(arg)) {
      parsed.switches.add(arg);
    } else if (arg.startsWith('--')) {
      throw new CliUsageError(`Unknown option "${arg}"`);
    } else {
      parsed.positionals.push(arg);
    }
  }
  return parsed;
}

function parsePortFlag(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new CliUsageError(`--port must be a port number, got "${value}"`);
  }
  return port;
}

/**
 * Parse command line arguments (without the node and script paths).
 *
 * @throws CliUsageError
 */
export function parseCliArgs(args: string[]): CliCommand {
  const [command, ...rest] = args;
  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    return { kind: 'help' };
  }

  const flags = parseFlags(rest);
  if (flags.switches.has('--help') || flags.switches.has('-h')) {
    return { kind: 'help' };
  }
  const configPath = flags.values.get('--config');
  const json = flags.switches.has('--json');

  switch (command) {
    case 'serve':
      return {
        kind: 'serve',
        host: flags.values.get('--host'),
        port: parsePortFlag(flags.values.get('--port')),
        configPath,
      };

    case 'run': {
      const prompt = (flags.values.get('--prompt') ?? flags.positionals.join(' ')).trim();
      if (!prompt) {
        throw new CliUsageError('run requires --prompt <text>');
      }
      return { kind: 'run', prompt, contextId: flags.values.get('--context'), json, configPath };
    }

    case 'classify': {
      const text = flags.positionals.join(' ').trim();
      if (!text) {
        throw new CliUsageError('classify requires the instruction text');
      }
      return { kind: 'classify', text, json };
    }

    case 'agents':
      return { kind: 'agents', json, configPath };

    default:
      throw new CliUsageError(`Unknown command "${command}"`);
  }
}

/**
 * Show help message.
 */
export function showHelp(): void {
  console.log('');
  console.log(color('═══════════════════════════════════════════════════', 'cyan'));
  console.log(color('  A2A Supervisor - Multi-agent workflow dispatcher', 'bold'));
  console.log(color('═══════════════════════════════════════════════════', 'cyan'));
  console.log('');
  console.log(color('Usage:', 'bold'));
  console.log('  a2a-supervisor serve [--host <host>] [--port <port>]   Start the A2A server');
  console.log('  a2a-supervisor run --prompt <text> [--context <id>]    Run one workflow');
  console.log('  a2a-supervisor classify <text>                         Show the workflow pattern');
  console.log('  a2a-supervisor agents                                  Check worker agents');
  console.log('');
  console.log(color('Options:', 'bold'));
  console.log('  --config <path>    Configuration file (default: a2a-supervisor.config.yaml)');
  console.log('  --json             Print machine-readable output');
  console.log('');
  console.log(color('Environment Variables:', 'bold'));
  console.log('  IS_DOCKER          Use Docker service names for agent URLs');
  console.log('  PLANNER_URL, KNOWLEDGE_URL, BROWSER_URL, EXECUTOR_URL');
  console.log('  AGENT_HOST, AGENT_PORT, A2A_AUTH_TOKEN, LOG_LEVEL, LOG_DIR');
  console.log('');
  console.log(color('Examples:', 'bold'));
  console.log(`  a2a-supervisor run --prompt ${color('"Collect AAPL prices and analyze the trend"', 'yellow')}`);
  console.log(`  a2a-supervisor classify ${color('"Buy 10 shares after analyzing TSLA"', 'yellow')}`);
  console.log('');
}

async function runWorkflow(
  command: Extract<CliCommand, { kind: 'run' }>,
  config: ResolvedConfig,
  deps: CliDependencies
): Promise<number> {
  const { dispatcher } = createSupervisor({ config, clientFactory: deps.clientFactory });

  if (!command.json) {
    console.log('');
    console.log(color('Prompt:', 'bold'), command.prompt);
    console.log(color('───────────────────────────────────────────────────', 'dim'));
  }

  const result = await dispatcher.run(
    { instruction: command.prompt, contextId: command.contextId },
    {
      onEvent: (event) => {
        if (!command.json) {
          console.log(color(describeEvent(event), 'dim'));
        }
      },
    }
  );

  if (command.json) {
    console.log(JSON.stringify(result, null, 2));
    return result.success ? 0 : 1;
  }

  console.log(color('───────────────────────────────────────────────────', 'dim'));
  if (result.results.some((stage) => stage.success)) {
    console.log(result.summary);
  }
  if (!result.success) {
    for (const error of result.errors) {
      console.log(color(`Error: ${error.message}`, 'red'));
    }
  }
  console.log('');
  return result.success ? 0 : 1;
}

function classifyInstruction(command: Extract<CliCommand, { kind: 'classify' }>): number {
  const classification = classifyRequest({ instruction: command.text });
  const stages = getStageSequence(classification.pattern);

  if (command.json) {
    console.log(JSON.stringify({ ...classification, stages }, null, 2));
    return 0;
  }

  const flag = classification.ambiguous ? color(' (ambiguous)', 'yellow') : '';
  console.log(`${color(classification.pattern, 'bold')}${flag} - ${classification.reason}`);
  console.log(`Stages: ${stages.join(' -> ')}`);
  return 0;
}

async function checkAgents(
  command: Extract<CliCommand, { kind: 'agents' }>,
  config: ResolvedConfig,
  deps: CliDependencies
): Promise<number> {
  const { registry } = createSupervisor({ config, clientFactory: deps.clientFactory, handlers: {} });
  const statuses = await registry.checkAgents();

  if (command.json) {
    console.log(JSON.stringify(statuses, null, 2));
  } else {
    for (const status of statuses) {
      const line = status.reachable
        ? color(`✓ ${status.agent.padEnd(10)} ${status.url}  ${status.name ?? ''} ${status.version ?? ''}`.trimEnd(), 'green')
        : color(`✗ ${status.agent.padEnd(10)} ${status.url}  ${status.error ?? 'unreachable'}`, 'red');
      console.log(line);
    }
  }
  return statuses.every((status) => status.reachable) ? 0 : 1;
}

/**
 * Run the CLI with the given arguments.
 *
 * Returns the exit code, or the running supervisor for `serve`.
 */
export async function runCli(args: string[], deps: CliDependencies = {}): Promise<CliOutcome> {
  const loadConfig = deps.loadConfig ?? ((configPath?: string) => Config.load({ configPath }));

  try {
    const command = parseCliArgs(args);
    logger.debug({ command: command.kind }, 'CLI command parsed');

    switch (command.kind) {
      case 'help':
        showHelp();
        return { kind: 'exit', code: 0 };

      case 'classify':
        return { kind: 'exit', code: classifyInstruction(command) };

      case 'run':
        return { kind: 'exit', code: await runWorkflow(command, loadConfig(command.configPath), deps) };

      case 'agents':
        return { kind: 'exit', code: await checkAgents(command, loadConfig(command.configPath), deps) };

      case 'serve': {
        const supervisor = await runSupervisor({
          config: loadConfig(command.configPath),
          host: command.host,
          port: command.port,
          clientFactory: deps.clientFactory,
        });
        return { kind: 'serving', supervisor };
      }
    }
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.log(color(`Error: ${error.message}`, 'red'));
      console.log(`Run ${color('a2a-supervisor --help', 'yellow')} for usage.`);
      return { kind: 'exit', code: 2 };
    }

    const report = handleError(error, { command: args[0] }, { log: true, customLogger: logger });
    console.log('');
    console.log(color(`Error: ${report.userMessage}`, 'red'));
    console.log('');
    return { kind: 'exit', code: 1 };
  }
}
