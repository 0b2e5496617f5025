#!/usr/bin/env node
/**
 * CLI entry point for the A2A supervisor.
 */
import { runCli } from './cli/index.js';
import { flushLogger, getRootLogger } from './utils/logger.js';

/**
 * Main CLI entry point.
 */
async function main(): Promise<void> {
  getRootLogger().debug(
    { command: process.argv[2], args: process.argv.slice(3), nodeVersion: process.version },
    'A2A supervisor starting'
  );

  const outcome = await runCli(process.argv.slice(2));
  if (outcome.kind === 'exit') {
    await flushLogger();
    process.exit(outcome.code);
  }
}

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  getRootLogger().fatal({ err: error }, 'Uncaught exception');
  void flushLogger().finally(() => process.exit(1));
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  getRootLogger().fatal({ err: reason }, 'Unhandled promise rejection');
  void flushLogger().finally(() => process.exit(1));
});

main().catch(async (error: unknown) => {
  getRootLogger().fatal({ err: error }, 'Fatal error in main');
  await flushLogger();
  process.exit(1);
});
