#!/usr/bin/env node
import logger from './utils/logger';
import { loadConfig } from './config';
import { ConfigError, errorMessage } from './utils/errors';
import { createTracker } from './app';
import { runRepl } from './cli/repl';
import type { AppConfig } from './types/config.types';

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      process.stderr.write(`Configuration error (${error.variable}): ${error.message}\n`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const { orchestrator, history } = createTracker(config);

  // Ctrl-C exits without waiting for in-flight lookups
  process.once('SIGINT', () => {
    orchestrator.stop();
    process.exit(0);
  });

  orchestrator.start();
  await runRepl({
    orchestrator,
    history,
    input: process.stdin,
    output: process.stdout,
  });
  orchestrator.stop();
  process.exit(0);
}

main().catch((error: unknown) => {
  logger.error('flight-watch crashed', { error: errorMessage(error) });
  process.exit(1);
});
