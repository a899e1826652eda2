#!/usr/bin/env node
/**
 * zipcast
 * Entry point for the command line
 */

import { getConfig } from './config/env.js';
import { logger } from './domain/logger.js';
import { runCli } from './cli/program.js';

async function main(): Promise<number> {
  try {
    const config = getConfig();
    logger.setLevel(config.logLevel);

    logger.debug('Starting zipcast', {
      version: config.appVersion,
      logLevel: config.logLevel,
      nwsBaseUrl: config.nwsBaseUrl,
    });

    return await runCli(process.argv.slice(2), { config });
  } catch (error) {
    if (error instanceof Error) {
      logger.logError(error, { context: 'startup' });
      process.stderr.write(`Error: ${error.message}\n`);
    } else {
      logger.error('Unknown error during startup', { error: String(error) });
      process.stderr.write(`Error: ${String(error)}\n`);
    }
    return 1;
  }
}

main().then((code) => {
  process.exitCode = code;
});
