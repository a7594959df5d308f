#!/usr/bin/env node

import { ConfigError, loadConfig } from './config.js';
import { logger } from './logger.js';
import { runRenewal } from './runner.js';
import { ExitCodes, ExitConditions, type Config } from './types.js';

async function main(): Promise<number> {
  let config: Readonly<Config>;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal({ issues: err.issues }, 'Invalid configuration');
      return ExitCodes[ExitConditions.CONFIG_INVALID];
    }
    throw err;
  }

  const result = await runRenewal(config);
  logger.info({ condition: result.condition, exitCode: result.exitCode }, result.message);
  return result.exitCode;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.fatal({ error: err instanceof Error ? err.message : String(err) }, 'Renewal run crashed');
    process.exitCode = ExitCodes[ExitConditions.INTERNAL_ERROR];
  });
