#!/usr/bin/env node
import 'dotenv/config';

import { createCli } from './cli/index.js';
import { loadConfig } from './config.js';
import { describeError } from './errors.js';
import { createLogger } from './logger.js';
import { createMarketplace, createShoppingAgent } from './setup.js';

const main = async () => {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  const cli = createCli({
    createAgent: () => createShoppingAgent(config, logger),
    createMarketplace: () => createMarketplace(config, logger)
  });

  try {
    await cli.parseAsync(process.argv);
  } catch {
    // Command handlers report their own failures on stderr.
    process.exitCode = 1;
  }
};

main().catch((error: unknown) => {
  process.stderr.write(`${describeError(error)}\n`);
  process.exitCode = 1;
});
