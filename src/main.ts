#!/usr/bin/env node
import { toError } from './core/errors.js';
import { logger } from './core/logging/index.js';
import { createIssueRequestOperator } from './operator.js';

async function main(): Promise<void> {
  const operator = createIssueRequestOperator();

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info('Shutting down', { signal });
    operator.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', toError(error));
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await operator.start();
}

main().catch((error: unknown) => {
  logger.fatal('Operator failed to start', toError(error));
  process.exitCode = 1;
});
