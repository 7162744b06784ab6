import config, { validateConfig } from './config';
import { createBot } from './bot';
import { logger, errorMessage } from './utils';

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception', {
    error: error.message,
    stack: error.stack
  });
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Promise Rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined
  });
  process.exit(1);
});

async function main(): Promise<void> {
  const problems = validateConfig(config);
  if (problems.length > 0) {
    logger.error('Invalid configuration, check the .env file', { problems });
    process.exit(1);
  }

  const bot = createBot(config);

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info(`${signal} received, shutting down gracefully`);

    bot.stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown', { error: errorMessage(error) });
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  await bot.start();
}

main().catch((error: unknown) => {
  logger.error('Failed to start bot', { error: errorMessage(error) });
  process.exit(1);
});
