/**
 * Petal Bot Entry Point
 *
 * Telegram flower shop bot. This service:
 * - Keeps per-user navigation state in memory
 * - Renders shop and admin screens from the catalog
 * - Guides users through building a custom bouquet
 * - Polls Telegram with the grammy runner
 */

import { run } from '@grammyjs/runner';
import type { RunnerHandle } from '@grammyjs/runner';
import { createDispatcher } from './bootstrap.js';
import { getConfig } from './config.js';
import { createBot } from './telegram/bot.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = getConfig();
  logger.info(
    { nodeEnv: config.nodeEnv, admins: config.adminIds.length, maxStackDepth: config.navigation.maxStackDepth },
    'Starting Petal bot'
  );

  const dispatcher = await createDispatcher(config);
  const bot = createBot(config.telegram.botToken, dispatcher);
  const runner: RunnerHandle = run(bot);

  logger.info('Petal bot started');

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info({ signal }, 'Shutting down...');
    if (!runner.isRunning()) {
      process.exit(0);
    }
    runner.stop().then(
      () => {
        logger.info('Runner stopped');
        process.exit(0);
      },
      (error: unknown) => {
        logger.error({ error }, 'Runner failed to stop cleanly');
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ reason }, 'Unhandled rejection');
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start Petal bot');
  process.exit(1);
});
