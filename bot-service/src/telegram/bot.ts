/**
 * Telegram Bot
 *
 * Builds the grammy bot: orders updates per user, injects the dispatcher into
 * every context, registers commands and handlers, and routes middleware
 * errors to the log.
 */

import { sequentialize } from '@grammyjs/runner';
import { Bot } from 'grammy';
import type { Context } from 'grammy';
import type { ActionDispatcher } from '../dispatch/types.js';
import { logger } from '../utils/logger.js';
import { registerAllCommands } from './commands/index.js';
import { registerCallbackHandler } from './handlers/callbacks.js';
import { registerTextHandler } from './handlers/text.js';

// =============================================================================
// Types
// =============================================================================

export interface DispatcherFlavor {
  dispatcher: ActionDispatcher;
}

export type BotContext = Context & DispatcherFlavor;

// =============================================================================
// Bot Factory
// =============================================================================

export function createBot(token: string, dispatcher: ActionDispatcher): Bot<BotContext> {
  const bot = new Bot<BotContext>(token);

  // Updates from one user are handled in arrival order under the concurrent runner
  bot.use(sequentialize((ctx: BotContext) => ctx.from?.id.toString()));

  bot.use(async (ctx, next) => {
    ctx.dispatcher = dispatcher;
    await next();
  });

  registerAllCommands(bot);
  registerCallbackHandler(bot);
  registerTextHandler(bot);

  bot.catch((err) => {
    logger.error(
      {
        error: err.error instanceof Error ? err.error.message : String(err.error),
        updateId: err.ctx.update.update_id,
        userId: err.ctx.from?.id,
      },
      'Bot error'
    );
  });

  return bot;
}
