/**
 * /start Command Handler
 *
 * Resets navigation to the home screen and records the user.
 */

import type { Bot } from 'grammy';
import { logger } from '../../utils/logger.js';
import type { BotContext } from '../bot.js';
import { dispatchFor, replyWithScreen } from '../respond.js';

export function registerStartCommand(bot: Bot<BotContext>): void {
  bot.command('start', async (ctx) => {
    const screen = await dispatchFor(ctx, { type: 'nav_reset' });
    if (!screen) {
      return;
    }
    await replyWithScreen(ctx, screen);
    logger.info({ userId: ctx.from?.id, username: ctx.from?.username }, 'User started bot');
  });
}
