/**
 * /cancel Command Handler
 *
 * Abandons any bouquet in progress and returns home.
 */

import type { Bot } from 'grammy';
import type { BotContext } from '../bot.js';
import { dispatchFor, replyWithScreen } from '../respond.js';

export function registerCancelCommand(bot: Bot<BotContext>): void {
  bot.command('cancel', async (ctx) => {
    const screen = await dispatchFor(ctx, { type: 'nav_reset' });
    if (screen) {
      await replyWithScreen(ctx, screen);
    }
  });
}
