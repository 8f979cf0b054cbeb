/**
 * /admin Command Handler
 *
 * Enters the admin area as a new root. Non-admins get a refusal.
 */

import type { Bot } from 'grammy';
import type { BotContext } from '../bot.js';
import { dispatchFor, replyWithScreen } from '../respond.js';

export function registerAdminCommand(bot: Bot<BotContext>): void {
  bot.command('admin', async (ctx) => {
    const screen = await dispatchFor(ctx, { type: 'admin_entry' });
    if (screen) {
      await replyWithScreen(ctx, screen);
    }
  });
}
