/**
 * /build Command Handler
 *
 * Starts the bouquet builder, or resumes the one in progress.
 */

import type { Bot } from 'grammy';
import type { BotContext } from '../bot.js';
import { dispatchFor, replyWithScreen } from '../respond.js';

export function registerBuildCommand(bot: Bot<BotContext>): void {
  bot.command('build', async (ctx) => {
    const screen = await dispatchFor(ctx, { type: 'guided_start' });
    if (screen) {
      await replyWithScreen(ctx, screen);
    }
  });
}
