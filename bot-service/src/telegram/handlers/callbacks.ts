/**
 * Inline Button Handler
 *
 * Decodes callback data into an action, dispatches it and edits the
 * originating message in place.
 */

import type { Bot } from 'grammy';
import { logger } from '../../utils/logger.js';
import type { BotContext } from '../bot.js';
import { decodeAction } from '../callback-data.js';
import { dispatchFor, editWithScreen } from '../respond.js';

export function registerCallbackHandler(bot: Bot<BotContext>): void {
  bot.on('callback_query:data', async (ctx) => {
    const data = ctx.callbackQuery.data;
    await ctx.answerCallbackQuery();

    const action = decodeAction(data);
    if (!action) {
      logger.debug({ userId: ctx.from.id, data }, 'Ignoring unknown callback data');
      return;
    }

    const screen = await dispatchFor(ctx, action);
    if (screen) {
      await editWithScreen(ctx, screen);
    }
  });
}
