import type { Bot } from 'grammy';
import { ScreenId } from '@petal/core/domain';
import type { BotContext } from '../bot.js';
import { dispatchFor, replyWithScreen } from '../respond.js';

export function registerCartCommand(bot: Bot<BotContext>): void {
  bot.command('cart', async (ctx) => {
    const screen = await dispatchFor(ctx, { type: 'enter_screen', target: ScreenId.CART });
    if (screen) {
      await replyWithScreen(ctx, screen);
    }
  });
}
