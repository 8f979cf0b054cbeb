/**
 * Screen delivery helpers shared by commands and handlers.
 */

import { GrammyError } from 'grammy';
import type { InboundAction, RenderedScreen, UserProfile } from '@petal/core/ports';
import { logger } from '../utils/logger.js';
import type { BotContext } from './bot.js';
import { toTelegramMessage } from './keyboard.js';

export type TelegramUser = NonNullable<BotContext['from']>;

export function profileOf(user: TelegramUser): UserProfile {
  return {
    id: user.id,
    username: user.username,
    firstName: user.first_name,
    lastName: user.last_name,
  };
}

/**
 * Dispatch an action for the update's sender. Null for updates without a
 * sender (channel posts).
 */
export async function dispatchFor(
  ctx: BotContext,
  action: InboundAction
): Promise<RenderedScreen | null> {
  const user = ctx.from;
  if (!user) {
    return null;
  }
  return ctx.dispatcher.dispatch({ userId: user.id, action, profile: profileOf(user) });
}

/**
 * Send a screen as a new message.
 */
export async function replyWithScreen(ctx: BotContext, screen: RenderedScreen): Promise<void> {
  const { text, reply_markup } = toTelegramMessage(screen.payload);
  await ctx.reply(text, { reply_markup });
}

const NOT_MODIFIED = 'message is not modified';

/**
 * Telegram refuses edits that would not change the message.
 */
export function isUnchangedEdit(error: unknown): boolean {
  return error instanceof GrammyError && error.description.includes(NOT_MODIFIED);
}

/**
 * Replace the message the pressed button belongs to. Falls back to a new
 * message when Telegram refuses the edit (message too old or deleted). An
 * edit that would change nothing is dropped: the user already sees the screen.
 */
export async function editWithScreen(ctx: BotContext, screen: RenderedScreen): Promise<void> {
  const { text, reply_markup } = toTelegramMessage(screen.payload);
  try {
    await ctx.editMessageText(text, { reply_markup });
  } catch (error) {
    if (isUnchangedEdit(error)) {
      logger.debug({ userId: ctx.from?.id, screenId: screen.screenId }, 'Screen unchanged, edit skipped');
      return;
    }
    logger.debug(
      {
        userId: ctx.from?.id,
        screenId: screen.screenId,
        error: error instanceof Error ? error.message : String(error),
      },
      'Message edit failed, sending new message'
    );
    await ctx.reply(text, { reply_markup });
  }
}
