/**
 * Free Text Handler
 *
 * While a bouquet is being built, typed answers count as step input:
 * an option id at single-choice steps, a comma-separated list at the
 * add-ons step ("none" for no add-ons). While an admin adds a flower, the
 * text is passed on as typed. Text outside a flow is ignored.
 */

import type { Bot } from 'grammy';
import { BouquetStep } from '@petal/core/domain';
import type { StepInput } from '@petal/core/domain';
import type { InboundAction } from '@petal/core/ports';
import type { ActionDispatcher } from '../../dispatch/types.js';
import type { BotContext } from '../bot.js';
import { dispatchFor, replyWithScreen } from '../respond.js';

export const NO_ADDONS_KEYWORD = 'none';

export function parseStepText(step: BouquetStep, text: string): StepInput {
  const normalized = text.trim().toLowerCase();
  if (step !== BouquetStep.ADDONS) {
    return normalized;
  }
  if (normalized === NO_ADDONS_KEYWORD) {
    return [];
  }
  return normalized
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

function textAction(dispatcher: ActionDispatcher, userId: number, text: string): InboundAction | null {
  if (dispatcher.activeDraftStep(userId) !== null) {
    return { type: 'flower_draft_input', value: text };
  }
  const step = dispatcher.activeFlowStep(userId);
  if (step === null) {
    return null;
  }
  return { type: 'guided_advance', value: parseStepText(step, text) };
}

export function registerTextHandler(bot: Bot<BotContext>): void {
  bot.on('message:text', async (ctx) => {
    const text = ctx.message.text;
    if (text.startsWith('/')) {
      return;
    }

    const userId = ctx.from?.id;
    if (userId === undefined) {
      return;
    }
    const action = textAction(ctx.dispatcher, userId, text);
    if (!action) {
      return;
    }

    const screen = await dispatchFor(ctx, action);
    if (screen) {
      await replyWithScreen(ctx, screen);
    }
  });
}
