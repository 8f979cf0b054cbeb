/**
 * Display payload → Telegram message
 */

import { InlineKeyboard } from 'grammy';
import type { DisplayPayload, PayloadButton } from '@petal/core/ports';
import { isLinkButton } from '@petal/core/ports';
import { encodeAction } from './callback-data.js';

export interface TelegramMessage {
  text: string;
  reply_markup: InlineKeyboard;
}

/**
 * Build the inline keyboard, one keyboard row per payload row.
 * Links open as Web App buttons.
 */
export function toInlineKeyboard(rows: readonly (readonly PayloadButton[])[]): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  rows.forEach((row, index) => {
    if (index > 0) {
      keyboard.row();
    }
    for (const button of row) {
      if (isLinkButton(button)) {
        keyboard.webApp(button.label, button.url);
      } else {
        keyboard.text(button.label, encodeAction(button.action));
      }
    }
  });
  return keyboard;
}

export function toTelegramMessage(payload: DisplayPayload): TelegramMessage {
  return {
    text: payload.text,
    reply_markup: toInlineKeyboard(payload.buttons),
  };
}
