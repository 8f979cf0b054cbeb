/**
 * Telegram Command Handlers Index
 *
 * Registers all command handlers on the bot instance.
 */

import type { Bot } from 'grammy';
import { logger } from '../../utils/logger.js';
import type { BotContext } from '../bot.js';
import { registerAdminCommand } from './admin.js';
import { registerBuildCommand } from './build.js';
import { registerCancelCommand } from './cancel.js';
import { registerCartCommand } from './cart.js';
import { registerStartCommand } from './start.js';

export const BOT_COMMANDS = [
  { command: 'start', description: 'Main menu' },
  { command: 'build', description: 'Build your own bouquet' },
  { command: 'cart', description: 'Show your cart' },
  { command: 'cancel', description: 'Cancel and return to the main menu' },
  { command: 'admin', description: 'Admin panel' },
];

/**
 * Register all command handlers on the bot
 */
export function registerAllCommands(bot: Bot<BotContext>): void {
  registerStartCommand(bot);
  registerBuildCommand(bot);
  registerCartCommand(bot);
  registerCancelCommand(bot);
  registerAdminCommand(bot);

  // Non-fatal: the bot works without the command menu
  bot.api.setMyCommands(BOT_COMMANDS).catch((error: unknown) => {
    logger.warn(
      { error: error instanceof Error ? error.message : String(error) },
      'Failed to set bot commands'
    );
  });
}
