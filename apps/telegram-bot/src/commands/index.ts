/**
 * Telegram Bot Commands
 * 
 * Command handlers and the video handlers that start conversions.
 */

import type { Bot } from 'grammy';
import type { Logger } from '@relay/utils';
import type { BotConfig } from '../config.js';
import { helpText, startText } from '../messages.js';
import { registerConvertHandlers, type ConvertHandlerDeps } from './convert.js';

export interface CommandDeps extends ConvertHandlerDeps {
  config: BotConfig;
}

export function registerCommands(bot: Bot, deps: CommandDeps, logger: Logger): void {
  const { audio } = deps.config;

  // /start - Intro and output format
  bot.command('start', async (ctx) => {
    logger.debug({ chatId: ctx.chat.id }, '/start');
    await ctx.reply(startText(audio.extension, audio.bitrate));
  });

  // /help - Usage
  bot.command('help', async (ctx) => {
    await ctx.reply(helpText());
  });

  registerConvertHandlers(bot, deps, logger);
}
