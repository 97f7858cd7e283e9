import type { Context, NextFunction } from 'grammy';
import type { Logger } from '@relay/utils';
import type { BotConfig } from '../config.js';

type AccessLists = BotConfig['access'];
type AccessContext = Pick<Context, 'from' | 'chat'>;

/**
 * Empty lists allow everyone; a non-empty list must contain the id
 */
export function isAllowed(access: AccessLists, userId?: number, chatId?: number): boolean {
  const userOk = access.allowedUserIds.length === 0
    || (userId !== undefined && access.allowedUserIds.includes(userId));
  const chatOk = access.allowedChatIds.length === 0
    || (chatId !== undefined && access.allowedChatIds.includes(chatId));
  return userOk && chatOk;
}

/**
 * Drops unauthorized updates without replying
 */
export function accessControl(access: AccessLists, logger: Logger) {
  return async (ctx: AccessContext, next: NextFunction): Promise<void> => {
    const userId = ctx.from?.id;
    const chatId = ctx.chat?.id;

    if (!isAllowed(access, userId, chatId)) {
      logger.warn({ userId, chatId }, 'Unauthorized update dropped');
      return;
    }
    await next();
  };
}
