/**
 * Video handlers
 *
 * Every message carrying a video starts a conversion in the background;
 * the handler returns at once so polling keeps going.
 */

import type { Bot } from 'grammy';
import type { Logger } from '@relay/utils';
import { createGrammyTransport, type GrammyTransportOptions } from '../lib/transport.js';
import { extractMediaRequest } from '../pipeline/media.js';
import type { ConversionOrchestrator } from '../pipeline/orchestrator.js';
import type { TaskTracker } from '../pipeline/taskTracker.js';

export interface ConvertHandlerDeps {
  orchestrator: ConversionOrchestrator;
  tracker: TaskTracker;
  transport: GrammyTransportOptions;
}

export function registerConvertHandlers(bot: Bot, deps: ConvertHandlerDeps, logger: Logger): void {
  bot.on(['message:video', 'message:video_note', 'message:document'], (ctx) => {
    const request = extractMediaRequest(ctx.msg);
    if (!request) {
      logger.debug({ chatId: ctx.chat.id, mimeType: ctx.msg.document?.mime_type }, 'Document is not a video, ignored');
      return;
    }

    const transport = createGrammyTransport(ctx, deps.transport);
    deps.tracker.track(
      deps.orchestrator.run(request, transport, {
        chatId: ctx.chat.id,
        messageId: ctx.msg.message_id,
      })
    );
  });
}
