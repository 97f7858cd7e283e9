/**
 * Telegram Bot Entry Point
 *
 * Receives videos and replies with their audio track.
 * Works in groups and private chats, optionally restricted by allow-lists.
 */

import './env.js';
import { Bot, GrammyError, HttpError } from 'grammy';
import { CleanupService } from '@relay/core';
import { SourceResolver, ProgressDownloader, buildHttpClients, createApiAgent } from '@relay/acquisition';
import { AudioTranscoder, FFmpeg, resolveTranscodeSpec } from '@relay/processing';
import { createLogger, redactSecret } from '@relay/utils';
import { loadConfig } from './config.js';
import { registerCommands } from './commands/index.js';
import { accessControl } from './lib/access.js';
import { bestEffort } from './lib/notify.js';
import { MESSAGES } from './messages.js';
import { ConversionOrchestrator } from './pipeline/orchestrator.js';
import { TaskTracker } from './pipeline/taskTracker.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ component: 'telegram-bot' });
  logger.level = config.logLevel;

  logger.info('Starting Telegram bot...');

  // HTTP stacks: undici pool for downloads, node agent for Bot API calls
  const clients = buildHttpClients(config.http, logger);
  const apiAgent = createApiAgent(config.telegram.apiRoot, clients.api.agentOptions);

  const bot = new Bot(config.botToken, {
    client: {
      apiRoot: config.telegram.apiRoot,
      timeoutSeconds: clients.api.timeoutSeconds,
      baseFetchConfig: { agent: apiAgent, compress: true },
    },
  });

  const resolver = new SourceResolver({
    cacheRoot: config.telegram.cacheRoot,
    fileUrlPrefix: config.telegram.fileUrlPrefix,
  });

  const cleanup = new CleanupService({
    cleanupOutput: config.cleanup.output,
    cleanupLocalSource: config.cleanup.localSource,
    cacheRoot: config.telegram.cacheRoot,
    credentialSegment: config.botToken,
  }, logger);
  await cleanup.checkCacheLayout();

  const transcoder = new AudioTranscoder({
    ffmpeg: new FFmpeg(config.ffmpeg.path),
    timeoutMs: config.ffmpeg.timeoutMs,
    logger,
  });

  const downloader = new ProgressDownloader({
    dispatcher: clients.downloadDispatcher,
    progressIntervalMs: config.progressIntervalMs,
    logger,
  });

  const orchestrator = new ConversionOrchestrator(
    { transcoder, downloader, resolver, cleanup, logger },
    {
      spec: resolveTranscodeSpec(config.audio.extension, config.audio.bitrate),
      secret: config.botToken,
    }
  );

  const tracker = new TaskTracker(logger);

  // Access control - silently drops updates outside the allow-lists
  bot.use(accessControl(config.access, logger));

  registerCommands(bot, {
    config,
    orchestrator,
    tracker,
    transport: { resolver, dispatcher: clients.downloadDispatcher },
  }, logger);

  // Error handling
  bot.catch(async (err) => {
    const ctx = err.ctx;
    const e = err.error;
    if (e instanceof GrammyError) {
      logger.error({ err: e, updateId: ctx.update.update_id }, 'Error in request');
    } else if (e instanceof HttpError) {
      logger.error({ err: e, updateId: ctx.update.update_id }, 'Could not contact Telegram');
    } else {
      logger.error({ err: e, updateId: ctx.update.update_id }, 'Unknown error');
    }

    if (ctx.chat) {
      await bestEffort(logger, 'reply global error', () => ctx.reply(MESSAGES.globalError));
    }
  });

  // Shutdown: stop polling, drain conversions, release sockets
  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info({ signal, inFlight: tracker.size }, 'Shutting down bot...');

    try {
      await bot.stop();
      await tracker.drain();
      await clients.downloadDispatcher.close();
      apiAgent.destroy();
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    }
  };

  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  for (const signal of signals) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }

  // Start bot
  await bot.start({
    onStart: (botInfo) => {
      logger.info({
        username: botInfo.username,
        apiRoot: redactSecret(config.telegram.apiRoot, config.botToken),
        cacheRoot: config.telegram.cacheRoot,
        output: config.audio.extension,
        allowedUsers: config.access.allowedUserIds.length > 0 ? config.access.allowedUserIds : 'all users allowed',
        allowedChats: config.access.allowedChatIds.length > 0 ? config.access.allowedChatIds : 'all chats allowed',
      }, 'Bot started');
    },
  });
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
