/**
 * Chat Transport
 *
 * The operations a conversion needs from the chat platform, bound to one
 * conversation. The orchestrator only sees this interface; grammy stays
 * behind `createGrammyTransport`.
 */

import { copyFile } from 'node:fs/promises';
import { createWriteStream } from 'node:fs';
import { pipeline } from 'node:stream/promises';
import { InputFile } from 'grammy';
import { request, type Dispatcher } from 'undici';
import { DownloadFailedError } from '@relay/core';
import type { SourceResolver } from '@relay/acquisition';

export type ChatAction = 'typing' | 'upload_document';

export interface RemoteFileInfo {
  filePath?: string;
  fileSize?: number;
}

export interface ChatTransport {
  getFile(fileId: string): Promise<RemoteFileInfo>;
  /** Full download without progress */
  downloadFile(fileId: string, destPath: string): Promise<void>;
  /** Sends a text quoting the triggering message, returns the new message id */
  reply(text: string): Promise<number>;
  editMessage(messageId: number, text: string): Promise<void>;
  deleteMessage(messageId: number): Promise<void>;
  sendAudio(filePath: string, fileName: string, caption: string): Promise<void>;
  sendDocument(filePath: string, fileName: string, caption: string): Promise<void>;
  sendChatAction(action: ChatAction): Promise<void>;
}

type ReplyParameters = { reply_parameters?: { message_id: number } };
type FileOptions = ReplyParameters & { caption?: string };

/**
 * The slice of grammy's `Api` the transport calls
 */
export interface TransportApi {
  getFile(fileId: string): Promise<{ file_path?: string; file_size?: number }>;
  sendMessage(chatId: number, text: string, other?: ReplyParameters): Promise<{ message_id: number }>;
  editMessageText(chatId: number, messageId: number, text: string): Promise<unknown>;
  deleteMessage(chatId: number, messageId: number): Promise<unknown>;
  sendAudio(chatId: number, audio: InputFile, other?: FileOptions): Promise<unknown>;
  sendDocument(chatId: number, document: InputFile, other?: FileOptions): Promise<unknown>;
  sendChatAction(chatId: number, action: ChatAction): Promise<unknown>;
}

/**
 * What the transport reads from a grammy `Context`
 */
export interface TransportContext {
  chat?: { id: number };
  msg?: { message_id: number };
  api: TransportApi;
}

export interface GrammyTransportOptions {
  resolver: Pick<SourceResolver, 'pickLocalPath' | 'buildDirectUrl'>;
  dispatcher?: Dispatcher;
}

export function createGrammyTransport(ctx: TransportContext, options: GrammyTransportOptions): ChatTransport {
  const chatId = ctx.chat?.id;
  if (chatId === undefined) {
    throw new Error('Update has no chat to reply to');
  }

  const api = ctx.api;
  const triggerId = ctx.msg?.message_id;
  const quote: ReplyParameters = triggerId !== undefined ? { reply_parameters: { message_id: triggerId } } : {};

  return {
    async getFile(fileId) {
      const file = await api.getFile(fileId);
      return { filePath: file.file_path, fileSize: file.file_size };
    },

    /**
     * Asks the Bot API for a fresh file path, then copies it out of the
     * local cache or streams the direct URL in one request, without progress
     */
    async downloadFile(fileId, destPath) {
      const file = await api.getFile(fileId);
      const filePath = (file.file_path ?? '').trim();

      const localPath = options.resolver.pickLocalPath(filePath);
      if (localPath) {
        await copyFile(localPath, destPath);
        return;
      }

      const url = options.resolver.buildDirectUrl(filePath);
      if (!url) {
        throw new DownloadFailedError('Bot API returned no file path');
      }

      const { statusCode, body } = await request(url, { method: 'GET', dispatcher: options.dispatcher });
      if (statusCode < 200 || statusCode >= 300) {
        await body.dump();
        throw new DownloadFailedError(`File download returned HTTP ${statusCode}`, { statusCode });
      }
      await pipeline(body, createWriteStream(destPath));
    },

    async reply(text) {
      const message = await api.sendMessage(chatId, text, quote);
      return message.message_id;
    },

    async editMessage(messageId, text) {
      await api.editMessageText(chatId, messageId, text);
    },

    async deleteMessage(messageId) {
      await api.deleteMessage(chatId, messageId);
    },

    async sendAudio(filePath, fileName, caption) {
      await api.sendAudio(chatId, new InputFile(filePath, fileName), { caption, ...quote });
    },

    async sendDocument(filePath, fileName, caption) {
      await api.sendDocument(chatId, new InputFile(filePath, fileName), { caption, ...quote });
    },

    async sendChatAction(action) {
      await api.sendChatAction(chatId, action);
    },
  };
}
