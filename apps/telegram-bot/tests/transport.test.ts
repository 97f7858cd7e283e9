import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InputFile } from 'grammy';
import { MockAgent } from 'undici';
import { DownloadFailedError } from '@relay/core';
import { SourceResolver } from '@relay/acquisition';
import { createGrammyTransport } from '../src/lib/transport.js';

const ORIGIN = 'https://files.example.test';
const FILE_URL_PREFIX = `${ORIGIN}/file/bottest-secret`;

function stubApi(file: { file_path?: string; file_size?: number } = {}) {
  return {
    getFile: vi.fn(async (_fileId: string) => file),
    sendMessage: vi.fn(async (_chatId: number, _text: string, _other?: unknown) => ({ message_id: 55 })),
    editMessageText: vi.fn(async (_chatId: number, _messageId: number, _text: string) => true),
    deleteMessage: vi.fn(async (_chatId: number, _messageId: number) => true),
    sendAudio: vi.fn(async (_chatId: number, _audio: InputFile, _other?: unknown) => true),
    sendDocument: vi.fn(async (_chatId: number, _document: InputFile, _other?: unknown) => true),
    sendChatAction: vi.fn(async (_chatId: number, _action: string) => true),
  };
}

describe('createGrammyTransport', () => {
  let dir: string;
  let agent: MockAgent;
  let resolver: SourceResolver;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'transport-test-'));
    agent = new MockAgent();
    agent.disableNetConnect();
    resolver = new SourceResolver({ cacheRoot: `${dir}/cache/`, fileUrlPrefix: FILE_URL_PREFIX });
  });

  afterEach(async () => {
    await agent.close();
    await rm(dir, { recursive: true, force: true });
  });

  it('refuses an update without a chat', () => {
    expect(() => createGrammyTransport({ api: stubApi() }, { resolver })).toThrow('Update has no chat to reply to');
  });

  it('quotes the triggering message in replies', async () => {
    const api = stubApi();
    const transport = createGrammyTransport({ chat: { id: 42 }, msg: { message_id: 7 }, api }, { resolver });

    expect(await transport.reply('working')).toBe(55);
    expect(api.sendMessage).toHaveBeenCalledWith(42, 'working', { reply_parameters: { message_id: 7 } });
  });

  it('replies without a quote when there is no trigger', async () => {
    const api = stubApi();
    const transport = createGrammyTransport({ chat: { id: 42 }, api }, { resolver });

    await transport.reply('working');
    expect(api.sendMessage).toHaveBeenCalledWith(42, 'working', {});
  });

  it('edits, deletes and sends chat actions in the bound chat', async () => {
    const api = stubApi();
    const transport = createGrammyTransport({ chat: { id: 42 }, msg: { message_id: 7 }, api }, { resolver });

    await transport.editMessage(100, 'Transcoding…');
    await transport.deleteMessage(100);
    await transport.sendChatAction('upload_document');

    expect(api.editMessageText).toHaveBeenCalledWith(42, 100, 'Transcoding…');
    expect(api.deleteMessage).toHaveBeenCalledWith(42, 100);
    expect(api.sendChatAction).toHaveBeenCalledWith(42, 'upload_document');
  });

  it('uploads audio and documents under the given name with caption and quote', async () => {
    const api = stubApi();
    const transport = createGrammyTransport({ chat: { id: 42 }, msg: { message_id: 7 }, api }, { resolver });

    await transport.sendAudio(join(dir, 'out.mp3'), 'Holiday clip.mp3', 'Audio extracted from video (MP3)');
    await transport.sendDocument(join(dir, 'out.mp3'), 'Holiday clip.mp3', 'Audio extracted from video (MP3)');

    const audioCall = api.sendAudio.mock.calls[0];
    expect(audioCall?.[0]).toBe(42);
    expect(audioCall?.[1]).toBeInstanceOf(InputFile);
    expect(audioCall?.[1].filename).toBe('Holiday clip.mp3');
    expect(audioCall?.[2]).toEqual({
      caption: 'Audio extracted from video (MP3)',
      reply_parameters: { message_id: 7 },
    });

    const documentCall = api.sendDocument.mock.calls[0];
    expect(documentCall?.[1].filename).toBe('Holiday clip.mp3');
  });

  describe('downloadFile', () => {
    it('streams the direct URL of a fresh file path', async () => {
      agent.get(ORIGIN)
        .intercept({ path: '/file/bottest-secret/videos/file_3.mp4', method: 'GET' })
        .reply(200, 'video-bytes');
      const api = stubApi({ file_path: 'videos/file_3.mp4' });
      const transport = createGrammyTransport({ chat: { id: 42 }, api }, { resolver, dispatcher: agent });
      const dest = join(dir, 'input_video');

      await transport.downloadFile('file-3', dest);

      expect(api.getFile).toHaveBeenCalledWith('file-3');
      expect(await readFile(dest, 'utf8')).toBe('video-bytes');
    });

    it('fails with the HTTP status on a non-2xx response', async () => {
      agent.get(ORIGIN)
        .intercept({ path: '/file/bottest-secret/videos/file_3.mp4', method: 'GET' })
        .reply(404, 'gone');
      const api = stubApi({ file_path: 'videos/file_3.mp4' });
      const transport = createGrammyTransport({ chat: { id: 42 }, api }, { resolver, dispatcher: agent });

      const error = await transport.downloadFile('file-3', join(dir, 'input_video')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DownloadFailedError);
      expect(error).toMatchObject({
        message: 'File download returned HTTP 404',
        details: { statusCode: 404 },
      });
    });

    it('copies a file found in the local cache without any request', async () => {
      const cached = join(dir, 'cache', 'bottest-secret', 'videos', 'file_3.mp4');
      await mkdir(join(dir, 'cache', 'bottest-secret', 'videos'), { recursive: true });
      await writeFile(cached, 'cached-bytes');
      const api = stubApi({ file_path: cached });
      const transport = createGrammyTransport({ chat: { id: 42 }, api }, { resolver, dispatcher: agent });
      const dest = join(dir, 'input_video');

      await transport.downloadFile('file-3', dest);

      expect(await readFile(dest, 'utf8')).toBe('cached-bytes');
    });

    it('fails when the Bot API still gives no file path', async () => {
      const transport = createGrammyTransport({ chat: { id: 42 }, api: stubApi() }, { resolver, dispatcher: agent });

      await expect(transport.downloadFile('file-3', join(dir, 'input_video')))
        .rejects.toThrow('Bot API returned no file path');
    });
  });
});
