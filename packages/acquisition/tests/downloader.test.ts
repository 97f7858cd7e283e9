import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MockAgent } from 'undici';
import type { DownloadProgress } from '@relay/core';
import { ProgressDownloader, parseContentLength } from '../src/downloader.js';

const ORIGIN = 'https://files.example.test';
const FILE_PATH = '/file/bottest-secret/videos/a.mp4';

describe('ProgressDownloader', () => {
  let agent: MockAgent;
  let dir: string;

  beforeEach(async () => {
    agent = new MockAgent();
    agent.disableNetConnect();
    dir = await mkdtemp(join(tmpdir(), 'download-test-'));
  });

  afterEach(async () => {
    await agent.close();
    await rm(dir, { recursive: true, force: true });
  });

  it('streams the body to disk and reports completion once', async () => {
    const payload = Buffer.alloc(4096, 7);
    agent.get(ORIGIN)
      .intercept({ path: FILE_PATH, method: 'GET' })
      .reply(200, payload, { headers: { 'content-length': String(payload.length) } });

    const progress: DownloadProgress[] = [];
    const completed: DownloadProgress[] = [];
    const dest = join(dir, 'input_video');

    const result = await new ProgressDownloader({ dispatcher: agent }).download(`${ORIGIN}${FILE_PATH}`, dest, {
      onProgress: (p) => progress.push(p),
      onComplete: (p) => completed.push(p),
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.bytesWritten).toBe(4096);
      expect(result.totalBytes).toBe(4096);
    }
    expect(await readFile(dest)).toEqual(payload);
    expect(progress.at(-1)?.percentage).toBe(100);
    expect(completed).toHaveLength(1);
    expect(completed[0]?.bytesTransferred).toBe(4096);
  });

  it('fails on a non-2xx status without creating the file', async () => {
    agent.get(ORIGIN)
      .intercept({ path: FILE_PATH, method: 'GET' })
      .reply(404, 'not found');

    const dest = join(dir, 'input_video');
    let completions = 0;
    const result = await new ProgressDownloader({ dispatcher: agent }).download(`${ORIGIN}${FILE_PATH}`, dest, {
      onComplete: () => {
        completions++;
      },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('DOWNLOAD_FAILED');
      expect(result.error.message).toBe('Unexpected HTTP status 404');
      expect(result.error.details).toEqual({ statusCode: 404 });
    }
    expect(completions).toBe(0);
    expect(existsSync(dest)).toBe(false);
  });

  it('fails on a transport error', async () => {
    agent.get(ORIGIN)
      .intercept({ path: FILE_PATH, method: 'GET' })
      .replyWithError(new Error('socket hang up'));

    const result = await new ProgressDownloader({ dispatcher: agent })
      .download(`${ORIGIN}${FILE_PATH}`, join(dir, 'input_video'));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toContain('socket hang up');
    }
  });

  it('keeps downloading when a progress listener throws', async () => {
    const payload = Buffer.from('video-bytes');
    agent.get(ORIGIN)
      .intercept({ path: FILE_PATH, method: 'GET' })
      .reply(200, payload, { headers: { 'content-length': String(payload.length) } });

    const dest = join(dir, 'input_video');
    const result = await new ProgressDownloader({ dispatcher: agent }).download(`${ORIGIN}${FILE_PATH}`, dest, {
      onProgress: () => {
        throw new Error('listener bug');
      },
    });

    expect(result.success).toBe(true);
    expect(await readFile(dest, 'utf8')).toBe('video-bytes');
  });
});

describe('parseContentLength', () => {
  it('parses valid lengths and treats anything else as unknown', () => {
    expect(parseContentLength('1024')).toBe(1024);
    expect(parseContentLength(['2048', '1'])).toBe(2048);
    expect(parseContentLength(undefined)).toBe(0);
    expect(parseContentLength('abc')).toBe(0);
    expect(parseContentLength('-5')).toBe(0);
  });
});
