/**
 * User-facing texts
 */

import type { DownloadProgress } from '@relay/core';
import { formatBytes } from '@relay/utils';

export const MESSAGES = {
  received: 'Video received, preparing the audio conversion…',
  downloading: 'Downloading…',
  transcoding: 'Transcoding to audio…',
  sending: 'Conversion finished, sending the audio…',
  ffmpegMissing: 'ffmpeg is not installed or not usable on the server. Please install it and try again.',
  downloadFailed: 'Download failed. Please try again later or resend the video.',
  transcodeFailed:
    'Conversion failed: ffmpeg could not process the video. Check that the video encoding is valid or try again later.',
  sendFailed: 'Sending failed, please try again later.',
  processingFailed:
    'Processing failed, possibly because the file is too large or a network or path permission problem. Please try again later.',
  globalError: 'An error occurred and has been logged. Please try again later.',
} as const;

export function formatDownloadProgress(progress: DownloadProgress): string {
  const done = formatBytes(progress.bytesTransferred);
  const speed = formatBytes(progress.speedBytesPerSec);

  if (progress.percentage !== undefined && progress.totalBytes > 0) {
    return `Downloading… ${progress.percentage}% (${done} / ${formatBytes(progress.totalBytes)}, ${speed}/s)`;
  }
  return `Downloading… ${done} (${speed}/s)`;
}

export function audioCaption(extension: string): string {
  return `Audio extracted from video (${extension.toUpperCase()})`;
}

export function startText(extension: string, bitrate: string): string {
  const quality = bitrate ? `, ${bitrate}` : '';
  return [
    'Send me a video, a video note or a video file and I will reply with its audio track.',
    '',
    `Output format: ${extension.toUpperCase()}${quality}`,
    '',
    'Use /help for more information.',
  ].join('\n');
}

export function helpText(): string {
  return [
    'How to use:',
    '1. Send or forward a video (a video file sent as a document works too).',
    '2. Wait while it is downloaded and converted; the status message shows progress.',
    '3. The audio arrives as a reply to your video.',
  ].join('\n');
}
