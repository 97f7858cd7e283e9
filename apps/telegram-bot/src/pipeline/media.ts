import type { Message } from 'grammy/types';
import type { MediaRequest } from '@relay/core';

/**
 * Pick the video carried by a message: a video, a video note, or a
 * document with a video/* MIME type. Anything else is not ours.
 */
export function extractMediaRequest(message: Message | undefined): MediaRequest | undefined {
  if (!message) {
    return undefined;
  }

  if (message.video) {
    const video = message.video;
    return {
      fileId: video.file_id,
      kind: 'video',
      fileName: video.file_name,
      fileSize: video.file_size,
      mimeType: video.mime_type,
    };
  }

  if (message.video_note) {
    return {
      fileId: message.video_note.file_id,
      kind: 'video_note',
      fileSize: message.video_note.file_size,
    };
  }

  const document = message.document;
  if (document?.mime_type?.startsWith('video/')) {
    return {
      fileId: document.file_id,
      kind: 'document',
      fileName: document.file_name,
      fileSize: document.file_size,
      mimeType: document.mime_type,
    };
  }

  return undefined;
}
