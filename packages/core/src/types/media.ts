/**
 * Media Types
 * 
 * Shapes shared by the acquisition, processing and bot layers
 * for a single video → audio conversion.
 */

/**
 * Which message attachment carried the video
 */
export type MediaKind = 'video' | 'video_note' | 'document';

/**
 * One inbound video, immutable for the lifetime of a conversion
 */
export interface MediaRequest {
  readonly fileId: string;
  readonly kind: MediaKind;
  readonly fileName?: string;
  readonly fileSize?: number;
  readonly mimeType?: string;
}

/**
 * Where the bytes of a remote file can be read from
 */
export type ResolvedSource =
  | { readonly kind: 'local'; readonly path: string }
  | { readonly kind: 'remote'; readonly url?: string };

/**
 * Snapshot of a streaming transfer
 */
export interface DownloadProgress {
  bytesTransferred: number;
  /** 0 when the server did not announce a length */
  totalBytes: number;
  /** Integer 0-100, only when totalBytes is known */
  percentage?: number;
  /** Average since the transfer started, bytes per second */
  speedBytesPerSec: number;
  elapsedMs: number;
}

/**
 * Codec selection for one output extension
 */
export interface TranscodeSpec {
  extension: string;
  codec: string;
  bitrate?: string;
  variableBitrate: boolean;
}
