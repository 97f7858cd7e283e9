/**
 * Audio Extraction Presets
 * 
 * Maps the configured output extension to an ffmpeg audio encoder and
 * decides which rate-control flags apply to it.
 */

import type { TranscodeSpec } from '@relay/core';
import { normalizeExtension } from '@relay/utils';

export const FALLBACK_AUDIO_CODEC = 'libmp3lame';

/**
 * Output extension → ffmpeg audio encoder
 */
export const AUDIO_CODECS: Readonly<Record<string, string>> = {
  mp3: 'libmp3lame',
  m4a: 'aac',
  aac: 'aac',
  opus: 'libopus',
  ogg: 'libopus',
  oga: 'libopus',
  flac: 'flac',
  wav: 'pcm_s16le',
};

// Extensions whose encoder takes -b:a
const BITRATE_EXTENSIONS: ReadonlySet<string> = new Set(['mp3', 'm4a', 'aac', 'opus', 'ogg']);

// Extensions encoded with libopus in VBR mode
const VBR_EXTENSIONS: ReadonlySet<string> = new Set(['opus', 'ogg']);

/**
 * Pick the encoder for an extension, falling back to MP3
 */
export function codecForExtension(ext: string): string {
  return AUDIO_CODECS[normalizeExtension(ext)] ?? FALLBACK_AUDIO_CODEC;
}

/**
 * Build the transcode spec for an output extension and bitrate.
 * The bitrate is dropped for encoders that do not take one.
 */
export function resolveTranscodeSpec(ext: string, bitrate?: string): TranscodeSpec {
  const extension = normalizeExtension(ext);
  const trimmedBitrate = bitrate?.trim();
  const spec: TranscodeSpec = {
    extension,
    codec: codecForExtension(extension),
    variableBitrate: VBR_EXTENSIONS.has(extension),
  };

  if (trimmedBitrate && BITRATE_EXTENSIONS.has(extension)) {
    spec.bitrate = trimmedBitrate;
  }

  return spec;
}

/**
 * ffmpeg arguments (without the binary) for audio extraction:
 * -y -i <input> -vn -acodec <codec> [-b:a <bitrate>] [-vbr on] <output>
 */
export function buildExtractAudioArgs(
  inputFile: string,
  outputFile: string,
  spec: TranscodeSpec
): string[] {
  const args: string[] = [
    '-y', // Overwrite output
    '-i', inputFile,
    '-vn', // Drop video
    '-acodec', spec.codec,
  ];

  if (spec.bitrate) {
    args.push('-b:a', spec.bitrate);
  }

  if (spec.variableBitrate) {
    args.push('-vbr', 'on');
  }

  args.push(outputFile);

  return args;
}
