/**
 * @relay/processing
 * 
 * Audio extraction with ffmpeg:
 * - Codec presets per output extension
 * - FFmpeg command wrapper
 * - Transcoder with outcome classification
 */

export {
  AUDIO_CODECS,
  FALLBACK_AUDIO_CODEC,
  codecForExtension,
  resolveTranscodeSpec,
  buildExtractAudioArgs,
} from './presets.js';

export { FFmpeg, type FFmpegExecuteOptions } from './ffmpeg.js';

export {
  AudioTranscoder,
  DIAGNOSTIC_TAIL_CHARS,
  type AudioTranscoderOptions,
  type TranscodeResult,
} from './transcoder.js';
