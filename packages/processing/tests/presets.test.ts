import { describe, it, expect } from 'vitest';
import { buildExtractAudioArgs, codecForExtension, resolveTranscodeSpec } from '../src/presets.js';

describe('codecForExtension', () => {
  it.each([
    ['mp3', 'libmp3lame'],
    ['m4a', 'aac'],
    ['aac', 'aac'],
    ['opus', 'libopus'],
    ['ogg', 'libopus'],
    ['oga', 'libopus'],
    ['flac', 'flac'],
    ['wav', 'pcm_s16le'],
    ['.MP3', 'libmp3lame'],
    ['xyz', 'libmp3lame'],
    ['', 'libmp3lame'],
  ])('%s -> %s', (ext, codec) => {
    expect(codecForExtension(ext)).toBe(codec);
  });
});

describe('resolveTranscodeSpec', () => {
  it('keeps the bitrate for lossy formats', () => {
    expect(resolveTranscodeSpec('mp3', '192k')).toEqual({
      extension: 'mp3',
      codec: 'libmp3lame',
      bitrate: '192k',
      variableBitrate: false,
    });
  });

  it('turns on variable bitrate for opus and ogg', () => {
    expect(resolveTranscodeSpec('ogg', '96k')).toEqual({
      extension: 'ogg',
      codec: 'libopus',
      bitrate: '96k',
      variableBitrate: true,
    });
  });

  it('drops the bitrate for lossless formats and empty values', () => {
    expect(resolveTranscodeSpec('flac', '192k').bitrate).toBeUndefined();
    expect(resolveTranscodeSpec('wav', '192k').bitrate).toBeUndefined();
    expect(resolveTranscodeSpec('mp3', '  ').bitrate).toBeUndefined();
    expect(resolveTranscodeSpec('mp3').bitrate).toBeUndefined();
  });
});

describe('buildExtractAudioArgs', () => {
  it('builds the mp3 command line', () => {
    expect(buildExtractAudioArgs('/tmp/in', '/tmp/out.mp3', resolveTranscodeSpec('mp3', '192k'))).toEqual([
      '-y', '-i', '/tmp/in', '-vn', '-acodec', 'libmp3lame', '-b:a', '192k', '/tmp/out.mp3',
    ]);
  });

  it('adds -vbr on for opus', () => {
    expect(buildExtractAudioArgs('in.mp4', 'out.opus', resolveTranscodeSpec('opus', '64k'))).toEqual([
      '-y', '-i', 'in.mp4', '-vn', '-acodec', 'libopus', '-b:a', '64k', '-vbr', 'on', 'out.opus',
    ]);
  });

  it('omits the bitrate for flac', () => {
    expect(buildExtractAudioArgs('in.mp4', 'out.flac', resolveTranscodeSpec('flac', '192k'))).toEqual([
      '-y', '-i', 'in.mp4', '-vn', '-acodec', 'flac', 'out.flac',
    ]);
  });
});
