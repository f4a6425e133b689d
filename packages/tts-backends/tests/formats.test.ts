import { describe, expect, it } from 'vitest';

import { resolveAudioFormat } from '../src/formats.js';

describe('resolveAudioFormat', () => {
  it('maps mp3 quality levels for ElevenLabs', () => {
    expect(resolveAudioFormat('elevenlabs', 'mp3', 'high')).toEqual({
      format: { container: 'mp3', quality: 'high', extension: 'mp3', serviceFormat: 'mp3_44100_128', bitrateKbps: 128 },
    });
    expect(resolveAudioFormat('elevenlabs', 'mp3', 'low').format.serviceFormat).toBe('mp3_44100_32');
  });

  it('falls back to mp3 with a warning when ElevenLabs is asked for another container', () => {
    const resolved = resolveAudioFormat('elevenlabs', 'wav', 'medium');
    expect(resolved.format).toEqual({
      container: 'mp3',
      quality: 'medium',
      extension: 'mp3',
      serviceFormat: 'mp3_44100_64',
      bitrateKbps: 64,
    });
    expect(resolved.warning).toBe('elevenlabs cannot produce wav; writing mp3 instead');
  });

  it('maps Azure containers and keeps the extension in step', () => {
    expect(resolveAudioFormat('azure', 'mp3', 'medium').format.serviceFormat).toBe(
      'audio-24khz-96kbitrate-mono-mp3',
    );
    expect(resolveAudioFormat('azure', 'wav', 'high').format).toEqual({
      container: 'wav',
      quality: 'high',
      extension: 'wav',
      serviceFormat: 'riff-24khz-16bit-mono-pcm',
    });
    expect(resolveAudioFormat('azure', 'mp3', 'high').format.bitrateKbps).toBe(160);
    expect(resolveAudioFormat('azure', 'ogg', 'low').format.serviceFormat).toBe('ogg-24khz-16bit-mono-opus');
    expect(resolveAudioFormat('azure', 'webm', 'low').format.extension).toBe('webm');
    expect(resolveAudioFormat('azure', 'webm', 'low').warning).toBeUndefined();
  });
});
