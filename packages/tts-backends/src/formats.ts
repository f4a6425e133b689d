import type { AudioContainer, AudioFormat, AudioQuality, ServiceName } from './types.js';

export const AUDIO_CONTAINERS = ['mp3', 'wav', 'ogg', 'webm'] as const satisfies readonly AudioContainer[];
export const AUDIO_QUALITIES = ['high', 'medium', 'low'] as const satisfies readonly AudioQuality[];

export type ElevenOutputFormat = 'mp3_44100_128' | 'mp3_44100_64' | 'mp3_44100_32';

const ELEVEN_MP3: Record<AudioQuality, ElevenOutputFormat> = {
  high: 'mp3_44100_128',
  medium: 'mp3_44100_64',
  low: 'mp3_44100_32',
};

const MP3_BITRATE_KBPS: Record<ServiceName, Record<AudioQuality, number>> = {
  elevenlabs: { high: 128, medium: 64, low: 32 },
  azure: { high: 160, medium: 96, low: 48 },
};

const AZURE_MP3: Record<AudioQuality, string> = {
  high: 'audio-24khz-160kbitrate-mono-mp3',
  medium: 'audio-24khz-96kbitrate-mono-mp3',
  low: 'audio-24khz-48kbitrate-mono-mp3',
};

const AZURE_OTHER: Record<Exclude<AudioContainer, 'mp3'>, string> = {
  wav: 'riff-24khz-16bit-mono-pcm',
  ogg: 'ogg-24khz-16bit-mono-opus',
  webm: 'webm-24khz-16bit-mono-opus',
};

export interface ResolvedAudioFormat {
  format: AudioFormat;
  /** Set when the requested container had to be replaced. */
  warning?: string;
}

export function elevenOutputFormat(quality: AudioQuality): ElevenOutputFormat {
  return ELEVEN_MP3[quality];
}

export function resolveAudioFormat(
  service: ServiceName,
  container: AudioContainer,
  quality: AudioQuality,
): ResolvedAudioFormat {
  if (service === 'elevenlabs') {
    const format: AudioFormat = {
      container: 'mp3',
      quality,
      extension: 'mp3',
      serviceFormat: elevenOutputFormat(quality),
      bitrateKbps: MP3_BITRATE_KBPS.elevenlabs[quality],
    };
    if (container === 'mp3') return { format };
    return { format, warning: `elevenlabs cannot produce ${container}; writing mp3 instead` };
  }

  if (container === 'mp3') {
    return {
      format: {
        container,
        quality,
        extension: container,
        serviceFormat: AZURE_MP3[quality],
        bitrateKbps: MP3_BITRATE_KBPS.azure[quality],
      },
    };
  }
  return { format: { container, quality, extension: container, serviceFormat: AZURE_OTHER[container] } };
}
