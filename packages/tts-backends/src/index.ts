import { createAzureSynthesizer } from './azure.js';
import { createElevenSynthesizer } from './eleven.js';
import type { RetryOptions } from './retry.js';
import type { SpeechSynthesizer } from './types.js';

export type SynthesizerConfig =
  | { service: 'elevenlabs'; apiKey: string; modelId?: string; retry?: RetryOptions }
  | { service: 'azure'; apiKey: string; region: string; retry?: RetryOptions };

export function createSynthesizer(config: SynthesizerConfig): SpeechSynthesizer {
  switch (config.service) {
    case 'elevenlabs':
      return createElevenSynthesizer(config);
    case 'azure':
      return createAzureSynthesizer(config);
  }
}

export * from './types.js';
export * from './formats.js';
export * from './retry.js';
export * from './voices.js';
export {
  DEFAULT_ELEVEN_MODEL_ID,
  createElevenSynthesizer,
  getElevenClient,
  readAudioStream,
  type ElevenSpeechApi,
  type ElevenSynthesizerOptions,
} from './eleven.js';
export {
  buildSpeechEnvelope,
  createAzureHttpClient,
  createAzureSynthesizer,
  escapeXml,
  voiceLocale,
  type AzureSynthesizerOptions,
} from './azure.js';
export {
  FfmpegNotFoundError,
  buildConcatArgs,
  concatAudioSegments,
  concatListFile,
  createFfmpegJoiner,
  resolveFfmpegPath,
  runFfmpeg,
  type AudioJoiner,
  type JoinFormat,
} from './ffmpeg.js';
