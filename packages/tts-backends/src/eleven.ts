import { ElevenLabsClient } from '@elevenlabs/elevenlabs-js';

import { ConfigurationError, SynthesisError } from '@voicescript/contracts';

import { elevenOutputFormat, type ElevenOutputFormat } from './formats.js';
import { type RetryOptions, toSynthesisError, withRetry } from './retry.js';
import type { SpeechSynthesizer, SynthesisRequest, VoiceInfo } from './types.js';

export const DEFAULT_ELEVEN_MODEL_ID = 'eleven_multilingual_v2';

interface ElevenVoiceRecord {
  voiceId: string;
  name?: string;
  category?: string;
  labels?: Record<string, string>;
}

/** The slice of the ElevenLabs SDK this backend talks to. */
export interface ElevenSpeechApi {
  textToSpeech: {
    convert(
      voiceId: string,
      request: { text: string; modelId?: string; outputFormat?: ElevenOutputFormat },
    ): Promise<ReadableStream<Uint8Array>>;
  };
  voices: {
    getAll(): Promise<{ voices: ElevenVoiceRecord[] }>;
  };
}

const clientCache = new Map<string, ElevenLabsClient>();

export function getElevenClient(apiKey: string): ElevenLabsClient {
  if (!apiKey) throw new ConfigurationError('Missing ElevenLabs API key (ELEVENLABS_API_KEY)');
  const cached = clientCache.get(apiKey);
  if (cached) return cached;
  const client = new ElevenLabsClient({ apiKey });
  clientCache.set(apiKey, client);
  return client;
}

function sdkSpeechApi(client: ElevenLabsClient): ElevenSpeechApi {
  return {
    textToSpeech: {
      convert: (voiceId, request) => client.textToSpeech.convert(voiceId, request),
    },
    voices: {
      getAll: async () => {
        const response = await client.voices.getAll();
        return {
          voices: response.voices.map((v) => ({
            voiceId: v.voiceId,
            name: v.name,
            category: v.category,
            labels: v.labels,
          })),
        };
      },
    },
  };
}

export async function readAudioStream(stream: ReadableStream<Uint8Array>): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  const reader = stream.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }
  return Buffer.concat(chunks);
}

export interface ElevenSynthesizerOptions {
  apiKey: string;
  modelId?: string;
  retry?: RetryOptions;
  /** Injected in tests; defaults to the cached SDK client for `apiKey`. */
  client?: ElevenSpeechApi;
}

class ElevenLabsSynthesizer implements SpeechSynthesizer {
  readonly service = 'elevenlabs';
  private voiceIds: Promise<Map<string, string>> | null = null;

  constructor(
    private readonly client: ElevenSpeechApi,
    private readonly modelId: string,
    private readonly retry: RetryOptions,
  ) {}

  async listVoices(): Promise<VoiceInfo[]> {
    const response = await this.client.voices.getAll();
    return response.voices.map((v) => ({
      id: v.voiceId,
      name: v.name ?? v.voiceId,
      category: v.category,
      locale: v.labels?.accent ?? v.labels?.language,
      gender: v.labels?.gender,
    }));
  }

  // Lowercased name -> id, plus every id mapped to itself. Loaded once per synthesizer.
  private lookupTable(): Promise<Map<string, string>> {
    this.voiceIds ??= this.listVoices().then((voices) => {
      const table = new Map<string, string>();
      for (const voice of voices) {
        table.set(voice.id.toLowerCase(), voice.id);
        if (!table.has(voice.name.toLowerCase())) table.set(voice.name.toLowerCase(), voice.id);
      }
      return table;
    });
    this.voiceIds.catch(() => {
      this.voiceIds = null;
    });
    return this.voiceIds;
  }

  async resolveVoiceId(voice: string): Promise<string> {
    let table: Map<string, string>;
    try {
      table = await this.lookupTable();
    } catch (err: unknown) {
      throw toSynthesisError(err, { voice, service: this.service });
    }
    const id = table.get(voice.toLowerCase());
    if (!id) {
      throw new SynthesisError(`Voice "${voice}" is not available to this ElevenLabs account`, {
        voice,
        service: this.service,
      });
    }
    return id;
  }

  async synthesize(request: SynthesisRequest): Promise<Uint8Array> {
    const voiceId = await withRetry(() => this.resolveVoiceId(request.voice), this.retry);
    return withRetry(async () => {
      try {
        const stream = await this.client.textToSpeech.convert(voiceId, {
          text: request.text,
          modelId: this.modelId,
          outputFormat: elevenOutputFormat(request.format.quality),
        });
        return await readAudioStream(stream);
      } catch (err: unknown) {
        throw toSynthesisError(err, { voice: request.voice, service: this.service });
      }
    }, this.retry);
  }
}

export function createElevenSynthesizer(options: ElevenSynthesizerOptions): SpeechSynthesizer {
  const client = options.client ?? sdkSpeechApi(getElevenClient(options.apiKey));
  return new ElevenLabsSynthesizer(client, options.modelId ?? DEFAULT_ELEVEN_MODEL_ID, options.retry ?? {});
}
