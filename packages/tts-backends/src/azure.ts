import axios, { type AxiosInstance } from 'axios';

import { ConfigurationError } from '@voicescript/contracts';

import { type RetryOptions, toSynthesisError, withRetry } from './retry.js';
import type { SpeechSynthesizer, SynthesisRequest, VoiceInfo } from './types.js';

const REQUEST_TIMEOUT_MS = 60000;

interface AzureVoiceRecord {
  ShortName: string;
  DisplayName?: string;
  Locale?: string;
  Gender?: string;
  VoiceType?: string;
}

export interface AzureSynthesizerOptions {
  apiKey: string;
  region: string;
  retry?: RetryOptions;
  /** Injected in tests; defaults to an axios instance for the region's endpoint. */
  http?: AxiosInstance;
}

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch);
}

/** Locale prefix of a voice name such as "en-GB-AdaMultilingualNeural". */
export function voiceLocale(voice: string): string {
  return /^[a-z]{2,3}-[A-Z]{2}(?=-)/.exec(voice)?.[0] ?? 'en-US';
}

/**
 * The request body the REST endpoint requires: one voice element around
 * escaped text. No prosody, styles or other markup is generated.
 */
export function buildSpeechEnvelope(text: string, voice: string): string {
  return (
    `<speak version='1.0' xml:lang='${voiceLocale(voice)}'>` +
    `<voice name='${escapeXml(voice)}'>${escapeXml(text)}</voice>` +
    `</speak>`
  );
}

class AzureSynthesizer implements SpeechSynthesizer {
  readonly service = 'azure';

  constructor(
    private readonly http: AxiosInstance,
    private readonly retry: RetryOptions,
  ) {}

  async listVoices(): Promise<VoiceInfo[]> {
    try {
      const response = await this.http.get<AzureVoiceRecord[]>('/cognitiveservices/voices/list');
      return response.data.map((v) => ({
        id: v.ShortName,
        name: v.ShortName,
        category: v.VoiceType,
        locale: v.Locale,
        gender: v.Gender,
      }));
    } catch (err: unknown) {
      throw toSynthesisError(err, { voice: '*', service: this.service });
    }
  }

  synthesize(request: SynthesisRequest): Promise<Uint8Array> {
    return withRetry(async () => {
      try {
        const response = await this.http.post<ArrayBuffer>(
          '/cognitiveservices/v1',
          buildSpeechEnvelope(request.text, request.voice),
          {
            headers: {
              'Content-Type': 'application/ssml+xml',
              'X-Microsoft-OutputFormat': request.format.serviceFormat,
            },
            responseType: 'arraybuffer',
          },
        );
        return new Uint8Array(response.data);
      } catch (err: unknown) {
        throw toSynthesisError(err, { voice: request.voice, service: this.service });
      }
    }, this.retry);
  }
}

export function createAzureHttpClient(apiKey: string, region: string): AxiosInstance {
  if (!apiKey) throw new ConfigurationError('Missing Azure Speech key (AZURE_SPEECH_KEY)');
  if (!region) throw new ConfigurationError('Missing Azure Speech region (AZURE_SPEECH_REGION)');
  return axios.create({
    baseURL: `https://${region}.tts.speech.microsoft.com`,
    timeout: REQUEST_TIMEOUT_MS,
    headers: {
      'Ocp-Apim-Subscription-Key': apiKey,
      'User-Agent': 'voicescript',
    },
  });
}

export function createAzureSynthesizer(options: AzureSynthesizerOptions): SpeechSynthesizer {
  const http = options.http ?? createAzureHttpClient(options.apiKey, options.region);
  return new AzureSynthesizer(http, options.retry ?? {});
}
