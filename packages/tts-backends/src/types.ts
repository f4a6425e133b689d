export type ServiceName = 'elevenlabs' | 'azure';

export type AudioContainer = 'mp3' | 'wav' | 'ogg' | 'webm';

export type AudioQuality = 'high' | 'medium' | 'low';

/**
 * The format a run actually produces. `container` may differ from the one
 * requested when the service cannot deliver it; `extension` always follows
 * `container`.
 */
export interface AudioFormat {
  container: AudioContainer;
  quality: AudioQuality;
  extension: string;
  /** Service-specific identifier sent with each request. */
  serviceFormat: string;
  /** Encoded bitrate of compressed output; joined files are re-encoded at this rate. */
  bitrateKbps?: number;
}

export interface SynthesisRequest {
  text: string;
  voice: string;
  format: AudioFormat;
}

export interface VoiceInfo {
  id: string;
  name: string;
  category?: string;
  locale?: string;
  gender?: string;
}

export interface SpeechSynthesizer {
  readonly service: ServiceName;
  synthesize(request: SynthesisRequest): Promise<Uint8Array>;
  listVoices(): Promise<VoiceInfo[]>;
}
