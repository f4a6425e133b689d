import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import yaml from 'js-yaml';
import { z } from 'zod';

import { ConfigurationError, errorMessage } from '@voicescript/contracts';
import { readEnum, readInt, readString } from '@voicescript/shared-infrastructure';
import {
  AUDIO_CONTAINERS,
  AUDIO_QUALITIES,
  DEFAULT_ELEVEN_MODEL_ID,
  type ServiceName,
  type SynthesizerConfig,
} from '@voicescript/tts-backends';

export const DEFAULT_CONFIG_FILE = 'voicescript.yml';
export const DEFAULT_OUTPUT_DIR = 'output';
export const MAX_CONCURRENCY = 16;

const SERVICES = ['elevenlabs', 'azure'] as const satisfies readonly ServiceName[];

const configSchema = z
  .object({
    service: z.enum(SERVICES).default('elevenlabs'),
    elevenlabs: z
      .object({
        apiKey: z.string().min(1).optional(),
        voice: z.string().min(1).optional(),
        modelId: z.string().min(1).default(DEFAULT_ELEVEN_MODEL_ID),
      })
      .strict()
      .default({}),
    azure: z
      .object({
        apiKey: z.string().min(1).optional(),
        region: z.string().min(1).optional(),
        voice: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    output: z
      .object({
        format: z.enum(AUDIO_CONTAINERS).default('mp3'),
        quality: z.enum(AUDIO_QUALITIES).default('high'),
        dir: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    concurrency: z.number().int().min(1).max(MAX_CONCURRENCY).default(1),
    ffmpegPath: z.string().min(1).optional(),
    /** Output paths keyed by generated filename stem. */
    filenames: z.record(z.string().min(1)).default({}),
  })
  .strict();

export type VoicescriptConfig = z.infer<typeof configSchema>;

export interface ServiceSettings {
  service: ServiceName;
  defaultVoice: string;
  synthesizer: SynthesizerConfig;
}

export interface LoadConfigOptions {
  /** Explicit config file; it must exist. */
  path?: string;
  cwd?: string;
}

export interface LoadedConfig {
  config: VoicescriptConfig;
  /** Absolute path of the file that was read, if any. */
  source?: string;
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawConfig, key: string): RawConfig {
  const existing = raw[key];
  const next: RawConfig = isRecord(existing) ? { ...existing } : {};
  raw[key] = next;
  return next;
}

function assignIfSet(target: RawConfig, key: string, value: string | number | undefined): void {
  if (value !== undefined) target[key] = value;
}

/** Environment variables take precedence over the file. */
export function applyEnvOverrides(raw: RawConfig): RawConfig {
  const merged: RawConfig = { ...raw };
  assignIfSet(merged, 'service', readEnum('VOICESCRIPT_SERVICE', SERVICES));
  const concurrency = readInt('VOICESCRIPT_CONCURRENCY', 0);
  assignIfSet(merged, 'concurrency', concurrency > 0 ? concurrency : undefined);
  assignIfSet(merged, 'ffmpegPath', readString('FFMPEG_PATH'));

  const eleven = section(merged, 'elevenlabs');
  assignIfSet(eleven, 'apiKey', readString('ELEVENLABS_API_KEY'));
  assignIfSet(eleven, 'modelId', readString('ELEVENLABS_MODEL_ID'));

  const azure = section(merged, 'azure');
  assignIfSet(azure, 'apiKey', readString('AZURE_SPEECH_KEY'));
  assignIfSet(azure, 'region', readString('AZURE_SPEECH_REGION'));
  return merged;
}

export function parseConfig(raw: unknown, source = 'configuration'): VoicescriptConfig {
  if (raw !== undefined && raw !== null && !isRecord(raw)) {
    throw new ConfigurationError(`${source} must be a mapping at the top level`);
  }
  const result = configSchema.safeParse(applyEnvOverrides(isRecord(raw) ? raw : {}));
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

async function readIfPresent(path: string, required: boolean): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf8');
  } catch (err: unknown) {
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    if (missing && !required) return undefined;
    throw new ConfigurationError(`Cannot read config file ${path}: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Read `voicescript.yml` (or the explicit `path`), apply environment
 * overrides and validate. A missing default file is not an error: the
 * environment alone can configure a run.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const cwd = options.cwd ?? process.cwd();
  const path = resolve(cwd, options.path ?? DEFAULT_CONFIG_FILE);
  const text = await readIfPresent(path, options.path !== undefined);
  if (text === undefined) return { config: parseConfig(undefined) };

  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (err: unknown) {
    throw new ConfigurationError(`Cannot parse ${path}: ${errorMessage(err)}`, { cause: err });
  }
  return { config: parseConfig(raw, path), source: path };
}

export function resolveService(config: VoicescriptConfig, override?: ServiceName): ServiceName {
  return override ?? config.service;
}

/** The voice used until a script's first directive. */
export function resolveDefaultVoice(
  config: VoicescriptConfig,
  overrides: { service?: ServiceName; voice?: string } = {},
): string {
  const service = resolveService(config, overrides.service);
  const voice = overrides.voice ?? config[service].voice;
  if (!voice) throw new ConfigurationError(`Set a default voice in ${service}.voice or pass --voice`);
  return voice;
}

/**
 * Pick the backend settings for a run. `service` and `voice` are command-line
 * overrides. Credentials and a default voice are required up front so a run
 * never starts without them.
 */
export function resolveServiceSettings(
  config: VoicescriptConfig,
  overrides: { service?: ServiceName; voice?: string } = {},
): ServiceSettings {
  const service = resolveService(config, overrides.service);

  if (service === 'elevenlabs') {
    const { apiKey, modelId } = config.elevenlabs;
    if (!apiKey) throw new ConfigurationError('Set elevenlabs.apiKey or ELEVENLABS_API_KEY');
    const defaultVoice = resolveDefaultVoice(config, overrides);
    return { service, defaultVoice, synthesizer: { service, apiKey, modelId } };
  }

  const { apiKey, region } = config.azure;
  if (!apiKey || !region) {
    throw new ConfigurationError('Set azure.apiKey and azure.region (or AZURE_SPEECH_KEY and AZURE_SPEECH_REGION)');
  }
  const defaultVoice = resolveDefaultVoice(config, overrides);
  return { service, defaultVoice, synthesizer: { service, apiKey, region } };
}
