import { randomUUID } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { basename, resolve } from 'node:path';

import { ValidationError, errorMessage } from '@voicescript/contracts';
import {
  type AudioFormat,
  type AudioJoiner,
  type ServiceName,
  type SpeechSynthesizer,
  type VoiceListFormat,
  type ExportVoicesResult,
  createFfmpegJoiner,
  createSynthesizer,
  exportVoices,
  resolveAudioFormat,
} from '@voicescript/tts-backends';

import {
  DEFAULT_OUTPUT_DIR,
  type VoicescriptConfig,
  resolveDefaultVoice,
  resolveService,
  resolveServiceSettings,
} from './config.js';
import { type ManifestStore, buildRunManifest, createFilesystemManifestStore } from './manifest.js';
import {
  type PipelineLogger,
  type PipelineMetrics,
  noopLogger,
  noopMetrics,
} from './observability.js';
import { type DocumentPlan, planDocument } from './plan.js';
import { type SlideDeckResult, type SlideNotesSource, processSlideDeck } from './slides.js';
import {
  type ProcessResult,
  type SectionProgressEvent,
  type SynthesisDependencies,
  processMarkdownDocument,
} from './synthesize.js';

export interface CreatePipelineOptions {
  config: VoicescriptConfig;
  service?: ServiceName;
  voice?: string;
  cwd?: string;
  /** Replaces the backend built from the config (tests, custom services). */
  synthesizer?: SpeechSynthesizer;
  joiner?: AudioJoiner;
  manifestStore?: ManifestStore;
  logger?: PipelineLogger;
  metrics?: PipelineMetrics;
}

export interface RunFlags {
  outputDir?: string;
  overwriteAudio?: boolean;
  strict?: boolean;
  concurrency?: number;
  signal?: AbortSignal;
  onSection?: (event: SectionProgressEvent) => void;
}

export interface SlideRunFlags extends RunFlags {
  includeSlideTitles?: boolean;
  includeEmptyNotes?: boolean;
  overwriteScript?: boolean;
}

export interface MarkdownRunResult extends ProcessResult {
  manifestPath: string;
}

export interface SlideRunResult extends SlideDeckResult {
  manifestPath: string;
}

export interface VoicescriptPipeline {
  service: ServiceName;
  format: AudioFormat;
  /** Set when the configured container was replaced for this service. */
  formatWarning?: string;
  logger: PipelineLogger;
  metrics: PipelineMetrics;
  planFile(mdPath: string, flags?: RunFlags): Promise<DocumentPlan>;
  runFile(mdPath: string, flags?: RunFlags): Promise<MarkdownRunResult>;
  runSlides(source: SlideNotesSource, flags?: SlideRunFlags): Promise<SlideRunResult>;
  listVoices(options?: { outPath?: string; format?: VoiceListFormat }): Promise<ExportVoicesResult>;
}

async function readMarkdown(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (err: unknown) {
    throw new ValidationError(`Cannot read ${path}: ${errorMessage(err)}`, { cause: err });
  }
}

export function createPipeline(options: CreatePipelineOptions): VoicescriptPipeline {
  const { config } = options;
  const cwd = options.cwd ?? process.cwd();
  const service = resolveService(config, options.service);
  const overrides = { service, voice: options.voice };
  const { format, warning } = resolveAudioFormat(service, config.output.format, config.output.quality);
  const manifestStore = options.manifestStore ?? createFilesystemManifestStore();
  const logger = options.logger ?? noopLogger;
  const metrics = options.metrics ?? noopMetrics;

  // Built on first use so planning works without credentials.
  let synthesizer = options.synthesizer;
  const getSynthesizer = (): SpeechSynthesizer => {
    if (!synthesizer) {
      const settings = resolveServiceSettings(config, overrides).synthesizer;
      synthesizer = createSynthesizer({
        ...settings,
        retry: {
          onRetry: ({ attempt, delayMs, error }) =>
            logger.log({
              level: 'warn',
              stage: 'synthesis.retry',
              message: `Retrying ${error.service} (attempt ${attempt + 1}) in ${delayMs}ms: ${error.message}`,
              detail: { voice: error.voice, status: error.status },
            }),
        },
      });
    }
    return synthesizer;
  };
  const defaultVoice = (): string => resolveDefaultVoice(config, overrides);

  const outputDirFor = (flags: RunFlags) =>
    resolve(cwd, flags.outputDir ?? config.output.dir ?? DEFAULT_OUTPUT_DIR);

  const dependencies = (flags: RunFlags): SynthesisDependencies => ({
    synthesizer: getSynthesizer(),
    joiner: options.joiner ?? createFfmpegJoiner({ ffmpegPath: config.ffmpegPath }),
    logger,
    metrics,
    runId: randomUUID(),
    onSection: flags.onSection,
  });

  return {
    service,
    format,
    ...(warning !== undefined && { formatWarning: warning }),
    logger,
    metrics,

    async planFile(mdPath, flags = {}) {
      return planDocument(await readMarkdown(resolve(cwd, mdPath)), {
        outputDir: outputDirFor(flags),
        defaultVoice: defaultVoice(),
        format,
        overwriteAudio: flags.overwriteAudio,
        filenames: config.filenames,
        strict: flags.strict,
      });
    },

    async runFile(mdPath, flags = {}) {
      const source = resolve(cwd, mdPath);
      const markdown = await readMarkdown(source);
      const outputDir = outputDirFor(flags);
      const result = await processMarkdownDocument(
        markdown,
        {
          outputDir,
          defaultVoice: defaultVoice(),
          format,
          overwriteAudio: flags.overwriteAudio,
          filenames: config.filenames,
          strict: flags.strict,
          concurrency: flags.concurrency ?? config.concurrency,
          signal: flags.signal,
        },
        dependencies(flags),
      );
      const manifestPath = await manifestStore.writeManifest(
        outputDir,
        basename(source),
        buildRunManifest(source, service, format, result.summary),
      );
      return { ...result, manifestPath };
    },

    async runSlides(source, flags = {}) {
      const result = await processSlideDeck(
        source,
        {
          outputDir: flags.outputDir === undefined ? undefined : resolve(cwd, flags.outputDir),
          defaultVoice: defaultVoice(),
          format,
          overwriteAudio: flags.overwriteAudio,
          filenames: config.filenames,
          concurrency: flags.concurrency ?? config.concurrency,
          signal: flags.signal,
          includeSlideTitles: flags.includeSlideTitles,
          includeEmptyNotes: flags.includeEmptyNotes,
          overwriteScript: flags.overwriteScript,
        },
        dependencies(flags),
      );
      const manifestPath = await manifestStore.writeManifest(
        result.plan.outputDir,
        basename(result.scriptPath),
        buildRunManifest(result.scriptPath, service, format, result.summary),
      );
      return { ...result, manifestPath };
    },

    async listVoices(voiceOptions = {}) {
      return exportVoices(getSynthesizer(), {
        outPath: voiceOptions.outPath === undefined ? undefined : resolve(cwd, voiceOptions.outPath),
        format: voiceOptions.format,
      });
    },
  };
}
