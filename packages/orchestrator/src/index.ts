export {
  DEFAULT_CONFIG_FILE,
  DEFAULT_OUTPUT_DIR,
  MAX_CONCURRENCY,
  applyEnvOverrides,
  loadConfig,
  parseConfig,
  resolveDefaultVoice,
  resolveService,
  resolveServiceSettings,
  type LoadConfigOptions,
  type LoadedConfig,
  type ServiceSettings,
  type VoicescriptConfig,
} from './config.js';
export { KeyedMutex, Semaphore, runPool, type PoolOutcome } from './concurrency.js';
export {
  CURRENT_MANIFEST_SCHEMA_VERSION,
  buildRunManifest,
  createFilesystemManifestStore,
  type ManifestStore,
  type RunManifest,
  type RunManifestEntry,
} from './manifest.js';
export {
  createPinoLogger,
  noopLogger,
  noopMetrics,
  type PinoLoggerOptions,
  type PipelineLogEvent,
  type PipelineLogLevel,
  type PipelineLogger,
  type PipelineMetrics,
} from './observability.js';
export {
  createPipeline,
  type CreatePipelineOptions,
  type MarkdownRunResult,
  type RunFlags,
  type SlideRunFlags,
  type SlideRunResult,
  type VoicescriptPipeline,
} from './pipeline.js';
export { planDocument, voicesOf, type DocumentPlan, type PlanOptions, type PlannedOutput } from './plan.js';
export {
  createJsonNotesSource,
  processSlideDeck,
  slideDeckPaths,
  type SlideDeckOptions,
  type SlideDeckResult,
  type SlideNotesSource,
} from './slides.js';
export {
  exitCodeFor,
  processMarkdownDocument,
  summarize,
  synthesizePlan,
  type OutputResult,
  type OutputStatus,
  type ProcessOptions,
  type ProcessResult,
  type RunSummary,
  type SectionFailure,
  type SectionProgressEvent,
  type SynthesisDependencies,
  type SynthesisOptions,
} from './synthesize.js';
