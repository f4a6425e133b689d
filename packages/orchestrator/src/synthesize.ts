import { randomUUID } from 'node:crypto';
import { mkdir, mkdtemp, rename, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, join } from 'node:path';

import { FilesystemError, SynthesisError, errorMessage } from '@voicescript/contracts';
import {
  type AudioFormat,
  type AudioJoiner,
  type SpeechSynthesizer,
  createFfmpegJoiner,
} from '@voicescript/tts-backends';

import { KeyedMutex, runPool } from './concurrency.js';
import {
  type PipelineLogger,
  type PipelineMetrics,
  noopLogger,
  noopMetrics,
} from './observability.js';
import { type DocumentPlan, type PlanOptions, type PlannedOutput, planDocument, voicesOf } from './plan.js';

export type OutputStatus = 'written' | 'skipped' | 'failed' | 'cancelled';

export interface OutputResult {
  sectionId: number;
  titlePath: string[];
  outputPath: string;
  status: OutputStatus;
  voices: string[];
  error?: string;
  durationMs?: number;
}

export interface SectionFailure {
  sectionId: number;
  title: string;
  outputPath: string;
  error: string;
  voice?: string;
}

export interface RunSummary {
  processed: number;
  skipped: number;
  failed: number;
  cancelled: number;
  outputs: OutputResult[];
  failures: SectionFailure[];
}

export type SectionProgressEvent = {
  output: PlannedOutput;
  status: 'start' | OutputStatus;
  error?: string;
};

export interface SynthesisDependencies {
  synthesizer: SpeechSynthesizer;
  /** Joins multi-segment sections; FFmpeg unless replaced. */
  joiner?: AudioJoiner;
  logger?: PipelineLogger;
  metrics?: PipelineMetrics;
  runId?: string;
  onSection?: (event: SectionProgressEvent) => void;
}

export interface SynthesisOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

function tempPathBeside(target: string): string {
  return join(dirname(target), `.${basename(target)}.${randomUUID()}.tmp`);
}

async function ensureDir(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
  } catch (err: unknown) {
    throw new FilesystemError(dir, `Cannot create ${dir}: ${errorMessage(err)}`, { cause: err });
  }
}

async function writeAtomically(target: string, produce: (tempPath: string) => Promise<void>): Promise<void> {
  await ensureDir(dirname(target));
  const temp = tempPathBeside(target);
  try {
    await produce(temp);
    await rename(temp, target).catch((err: unknown) => {
      throw new FilesystemError(target, `Cannot move audio into ${target}: ${errorMessage(err)}`, { cause: err });
    });
  } catch (err: unknown) {
    await rm(temp, { force: true });
    throw err;
  }
}

async function writeBytes(path: string, bytes: Uint8Array): Promise<void> {
  try {
    await writeFile(path, bytes);
  } catch (err: unknown) {
    throw new FilesystemError(path, `Cannot write ${path}: ${errorMessage(err)}`, { cause: err });
  }
}

async function joinSegments(
  clips: Uint8Array[],
  target: string,
  format: AudioFormat,
  joiner: AudioJoiner,
): Promise<void> {
  const workDir = await mkdtemp(join(tmpdir(), 'voicescript-'));
  try {
    const paths: string[] = [];
    for (const [index, clip] of clips.entries()) {
      const path = join(workDir, `segment-${String(index).padStart(3, '0')}.${format.extension}`);
      await writeBytes(path, clip);
      paths.push(path);
    }
    await joiner.concat(paths, target, format);
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}

/**
 * Synthesize every segment of one section in order and put the result at
 * its output path. Nothing is left at the path if any step fails.
 */
async function renderOutput(
  output: PlannedOutput,
  format: AudioFormat,
  synthesizer: SpeechSynthesizer,
  joiner: () => AudioJoiner,
): Promise<void> {
  const clips: Uint8Array[] = [];
  for (const segment of output.segments) {
    clips.push(await synthesizer.synthesize({ text: segment.text, voice: segment.voice, format }));
  }
  await writeAtomically(output.outputPath, async (temp) => {
    const [only] = clips;
    if (clips.length === 1 && only) {
      await writeBytes(temp, only);
    } else {
      await joinSegments(clips, temp, format, joiner());
    }
  });
}

export function summarize(outputs: OutputResult[], plan: Pick<DocumentPlan, 'outputs'>): RunSummary {
  const count = (status: OutputStatus) => outputs.filter((o) => o.status === status).length;
  const failures: SectionFailure[] = [];
  for (const result of outputs) {
    if (result.status !== 'failed') continue;
    const planned = plan.outputs.find((o) => o.sectionId === result.sectionId);
    failures.push({
      sectionId: result.sectionId,
      title: planned?.title ?? result.titlePath.join(' / '),
      outputPath: result.outputPath,
      error: result.error ?? 'unknown error',
    });
  }
  return {
    processed: count('written'),
    skipped: count('skipped'),
    failed: count('failed'),
    cancelled: count('cancelled'),
    outputs,
    failures,
  };
}

/**
 * Produce every non-skipped output of a plan. A failing section is recorded
 * and the run continues with the next one.
 */
export async function synthesizePlan(
  plan: DocumentPlan,
  deps: SynthesisDependencies,
  options: SynthesisOptions = {},
): Promise<RunSummary> {
  const logger = deps.logger ?? noopLogger;
  const metrics = deps.metrics ?? noopMetrics;
  const runId = deps.runId ?? randomUUID();
  const locks = new KeyedMutex();
  let joiner: AudioJoiner | undefined = deps.joiner;
  const getJoiner = (): AudioJoiner => (joiner ??= createFfmpegJoiner());
  const failedVoice = new Map<number, string>();

  await ensureDir(plan.outputDir);

  const emit = (output: PlannedOutput, status: SectionProgressEvent['status'], error?: string) => {
    deps.onSection?.({ output, status, ...(error !== undefined && { error }) });
  };

  const processOne = async (output: PlannedOutput): Promise<OutputResult> => {
    const base = {
      sectionId: output.sectionId,
      titlePath: output.titlePath,
      outputPath: output.outputPath,
      voices: voicesOf(output),
    };
    if (output.skip) {
      logger.log({
        level: 'info',
        message: 'section.skipped',
        runId,
        stage: 'synthesize',
        detail: { path: output.outputPath, reason: 'exists' },
      });
      metrics.increment('voicescript.section.skipped', 1);
      emit(output, 'skipped');
      return { ...base, status: 'skipped' };
    }

    emit(output, 'start');
    const startedAt = Date.now();
    try {
      await locks.runExclusive(output.outputPath, () =>
        renderOutput(output, plan.format, deps.synthesizer, getJoiner),
      );
      const durationMs = Math.max(Date.now() - startedAt, 0);
      logger.log({
        level: 'info',
        message: 'section.written',
        runId,
        stage: 'synthesize',
        detail: { path: output.outputPath, segments: output.segments.length, durationMs },
      });
      metrics.timing('voicescript.section.duration_ms', durationMs, { service: deps.synthesizer.service });
      metrics.increment('voicescript.section.written', 1);
      emit(output, 'written');
      return { ...base, status: 'written', durationMs };
    } catch (err: unknown) {
      const message = errorMessage(err);
      if (err instanceof SynthesisError) failedVoice.set(output.sectionId, err.voice);
      logger.log({
        level: 'error',
        message: 'section.failed',
        runId,
        stage: 'synthesize',
        detail: { path: output.outputPath, error: message },
      });
      metrics.increment('voicescript.section.failed', 1);
      emit(output, 'failed', message);
      return { ...base, status: 'failed', error: message };
    }
  };

  const outcomes = await runPool(plan.outputs, options.concurrency ?? 1, processOne, options.signal);
  const results = outcomes.map((outcome, index): OutputResult => {
    if (outcome.status === 'done') return outcome.value;
    const output = plan.outputs[index];
    if (!output) throw new Error(`No planned output at index ${index}`);
    emit(output, 'cancelled');
    return {
      sectionId: output.sectionId,
      titlePath: output.titlePath,
      outputPath: output.outputPath,
      voices: voicesOf(output),
      status: 'cancelled',
    };
  });

  const summary = summarize(results, plan);
  for (const failure of summary.failures) {
    const voice = failedVoice.get(failure.sectionId);
    if (voice !== undefined) failure.voice = voice;
  }
  logger.log({
    level: summary.failed > 0 ? 'warn' : 'info',
    message: 'run.completed',
    runId,
    stage: 'synthesize',
    detail: {
      processed: summary.processed,
      skipped: summary.skipped,
      failed: summary.failed,
      cancelled: summary.cancelled,
    },
  });
  return summary;
}

export type ProcessOptions = PlanOptions & SynthesisOptions;

export interface ProcessResult {
  plan: DocumentPlan;
  summary: RunSummary;
}

export async function processMarkdownDocument(
  markdown: string,
  options: ProcessOptions,
  deps: SynthesisDependencies,
): Promise<ProcessResult> {
  const plan = await planDocument(markdown, options);
  const logger = deps.logger ?? noopLogger;
  for (const diagnostic of plan.diagnostics) {
    logger.log({
      level: 'warn',
      message: `parse.${diagnostic.kind}`,
      runId: deps.runId,
      stage: 'parse',
      detail: { line: diagnostic.line, message: diagnostic.message },
    });
  }
  for (const collision of plan.collisions) {
    logger.log({
      level: 'warn',
      message: 'plan.filename-collision',
      runId: deps.runId,
      stage: 'plan',
      detail: { path: collision.relativePath, sections: collision.sectionIds },
    });
  }
  const summary = await synthesizePlan(plan, deps, options);
  return { plan, summary };
}

/** Non-zero only when a section failed; skipped and cancelled sections are not errors. */
export function exitCodeFor(summary: RunSummary): 0 | 1 {
  return summary.failed > 0 ? 1 : 0;
}
