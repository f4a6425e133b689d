#!/usr/bin/env node
import { Command, CommanderError, InvalidOptionArgumentError } from 'commander';
import { createRequire } from 'node:module';
import { relative, resolve } from 'node:path';
import process from 'node:process';
import ora from 'ora';
import pc from 'picocolors';

import { errorMessage } from '@voicescript/contracts';
import { loadEnvFiles } from '@voicescript/shared-infrastructure';
import type { ServiceName, VoiceListFormat } from '@voicescript/tts-backends';

import {
  type DocumentPlan,
  MAX_CONCURRENCY,
  type PipelineLogger,
  type RunSummary,
  type SectionProgressEvent,
  type VoicescriptPipeline,
  createJsonNotesSource,
  createPipeline,
  exitCodeFor,
  loadConfig,
  voicesOf,
} from '../src/index.js';
import { createLogger } from '../src/logger.js';

const envSummary = loadEnvFiles({ cwd: process.cwd(), assignToProcess: true, override: false });

const rawArgs = process.argv.slice(2);
const require = createRequire(import.meta.url);

const readVersion = (): string => {
  const pkg: unknown = require('../package.json');
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
};

if (rawArgs.includes('--version') || rawArgs.includes('-v')) {
  console.log(readVersion());
  process.exit(0);
}

const usage = (): never => {
  console.error(`Usage:
  voicescript run --md <file.md> [options]
      --config <file>           Config file (default ./voicescript.yml)
      --service <name>          elevenlabs or azure
      --voice <name>            Default voice before the first directive
      --out <dir>               Output directory (default ./output)
      --overwrite-audio         Regenerate files that already exist
      --concurrency <n>         Sections synthesized at once (1-${MAX_CONCURRENCY})
      --dry-run                 Print the planned files without synthesizing
      --strict                  Stop on malformed voice directives
      --json                    Emit structured JSON log output

  voicescript slides --notes <deck.json> [options]
      --no-titles               Leave slide titles out of the script
      --include-empty-notes     Keep slides that have no notes
      --overwrite-script        Rebuild the script even if one exists

  voicescript voices [--out <file>] [--format text|json]
  voicescript parse --md <file.md> [--strict]`);
  process.exit(1);
};

const command = rawArgs[0] && !rawArgs[0].startsWith('--') ? rawArgs[0] : null;
const jsonOutput = rawArgs.includes('--json');
const logger = createLogger({ json: jsonOutput });
const useFancy = !jsonOutput && Boolean(process.stdout.isTTY);

if (envSummary.loadedFiles.length > 0) {
  logger.step('Environment files loaded', {
    loaded: envSummary.loadedFiles.map((file) => relative(process.cwd(), file)),
  });
}

const pipelineLogger: PipelineLogger = {
  log({ level, message, detail, runId, stage }) {
    const payload: Record<string, unknown> = {};
    if (runId) payload.runId = runId;
    if (stage) payload.stage = stage;
    if (detail && Object.keys(detail).length > 0) payload.detail = detail;

    switch (level) {
      case 'error':
        logger.error(message, payload);
        break;
      case 'warn':
        logger.warn(message, payload);
        break;
      case 'debug':
        // Per-section progress is on the spinner; keep the console quiet.
        if (jsonOutput) logger.step(message, payload);
        break;
      default:
        if (jsonOutput) logger.info(message, payload);
    }
  },
};

const SERVICE_CHOICES = ['elevenlabs', 'azure'] as const satisfies readonly ServiceName[];
const VOICE_LIST_FORMATS = ['text', 'json'] as const satisfies readonly VoiceListFormat[];

const parseChoice =
  <T extends string>(label: string, choices: readonly T[]) =>
  (value: string): T => {
    const match = choices.find((choice) => choice === value);
    if (!match) {
      throw new InvalidOptionArgumentError(`${label} must be one of: ${choices.join(', ')}.`);
    }
    return match;
  };

const parseConcurrency = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 1 || parsed > MAX_CONCURRENCY) {
    throw new InvalidOptionArgumentError(`Concurrency must be an integer from 1 to ${MAX_CONCURRENCY}.`);
  }
  return parsed;
};

const stripGlobalFlags = (args: string[]): string[] => args.filter((arg) => arg !== '--json');

const parseWithCommander = async (program: Command, args: string[]): Promise<Command> => {
  program.exitOverride();
  try {
    return await program.parseAsync(['node', 'cli.js', ...stripGlobalFlags(args)], {
      from: 'node',
    });
  } catch (error) {
    if (error instanceof CommanderError) {
      const message = error.message.trim();
      if (message) console.error(pc.red(message));
      process.exit(error.exitCode);
    }
    throw error;
  }
};

interface CommonFlags {
  config?: string;
  service?: ServiceName;
  voice?: string;
  out?: string;
  overwriteAudio?: boolean;
  concurrency?: number;
}

const withCommonOptions = (program: Command): Command =>
  program
    .allowExcessArguments(false)
    .option('--config <file>', 'Config file')
    .option('--service <name>', 'Speech service', parseChoice('Service', SERVICE_CHOICES))
    .option('--voice <name>', 'Default voice')
    .option('--out <dir>', 'Output directory')
    .option('--overwrite-audio', 'Regenerate files that already exist')
    .option('--concurrency <n>', 'Sections synthesized at once', parseConcurrency);

const openPipeline = async (flags: CommonFlags): Promise<VoicescriptPipeline> => {
  const { config, source } = await loadConfig({ path: flags.config, cwd: process.cwd() });
  if (source) logger.step('Loaded config', { path: relative(process.cwd(), source) });
  const pipeline = createPipeline({
    config,
    service: flags.service,
    voice: flags.voice,
    logger: pipelineLogger,
  });
  if (pipeline.formatWarning) logger.warn(pipeline.formatWarning);
  return pipeline;
};

/** Ctrl-C stops new sections from starting; in-flight ones finish. */
const interruptSignal = (): AbortSignal => {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted; waiting for sections in progress');
    controller.abort();
  });
  return controller.signal;
};

const progressReporter = () => {
  const spinner = useFancy ? ora({ spinner: 'dots', color: 'cyan' }) : null;
  const onSection = (event: SectionProgressEvent): void => {
    const label = event.output.relativePath;
    if (event.status === 'start') {
      if (spinner && !spinner.isSpinning) spinner.start(`Synthesizing ${label}`);
      else if (spinner) spinner.text = `Synthesizing ${label}`;
      return;
    }
    if (!spinner) return;
    switch (event.status) {
      case 'written':
        spinner.succeed(label);
        break;
      case 'skipped':
        spinner.info(`${label} ${pc.dim('(exists)')}`);
        break;
      case 'failed':
        spinner.fail(`${label} ${pc.dim(event.error ?? '')}`);
        break;
      case 'cancelled':
        spinner.warn(`${label} ${pc.dim('(cancelled)')}`);
        break;
    }
  };
  return {
    onSection,
    stop: () => {
      if (spinner?.isSpinning) spinner.stop();
    },
  };
};

const printPlan = (plan: DocumentPlan): void => {
  if (jsonOutput) return;
  console.log(`\nPlanned ${plan.outputs.length} file(s) in ${plan.outputDir}`);
  for (const output of plan.outputs) {
    const note = output.skip ? pc.dim(' (exists, skipped)') : '';
    console.log(`  ${output.relativePath}  ${pc.dim(voicesOf(output).join(', '))}${note}`);
  }
};

const printSummary = (summary: RunSummary, manifestPath: string): void => {
  if (jsonOutput) return;
  console.log('\nSummary');
  console.log(`  Written  : ${summary.processed}`);
  console.log(`  Skipped  : ${summary.skipped}`);
  console.log(`  Failed   : ${summary.failed}`);
  if (summary.cancelled > 0) console.log(`  Cancelled: ${summary.cancelled}`);
  console.log(`  Manifest : ${manifestPath}`);
  for (const failure of summary.failures) {
    console.log(pc.red(`  ✖ ${failure.title}: ${failure.error}`));
  }
};

async function handleRun(args: string[]): Promise<void> {
  const program = withCommonOptions(new Command('run').usage('--md <file.md> [options]'))
    .option('--md <file>', 'Markdown script')
    .option('--dry-run', 'Print the planned files without synthesizing')
    .option('--strict', 'Stop on malformed voice directives');
  const parsed = await parseWithCommander(program, args);
  const opts = parsed.opts<CommonFlags & { md?: string; dryRun?: boolean; strict?: boolean }>();
  if (!opts.md) usage();
  const md = opts.md ?? '';

  const pipeline = await openPipeline(opts);
  const flags = { outputDir: opts.out, overwriteAudio: Boolean(opts.overwriteAudio), strict: Boolean(opts.strict) };

  if (opts.dryRun) {
    const plan = await pipeline.planFile(md, flags);
    for (const diagnostic of plan.diagnostics) {
      logger.warn(`line ${diagnostic.line}: ${diagnostic.message}`);
    }
    printPlan(plan);
    logger.flush({ command: 'run', dryRun: true, plan: plan.outputs });
    return;
  }

  logger.info('Starting synthesis', { md, service: pipeline.service, format: pipeline.format.serviceFormat });
  const progress = progressReporter();
  const result = await pipeline.runFile(md, {
    ...flags,
    concurrency: opts.concurrency,
    signal: interruptSignal(),
    onSection: progress.onSection,
  });
  progress.stop();

  printSummary(result.summary, result.manifestPath);
  logger.flush({ command: 'run', summary: result.summary, manifest: result.manifestPath });
  process.exitCode = exitCodeFor(result.summary);
}

async function handleSlides(args: string[]): Promise<void> {
  const program = withCommonOptions(new Command('slides').usage('--notes <deck.json> [options]'))
    .option('--notes <file>', 'Speaker notes exported as JSON')
    .option('--no-titles', 'Leave slide titles out of the script')
    .option('--include-empty-notes', 'Keep slides that have no notes')
    .option('--overwrite-script', 'Rebuild the script even if one exists');
  const parsed = await parseWithCommander(program, args);
  const opts = parsed.opts<
    CommonFlags & { notes?: string; titles: boolean; includeEmptyNotes?: boolean; overwriteScript?: boolean }
  >();
  if (!opts.notes) usage();

  const pipeline = await openPipeline(opts);
  const source = await createJsonNotesSource(resolve(opts.notes ?? ''));
  const progress = progressReporter();
  const result = await pipeline.runSlides(source, {
    outputDir: opts.out,
    overwriteAudio: Boolean(opts.overwriteAudio),
    concurrency: opts.concurrency,
    includeSlideTitles: opts.titles,
    includeEmptyNotes: Boolean(opts.includeEmptyNotes),
    overwriteScript: Boolean(opts.overwriteScript),
    signal: interruptSignal(),
    onSection: progress.onSection,
  });
  progress.stop();

  logger.info(result.scriptReused ? 'Reused existing script' : 'Wrote script', { path: result.scriptPath });
  printSummary(result.summary, result.manifestPath);
  logger.flush({
    command: 'slides',
    script: result.scriptPath,
    summary: result.summary,
    manifest: result.manifestPath,
  });
  process.exitCode = exitCodeFor(result.summary);
}

async function handleVoices(args: string[]): Promise<void> {
  const program = new Command('voices')
    .allowExcessArguments(false)
    .option('--config <file>', 'Config file')
    .option('--service <name>', 'Speech service', parseChoice('Service', SERVICE_CHOICES))
    .option('--out <file>', 'Write the list to a file')
    .option('--format <format>', 'text or json', parseChoice('Format', VOICE_LIST_FORMATS), 'text');
  const parsed = await parseWithCommander(program, args);
  const opts = parsed.opts<{ config?: string; service?: ServiceName; out?: string; format: VoiceListFormat }>();

  const pipeline = await openPipeline(opts);
  const exported = await pipeline.listVoices({ outPath: opts.out, format: opts.format });
  if (exported.outPath) {
    logger.success(`Exported ${exported.count} voices`, { path: exported.outPath });
  } else if (!jsonOutput) {
    console.log(exported.content);
  }
  logger.flush({ command: 'voices', count: exported.count, path: exported.outPath });
}

async function handleParse(args: string[]): Promise<void> {
  const program = withCommonOptions(new Command('parse').usage('--md <file.md> [--strict]'))
    .option('--md <file>', 'Markdown script')
    .option('--strict', 'Stop on malformed voice directives');
  const parsed = await parseWithCommander(program, args);
  const opts = parsed.opts<CommonFlags & { md?: string; strict?: boolean }>();
  if (!opts.md) usage();

  const pipeline = await openPipeline(opts);
  const plan = await pipeline.planFile(opts.md ?? '', { outputDir: opts.out, strict: Boolean(opts.strict) });
  console.log(
    JSON.stringify(
      {
        sections: plan.sections,
        outputs: plan.outputs,
        diagnostics: plan.diagnostics,
        collisions: plan.collisions,
      },
      null,
      2,
    ),
  );
}

async function main(): Promise<void> {
  try {
    switch (command) {
      case 'slides':
        await handleSlides(rawArgs.slice(1));
        return;
      case 'voices':
        await handleVoices(rawArgs.slice(1));
        return;
      case 'parse':
        await handleParse(rawArgs.slice(1));
        return;
      case 'run':
        await handleRun(rawArgs.slice(1));
        return;
      case null:
        await handleRun(rawArgs);
        return;
      default:
        usage();
    }
  } catch (error: unknown) {
    const message = errorMessage(error);
    const name = error instanceof Error ? error.name : 'Error';
    logger.error(message, { name });
    logger.flush({ command: command ?? 'run', error: { message, name } });
    process.exit(1);
  }
}

await main();
