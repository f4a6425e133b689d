import { spawn } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import { rm, writeFile } from 'node:fs/promises';
import { platform, tmpdir } from 'node:os';
import { delimiter, join, resolve } from 'node:path';

import { FfmpegNotFoundError, InfrastructureError } from '@voicescript/contracts';

import type { AudioFormat } from './types.js';

const BINARY_CANDIDATES = platform() === 'win32' ? ['ffmpeg.exe', 'ffmpeg'] : ['ffmpeg'];

let cachedBinary: string | null = null;

export { FfmpegNotFoundError };

/** The part of an {@link AudioFormat} the joiner encodes with. */
export type JoinFormat = Pick<AudioFormat, 'container' | 'bitrateKbps'>;

/** Joins per-segment audio files into one file of the given format. */
export interface AudioJoiner {
  concat(inputPaths: readonly string[], outFile: string, format: JoinFormat): Promise<void>;
}

async function canSpawn(command: string): Promise<boolean> {
  return new Promise((resolvePromise) => {
    const proc = spawn(command, ['-version'], { stdio: 'ignore' });
    proc.on('error', () => resolvePromise(false));
    proc.on('exit', (code) => resolvePromise(code === 0));
  });
}

function pathCandidates(searchPath: string): string[] {
  return searchPath
    .split(delimiter)
    .filter(Boolean)
    .flatMap((dir) => BINARY_CANDIDATES.map((name) => join(dir, name)));
}

export async function resolveFfmpegPath(
  explicit?: string,
  searchPath: string = process.env.PATH ?? '',
): Promise<string> {
  const tryExplicit = explicit ?? process.env.FFMPEG_PATH;
  if (tryExplicit && (await canSpawn(tryExplicit))) {
    cachedBinary = tryExplicit;
    return tryExplicit;
  }

  if (cachedBinary && (await canSpawn(cachedBinary))) {
    return cachedBinary;
  }

  for (const candidate of pathCandidates(searchPath)) {
    if (await canSpawn(candidate)) {
      cachedBinary = candidate;
      return candidate;
    }
  }

  const instructions = [
    'FFmpeg is required to join multi-voice sections but no executable was found.',
    'Install FFmpeg and make sure it is on your PATH, or set FFMPEG_PATH (or ffmpegPath in voicescript.yml).',
    '',
    'Quick install guides:',
    '  • macOS:   brew install ffmpeg',
    '  • Ubuntu:  sudo apt-get install ffmpeg',
    '  • Windows: choco install ffmpeg',
  ].join('\n');

  throw new FfmpegNotFoundError(instructions);
}

/** Run ffmpeg with args; rejects on non-zero exit. */
export async function runFfmpeg(args: string[], label = 'ffmpeg', explicitPath?: string): Promise<void> {
  const bin = await resolveFfmpegPath(explicitPath);
  await new Promise<void>((resolvePromise, reject) => {
    const proc = spawn(bin, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stderr = '';
    proc.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    proc.on('error', reject);
    proc.on('exit', (code) => {
      if (code === 0) {
        resolvePromise();
        return;
      }
      const parts = [`${label} exited with code ${code}`];
      const trimmed = stderr.trim();
      if (trimmed) parts.push(`stderr:\n${trimmed}`);
      reject(new InfrastructureError(parts.join('\n\n')));
    });
  });
}

const DEFAULT_MP3_BITRATE_KBPS = 128;

function encoderArgs({ container, bitrateKbps }: JoinFormat): string[] {
  switch (container) {
    case 'mp3':
      return ['-c:a', 'libmp3lame', '-b:a', `${bitrateKbps ?? DEFAULT_MP3_BITRATE_KBPS}k`];
    case 'wav':
      return ['-c:a', 'pcm_s16le'];
    case 'ogg':
    case 'webm':
      return bitrateKbps ? ['-c:a', 'libopus', '-b:a', `${bitrateKbps}k`] : ['-c:a', 'libopus'];
  }
}

export function concatListFile(paths: readonly string[]): string {
  return paths.map((p) => `file '${resolve(p).replace(/'/g, "'\\''")}'`).join('\n');
}

/** Concat demuxer input, decoded and re-encoded so mismatched frames still join cleanly. */
export function buildConcatArgs(listFile: string, outFile: string, format: JoinFormat): string[] {
  return ['-y', '-f', 'concat', '-safe', '0', '-i', listFile, ...encoderArgs(format), '-f', format.container, outFile];
}

export async function concatAudioSegments(
  segmentPaths: readonly string[],
  outFile: string,
  format: JoinFormat,
  ffmpegPath?: string,
): Promise<void> {
  if (segmentPaths.length === 0) throw new InfrastructureError('No segments to concatenate');
  const listFile = join(tmpdir(), `ffconcat_${randomUUID()}.txt`);
  await writeFile(listFile, concatListFile(segmentPaths), 'utf8');
  try {
    await runFfmpeg(buildConcatArgs(listFile, outFile, format), 'ffmpeg-concat', ffmpegPath);
  } finally {
    await rm(listFile, { force: true });
  }
}

export function createFfmpegJoiner(options: { ffmpegPath?: string } = {}): AudioJoiner {
  return {
    concat: (inputPaths, outFile, format) => concatAudioSegments(inputPaths, outFile, format, options.ffmpegPath),
  };
}
