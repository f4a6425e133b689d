import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import type { SpeechSynthesizer, VoiceInfo } from './types.js';

export type VoiceListFormat = 'text' | 'json';

export function formatVoiceList(voices: readonly VoiceInfo[], format: VoiceListFormat): string {
  const sorted = [...voices].sort((a, b) => a.name.localeCompare(b.name, 'en', { sensitivity: 'base' }));
  if (format === 'json') {
    return `${JSON.stringify({ voices: sorted }, null, 2)}\n`;
  }
  return sorted
    .map((v) => {
      const details = [v.category, v.locale, v.gender].filter(Boolean).join(', ');
      const head = v.name === v.id ? v.name : `${v.name} (${v.id})`;
      return details ? `${head} [${details}]\n` : `${head}\n`;
    })
    .join('');
}

export interface ExportVoicesResult {
  count: number;
  content: string;
  outPath?: string;
}

/** Fetch the service's voice catalogue and render it; written to `outPath` when given. */
export async function exportVoices(
  synth: SpeechSynthesizer,
  options: { outPath?: string; format?: VoiceListFormat } = {},
): Promise<ExportVoicesResult> {
  const voices = await synth.listVoices();
  const content = formatVoiceList(voices, options.format ?? 'text');
  if (!options.outPath) return { count: voices.length, content };
  const abs = resolve(options.outPath);
  await mkdir(dirname(abs), { recursive: true });
  await writeFile(abs, content, 'utf8');
  return { count: voices.length, content, outPath: abs };
}
