import { mkdir, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

import type { ServiceName } from '@voicescript/tts-backends';

import type { OutputStatus, RunSummary } from './synthesize.js';

export const CURRENT_MANIFEST_SCHEMA_VERSION = 1;

export type RunManifestEntry = {
  path: string;
  title: string;
  voices: string[];
  status: OutputStatus;
  error?: string;
};

export type RunManifest = {
  schemaVersion: number;
  source: string;
  service: ServiceName;
  format: { container: string; serviceFormat: string };
  outputs: RunManifestEntry[];
  timestamp: string;
};

export type ManifestStore = {
  manifestPathFor(outputDir: string, documentName: string): string;
  writeManifest(outputDir: string, documentName: string, manifest: RunManifest): Promise<string>;
};

export function createFilesystemManifestStore(): ManifestStore {
  const manifestPathFor = (outputDir: string, documentName: string): string => {
    const base = basename(documentName).replace(/\.[^.]+$/, '');
    return join(outputDir, `${base}.manifest.json`);
  };

  return {
    manifestPathFor,
    async writeManifest(outputDir, documentName, manifest) {
      const target = manifestPathFor(outputDir, documentName);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, `${JSON.stringify(manifest, null, 2)}\n`);
      return target;
    },
  };
}

export function buildRunManifest(
  source: string,
  service: ServiceName,
  format: { container: string; serviceFormat: string },
  summary: RunSummary,
): RunManifest {
  return {
    schemaVersion: CURRENT_MANIFEST_SCHEMA_VERSION,
    source,
    service,
    format: { container: format.container, serviceFormat: format.serviceFormat },
    outputs: summary.outputs.map((output) => ({
      path: output.outputPath,
      title: output.titlePath.join(' / '),
      voices: output.voices,
      status: output.status,
      ...(output.error !== undefined && { error: output.error }),
    })),
    timestamp: new Date().toISOString(),
  };
}
