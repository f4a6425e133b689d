import { mkdtemp, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';

import { buildRunManifest, createFilesystemManifestStore } from '../src/manifest.js';
import { summarize } from '../src/synthesize.js';
import { MP3 } from './fakes.js';

const summary = summarize(
  [
    { sectionId: 1, titlePath: ['Course', 'One'], outputPath: '/out/course_one.mp3', voices: ['Brian'], status: 'written' },
    {
      sectionId: 2,
      titlePath: ['Course', 'Two'],
      outputPath: '/out/course_two.mp3',
      voices: ['Aria'],
      status: 'failed',
      error: 'HTTP 401',
    },
  ],
  { outputs: [] },
);

describe('buildRunManifest', () => {
  it('records each output with its joined title', () => {
    const manifest = buildRunManifest('/scripts/course.md', 'elevenlabs', MP3, summary);
    expect(manifest).toMatchObject({
      schemaVersion: 1,
      source: '/scripts/course.md',
      service: 'elevenlabs',
      format: { container: 'mp3', serviceFormat: 'mp3_44100_128' },
      outputs: [
        { path: '/out/course_one.mp3', title: 'Course / One', voices: ['Brian'], status: 'written' },
        { path: '/out/course_two.mp3', title: 'Course / Two', voices: ['Aria'], status: 'failed', error: 'HTTP 401' },
      ],
    });
    expect(manifest.outputs[0]).not.toHaveProperty('error');
    expect(Number.isNaN(Date.parse(manifest.timestamp))).toBe(false);
  });
});

describe('createFilesystemManifestStore', () => {
  it('names the manifest after the document', () => {
    const store = createFilesystemManifestStore();
    expect(store.manifestPathFor('/out', '/scripts/lesson.md')).toBe('/out/lesson.manifest.json');
  });

  it('writes the manifest as indented JSON', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'voicescript-manifest-'));
    const store = createFilesystemManifestStore();
    const manifest = buildRunManifest('/scripts/course.md', 'azure', MP3, summary);

    const path = await store.writeManifest(join(dir, 'nested'), 'course.md', manifest);

    expect(path).toBe(join(dir, 'nested', 'course.manifest.json'));
    expect(await readFile(path, 'utf8')).toBe(`${JSON.stringify(manifest, null, 2)}\n`);
  });
});
