import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const summary = { processed: 2, skipped: 1, failed: 0, cancelled: 0, outputs: [], failures: [] };

const pipelineMock = {
  service: 'elevenlabs',
  format: { container: 'mp3', quality: 'high', extension: 'mp3', serviceFormat: 'mp3_44100_128' },
  formatWarning: undefined,
  planFile: vi.fn(),
  runFile: vi.fn(),
  runSlides: vi.fn(),
  listVoices: vi.fn(),
};

const createPipeline = vi.fn(() => pipelineMock);
const loadConfig = vi.fn();
const createJsonNotesSource = vi.fn();

vi.mock('@voicescript/shared-infrastructure', () => ({
  loadEnvFiles: vi.fn(() => ({ values: {}, loadedFiles: [], missingFiles: [], assignedKeys: [], overriddenKeys: [] })),
}));

vi.mock('../src/index.js', async () => {
  const actual = await vi.importActual<typeof import('../src/index.js')>('../src/index.js');
  return { ...actual, createPipeline, loadConfig, createJsonNotesSource };
});

const importCli = async (): Promise<void> => {
  await import('../bin/cli.js');
};

describe('cli (commander parsing)', () => {
  const originalArgv = [...process.argv];

  beforeEach(() => {
    vi.resetModules();
    createPipeline.mockClear();
    pipelineMock.planFile.mockReset();
    pipelineMock.runFile.mockReset();
    pipelineMock.runSlides.mockReset();
    pipelineMock.listVoices.mockReset();
    loadConfig.mockReset().mockResolvedValue({ config: { concurrency: 1 } });
    createJsonNotesSource.mockReset();
    process.argv = [...originalArgv];
  });

  afterEach(() => {
    process.exitCode = undefined;
    process.argv = [...originalArgv];
  });

  it('forwards run flags to the pipeline', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    process.argv = [
      'node',
      'cli',
      'run',
      '--md',
      'lesson.md',
      '--service',
      'azure',
      '--voice',
      'en-US-JennyNeural',
      '--out',
      'audio',
      '--overwrite-audio',
      '--concurrency',
      '3',
      '--json',
    ];
    pipelineMock.runFile.mockResolvedValue({ summary, manifestPath: '/tmp/lesson.manifest.json' });

    await importCli();

    expect(loadConfig).toHaveBeenCalledWith({ path: undefined, cwd: process.cwd() });
    expect(createPipeline).toHaveBeenCalledWith(
      expect.objectContaining({ service: 'azure', voice: 'en-US-JennyNeural' }),
    );
    expect(pipelineMock.runFile).toHaveBeenCalledWith(
      'lesson.md',
      expect.objectContaining({ outputDir: 'audio', overwriteAudio: true, concurrency: 3 }),
    );
    expect(process.exitCode).toBe(0);

    const flushed: unknown = JSON.parse(String(logSpy.mock.calls.at(-1)?.[0]));
    expect(flushed).toMatchObject({ result: { command: 'run', summary: { processed: 2 } } });
  });

  it('treats flags without a subcommand as run', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    process.argv = ['node', 'cli', '--md', 'lesson.md', '--json'];
    pipelineMock.runFile.mockResolvedValue({
      summary: { ...summary, failed: 1 },
      manifestPath: '/tmp/lesson.manifest.json',
    });

    await importCli();

    expect(pipelineMock.runFile).toHaveBeenCalledTimes(1);
    expect(process.exitCode).toBe(1);
  });

  it('plans instead of synthesizing on --dry-run', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    process.argv = ['node', 'cli', 'run', '--md', 'lesson.md', '--dry-run', '--strict', '--json'];
    pipelineMock.planFile.mockResolvedValue({ outputDir: '/tmp/out', outputs: [], diagnostics: [] });

    await importCli();

    expect(pipelineMock.planFile).toHaveBeenCalledWith('lesson.md', {
      outputDir: undefined,
      overwriteAudio: false,
      strict: true,
    });
    expect(pipelineMock.runFile).not.toHaveBeenCalled();
  });

  it('dumps the plan for parse and forwards --strict', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    process.argv = ['node', 'cli', 'parse', '--md', 'lesson.md', '--strict'];
    pipelineMock.planFile.mockResolvedValue({ sections: [], outputs: [], diagnostics: [], collisions: [] });

    await importCli();

    expect(pipelineMock.planFile).toHaveBeenCalledWith('lesson.md', { outputDir: undefined, strict: true });
    expect(JSON.parse(String(logSpy.mock.calls.at(-1)?.[0]))).toEqual({
      sections: [],
      outputs: [],
      diagnostics: [],
      collisions: [],
    });
  });

  it('passes slide options through', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    process.argv = ['node', 'cli', 'slides', '--notes', '/decks/deck.json', '--no-titles', '--overwrite-script', '--json'];
    createJsonNotesSource.mockResolvedValue({ path: '/decks/deck.json', title: 'deck', readSlides: vi.fn() });
    pipelineMock.runSlides.mockResolvedValue({
      summary,
      scriptPath: '/decks/deck/deck.md',
      scriptReused: false,
      manifestPath: '/decks/deck/deck.manifest.json',
    });

    await importCli();

    expect(createJsonNotesSource).toHaveBeenCalledWith('/decks/deck.json');
    expect(pipelineMock.runSlides).toHaveBeenCalledWith(
      expect.objectContaining({ path: '/decks/deck.json' }),
      expect.objectContaining({ includeSlideTitles: false, includeEmptyNotes: false, overwriteScript: true }),
    );
  });

  it('prints the voice list', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    process.argv = ['node', 'cli', 'voices', '--format', 'json'];
    pipelineMock.listVoices.mockResolvedValue({ count: 1, content: '{"voices":[]}\n' });

    await importCli();

    expect(pipelineMock.listVoices).toHaveBeenCalledWith({ outPath: undefined, format: 'json' });
    expect(logSpy).toHaveBeenCalledWith('{"voices":[]}\n');
  });

  it('exits with the commander error code on a bad option', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });
    process.argv = ['node', 'cli', 'run', '--md', 'lesson.md', '--concurrency', '99'];

    await expect(importCli()).rejects.toThrow('exit 1');

    expect(exitSpy).toHaveBeenNthCalledWith(1, 1);
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain('Concurrency must be an integer from 1 to 16.');
    expect(pipelineMock.runFile).not.toHaveBeenCalled();
  });
});
