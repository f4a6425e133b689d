import { describe, expect, it } from 'vitest';

import { createLogger, formatMessage } from '../src/logger.js';

describe('createLogger', () => {
  it('prints each event as it happens', () => {
    const lines: string[] = [];
    const logger = createLogger({ write: (line) => lines.push(line) });

    logger.info('Loaded config', { path: 'voicescript.yml' });
    logger.success('Done');
    logger.flush({ ignored: true });

    expect(lines).toEqual([
      formatMessage('info', 'Loaded config', { path: 'voicescript.yml' }),
      formatMessage('success', 'Done'),
    ]);
  });

  it('buffers events until flush in JSON mode', () => {
    const lines: string[] = [];
    const logger = createLogger({ json: true, write: (line) => lines.push(line) });

    logger.warn('Slow backend', { attempt: 2 });
    expect(lines).toEqual([]);

    logger.flush({ command: 'run' });
    expect(lines).toHaveLength(1);
    const output: unknown = JSON.parse(lines[0] ?? '');
    expect(output).toMatchObject({
      events: [{ level: 'warn', message: 'Slow backend', details: { attempt: 2 } }],
      result: { command: 'run' },
    });
  });
});

describe('formatMessage', () => {
  it('omits empty details', () => {
    expect(formatMessage('step', 'Parsing', {})).toBe(formatMessage('step', 'Parsing'));
    expect(formatMessage('step', 'Parsing', { line: 3 })).toContain('{"line":3}');
  });
});
