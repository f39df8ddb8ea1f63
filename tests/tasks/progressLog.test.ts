import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ProgressLog } from '../../src/tasks/progressLog.js';
import { makeTempDir, removeDir } from '../helpers.js';

describe('ProgressLog', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir('progress-');
  });

  afterEach(() => {
    removeDir(root);
  });

  it('reads as empty before initialization', async () => {
    expect(await new ProgressLog(root).load()).toBe('');
  });

  it('writes the header and appends sections', async () => {
    const log = new ProgressLog(root);
    await log.initialize('demo', 'A todo app', '2026-03-01T00:00:00.000Z');
    await log.append('### later\n- something\n\n');

    expect(await log.load()).toBe([
      '# Project progress',
      '',
      '## Project',
      '',
      '- **Name**: demo',
      '- **Description**: A todo app',
      '- **Started**: 2026-03-01T00:00:00.000Z',
      '',
      '## Log',
      '',
      '### 2026-03-01T00:00:00.000Z',
      '- Project initialized',
      '',
      '### later',
      '- something',
      '',
    ].join('\n'));
  });
});
