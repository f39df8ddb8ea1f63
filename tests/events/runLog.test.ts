import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { RunLog } from '../../src/events/runLog.js';
import type { IterationRecord } from '../../src/events/runLog.js';
import { makeTempDir, removeDir } from '../helpers.js';

function record(iteration: number): IterationRecord {
  return {
    timestamp: '2026-01-01T00:00:00.000Z',
    session_id: 'sess-run',
    iteration,
    task_id: 'task-001',
    outcome: 'completed',
    status: 'completed',
    precheck: { ok: true, skipped: true, exit_code: null, summary: 'no init script; skipped' },
    verification: { ok: true, first_failure_index: null, commands: [] },
    checkpoint: { committed: false, reason: 'no changes', commit: null },
    output_preview: 'done',
  };
}

describe('RunLog', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir('runlog-');
  });

  afterEach(() => {
    removeDir(root);
  });

  it('reads nothing from a missing file', () => {
    expect(new RunLog(path.join(root, 'run_log.jsonl')).readAll()).toEqual([]);
  });

  it('appends records in order', () => {
    const log = new RunLog(path.join(root, 'run_log.jsonl'));
    log.append(record(1));
    log.append(record(2));
    expect(log.readAll()).toEqual([record(1), record(2)]);
  });

  it('skips a torn trailing line', () => {
    const file = path.join(root, 'run_log.jsonl');
    const log = new RunLog(file);
    log.append(record(1));
    fs.appendFileSync(file, '{"timestamp":"2026');
    expect(log.readAll()).toEqual([record(1)]);
  });
});
