import * as fs from 'node:fs';
import * as path from 'node:path';
import { isNodeError } from '../errors.js';
import type { TaskStatus } from '../tasks/types.js';

export type IterationOutcome =
  | 'completed'
  | 'in_progress'
  | 'task_blocked'
  | 'precheck_failed'
  | 'nothing_eligible'
  | 'pinned_unavailable';

export interface PrecheckSummary {
  ok: boolean;
  skipped: boolean;
  exit_code: number | null;
  summary: string;
}

export interface VerificationSummary {
  ok: boolean;
  first_failure_index: number | null;
  commands: Array<{ command: string; exit_code: number | null; denied: boolean }>;
}

export interface CheckpointSummary {
  committed: boolean;
  reason: string;
  commit: string | null;
}

export interface IterationRecord {
  timestamp: string;
  session_id: string;
  iteration: number;
  task_id: string | null;
  outcome: IterationOutcome;
  status: TaskStatus | null;
  precheck: PrecheckSummary;
  verification: VerificationSummary | null;
  checkpoint: CheckpointSummary | null;
  output_preview: string;
}

/** One line per iteration in run_log.jsonl. */
export class RunLog {
  constructor(readonly filePath: string) {}

  append(record: IterationRecord): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.appendFileSync(this.filePath, JSON.stringify(record) + '\n');
  }

  readAll(): IterationRecord[] {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return [];
      throw err;
    }
    const records: IterationRecord[] = [];
    for (const line of content.split('\n')) {
      if (!line.trim()) continue;
      try {
        records.push(JSON.parse(line) as IterationRecord);
      } catch {
        // Torn trailing line from an interrupted append
      }
    }
    return records;
  }
}
