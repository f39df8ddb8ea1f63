import * as fs from 'node:fs';
import * as path from 'node:path';
import { CheckpointFailure, errorMessage } from '../errors.js';
import type { EventSink } from '../events/types.js';
import type { SessionContext } from '../session/context.js';
import { spawnWithTimeout } from '../utils/exec.js';
import type { SpawnResult } from '../utils/exec.js';

export interface CheckpointResult {
  committed: boolean;
  reason: string;
  commit: string | null;
  files: string[];
}

export interface CheckpointEntry {
  hash: string;
  subject: string;
  date: string;
}

const DEFAULT_GITIGNORE = [
  'node_modules/',
  'dist/',
  'build/',
  '__pycache__/',
  '*.pyc',
  '.venv/',
  '.env',
  '.DS_Store',
  '*.log',
  '*.tmp',
  'events.jsonl',
  '',
].join('\n');

/** Parses `git status --porcelain -z` output into paths, taking the new name of a rename. */
export function parsePorcelain(output: string): string[] {
  const entries = output.split('\0');
  const files: string[] = [];
  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    if (entry.length < 4) continue;
    const status = entry.slice(0, 2);
    files.push(entry.slice(3));
    // Renames and copies carry the original path as the next entry
    if (status.includes('R') || status.includes('C')) i++;
  }
  return files;
}

/**
 * Git operations for the session. Checkpointing is best effort: every method
 * reports failure through its result, none of them throws.
 */
export class CheckpointAdapter {
  constructor(
    readonly projectRoot: string,
    private readonly events: EventSink,
    private readonly timeoutMs = 30_000,
  ) {}

  private exec(args: string[]): Promise<SpawnResult> {
    return spawnWithTimeout('git', args, { timeoutMs: this.timeoutMs, cwd: this.projectRoot });
  }

  private async git(args: string[]): Promise<string> {
    const result = await this.exec(args);
    if (result.timedOut) {
      throw new CheckpointFailure(`git ${args[0]} timed out`);
    }
    if (result.exitCode !== 0) {
      const detail = (result.stderr || result.stdout).trim().split('\n')[0] || `exit code ${result.exitCode ?? 'unknown'}`;
      throw new CheckpointFailure(`git ${args[0]} failed: ${detail}`);
    }
    return result.stdout;
  }

  async isRepository(): Promise<boolean> {
    const result = await this.exec(['rev-parse', '--git-dir']);
    return result.exitCode === 0;
  }

  async changedFiles(): Promise<string[]> {
    const result = await this.exec(['status', '--porcelain', '-z', '--untracked-files=all']);
    if (result.exitCode !== 0) return [];
    return parsePorcelain(result.stdout);
  }

  async checkpoint(message: string, context: SessionContext): Promise<CheckpointResult> {
    let outcome: CheckpointResult;
    let ok = true;
    try {
      if (!(await this.isRepository())) {
        throw new CheckpointFailure('not a git repository');
      }
      const files = await this.changedFiles();
      if (files.length === 0) {
        outcome = { committed: false, reason: 'no changes', commit: null, files };
      } else {
        await this.git(['add', '-A']);
        await this.git(['commit', '-m', message, '-m', `Checkpoint: ${new Date().toISOString()}`]);
        const commit = (await this.git(['rev-parse', '--short', 'HEAD'])).trim();
        outcome = { committed: true, reason: 'committed', commit, files };
      }
    } catch (err) {
      ok = false;
      outcome = { committed: false, reason: errorMessage(err), commit: null, files: [] };
    }

    this.events.record(context, {
      event_type: 'checkpoint',
      component: 'git',
      name: 'commit',
      payload: {
        message: ok ? (outcome.committed ? `committed ${outcome.commit ?? ''}: ${message}` : outcome.reason) : `checkpoint failed: ${outcome.reason}`,
        commit: outcome.commit,
        files_changed: outcome.files.length,
      },
      ok,
    });
    return outcome;
  }

  async recentCheckpoints(count: number): Promise<CheckpointEntry[]> {
    const result = await this.exec(['log', `-n${count}`, '--pretty=format:%h%x1f%s%x1f%cI']);
    if (result.exitCode !== 0) return [];
    return result.stdout
      .split('\n')
      .filter(line => line.trim() !== '')
      .map(line => {
        const [hash = '', subject = '', date = ''] = line.split('\x1f');
        return { hash, subject, date };
      });
  }

  /** `git init` plus a default .gitignore. Safe to call on an existing repository. */
  async initRepository(): Promise<boolean> {
    try {
      if (!(await this.isRepository())) {
        await this.git(['init']);
      }
      const ignorePath = path.join(this.projectRoot, '.gitignore');
      if (!fs.existsSync(ignorePath)) {
        fs.writeFileSync(ignorePath, DEFAULT_GITIGNORE);
      }
      return true;
    } catch (err) {
      if (err instanceof CheckpointFailure) return false;
      throw err;
    }
  }
}
