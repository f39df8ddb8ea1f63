import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';

export const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;

export interface SpawnOptions {
  timeoutMs: number;
  killGraceMs?: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Per stream; the oldest bytes are dropped beyond this. */
  maxOutputBytes?: number;
}

export interface SpawnResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
  /** True when either stream lost bytes to the output cap. */
  outputTruncated: boolean;
  durationMs: number;
}

/** Keeps the most recent `limit` bytes of a stream. */
class TailBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  dropped = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.size += chunk.length;
    while (this.size > this.limit && this.chunks.length > 0) {
      const head = this.chunks[0];
      const excess = this.size - this.limit;
      this.dropped = true;
      if (head.length <= excess) {
        this.chunks.shift();
        this.size -= head.length;
      } else {
        this.chunks[0] = head.subarray(excess);
        this.size -= excess;
      }
    }
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf-8');
  }
}

export function spawnWithTimeout(
  command: string,
  args: string[],
  options: SpawnOptions,
): Promise<SpawnResult> {
  return new Promise((resolve) => {
    const killGraceMs = options.killGraceMs ?? 5000;
    const limit = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    const startedAt = Date.now();
    const stdout = new TailBuffer(limit);
    const stderr = new TailBuffer(limit);
    let timedOut = false;
    let settled = false;

    const child: ChildProcess = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    const timeoutHandle = setTimeout(() => {
      if (settled) return;
      timedOut = true;
      killProcessGroup(child, killGraceMs);
    }, options.timeoutMs);

    const finish = (exitCode: number | null, stderrText: string): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutHandle);
      resolve({
        stdout: stdout.text(),
        stderr: stderrText,
        exitCode,
        timedOut,
        outputTruncated: stdout.dropped || stderr.dropped,
        durationMs: Date.now() - startedAt,
      });
    };

    child.on('close', (code) => finish(code, stderr.text()));
    // Spawn failures (missing binary, bad cwd) surface here
    child.on('error', (err) => finish(null, err.message));
  });
}

/** Runs a full command line through bash so pipes, `&&` and quoting behave as typed. */
export function runShell(command: string, options: SpawnOptions): Promise<SpawnResult> {
  return spawnWithTimeout('bash', ['-c', command], options);
}

function killProcessGroup(child: ChildProcess, graceMs: number): void {
  const pid = child.pid;
  if (!pid) return;

  const signal = (name: NodeJS.Signals): void => {
    try {
      process.kill(-pid, name);
    } catch {
      try {
        child.kill(name);
      } catch {
        // Already gone
      }
    }
  };

  signal('SIGTERM');
  const graceTimeout = setTimeout(() => signal('SIGKILL'), graceMs);
  child.on('close', () => clearTimeout(graceTimeout));
}
