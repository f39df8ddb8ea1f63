import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { CheckpointAdapter } from '../checkpoint/checkpointAdapter.js';
import { errorMessage, isNodeError } from '../errors.js';
import type { RunLog, IterationOutcome, IterationRecord, PrecheckSummary, VerificationSummary, CheckpointSummary } from '../events/runLog.js';
import type { EventSink } from '../events/types.js';
import type { Executor, ToolChannel } from '../executor/types.js';
import {
  classifyExhaustion,
  findDependencyCycles,
  findMissingDependencies,
  orderedCandidates,
  selectNext,
  selectPinned,
  summarize,
} from '../scheduler/scheduler.js';
import type { ExhaustionReason } from '../scheduler/scheduler.js';
import type { GuardedShell } from '../security/guardedShell.js';
import { commandSucceeded } from '../security/guardedShell.js';
import type { ProgressLog } from '../tasks/progressLog.js';
import type { TaskStore } from '../tasks/taskStore.js';
import type { Task, TaskList, TaskStatus } from '../tasks/types.js';
import { tail, truncate } from '../utils/text.js';
import { effectiveVerifyCommands } from '../verification/verificationGate.js';
import type { VerificationGate, VerificationResult } from '../verification/verificationGate.js';
import { atIteration, createSessionContext } from './context.js';
import type { SessionContext } from './context.js';
import { buildExecutionPrompt } from './executionContext.js';
import type { PrecheckView } from './executionContext.js';

export type SessionPhase =
  | 'idle'
  | 'precheck'
  | 'selecting'
  | 'executing'
  | 'verifying'
  | 'persisting'
  | 'checkpointing'
  | 'logging'
  | 'done'
  | 'blocked';

export type StopReason = 'done' | 'precheck_failed' | 'iteration_limit' | 'pinned_task_ran' | 'aborted';

export interface SessionCollaborators {
  store: TaskStore;
  progress: ProgressLog;
  runLog: RunLog;
  events: EventSink;
  shell: GuardedShell;
  verifier: VerificationGate;
  checkpoints: CheckpointAdapter;
  executor: Executor;
  tools: (context: SessionContext) => ToolChannel;
}

export interface SessionSettings {
  projectRoot: string;
  precheckScript: string;
  precheckTimeoutMs: number;
  maxTurns: number;
  maxIterations: number;
  iterationDelayMs: number;
  previewLength: number;
}

export interface IterationOptions {
  pinnedTaskId?: string;
}

export interface IterationReport {
  record: IterationRecord;
  terminal: 'idle' | 'done' | 'blocked';
  exhaustion: ExhaustionReason | null;
}

export interface SessionOptions {
  continuous?: boolean;
  maxIterations?: number;
  pinnedTaskId?: string;
  signal?: AbortSignal;
  sessionId?: string;
}

export interface SessionSummary {
  session_id: string;
  iterations: number;
  completed_tasks: string[];
  unfinished_tasks: string[];
  blocked_tasks: string[];
  stop_reason: StopReason;
  last_outcome: IterationOutcome | null;
  last_record: IterationRecord | null;
}

interface PrecheckRun {
  summary: PrecheckSummary;
  view: PrecheckView;
}

const RECENT_CHECKPOINTS = 5;

function pause(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const finish = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', finish);
      resolve();
    };
    const timer = setTimeout(finish, ms);
    signal?.addEventListener('abort', finish, { once: true });
  });
}

function replaceTask(list: TaskList, task: Task): TaskList {
  return { ...list, tasks: list.tasks.map(t => (t.id === task.id ? task : t)) };
}

function summarizeVerification(result: VerificationResult): VerificationSummary {
  return {
    ok: result.ok,
    first_failure_index: result.first_failure_index,
    commands: result.results.map(r => ({ command: r.command, exit_code: r.exit_code, denied: r.denied })),
  };
}

export function checkpointMessage(task: Task, outcome: IterationOutcome): string {
  switch (outcome) {
    case 'completed':
      return `feat: complete ${task.name} (${task.id})`;
    case 'task_blocked':
      return `wip: ${task.name} blocked (${task.id})`;
    default:
      return `wip: ${task.name} verification failed (${task.id})`;
  }
}

/**
 * Drives iterations: precheck, select, execute, verify, persist, checkpoint,
 * log. State lives in the collaborators; the runner keeps none between
 * iterations.
 */
export class SessionRunner {
  constructor(
    private readonly deps: SessionCollaborators,
    readonly settings: SessionSettings,
  ) {}

  private transition(context: SessionContext, to: SessionPhase): SessionContext {
    const next: SessionContext = { ...context, phase: to };
    this.deps.events.record(next, {
      event_type: 'phase_transition',
      component: 'session',
      name: 'phase',
      payload: { from: context.phase, to },
    });
    return next;
  }

  /** A pinned run is an explicit retry: a blocked task goes back to pending first. */
  private async reopenBlocked(context: SessionContext, taskId: string): Promise<void> {
    const list = await this.deps.store.load();
    const task = list.tasks.find(t => t.id === taskId);
    if (task?.status !== 'blocked') return;
    await this.deps.store.resetTask(taskId, 'Reset from blocked for a pinned run');
    this.deps.events.record(context, {
      event_type: 'task_reset',
      component: 'session',
      name: 'task',
      payload: { message: `task ${taskId} reset from blocked to pending`, task_id: taskId },
    });
  }

  async runSession(options: SessionOptions = {}): Promise<SessionSummary> {
    const continuous = options.continuous ?? false;
    const limit = continuous ? options.maxIterations ?? this.settings.maxIterations : 1;
    const base = createSessionContext(this.settings.projectRoot, 'idle', options.sessionId);

    this.deps.events.record(base, {
      event_type: 'session_start',
      component: 'session',
      name: 'session',
      payload: {
        message: `session started (${continuous ? 'continuous' : 'single'}, up to ${limit} iteration${limit === 1 ? '' : 's'})`,
        pinned_task: options.pinnedTaskId ?? null,
      },
    });

    const completed: string[] = [];
    let iterations = 0;
    let last: IterationRecord | null = null;
    let stopReason: StopReason = 'iteration_limit';
    let failure: unknown = null;

    try {
      if (options.pinnedTaskId) {
        await this.reopenBlocked(base, options.pinnedTaskId);
      }
      for (let i = 1; i <= limit; i++) {
        if (options.signal?.aborted) {
          stopReason = 'aborted';
          break;
        }
        const report = await this.runIteration(atIteration(base, i), { pinnedTaskId: options.pinnedTaskId });
        iterations++;
        last = report.record;
        if (report.record.outcome === 'completed' && report.record.task_id) completed.push(report.record.task_id);

        if (report.terminal === 'done') {
          stopReason = 'done';
          break;
        }
        if (report.terminal === 'blocked') {
          stopReason = 'precheck_failed';
          break;
        }
        if (options.pinnedTaskId) {
          stopReason = 'pinned_task_ran';
          break;
        }
        if (i < limit) {
          await pause(this.settings.iterationDelayMs, options.signal);
        }
      }
    } catch (err) {
      failure = err;
      throw err;
    } finally {
      this.deps.events.record(atIteration(base, iterations), {
        event_type: 'session_end',
        component: 'session',
        name: 'session',
        payload: {
          message: failure === null
            ? `session finished after ${iterations} iteration${iterations === 1 ? '' : 's'}: ${stopReason}`
            : `session failed: ${errorMessage(failure)}`,
          completed_tasks: completed,
        },
        ok: failure === null,
      });
    }

    const list = await this.deps.store.load();
    return {
      session_id: base.sessionId,
      iterations,
      completed_tasks: completed,
      unfinished_tasks: list.tasks.filter(t => t.status === 'pending' || t.status === 'in_progress').map(t => t.id),
      blocked_tasks: list.tasks.filter(t => t.status === 'blocked').map(t => t.id),
      stop_reason: stopReason,
      last_outcome: last?.outcome ?? null,
      last_record: last,
    };
  }

  async runIteration(start: SessionContext, options: IterationOptions = {}): Promise<IterationReport> {
    let context = this.transition({ ...start, phase: 'idle' }, 'precheck');
    const precheck = await this.precheck(context);

    if (!precheck.summary.ok) {
      context = this.transition(context, 'logging');
      const record = this.buildRecord(context, {
        task: null,
        outcome: 'precheck_failed',
        precheck: precheck.summary,
        output: precheck.view.output,
      });
      this.finishRecord(context, record);
      this.transition(context, 'blocked');
      return { record, terminal: 'blocked', exhaustion: null };
    }

    context = this.transition(context, 'selecting');
    let list = await this.deps.store.load();
    const selected = options.pinnedTaskId ? selectPinned(list, options.pinnedTaskId) : selectNext(list);

    if (!selected) {
      return this.reportExhaustion(context, list, precheck.summary, options.pinnedTaskId);
    }

    context = this.transition(context, 'executing');
    const startedAt = new Date().toISOString();
    let task: Task = selected.status === 'pending'
      ? { ...selected, status: 'in_progress', updated_at: startedAt }
      : selected;
    list = replaceTask(list, task);

    let output = '';
    let executorError: string | null = null;
    try {
      const prompt = buildExecutionPrompt({
        projectRoot: this.settings.projectRoot,
        projectName: list.project_name,
        stats: summarize(list),
        progress: await this.deps.progress.load(),
        checkpoints: await this.deps.checkpoints.recentCheckpoints(RECENT_CHECKPOINTS),
        precheck: precheck.view,
        initScript: await this.readInitScript(),
        queue: orderedCandidates(list),
        task,
      });
      const result = await this.deps.executor.executeTask(
        { context, systemPrompt: prompt.systemPrompt, prompt: prompt.prompt, maxTurns: this.settings.maxTurns },
        this.deps.tools(context),
      );
      output = result.output;
    } catch (err) {
      executorError = errorMessage(err);
      this.deps.events.record(context, {
        event_type: 'error',
        component: 'executor',
        name: 'execute',
        payload: { message: `executor failed on ${task.id}: ${executorError}` },
        ok: false,
      });
    }

    let verification: VerificationResult | null = null;
    let outcome: IterationOutcome;
    let status: TaskStatus;
    let notes: string;

    if (executorError !== null) {
      outcome = 'task_blocked';
      status = 'blocked';
      notes = `Blocked: executor error: ${executorError}`;
    } else {
      context = this.transition(context, 'verifying');
      const commands = effectiveVerifyCommands(task);
      verification = await this.deps.verifier.run(commands, context);
      if (verification.ok) {
        outcome = 'completed';
        status = 'completed';
        notes = commands.length > 0
          ? `Completed: ${commands.length} verification command${commands.length === 1 ? '' : 's'} passed`
          : 'Completed: no verification commands';
      } else {
        const failed = verification.results[verification.results.length - 1];
        outcome = 'in_progress';
        status = 'in_progress';
        notes = failed.denied
          ? `Verification denied by policy: ${failed.command}`
          : failed.timed_out
            ? `Verification timed out: ${failed.command}`
            : `Verification failed: ${failed.command} (exit ${failed.exit_code ?? 'none'})`;
      }
    }

    context = this.transition(context, 'persisting');
    const finishedAt = new Date().toISOString();
    task = { ...task, status, notes, updated_at: finishedAt };
    list = { ...replaceTask(list, task), updated_at: finishedAt };
    await this.deps.progress.append(this.progressSection(context, task, outcome, output, verification, finishedAt));
    await this.deps.store.save(list);

    context = this.transition(context, 'checkpointing');
    const checkpoint = await this.deps.checkpoints.checkpoint(checkpointMessage(task, outcome), context);
    const checkpointSummary: CheckpointSummary = {
      committed: checkpoint.committed,
      reason: checkpoint.reason,
      commit: checkpoint.commit,
    };

    context = this.transition(context, 'logging');
    const record = this.buildRecord(context, {
      task,
      outcome,
      precheck: precheck.summary,
      verification: verification ? summarizeVerification(verification) : null,
      checkpoint: checkpointSummary,
      output: executorError ?? output,
    });
    this.finishRecord(context, record);
    this.transition(context, 'idle');
    return { record, terminal: 'idle', exhaustion: null };
  }

  private reportExhaustion(
    context: SessionContext,
    list: TaskList,
    precheck: PrecheckSummary,
    pinnedTaskId: string | undefined,
  ): IterationReport {
    const reason = classifyExhaustion(list);
    const cycles = findDependencyCycles(list);
    const missing = findMissingDependencies(list);

    if (cycles.length > 0 || missing.length > 0) {
      this.deps.events.record(context, {
        event_type: 'error',
        component: 'session',
        name: 'dependencies',
        payload: {
          message: [
            ...cycles.map(c => `dependency cycle: ${[...c, c[0]].join(' -> ')}`),
            ...missing.map(m => `${m.task_id} depends on unknown ${m.missing.join(', ')}`),
          ].join('; '),
          cycles,
          missing,
        },
        ok: false,
      });
    }

    const logging = this.transition(context, 'logging');
    const outcome: IterationOutcome = pinnedTaskId ? 'pinned_unavailable' : 'nothing_eligible';
    const message = pinnedTaskId
      ? `task ${pinnedTaskId} is not runnable`
      : `no eligible task: ${reason}`;
    const record = this.buildRecord(logging, { task: null, outcome, precheck, output: message });
    this.finishRecord(logging, record);
    this.transition(logging, 'done');
    return { record, terminal: 'done', exhaustion: reason };
  }

  private async readInitScript(): Promise<string | null> {
    try {
      return await fs.readFile(path.join(this.settings.projectRoot, this.settings.precheckScript), 'utf-8');
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return null;
      throw err;
    }
  }

  private async precheck(context: SessionContext): Promise<PrecheckRun> {
    const script = await this.readInitScript();
    if (script === null) {
      const summary: PrecheckSummary = { ok: true, skipped: true, exit_code: null, summary: 'no init script; skipped' };
      this.deps.events.record(context, {
        event_type: 'precheck',
        component: 'session',
        name: 'precheck',
        payload: { summary: summary.summary, skipped: true },
      });
      return { summary, view: { ok: true, skipped: true, exitCode: null, output: '' } };
    }

    const result = await this.deps.shell.run(`bash ./${this.settings.precheckScript}`, context, {
      timeoutMs: this.settings.precheckTimeoutMs,
      name: 'precheck',
    });
    const ok = commandSucceeded(result);
    const output = [result.stdout, result.stderr].filter(s => s.trim() !== '').join('\n');
    const summary: PrecheckSummary = {
      ok,
      skipped: false,
      exit_code: result.exit_code,
      summary: ok
        ? 'precheck passed'
        : result.timed_out
          ? 'precheck timed out'
          : `precheck failed with exit code ${result.exit_code ?? 'none'}`,
    };
    this.deps.events.record(context, {
      event_type: 'precheck',
      component: 'session',
      name: 'precheck',
      payload: { summary: summary.summary, exit_code: result.exit_code, output_preview: tail(output, 20) },
      ok,
    });
    return { summary, view: { ok, skipped: false, exitCode: result.exit_code, output } };
  }

  private progressSection(
    context: SessionContext,
    task: Task,
    outcome: IterationOutcome,
    output: string,
    verification: VerificationResult | null,
    timestamp: string,
  ): string {
    const label = outcome === 'completed' ? 'completed' : outcome === 'task_blocked' ? 'blocked' : 'verification failed';
    const lines = [
      `### ${timestamp} - ${task.id}: ${task.name}`,
      `- Session: ${context.sessionId} (iteration ${context.iteration})`,
      `- Outcome: ${label}`,
      `- Notes: ${task.notes}`,
    ];
    const preview = truncate(output.trim(), this.settings.previewLength);
    if (preview) lines.push(`- Output: ${preview.replace(/\n+/g, ' ')}`);
    if (verification && verification.results.length > 0) {
      lines.push('- Verification:');
      for (const r of verification.results) {
        const mark = commandSucceeded(r) ? 'pass' : r.denied ? 'denied' : 'fail';
        lines.push(`  - [${mark}] \`${r.command}\` (exit ${r.exit_code ?? 'none'})`);
      }
    }
    return lines.join('\n');
  }

  private buildRecord(
    context: SessionContext,
    parts: {
      task: Task | null;
      outcome: IterationOutcome;
      precheck: PrecheckSummary;
      verification?: VerificationSummary | null;
      checkpoint?: CheckpointSummary | null;
      output: string;
    },
  ): IterationRecord {
    return {
      timestamp: new Date().toISOString(),
      session_id: context.sessionId,
      iteration: context.iteration,
      task_id: parts.task?.id ?? null,
      outcome: parts.outcome,
      status: parts.task?.status ?? null,
      precheck: parts.precheck,
      verification: parts.verification ?? null,
      checkpoint: parts.checkpoint ?? null,
      output_preview: truncate(parts.output.trim(), this.settings.previewLength),
    };
  }

  private finishRecord(context: SessionContext, record: IterationRecord): void {
    this.deps.runLog.append(record);
    this.deps.events.record(context, {
      event_type: 'iteration',
      component: 'session',
      name: 'iteration',
      payload: {
        message: record.task_id
          ? `iteration ${record.iteration}: ${record.task_id} -> ${record.outcome}`
          : `iteration ${record.iteration}: ${record.outcome}`,
        outcome: record.outcome,
        task_id: record.task_id,
      },
      ok: record.outcome !== 'precheck_failed' && record.outcome !== 'task_blocked',
    });
  }
}
