import type { CheckpointEntry } from '../checkpoint/checkpointAdapter.js';
import type { Task, TaskStats } from '../tasks/types.js';
import { tail } from '../utils/text.js';
import { effectiveVerifyCommands } from '../verification/verificationGate.js';

const SYSTEM_TEMPLATE = `You are a coding assistant working inside the project at {{projectRoot}}.

You work on exactly one task per session. Use the tools to inspect and change the project.

RULES:
- Only touch files inside the project directory
- Do not edit tasks.json, run_log.jsonl, events.jsonl or anything under .git; the harness owns them
- Destructive or privileged shell commands are refused by policy; a refused command exits 126
- The task is accepted only if every verification command exits 0, so run them yourself before finishing
- Finish with a short summary of what you changed and what is left`;

const TASK_TEMPLATE = `# Project: {{projectName}}

## Statistics
{{stats}}

## Precheck
{{precheck}}

## init.sh
{{initScript}}

## Recent checkpoints
{{checkpoints}}

## Progress so far
{{progress}}

## Remaining queue
{{queue}}

## Current task
{{task}}`;

export interface PrecheckView {
  ok: boolean;
  skipped: boolean;
  exitCode: number | null;
  output: string;
}

export interface ExecutionContextParams {
  projectRoot: string;
  projectName: string;
  stats: TaskStats;
  progress: string;
  checkpoints: CheckpointEntry[];
  precheck: PrecheckView;
  initScript: string | null;
  queue: Task[];
  task: Task;
}

export interface ExecutionPrompt {
  systemPrompt: string;
  prompt: string;
}

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match: string, key: string) => values[key] ?? match);
}

function list(items: string[], empty: string): string {
  return items.length > 0 ? items.map(i => `- ${i}`).join('\n') : empty;
}

export function formatTask(task: Task): string {
  const lines = [
    `- **ID**: ${task.id}`,
    `- **Name**: ${task.name}`,
    `- **Priority**: ${task.priority}`,
    `- **Status**: ${task.status}`,
  ];
  if (task.dependencies.length > 0) lines.push(`- **Depends on**: ${task.dependencies.join(', ')}`);
  lines.push('', '### Description', task.description || '(none)');
  lines.push('', '### Acceptance criteria', list(task.acceptance_criteria, '(none given)'));
  const verify = effectiveVerifyCommands(task);
  lines.push('', '### Verification commands (all must exit 0)', list(verify.map(c => `\`${c}\``), '(none; the task is accepted as-is)'));
  if (task.notes) lines.push('', '### Notes from earlier attempts', task.notes);
  return lines.join('\n');
}

function formatPrecheck(precheck: PrecheckView): string {
  if (precheck.skipped) return 'No init.sh; precheck skipped.';
  const status = precheck.ok ? 'passed' : `failed (exit ${precheck.exitCode ?? 'none'})`;
  const output = tail(precheck.output, 40);
  return output ? `Precheck ${status}. Output:\n\`\`\`\n${output}\n\`\`\`` : `Precheck ${status}.`;
}

function formatStats(stats: TaskStats): string {
  return [
    `- Total: ${stats.total}`,
    `- Completed: ${stats.completed} (${stats.completion_rate}%)`,
    `- In progress: ${stats.in_progress}`,
    `- Pending: ${stats.pending}`,
    `- Blocked: ${stats.blocked}`,
  ].join('\n');
}

/** Assembles what the executor sees for one iteration. */
export function buildExecutionPrompt(params: ExecutionContextParams): ExecutionPrompt {
  const systemPrompt = fill(SYSTEM_TEMPLATE, { projectRoot: params.projectRoot });
  const prompt = fill(TASK_TEMPLATE, {
    projectName: params.projectName,
    stats: formatStats(params.stats),
    precheck: formatPrecheck(params.precheck),
    initScript: params.initScript ? `\`\`\`bash\n${params.initScript.trimEnd()}\n\`\`\`` : '(none)',
    checkpoints: list(params.checkpoints.map(c => `${c.hash} ${c.subject} (${c.date})`), '(no commits yet)'),
    progress: params.progress.trim() || '(empty)',
    queue: list(
      params.queue.filter(t => t.id !== params.task.id).map(t => `[${t.priority}] ${t.id}: ${t.name} (${t.status})`),
      '(nothing else queued)',
    ),
    task: formatTask(params.task),
  });
  return { systemPrompt, prompt };
}
