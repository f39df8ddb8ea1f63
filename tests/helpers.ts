import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Config } from '../src/config.js';
import { PROJECT_FILES } from '../src/config.js';
import type { EngineEvent, EventInput, EventSink } from '../src/events/types.js';
import type { ChatMessage, ExecutionRequest, ExecutionResult, Executor, ToolChannel } from '../src/executor/types.js';
import type { Task, TaskList } from '../src/tasks/types.js';

export function makeConfig(overrides: Partial<Config> = {}): Config {
  return {
    apiBaseUrl: 'http://executor.test/v1',
    apiKey: '',
    model: 'test-model',
    temperature: 0,
    maxTokens: 512,
    maxTurns: 5,
    commandTimeoutMs: 10_000,
    precheckTimeoutMs: 10_000,
    verifyTimeoutMs: 10_000,
    maxIterations: 10,
    iterationDelayMs: 0,
    verboseEvents: false,
    previewLength: 300,
    allowedCommands: [],
    protectedGlobs: ['tasks.json', 'events.jsonl', 'run_log.jsonl', '.git/**'],
    denyGlobs: ['**/.env', '**/.ssh/**'],
    port: 8787,
    bind: '127.0.0.1',
    apiToken: 'test-secret',
    files: { ...PROJECT_FILES },
    ...overrides,
  };
}

export function makeTempDir(prefix = 'stepwise-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function makeTask(overrides: Partial<Task> & Pick<Task, 'id'>): Task {
  return {
    name: overrides.id,
    description: '',
    priority: 'medium',
    status: 'pending',
    dependencies: [],
    verify_commands: [],
    acceptance_criteria: [],
    notes: '',
    created_at: '2026-01-01T00:00:00.000Z',
    updated_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeList(tasks: Task[], projectName = 'demo'): TaskList {
  return {
    project_name: projectName,
    tech_stack: '',
    init_command: './init.sh',
    created_at: '2026-01-01T00:00:00.000Z',
    updated_at: '2026-01-01T00:00:00.000Z',
    tasks,
  };
}

export function writeTaskList(root: string, list: TaskList): void {
  fs.writeFileSync(path.join(root, 'tasks.json'), JSON.stringify(list, null, 2));
}

export function readTaskList(root: string): TaskList {
  return JSON.parse(fs.readFileSync(path.join(root, 'tasks.json'), 'utf-8')) as TaskList;
}

/** In-memory event sink. */
export class MemoryEvents implements EventSink {
  readonly events: EngineEvent[] = [];

  record(context: { sessionId: string; iteration: number; phase: string }, input: EventInput): EngineEvent {
    const event: EngineEvent = {
      timestamp: new Date().toISOString(),
      session_id: context.sessionId,
      iteration: context.iteration,
      phase: context.phase,
      event_type: input.event_type,
      component: input.component,
      name: input.name,
      payload: input.payload ?? {},
      ok: input.ok ?? true,
    };
    this.events.push(event);
    return event;
  }

  ofType(type: EngineEvent['event_type']): EngineEvent[] {
    return this.events.filter(e => e.event_type === type);
  }
}

export type ExecutorStep = (request: ExecutionRequest, tools: ToolChannel) => Promise<string>;

/** Executor that runs the given steps in order, one per executeTask call. */
export class ScriptedExecutor implements Executor {
  readonly requests: ExecutionRequest[] = [];
  readonly conversations: Array<{ message: string; history: ChatMessage[] }> = [];
  reply = 'noted';

  constructor(private readonly steps: ExecutorStep[] = []) {}

  async executeTask(request: ExecutionRequest, tools: ToolChannel): Promise<ExecutionResult> {
    this.requests.push(request);
    const step = this.steps.shift();
    const output = step ? await step(request, tools) : 'done';
    return { output, turns: 1 };
  }

  async converse(message: string, history: ChatMessage[]): Promise<string> {
    this.conversations.push({ message, history: [...history] });
    return this.reply;
  }
}
