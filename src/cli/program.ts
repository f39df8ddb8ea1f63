import { Command, CommanderError, InvalidArgumentError } from 'commander';
import * as path from 'node:path';
import * as readline from 'node:readline';
import { createApp } from '../app.js';
import type { Config } from '../config.js';
import { loadConfig, requireApiToken } from '../config.js';
import {
  DuplicateTaskError,
  InvalidInputError,
  PrecheckFailure,
  ProjectNotInitializedError,
  SchemaError,
  errorMessage,
} from '../errors.js';
import { RunLog } from '../events/runLog.js';
import type { ChatMessage, Executor } from '../executor/types.js';
import { initProject } from '../project/initProject.js';
import {
  classifyExhaustion,
  findDependencyCycles,
  findMissingDependencies,
  selectNext,
  summarize,
} from '../scheduler/scheduler.js';
import { createProjectServices, createSessionRunner } from '../session/createSession.js';
import type { SessionSummary } from '../session/sessionRunner.js';
import { validateNewTask } from '../tasks/schema.js';
import { FileTaskStore } from '../tasks/taskStore.js';
import type { TaskPriority } from '../tasks/types.js';

export interface CliIO {
  log: (line: string) => void;
  error: (line: string) => void;
  input?: NodeJS.ReadableStream;
}

export interface CliDeps {
  config?: Config;
  executor?: Executor;
  signal?: AbortSignal;
}

// A type alias, so it satisfies commander's OptionValues index signature
type GlobalOptions = {
  model?: string;
  url?: string;
  apiKey?: string;
  verbose?: boolean;
  quietEvents?: boolean;
  verboseEvents?: boolean;
};

interface InitOptions {
  spec?: string;
  name?: string;
  techStack?: string;
  git: boolean;
  analyze: boolean;
}

interface RunOptions {
  iterations?: number;
  continuous?: boolean;
  task?: string;
}

interface StatusOptions {
  json?: boolean;
}

interface AddTaskOptions {
  id: string;
  name: string;
  desc?: string;
  priority?: string;
  dependsOn: string[];
  verify: string[];
  criteria: string[];
}

interface ResetTaskOptions {
  id: string;
}

const EXIT_WORDS = new Set(['exit', 'quit', 'q']);

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

function isPriority(value: string): value is TaskPriority {
  return value === 'high' || value === 'medium' || value === 'low';
}

/** Applies the global flags on top of the environment configuration. */
export function applyGlobalOptions(base: Config, globals: GlobalOptions): Config {
  let verboseEvents = base.verboseEvents;
  if (globals.quietEvents) verboseEvents = false;
  if (globals.verboseEvents || globals.verbose) verboseEvents = true;
  return {
    ...base,
    model: globals.model ?? base.model,
    apiBaseUrl: globals.url ? globals.url.replace(/\/+$/, '') : base.apiBaseUrl,
    apiKey: globals.apiKey ?? base.apiKey,
    verboseEvents,
  };
}

function describeSummary(summary: SessionSummary): string[] {
  const lines = [
    `Session ${summary.session_id}: ${summary.iterations} iteration${summary.iterations === 1 ? '' : 's'}, stopped: ${summary.stop_reason}`,
    `  completed: ${summary.completed_tasks.join(', ') || '(none)'}`,
    `  unfinished: ${summary.unfinished_tasks.join(', ') || '(none)'}`,
  ];
  if (summary.blocked_tasks.length > 0) lines.push(`  blocked: ${summary.blocked_tasks.join(', ')}`);
  if (summary.last_outcome) lines.push(`  last outcome: ${summary.last_outcome}`);
  return lines;
}

export function buildProgram(io: CliIO, deps: CliDeps = {}): Command {
  const program = new Command();

  const configFor = (command: Command): Config =>
    applyGlobalOptions(deps.config ?? loadConfig(), command.optsWithGlobals<GlobalOptions>());

  program
    .name('stepwise')
    .description('Long-running task sessions: pick the next task, delegate it, verify it, checkpoint it')
    .version('0.1.0')
    .option('--model <name>', 'model name for the executor endpoint')
    .option('--url <baseUrl>', 'OpenAI-compatible API base URL')
    .option('--api-key <key>', 'API key for the executor endpoint')
    .option('-v, --verbose', 'print iteration output previews')
    .option('--quiet-events', 'do not print events to the console')
    .option('--verbose-events', 'print events to the console')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.log(str.trimEnd()),
      writeErr: (str) => io.error(str.trimEnd()),
    });

  // stepwise init
  program
    .command('init <dir>')
    .description('Create tasks.json, progress.md, init.sh and a git repository')
    .option('--spec <text>', 'requirements text; becomes the seed task description')
    .option('--name <name>', 'project name (defaults to the directory name)')
    .option('--tech-stack <text>', 'technology stack recorded in the task list')
    .option('--no-git', 'skip git initialization')
    .option('--no-analyze', 'skip the executor analysis of the requirements')
    .action(async (dir: string, options: InitOptions, command: Command) => {
      const spec = options.spec?.trim();
      if (!spec) {
        throw new InvalidInputError('--spec is required');
      }
      const config = configFor(command);
      const services = createProjectServices(dir, config, { executor: deps.executor, print: io.log });
      const result = await initProject({
        projectRoot: dir,
        spec,
        name: options.name,
        techStack: options.techStack,
        git: options.git,
        analyze: options.analyze,
        initScriptName: config.files.precheckScript,
      }, services);

      io.log(result.createdTaskList
        ? `Initialized ${result.projectName} in ${path.resolve(dir)}`
        : `Task list already exists in ${path.resolve(dir)}; left unchanged`);
      if (result.createdInitScript) io.log(`Created ${config.files.precheckScript}`);
      if (result.analysis === 'degraded') io.log('Executor unavailable; initial analysis skipped');
      if (result.commit) {
        io.log(result.commit.committed ? `Committed ${result.commit.commit ?? ''}` : `No commit: ${result.commit.reason}`);
      }
    });

  // stepwise run
  program
    .command('run <dir>')
    .description('Run session iterations')
    .option('-i, --iterations <n>', 'maximum number of iterations (implies --continuous)', positiveInt)
    .option('-c, --continuous', 'keep going until nothing is eligible')
    .option('-t, --task <id>', 'run this task only')
    .action(async (dir: string, options: RunOptions, command: Command) => {
      const config = configFor(command);
      const store = new FileTaskStore(path.resolve(dir), config.files.tasks);
      const list = await store.load();
      if (options.task && !list.tasks.some(t => t.id === options.task)) {
        throw new InvalidInputError(`Unknown task id '${options.task}'`);
      }

      const runner = createSessionRunner(dir, config, { executor: deps.executor, print: io.log });
      const summary = await runner.runSession({
        continuous: (options.continuous ?? false) || options.iterations !== undefined,
        maxIterations: options.iterations,
        pinnedTaskId: options.task,
        signal: deps.signal,
      });

      for (const line of describeSummary(summary)) io.log(line);
      const globals = command.optsWithGlobals<GlobalOptions>();
      if (globals.verbose && summary.last_record?.output_preview) {
        io.log(`  output: ${summary.last_record.output_preview}`);
      }

      const last = summary.last_record;
      if (summary.stop_reason === 'precheck_failed' && last) {
        throw new PrecheckFailure(last.precheck.exit_code, last.output_preview);
      }
    });

  // stepwise status
  program
    .command('status <dir>')
    .description('Show task statistics, the next task and recent iterations')
    .option('--json', 'print machine-readable JSON')
    .action(async (dir: string, options: StatusOptions, command: Command) => {
      const config = configFor(command);
      const root = path.resolve(dir);
      const list = await new FileTaskStore(root, config.files.tasks).load();
      const stats = summarize(list);
      const next = selectNext(list);
      const cycles = findDependencyCycles(list);
      const missing = findMissingDependencies(list);
      const recent = new RunLog(path.join(root, config.files.runLog)).readAll().slice(-5);

      if (options.json) {
        io.log(JSON.stringify({
          project_name: list.project_name,
          stats,
          next_task: next ? { id: next.id, name: next.name, priority: next.priority, status: next.status } : null,
          exhaustion: next ? null : classifyExhaustion(list),
          cycles,
          missing_dependencies: missing,
          tasks: list.tasks.map(t => ({ id: t.id, name: t.name, priority: t.priority, status: t.status })),
          recent_runs: recent,
        }, null, 2));
        return;
      }

      io.log(`Project: ${list.project_name || '(unnamed)'}`);
      io.log(`Tasks: ${stats.completed}/${stats.total} completed (${stats.completion_rate}%), ${stats.in_progress} in progress, ${stats.pending} pending, ${stats.blocked} blocked`);
      io.log(next ? `Next: [${next.priority}] ${next.id} ${next.name}` : `Next: none (${classifyExhaustion(list)})`);
      for (const cycle of cycles) io.log(`Dependency cycle: ${[...cycle, cycle[0]].join(' -> ')}`);
      for (const m of missing) io.log(`Missing dependency: ${m.task_id} -> ${m.missing.join(', ')}`);
      for (const task of list.tasks) {
        io.log(`  ${task.status.padEnd(11)} [${task.priority}] ${task.id} ${task.name}`);
      }
      if (recent.length > 0) {
        io.log('Recent iterations:');
        for (const r of recent) {
          io.log(`  ${r.timestamp} #${r.iteration} ${r.task_id ?? '-'} ${r.outcome}`);
        }
      }
    });

  // stepwise add-task
  program
    .command('add-task <dir>')
    .description('Append a pending task to the task list')
    .requiredOption('--id <id>', 'unique task id')
    .requiredOption('--name <name>', 'short task name')
    .option('--desc <text>', 'description')
    .option('--priority <level>', 'high, medium or low')
    .option('--depends-on <id>', 'dependency task id (repeatable)', collect, [])
    .option('--verify <cmd>', 'verification command (repeatable, run in order)', collect, [])
    .option('--criteria <text>', 'acceptance criterion (repeatable)', collect, [])
    .action(async (dir: string, options: AddTaskOptions, command: Command) => {
      if (options.priority !== undefined && !isPriority(options.priority)) {
        throw new InvalidInputError(`Invalid priority '${options.priority}'; use high, medium or low`);
      }
      const validation = validateNewTask({
        id: options.id,
        name: options.name,
        description: options.desc,
        priority: options.priority,
        dependencies: options.dependsOn,
        verify_commands: options.verify,
        acceptance_criteria: options.criteria,
      });
      if (!validation.valid || !validation.input) {
        throw new InvalidInputError('Invalid task', validation.errors);
      }

      const config = configFor(command);
      const store = new FileTaskStore(path.resolve(dir), config.files.tasks);
      const task = await store.appendTask(validation.input);
      io.log(`Added ${task.id}: ${task.name} [${task.priority}]`);

      const list = await store.load();
      const unknown = task.dependencies.filter(d => !list.tasks.some(t => t.id === d));
      if (unknown.length > 0) {
        io.error(`Warning: ${task.id} depends on unknown task(s): ${unknown.join(', ')}`);
      }
    });

  // stepwise reset-task
  program
    .command('reset-task <dir>')
    .description('Put a task back to pending so the next run picks it up again')
    .requiredOption('--id <id>', 'task id')
    .action(async (dir: string, options: ResetTaskOptions, command: Command) => {
      const config = configFor(command);
      const store = new FileTaskStore(path.resolve(dir), config.files.tasks);
      const task = await store.resetTask(options.id, 'Status reset to pending');
      if (!task) {
        throw new InvalidInputError(`Unknown task id '${options.id}'`);
      }
      io.log(`Reset ${task.id}: ${task.name} -> pending`);
    });

  // stepwise chat
  program
    .command('chat <dir>')
    .description('Talk to the executor about the project; exit, quit or q leaves')
    .action(async (dir: string, _options: Record<string, never>, command: Command) => {
      const config = configFor(command);
      const services = createProjectServices(dir, config, { executor: deps.executor, print: io.log });
      const list = await services.store.load();
      const stats = summarize(list);
      const system = `You are helping with the project "${list.project_name}" at ${path.resolve(dir)}. `
        + `${stats.completed} of ${stats.total} tasks are completed. Answer concisely.`;

      const history: ChatMessage[] = [];
      const rl = readline.createInterface({ input: io.input ?? process.stdin, terminal: false });
      io.log('Chat started; type exit, quit or q to leave.');
      try {
        for await (const raw of rl) {
          const message = raw.trim();
          if (!message) continue;
          if (EXIT_WORDS.has(message.toLowerCase())) break;
          try {
            const reply = await services.executor.converse(message, history, system);
            history.push({ role: 'user', content: message }, { role: 'assistant', content: reply });
            io.log(`assistant> ${reply}`);
          } catch (err) {
            io.error(`Error: ${errorMessage(err)}`);
          }
        }
      } finally {
        rl.close();
      }
    });

  // stepwise serve
  program
    .command('serve <dir>')
    .description('Serve the status API for a project')
    .action(async (dir: string, _options: Record<string, never>, command: Command) => {
      const config = configFor(command);
      requireApiToken(config);
      const app = createApp(config, dir, { executor: deps.executor, print: io.log });
      await new Promise<void>((resolve) => {
        app.listen(config.port, config.bind, () => {
          io.log(`stepwise listening on ${config.bind}:${config.port}`);
          resolve();
        });
      });
    });

  return program;
}

function reportError(io: CliIO, err: unknown): void {
  if (err instanceof SchemaError || err instanceof InvalidInputError) {
    io.error(`Error: ${err.message}`);
    for (const issue of err.issues) io.error(`  - ${issue}`);
    return;
  }
  if (err instanceof PrecheckFailure) {
    io.error(`Error: ${err.message}`);
    if (err.output) io.error(err.output);
    return;
  }
  if (err instanceof ProjectNotInitializedError || err instanceof DuplicateTaskError) {
    io.error(`Error: ${err.message}`);
    return;
  }
  io.error(`Error: ${errorMessage(err)}`);
}

/** Parses `argv` (without the node and script entries) and returns the exit code. */
export async function runCli(argv: string[], io: CliIO, deps: CliDeps = {}): Promise<number> {
  const program = buildProgram(io, deps);
  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    reportError(io, err);
    return 1;
  }
}
