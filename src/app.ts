import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import * as path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import type { Config } from './config.js';
import { requireApiToken } from './config.js';
import { DuplicateTaskError, ProjectNotInitializedError, SchemaError, errorMessage } from './errors.js';
import type { Executor } from './executor/types.js';
import { createAuthMiddleware } from './middleware/auth.js';
import { classifyExhaustion, findDependencyCycles, findMissingDependencies, selectNext, summarize } from './scheduler/scheduler.js';
import { createSessionRunner } from './session/createSession.js';
import { RunGate } from './session/runGate.js';
import type { SessionSummary } from './session/sessionRunner.js';
import { validateNewTask } from './tasks/schema.js';
import { FileTaskStore } from './tasks/taskStore.js';

export type RunState =
  | { status: 'running'; started_at: string }
  | { status: 'finished'; started_at: string; finished_at: string; summary: SessionSummary }
  | { status: 'failed'; started_at: string; finished_at: string; error: string };

export interface AppOptions {
  executor?: Executor;
  print?: (line: string) => void;
  /** Finished runs kept for `GET /v1/runs/:id`; the oldest go first. */
  maxRunHistory?: number;
}

const DEFAULT_RUN_HISTORY = 100;

function rememberRun(runs: Map<string, RunState>, sessionId: string, state: RunState, limit: number): void {
  runs.set(sessionId, state);
  for (const [id, run] of runs) {
    if (runs.size <= limit) break;
    if (run.status !== 'running') runs.delete(id);
  }
}

function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

/** HTTP surface over one project: status, the task list and background runs. */
export function createApp(config: Config, projectRoot: string, options: AppOptions = {}) {
  const app = express();
  const root = path.resolve(projectRoot);
  const store = new FileTaskStore(root, config.files.tasks);
  const gate = new RunGate();
  const runs = new Map<string, RunState>();
  const runHistory = options.maxRunHistory ?? DEFAULT_RUN_HISTORY;

  app.use(express.json());
  app.use(createAuthMiddleware(requireApiToken(config), {
    onRejected: (reason, req) => options.print?.(`Rejected ${req.method} ${req.path}: ${reason}`),
  }));

  // --- GET /v1/health ---
  app.get('/v1/health', (_req, res) => {
    res.json({
      status: 'ok',
      active_session: gate.activeSessionId(),
    });
  });

  // --- GET /v1/status ---
  app.get('/v1/status', asyncRoute(async (_req, res) => {
    const list = await store.load();
    const next = selectNext(list);
    res.json({
      project_name: list.project_name,
      stats: summarize(list),
      next_task: next ? { id: next.id, name: next.name, priority: next.priority, status: next.status } : null,
      exhaustion: next ? null : classifyExhaustion(list),
      cycles: findDependencyCycles(list),
      missing_dependencies: findMissingDependencies(list),
      active_session: gate.activeSessionId(),
    });
  }));

  // --- GET /v1/tasks ---
  app.get('/v1/tasks', asyncRoute(async (_req, res) => {
    res.json(await store.load());
  }));

  // --- POST /v1/tasks ---
  app.post('/v1/tasks', asyncRoute(async (req, res) => {
    const validation = validateNewTask(req.body);
    if (!validation.valid || !validation.input) {
      res.status(400).json({ error: 'Invalid task input', errors: validation.errors });
      return;
    }
    try {
      const task = await store.appendTask(validation.input);
      res.status(201).json(task);
    } catch (err) {
      if (err instanceof DuplicateTaskError) {
        res.status(409).json({ error: err.message });
        return;
      }
      throw err;
    }
  }));

  // --- POST /v1/runs ---
  app.post('/v1/runs', asyncRoute(async (req, res) => {
    const body: unknown = req.body;
    const pinned = body !== null && typeof body === 'object' && 'task_id' in body ? body.task_id : undefined;
    if (pinned !== undefined && typeof pinned !== 'string') {
      res.status(400).json({ error: 'task_id must be a string' });
      return;
    }

    // Fail before taking the gate when the project is missing or unreadable
    await store.load();

    const sessionId = uuidv4();
    if (!gate.acquire(root, sessionId)) {
      res.status(503).json({
        error: 'Server busy',
        active_session: gate.activeSessionId(),
      });
      return;
    }

    const startedAt = new Date().toISOString();
    rememberRun(runs, sessionId, { status: 'running', started_at: startedAt }, runHistory);
    res.status(202).json({ session_id: sessionId });

    const runner = createSessionRunner(root, config, { executor: options.executor, print: options.print });
    void runner.runSession({ sessionId, pinnedTaskId: pinned })
      .then(summary => {
        rememberRun(runs, sessionId, { status: 'finished', started_at: startedAt, finished_at: new Date().toISOString(), summary }, runHistory);
      })
      .catch((err: unknown) => {
        rememberRun(runs, sessionId, { status: 'failed', started_at: startedAt, finished_at: new Date().toISOString(), error: errorMessage(err) }, runHistory);
      })
      .finally(() => {
        gate.release(root, sessionId);
      });
  }));

  // --- GET /v1/runs/:id ---
  app.get('/v1/runs/:id', (req, res) => {
    const state = runs.get(req.params.id);
    if (!state) {
      res.status(404).json({ error: 'Run not found' });
      return;
    }
    res.json({ session_id: req.params.id, ...state });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Request body is not valid JSON' });
      return;
    }
    if (err instanceof ProjectNotInitializedError) {
      res.status(404).json({ error: err.message });
      return;
    }
    if (err instanceof SchemaError) {
      res.status(422).json({ error: err.message, issues: err.issues });
      return;
    }
    res.status(500).json({ error: errorMessage(err) });
  });

  return app;
}
