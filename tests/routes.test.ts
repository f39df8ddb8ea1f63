import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import request from 'supertest';
import { createApp } from '../src/app.js';
import { ScriptedExecutor, makeConfig, makeList, makeTask, makeTempDir, readTaskList, removeDir, writeTaskList } from './helpers.js';

const AUTH = { Authorization: 'Bearer test-secret' };

describe('HTTP API', () => {
  let root: string;
  let executor: ScriptedExecutor;

  const app = () => createApp(makeConfig(), root, { executor, print: () => {} });

  beforeEach(() => {
    root = makeTempDir('api-');
    executor = new ScriptedExecutor();
  });

  afterEach(() => {
    removeDir(root);
  });

  it('requires the bearer token on every route', async () => {
    const res = await request(app()).get('/v1/health');
    expect(res.status).toBe(401);
  });

  it('refuses to start without a configured token', () => {
    expect(() => createApp(makeConfig({ apiToken: null }), root)).toThrow('STEPWISE_API_TOKEN is required but not set');
  });

  it('reports health', async () => {
    const res = await request(app()).get('/v1/health').set(AUTH);
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', active_session: null });
  });

  it('returns 404 for an uninitialized project', async () => {
    const res = await request(app()).get('/v1/status').set(AUTH);
    expect(res.status).toBe(404);
    expect(res.body.error).toBe(`No task list found in ${path.resolve(root)}; run "stepwise init" first`);
  });

  it('returns 422 for a task list that does not validate', async () => {
    fs.writeFileSync(path.join(root, 'tasks.json'), JSON.stringify({ tasks: [{ id: 'a', status: 'done' }] }));
    const res = await request(app()).get('/v1/tasks').set(AUTH);
    expect(res.status).toBe(422);
    expect(Array.isArray(res.body.issues)).toBe(true);
  });

  it('summarizes the project', async () => {
    writeTaskList(root, makeList([
      makeTask({ id: 'a', status: 'completed' }),
      makeTask({ id: 'b', name: 'Second', priority: 'high' }),
      makeTask({ id: 'c', dependencies: ['ghost'] }),
    ], 'shop'));

    const res = await request(app()).get('/v1/status').set(AUTH);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      project_name: 'shop',
      stats: { total: 3, pending: 2, in_progress: 0, completed: 1, blocked: 0, completion_rate: 33.3 },
      next_task: { id: 'b', name: 'Second', priority: 'high', status: 'pending' },
      exhaustion: null,
      cycles: [],
      missing_dependencies: [{ task_id: 'c', missing: ['ghost'] }],
      active_session: null,
    });
  });

  it('lists tasks', async () => {
    writeTaskList(root, makeList([makeTask({ id: 'a' })]));
    const res = await request(app()).get('/v1/tasks').set(AUTH);
    expect(res.status).toBe(200);
    expect(res.body.tasks.map((t: { id: string }) => t.id)).toEqual(['a']);
  });

  it('adds a task and rejects duplicates', async () => {
    writeTaskList(root, makeList([makeTask({ id: 'a' })]));
    const server = app();

    const created = await request(server).post('/v1/tasks').set(AUTH).send({ id: 'b', name: 'Second', verify_commands: ['true'] });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ id: 'b', name: 'Second', status: 'pending', priority: 'medium', verify_commands: ['true'] });
    expect(readTaskList(root).tasks.map(t => t.id)).toEqual(['a', 'b']);

    const duplicate = await request(server).post('/v1/tasks').set(AUTH).send({ id: 'b', name: 'Again' });
    expect(duplicate.status).toBe(409);
    expect(duplicate.body).toEqual({ error: "Task id 'b' already exists" });
  });

  it('rejects invalid task input', async () => {
    writeTaskList(root, makeList([]));
    const res = await request(app()).post('/v1/tasks').set(AUTH).send({ id: 'x' });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Invalid task input', errors: ['name: Required'] });
  });

  it('rejects a malformed JSON body', async () => {
    writeTaskList(root, makeList([]));
    const res = await request(app())
      .post('/v1/tasks')
      .set(AUTH)
      .set('Content-Type', 'application/json')
      .send('{"id": ');
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Request body is not valid JSON' });
  });

  it('starts a background run and reports its result', async () => {
    writeTaskList(root, makeList([makeTask({ id: 'a', verify_commands: ['true'] })]));
    const server = app();

    const started = await request(server).post('/v1/runs').set(AUTH).send({});
    expect(started.status).toBe(202);
    const sessionId: unknown = started.body.session_id;
    expect(typeof sessionId).toBe('string');

    await vi.waitFor(async () => {
      const res = await request(server).get(`/v1/runs/${String(sessionId)}`).set(AUTH);
      expect(res.body.status).toBe('finished');
    }, { timeout: 10_000, interval: 50 });

    const finished = await request(server).get(`/v1/runs/${String(sessionId)}`).set(AUTH);
    expect(finished.body).toMatchObject({ session_id: sessionId, status: 'finished', summary: { completed_tasks: ['a'] } });
    expect(readTaskList(root).tasks[0].status).toBe('completed');
  });

  it('forgets the oldest finished runs beyond the history limit', async () => {
    writeTaskList(root, makeList([makeTask({ id: 'a' }), makeTask({ id: 'b' })]));
    const server = createApp(makeConfig(), root, { executor, print: () => {}, maxRunHistory: 1 });

    const runToEnd = async (): Promise<string> => {
      const started = await request(server).post('/v1/runs').set(AUTH).send({});
      expect(started.status).toBe(202);
      const sessionId = String(started.body.session_id);
      await vi.waitFor(async () => {
        const health = await request(server).get('/v1/health').set(AUTH);
        expect(health.body.active_session).toBeNull();
      }, { timeout: 10_000, interval: 50 });
      return sessionId;
    };

    const first = await runToEnd();
    const second = await runToEnd();

    expect((await request(server).get(`/v1/runs/${first}`).set(AUTH)).status).toBe(404);
    const kept = await request(server).get(`/v1/runs/${second}`).set(AUTH);
    expect(kept.body).toMatchObject({ status: 'finished', summary: { completed_tasks: ['b'] } });
  });

  it('allows one run at a time', async () => {
    writeTaskList(root, makeList([makeTask({ id: 'a' })]));
    let release: () => void = () => {};
    const held = new Promise<void>(resolve => {
      release = resolve;
    });
    executor = new ScriptedExecutor([async () => {
      await held;
      return 'done';
    }]);
    const server = app();

    const first = await request(server).post('/v1/runs').set(AUTH).send({ task_id: 'a' });
    expect(first.status).toBe(202);

    const second = await request(server).post('/v1/runs').set(AUTH).send({});
    expect(second.status).toBe(503);
    expect(second.body).toEqual({ error: 'Server busy', active_session: first.body.session_id });

    release();
    await vi.waitFor(async () => {
      const res = await request(server).get('/v1/health').set(AUTH);
      expect(res.body.active_session).toBeNull();
    }, { timeout: 10_000, interval: 50 });
  });

  it('validates run requests', async () => {
    writeTaskList(root, makeList([]));
    const bad = await request(app()).post('/v1/runs').set(AUTH).send({ task_id: 7 });
    expect(bad.status).toBe(400);
    expect(bad.body).toEqual({ error: 'task_id must be a string' });

    const missing = await request(app()).get('/v1/runs/no-such-run').set(AUTH);
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: 'Run not found' });
  });
});
