import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { DuplicateTaskError, ProjectNotInitializedError, SchemaError } from '../../src/errors.js';
import { FileTaskStore } from '../../src/tasks/taskStore.js';
import { makeList, makeTask, makeTempDir, removeDir } from '../helpers.js';

const interruption = vi.hoisted(() => ({ beforeRename: false }));

// Lets a test stop a save after the temp file is written but before the rename
vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    rename: async (from: string, to: string): Promise<void> => {
      if (interruption.beforeRename) throw new Error('interrupted before rename');
      return actual.rename(from, to);
    },
  };
});

describe('FileTaskStore', () => {
  let root: string;
  let store: FileTaskStore;

  beforeEach(() => {
    root = makeTempDir('taskstore-');
    store = new FileTaskStore(root);
  });

  afterEach(() => {
    interruption.beforeRename = false;
    removeDir(root);
  });

  it('reports a missing task list as an uninitialized project', async () => {
    expect(store.exists()).toBe(false);
    await expect(store.load()).rejects.toBeInstanceOf(ProjectNotInitializedError);
  });

  it('saves and loads the same list', async () => {
    const list = makeList([makeTask({ id: 'a', verify_commands: ['true'] }), makeTask({ id: 'b', dependencies: ['a'] })]);
    await store.save(list);
    expect(store.exists()).toBe(true);
    expect(await store.load()).toEqual(list);
  });

  it('leaves no temp file behind after a save', async () => {
    await store.save(makeList([]));
    expect(fs.readdirSync(root)).toEqual(['tasks.json']);
  });

  it('keeps the previous list readable when a save stops before the rename', async () => {
    const before = makeList([makeTask({ id: 'a' })]);
    await store.save(before);

    interruption.beforeRename = true;
    await expect(store.save(makeList([makeTask({ id: 'a' }), makeTask({ id: 'b' })]))).rejects.toThrow('interrupted before rename');
    interruption.beforeRename = false;

    expect(await store.load()).toEqual(before);
  });

  it('ignores a torn temp file left by an earlier crash', async () => {
    const before = makeList([makeTask({ id: 'a' })]);
    await store.save(before);
    fs.writeFileSync(path.join(root, 'tasks.json.tmp'), '{"project_name": "dem');

    expect(await store.load()).toEqual(before);

    const after = makeList([makeTask({ id: 'b' })]);
    await store.save(after);
    expect(await store.load()).toEqual(after);
    expect(fs.readdirSync(root)).toEqual(['tasks.json']);
  });

  it('rejects a file that is not JSON', async () => {
    fs.writeFileSync(path.join(root, 'tasks.json'), '{ not json');
    await expect(store.load()).rejects.toBeInstanceOf(SchemaError);
  });

  it('appends a task with defaults', async () => {
    await store.save(makeList([makeTask({ id: 'a' })]));
    const task = await store.appendTask({ id: 'b', name: 'Second', dependencies: ['a'] });
    expect(task.status).toBe('pending');
    const loaded = await store.load();
    expect(loaded.tasks.map(t => t.id)).toEqual(['a', 'b']);
    expect(loaded.updated_at).toBe(task.created_at);
  });

  it('refuses a duplicate id', async () => {
    await store.save(makeList([makeTask({ id: 'a' })]));
    await expect(store.appendTask({ id: 'a', name: 'Again' })).rejects.toBeInstanceOf(DuplicateTaskError);
    expect((await store.load()).tasks).toHaveLength(1);
  });

  it('serializes concurrent saves', async () => {
    await Promise.all([
      store.save(makeList([makeTask({ id: 'first' })])),
      store.save(makeList([makeTask({ id: 'second' })])),
    ]);
    expect((await store.load()).tasks.map(t => t.id)).toEqual(['second']);
  });
});
