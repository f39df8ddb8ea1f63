import * as fs from 'node:fs/promises';
import { existsSync } from 'node:fs';
import * as path from 'node:path';
import { DuplicateTaskError, ProjectNotInitializedError, SchemaError, errorMessage, isNodeError } from '../errors.js';
import { buildTask, parseTaskList } from './schema.js';
import type { NewTaskInput, Task, TaskList } from './types.js';

export interface TaskStore {
  readonly filePath: string;
  exists(): boolean;
  load(): Promise<TaskList>;
  save(list: TaskList): Promise<void>;
  appendTask(input: NewTaskInput): Promise<Task>;
  /** Puts a task back to `pending`; null when the id is unknown. */
  resetTask(taskId: string, note: string): Promise<Task | null>;
}

/**
 * The only writer of the task list file. Every save replaces the whole
 * document through a temp file and a rename.
 */
export class FileTaskStore implements TaskStore {
  private lock: Promise<void> = Promise.resolve();

  readonly filePath: string;

  constructor(projectRoot: string, fileName = 'tasks.json') {
    this.filePath = path.join(projectRoot, fileName);
  }

  private withLock<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.lock.then(fn, fn);
    this.lock = next.then(() => {}, () => {});
    return next;
  }

  exists(): boolean {
    return existsSync(this.filePath);
  }

  async load(): Promise<TaskList> {
    let data: string;
    try {
      data = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') {
        throw new ProjectNotInitializedError(path.dirname(this.filePath));
      }
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (err) {
      throw new SchemaError(`Task list is not valid JSON: ${errorMessage(err)}`);
    }
    return parseTaskList(raw);
  }

  save(list: TaskList): Promise<void> {
    return this.withLock(async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      const tmpPath = this.filePath + '.tmp';
      await fs.writeFile(tmpPath, JSON.stringify(list, null, 2) + '\n');
      await fs.rename(tmpPath, this.filePath);
    });
  }

  async appendTask(input: NewTaskInput): Promise<Task> {
    const list = await this.load();
    if (list.tasks.some(t => t.id === input.id.trim())) {
      throw new DuplicateTaskError(input.id.trim());
    }
    const task = buildTask(input);
    await this.save({ ...list, updated_at: task.created_at, tasks: [...list.tasks, task] });
    return task;
  }

  async resetTask(taskId: string, note: string): Promise<Task | null> {
    const list = await this.load();
    const current = list.tasks.find(t => t.id === taskId);
    if (!current) return null;
    const now = new Date().toISOString();
    const task: Task = { ...current, status: 'pending', notes: note, updated_at: now };
    await this.save({
      ...list,
      updated_at: now,
      tasks: list.tasks.map(t => (t.id === taskId ? task : t)),
    });
    return task;
  }
}
