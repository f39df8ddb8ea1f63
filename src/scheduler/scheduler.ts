import type { Task, TaskList, TaskPriority, TaskStats } from '../tasks/types.js';

const PRIORITY_RANK: Record<TaskPriority, number> = { high: 0, medium: 1, low: 2 };

export type ExhaustionReason =
  | 'empty'
  | 'all_complete'
  | 'dependency_cycle'
  | 'missing_dependency'
  | 'blocked_by_dependencies'
  | 'only_blocked_tasks';

export interface MissingDependency {
  task_id: string;
  missing: string[];
}

function isOpen(task: Task): boolean {
  return task.status === 'pending' || task.status === 'in_progress';
}

/** Open tasks ordered by priority; equal priorities keep list order. */
export function orderedCandidates(list: TaskList): Task[] {
  return list.tasks
    .map((task, index) => ({ task, index }))
    .filter(({ task }) => isOpen(task))
    .sort((a, b) => PRIORITY_RANK[a.task.priority] - PRIORITY_RANK[b.task.priority] || a.index - b.index)
    .map(({ task }) => task);
}

export function dependenciesMet(task: Task, list: TaskList): boolean {
  return task.dependencies.every(depId => {
    const dep = list.tasks.find(t => t.id === depId);
    return dep !== undefined && dep.status === 'completed';
  });
}

/**
 * Next task to work on: interrupted in-progress work first, then the first
 * pending task whose dependencies are all completed. Null means nothing is
 * actionable.
 */
export function selectNext(list: TaskList): Task | null {
  const candidates = orderedCandidates(list);

  const resumed = candidates.find(t => t.status === 'in_progress');
  if (resumed) return resumed;

  return candidates.find(t => t.status === 'pending' && dependenciesMet(t, list)) ?? null;
}

export function selectPinned(list: TaskList, taskId: string): Task | null {
  const task = list.tasks.find(t => t.id === taskId);
  if (!task) return null;
  if (task.status === 'in_progress') return task;
  if (task.status === 'pending' && dependenciesMet(task, list)) return task;
  return null;
}

export function findMissingDependencies(list: TaskList): MissingDependency[] {
  const ids = new Set(list.tasks.map(t => t.id));
  const result: MissingDependency[] = [];
  for (const task of list.tasks) {
    const missing = task.dependencies.filter(d => !ids.has(d));
    if (missing.length > 0) result.push({ task_id: task.id, missing });
  }
  return result;
}

/**
 * Dependency cycles among tasks that are not completed. Each cycle is
 * reported once, rotated to start at its member that appears first in the list.
 */
export function findDependencyCycles(list: TaskList): string[][] {
  const byId = new Map(list.tasks.filter(t => t.status !== 'completed').map(t => [t.id, t]));
  const order = new Map(list.tasks.map((t, i) => [t.id, i]));
  const state = new Map<string, 'visiting' | 'done'>();
  const stack: string[] = [];
  const seen = new Set<string>();
  const cycles: string[][] = [];

  const visit = (id: string): void => {
    state.set(id, 'visiting');
    stack.push(id);
    const task = byId.get(id);
    for (const dep of task?.dependencies ?? []) {
      if (!byId.has(dep)) continue;
      const depState = state.get(dep);
      if (depState === 'visiting') {
        const cycle = stack.slice(stack.indexOf(dep));
        const first = cycle.reduce((best, cur) => ((order.get(cur) ?? 0) < (order.get(best) ?? 0) ? cur : best));
        const start = cycle.indexOf(first);
        const rotated = [...cycle.slice(start), ...cycle.slice(0, start)];
        const key = rotated.join('>');
        if (!seen.has(key)) {
          seen.add(key);
          cycles.push(rotated);
        }
      } else if (depState === undefined) {
        visit(dep);
      }
    }
    stack.pop();
    state.set(id, 'done');
  };

  for (const task of list.tasks) {
    if (byId.has(task.id) && !state.has(task.id)) visit(task.id);
  }
  return cycles;
}

export function summarize(list: TaskList): TaskStats {
  const count = (status: Task['status']) => list.tasks.filter(t => t.status === status).length;
  const total = list.tasks.length;
  const completed = count('completed');
  return {
    total,
    pending: count('pending'),
    in_progress: count('in_progress'),
    completed,
    blocked: count('blocked'),
    completion_rate: total > 0 ? Math.round((completed / total) * 1000) / 10 : 0,
  };
}

/** Why {@link selectNext} found nothing. Only meaningful when it returned null. */
export function classifyExhaustion(list: TaskList): ExhaustionReason {
  if (list.tasks.length === 0) return 'empty';
  if (list.tasks.every(t => t.status === 'completed')) return 'all_complete';
  if (!list.tasks.some(isOpen)) return 'only_blocked_tasks';
  if (findDependencyCycles(list).length > 0) return 'dependency_cycle';
  const openIds = new Set(list.tasks.filter(isOpen).map(t => t.id));
  if (findMissingDependencies(list).some(m => openIds.has(m.task_id))) return 'missing_dependency';
  return 'blocked_by_dependencies';
}
