import { z } from 'zod';
import { SchemaError } from '../errors.js';
import { TaskPrioritySchema, TaskStatusSchema } from './types.js';
import type { NewTaskInput, Task, TaskList } from './types.js';

const now = () => new Date().toISOString();

const commandList = z.array(z.string()).default([]);

/**
 * On-disk shape of a task. `test_command` is the single-command field older
 * task lists carry; it only survives until {@link migrateTaskRecord} runs.
 */
export const TaskRecordSchema = z.object({
  id: z.string().trim().min(1, 'id must be a non-empty string'),
  name: z.string().default(''),
  description: z.string().default(''),
  priority: TaskPrioritySchema.default('medium'),
  status: TaskStatusSchema.default('pending'),
  dependencies: z.array(z.string()).default([]),
  verify_commands: commandList,
  test_command: z.string().optional(),
  acceptance_criteria: z.array(z.string()).default([]),
  notes: z.string().default(''),
  created_at: z.string().default(now),
  updated_at: z.string().default(''),
});

export type TaskRecord = z.infer<typeof TaskRecordSchema>;

export const TaskListRecordSchema = z.object({
  project_name: z.string().default(''),
  tech_stack: z.string().default(''),
  init_command: z.string().default('./init.sh'),
  created_at: z.string().default(now),
  updated_at: z.string().default(''),
  tasks: z.array(TaskRecordSchema),
});

export const NewTaskInputSchema = z.object({
  id: z.string().trim().min(1, 'id is required').max(128).regex(/^[A-Za-z0-9_.-]+$/, 'id may only contain letters, digits, ".", "_" and "-"'),
  name: z.string().trim().min(1, 'name is required'),
  description: z.string().optional(),
  priority: TaskPrioritySchema.optional(),
  dependencies: z.array(z.string().trim().min(1)).optional(),
  verify_commands: z.array(z.string()).optional(),
  acceptance_criteria: z.array(z.string()).optional(),
});

/**
 * Legacy rule: a record with no non-blank verify commands but a non-empty `test_command`
 * gets that command as its only verify command. Applied once, at load time.
 */
export function migrateTaskRecord(record: TaskRecord): Task {
  const { test_command: legacyCommand, ...rest } = record;
  const declared = rest.verify_commands.filter(command => command.trim());
  const verifyCommands = declared.length === 0 && legacyCommand && legacyCommand.trim()
    ? [legacyCommand]
    : rest.verify_commands;

  return {
    ...rest,
    verify_commands: verifyCommands,
    updated_at: rest.updated_at || rest.created_at,
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

export function parseTaskList(raw: unknown): TaskList {
  const parsed = TaskListRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new SchemaError(`Task list is structurally invalid: ${issues[0]}`, issues);
  }

  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const task of parsed.data.tasks) {
    if (seen.has(task.id)) duplicates.push(task.id);
    seen.add(task.id);
  }
  if (duplicates.length > 0) {
    throw new SchemaError(
      `Task list contains duplicate ids: ${[...new Set(duplicates)].join(', ')}`,
      duplicates.map(id => `tasks: duplicate id ${id}`),
    );
  }

  return {
    ...parsed.data,
    updated_at: parsed.data.updated_at || parsed.data.created_at,
    tasks: parsed.data.tasks.map(migrateTaskRecord),
  };
}

export interface NewTaskValidation {
  valid: boolean;
  input?: NewTaskInput;
  errors: string[];
}

export function validateNewTask(raw: unknown): NewTaskValidation {
  const parsed = NewTaskInputSchema.safeParse(raw);
  if (!parsed.success) {
    return { valid: false, errors: formatIssues(parsed.error) };
  }
  return { valid: true, input: parsed.data, errors: [] };
}

export function buildTask(input: NewTaskInput, timestamp = now()): Task {
  return {
    id: input.id.trim(),
    name: input.name.trim(),
    description: input.description ?? '',
    priority: input.priority ?? 'medium',
    status: 'pending',
    dependencies: input.dependencies ?? [],
    verify_commands: (input.verify_commands ?? []).map(c => c.trim()).filter(Boolean),
    acceptance_criteria: input.acceptance_criteria ?? [],
    notes: '',
    created_at: timestamp,
    updated_at: timestamp,
  };
}
