import { z } from 'zod';

export const TaskPrioritySchema = z.enum(['high', 'medium', 'low']);
export type TaskPriority = z.infer<typeof TaskPrioritySchema>;

export const TaskStatusSchema = z.enum(['pending', 'in_progress', 'completed', 'blocked']);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export interface Task {
  id: string;
  name: string;
  description: string;
  priority: TaskPriority;
  status: TaskStatus;
  dependencies: string[];
  verify_commands: string[];
  acceptance_criteria: string[];
  notes: string;
  created_at: string;
  updated_at: string;
}

export interface TaskList {
  project_name: string;
  tech_stack: string;
  init_command: string;
  created_at: string;
  updated_at: string;
  tasks: Task[];
}

export interface NewTaskInput {
  id: string;
  name: string;
  description?: string;
  priority?: TaskPriority;
  dependencies?: string[];
  verify_commands?: string[];
  acceptance_criteria?: string[];
}

export interface TaskStats {
  total: number;
  pending: number;
  in_progress: number;
  completed: number;
  blocked: number;
  completion_rate: number;
}
