import type { SessionContext } from '../session/context.js';

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, { type: string; description: string }>;
    required: string[];
  };
}

export interface ToolOutcome {
  ok: boolean;
  content: string;
}

/**
 * What the executor is allowed to do to the project. Every call is checked
 * (commands by the command policy, paths by the path guard) before it runs.
 */
export interface ToolChannel {
  definitions(): ToolDefinition[];
  invoke(name: string, args: Record<string, unknown>): Promise<ToolOutcome>;
}

export interface ExecutionRequest {
  context: SessionContext;
  systemPrompt: string;
  prompt: string;
  maxTurns: number;
}

export interface ExecutionResult {
  output: string;
  turns: number;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface Executor {
  executeTask(request: ExecutionRequest, tools: ToolChannel): Promise<ExecutionResult>;
  /** Free-form exchange used by `chat` and project analysis; no tools. */
  converse(message: string, history: ChatMessage[], systemPrompt?: string): Promise<string>;
}
