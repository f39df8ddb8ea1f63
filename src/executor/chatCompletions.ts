import { z } from 'zod';
import { ExecutorUnavailableError, errorMessage } from '../errors.js';
import type { EventSink } from '../events/types.js';
import type { SessionContext } from '../session/context.js';
import { truncate } from '../utils/text.js';
import type {
  ChatMessage,
  ExecutionRequest,
  ExecutionResult,
  Executor,
  ToolChannel,
  ToolDefinition,
} from './types.js';

const ToolCallSchema = z.object({
  id: z.string(),
  type: z.string().optional(),
  function: z.object({
    name: z.string(),
    arguments: z.string().nullish(),
  }),
});

const ChatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullish(),
        tool_calls: z.array(ToolCallSchema).nullish(),
      }),
      finish_reason: z.string().nullish(),
    }),
  ).min(1),
});

type WireToolCall = z.infer<typeof ToolCallSchema>;

type WireMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string | null; tool_calls?: WireToolCall[] }
  | { role: 'tool'; tool_call_id: string; content: string };

export interface ChatCompletionsOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  requestTimeoutMs?: number;
}

const CHAT_SYSTEM_PROMPT =
  'You are a software engineering assistant helping with a project tracked as a task list. Answer concisely.';

function parseArguments(raw: string | null | undefined): Record<string, unknown> | null {
  if (!raw || !raw.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return null;
  } catch {
    return null;
  }
}

/** An executor backed by any OpenAI-compatible `/chat/completions` endpoint. */
export class ChatCompletionsExecutor implements Executor {
  private readonly requestTimeoutMs: number;

  constructor(
    private readonly options: ChatCompletionsOptions,
    private readonly events: EventSink,
  ) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? 300_000;
  }

  async executeTask(request: ExecutionRequest, tools: ToolChannel): Promise<ExecutionResult> {
    const { context } = request;
    const messages: WireMessage[] = [
      { role: 'system', content: request.systemPrompt },
      { role: 'user', content: request.prompt },
    ];
    const definitions = tools.definitions();
    let lastText = '';

    for (let turn = 1; turn <= request.maxTurns; turn++) {
      const reply = await this.complete(messages, definitions);
      const text = reply.content ?? '';
      const calls = reply.tool_calls ?? [];
      if (text.trim()) lastText = text;

      this.events.record(context, {
        event_type: 'assistant_text',
        component: 'executor',
        name: 'assistant',
        payload: { text_preview: text, turn, tool_calls: calls.length },
      });

      if (calls.length === 0) {
        return { output: text, turns: turn };
      }

      messages.push({ role: 'assistant', content: reply.content ?? null, tool_calls: calls });
      for (const call of calls) {
        const content = await this.invokeTool(call, tools);
        messages.push({ role: 'tool', tool_call_id: call.id, content });
      }
    }

    this.recordTurnLimit(context, request.maxTurns);
    return { output: lastText || `(stopped after ${request.maxTurns} turns)`, turns: request.maxTurns };
  }

  async converse(message: string, history: ChatMessage[], systemPrompt = CHAT_SYSTEM_PROMPT): Promise<string> {
    const messages: WireMessage[] = [
      { role: 'system', content: systemPrompt },
      ...history.map((m): WireMessage => ({ role: m.role, content: m.content })),
      { role: 'user', content: message },
    ];
    const reply = await this.complete(messages, []);
    return reply.content ?? '';
  }

  private async invokeTool(call: WireToolCall, tools: ToolChannel): Promise<string> {
    const args = parseArguments(call.function.arguments);
    if (args === null) {
      return `Invalid arguments for ${call.function.name}: expected a JSON object`;
    }
    const outcome = await tools.invoke(call.function.name, args);
    return outcome.content;
  }

  private recordTurnLimit(context: SessionContext, maxTurns: number): void {
    this.events.record(context, {
      event_type: 'error',
      component: 'executor',
      name: 'turn_limit',
      payload: { message: `executor stopped after ${maxTurns} turns without a final answer` },
      ok: false,
    });
  }

  private async complete(
    messages: WireMessage[],
    tools: ToolDefinition[],
  ): Promise<z.infer<typeof ChatResponseSchema>['choices'][number]['message']> {
    const url = `${this.options.baseUrl}/chat/completions`;
    const body: Record<string, unknown> = {
      model: this.options.model,
      messages,
      temperature: this.options.temperature,
      max_tokens: this.options.maxTokens,
    };
    if (tools.length > 0) {
      body.tools = tools.map(t => ({ type: 'function', function: t }));
    }

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) headers.Authorization = `Bearer ${this.options.apiKey}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (err) {
      throw new ExecutorUnavailableError(`Cannot reach executor endpoint ${url}: ${errorMessage(err)}`, err);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw new ExecutorUnavailableError(
        `Executor endpoint returned ${response.status}${detail ? `: ${truncate(detail, 200)}` : ''}`,
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new ExecutorUnavailableError(`Executor endpoint returned invalid JSON: ${errorMessage(err)}`, err);
    }

    const parsed = ChatResponseSchema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ExecutorUnavailableError(
        `Unexpected executor response: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid shape'}`,
      );
    }
    return parsed.data.choices[0].message;
  }
}
