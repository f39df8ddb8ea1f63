import * as fs from 'node:fs';
import * as path from 'node:path';
import { sanitizeRecord } from '../security/redaction.js';
import type { EngineEvent, EventInput, EventPayload, EventSink } from './types.js';

export interface EventLogOptions {
  verbose: boolean;
  previewLength: number;
  print?: (line: string) => void;
}

function text(value: unknown): string {
  if (value === undefined || value === null) return '';
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function prefixFor(event: EngineEvent): string {
  switch (event.event_type) {
    case 'assistant_text':
      return '[assistant]';
    case 'tool_use':
      return '[tool-call]';
    case 'tool_result':
      return '[tool-result]';
    default:
      return '[session]';
  }
}

export function formatConsoleLine(event: EngineEvent): string {
  const prefix = prefixFor(event);
  const p: EventPayload = event.payload;

  switch (event.event_type) {
    case 'assistant_text': {
      const content = text(p.text_preview).trim();
      return `${prefix} ${content || '(empty reply)'}`;
    }
    case 'tool_use':
      return `${prefix} <${text(p.tool_name) || event.name} - ${text(p.input_preview)}>`;
    case 'tool_result': {
      const status = text(p.status) || (event.ok ? 'done' : 'error');
      const exit = p.exit_code !== undefined ? ` exit=${text(p.exit_code)}` : '';
      const duration = p.duration_ms !== undefined ? ` ${text(p.duration_ms)}ms` : '';
      return `${prefix} [${status}] ${event.name}${exit}${duration}`;
    }
    case 'security_decision':
      return event.ok
        ? `${prefix} command allowed: ${text(p.command)}`
        : `${prefix} [denied] ${text(p.command)} (${text(p.rule)}): ${text(p.reason)}`;
    default: {
      const message = text(p.message) || text(p.summary) || event.name;
      return event.ok ? `${prefix} ${message}` : `${prefix} [error] ${message}`;
    }
  }
}

/**
 * Append-only event store. Each event is one JSON line written synchronously,
 * so a crash loses at most the event being written.
 */
export class EventLog implements EventSink {
  private writeFailed = false;
  private readonly print: (line: string) => void;

  constructor(
    readonly filePath: string | null,
    private readonly options: EventLogOptions,
  ) {
    this.print = options.print ?? ((line) => console.log(line));
  }

  record(context: { sessionId: string; iteration: number; phase: string }, input: EventInput): EngineEvent {
    const event: EngineEvent = {
      timestamp: new Date().toISOString(),
      session_id: context.sessionId,
      iteration: context.iteration,
      phase: context.phase,
      event_type: input.event_type,
      component: input.component,
      name: input.name,
      payload: sanitizeRecord(input.payload ?? {}, this.options.previewLength),
      ok: input.ok ?? true,
    };

    if (this.options.verbose) {
      this.print(formatConsoleLine(event));
    }
    this.persist(event);
    return event;
  }

  private persist(event: EngineEvent): void {
    if (!this.filePath) return;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.appendFileSync(this.filePath, JSON.stringify(event) + '\n');
    } catch (err) {
      // Losing the event file must not stop the iteration; say so once
      if (!this.writeFailed) {
        this.writeFailed = true;
        console.error(`stepwise: cannot write event log ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }
}
