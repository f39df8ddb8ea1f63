export type EventType =
  | 'session_start'
  | 'session_end'
  | 'phase_transition'
  | 'precheck'
  | 'tool_use'
  | 'tool_result'
  | 'security_decision'
  | 'assistant_text'
  | 'verification'
  | 'checkpoint'
  | 'iteration'
  | 'task_reset'
  | 'error';

export type EventComponent = 'session' | 'security' | 'executor' | 'tool' | 'git' | 'cli';

export type EventPayload = Record<string, unknown>;

export interface EngineEvent {
  timestamp: string;
  session_id: string;
  iteration: number;
  phase: string;
  event_type: EventType;
  component: EventComponent;
  name: string;
  payload: EventPayload;
  ok: boolean;
}

export interface EventInput {
  event_type: EventType;
  component: EventComponent;
  name: string;
  payload?: EventPayload;
  ok?: boolean;
}

/** Anything that accepts events; the session runner and its collaborators only see this. */
export interface EventSink {
  record(context: { sessionId: string; iteration: number; phase: string }, input: EventInput): EngineEvent;
}
