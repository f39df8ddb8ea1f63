import { v4 as uuidv4 } from 'uuid';

/**
 * Everything a component needs to know about the run it is serving. Passed
 * explicitly into every call; there is no ambient project root or session id.
 */
export interface SessionContext {
  readonly sessionId: string;
  readonly projectRoot: string;
  readonly phase: string;
  readonly iteration: number;
}

export function createSessionContext(projectRoot: string, phase: string, sessionId: string = uuidv4()): SessionContext {
  return { sessionId, projectRoot, phase, iteration: 0 };
}

export function atIteration(context: SessionContext, iteration: number): SessionContext {
  return { ...context, iteration };
}
