import type { EventSink } from '../events/types.js';
import { commandSucceeded } from '../security/guardedShell.js';
import type { CommandResult, GuardedShell } from '../security/guardedShell.js';
import type { SessionContext } from '../session/context.js';
import type { Task } from '../tasks/types.js';

export interface VerificationResult {
  ok: boolean;
  results: CommandResult[];
  first_failure_index: number | null;
}

export function effectiveVerifyCommands(task: Pick<Task, 'verify_commands'>): string[] {
  return task.verify_commands.map(c => c.trim()).filter(c => c !== '');
}

/** Runs verify commands in order and stops at the first one that does not exit 0. */
export class VerificationGate {
  constructor(
    private readonly shell: GuardedShell,
    private readonly events: EventSink,
    private readonly timeoutMs: number,
  ) {}

  async run(commands: string[], context: SessionContext): Promise<VerificationResult> {
    const results: CommandResult[] = [];
    let firstFailure: number | null = null;

    for (const [index, command] of commands.entries()) {
      const result = await this.shell.run(command, context, { timeoutMs: this.timeoutMs, name: 'verify' });
      results.push(result);
      if (!commandSucceeded(result)) {
        firstFailure = index;
        break;
      }
    }

    const outcome: VerificationResult = { ok: firstFailure === null, results, first_failure_index: firstFailure };
    this.events.record(context, {
      event_type: 'verification',
      component: 'session',
      name: 'verify',
      payload: {
        summary: outcome.ok
          ? `verification passed (${results.length} command${results.length === 1 ? '' : 's'})`
          : `verification failed at command ${firstFailure ?? 0}: ${commands[firstFailure ?? 0]}`,
        total: commands.length,
        ran: results.length,
        first_failure_index: firstFailure,
      },
      ok: outcome.ok,
    });
    return outcome;
  }
}
