import type { EventSink } from '../events/types.js';
import type { SessionContext } from '../session/context.js';
import { runShell } from '../utils/exec.js';
import { tail } from '../utils/text.js';
import type { CommandPolicy, PolicyRule } from './commandPolicy.js';

export const DENIED_EXIT_CODE = 126;

export interface CommandResult {
  command: string;
  exit_code: number | null;
  stdout: string;
  stderr: string;
  timed_out: boolean;
  denied: boolean;
  rule: PolicyRule | null;
  duration_ms: number;
}

export interface ShellRunOptions {
  timeoutMs: number;
  /** Event name, e.g. the tool or phase that asked for the command. */
  name?: string;
}

export function commandSucceeded(result: CommandResult): boolean {
  return !result.denied && !result.timed_out && result.exit_code === 0;
}

/**
 * Runs shell commands in the project root, but only after the command policy
 * has allowed them. A denial comes back as an ordinary failed result.
 */
export class GuardedShell {
  constructor(
    private readonly policy: CommandPolicy,
    private readonly events: EventSink,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  async run(command: string, context: SessionContext, options: ShellRunOptions): Promise<CommandResult> {
    const name = options.name ?? 'run_command';
    this.events.record(context, {
      event_type: 'tool_use',
      component: 'tool',
      name,
      payload: { tool_name: 'bash', input_preview: command },
    });

    const decision = this.policy.authorize(command, context);
    if (!decision.allowed) {
      const result: CommandResult = {
        command,
        exit_code: DENIED_EXIT_CODE,
        stdout: '',
        stderr: `Command denied by policy (${decision.rule ?? 'unknown'}): ${decision.reason}`,
        timed_out: false,
        denied: true,
        rule: decision.rule,
        duration_ms: 0,
      };
      this.recordResult(context, name, result, 'denied');
      return result;
    }

    const spawned = await runShell(command, {
      timeoutMs: options.timeoutMs,
      cwd: context.projectRoot,
      env: this.env,
    });

    const result: CommandResult = {
      command,
      exit_code: spawned.exitCode,
      stdout: spawned.stdout,
      stderr: spawned.stderr,
      timed_out: spawned.timedOut,
      denied: false,
      rule: null,
      duration_ms: spawned.durationMs,
    };
    const status = result.timed_out ? 'timeout' : result.exit_code === 0 ? 'done' : 'error';
    this.recordResult(context, name, result, status);
    return result;
  }

  private recordResult(context: SessionContext, name: string, result: CommandResult, status: string): void {
    this.events.record(context, {
      event_type: 'tool_result',
      component: 'tool',
      name,
      payload: {
        status,
        command: result.command,
        exit_code: result.exit_code,
        duration_ms: result.duration_ms,
        stdout_preview: tail(result.stdout, 20),
        stderr_preview: tail(result.stderr, 20),
      },
      ok: commandSucceeded(result),
    });
  }
}
