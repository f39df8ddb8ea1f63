import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { errorMessage } from '../errors.js';
import type { EventSink } from '../events/types.js';
import type { GuardedShell } from '../security/guardedShell.js';
import { commandSucceeded } from '../security/guardedShell.js';
import { validatePath } from '../security/pathGuard.js';
import type { PathAccess, PathRules } from '../security/pathGuard.js';
import type { SessionContext } from '../session/context.js';
import { truncate } from '../utils/text.js';
import type { ToolChannel, ToolDefinition, ToolOutcome } from './types.js';

const MAX_TOOL_OUTPUT = 8_000;
const MAX_READ_CHARS = 50_000;

export const TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: 'run_command',
    description: 'Run a shell command in the project root and return its exit code and output.',
    parameters: {
      type: 'object',
      properties: { command: { type: 'string', description: 'The command line to run with bash' } },
      required: ['command'],
    },
  },
  {
    name: 'read_file',
    description: 'Read a text file inside the project.',
    parameters: {
      type: 'object',
      properties: { path: { type: 'string', description: 'Path relative to the project root' } },
      required: ['path'],
    },
  },
  {
    name: 'write_file',
    description: 'Create or overwrite a file inside the project. Parent directories are created.',
    parameters: {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'Path relative to the project root' },
        content: { type: 'string', description: 'Full new file content' },
      },
      required: ['path', 'content'],
    },
  },
  {
    name: 'list_files',
    description: 'List the entries of a directory inside the project. Directories end with "/".',
    parameters: {
      type: 'object',
      properties: { path: { type: 'string', description: 'Directory relative to the project root; defaults to "."' } },
      required: [],
    },
  },
];

export interface ToolChannelOptions {
  commandTimeoutMs: number;
  pathRules: PathRules;
}

function stringArg(args: Record<string, unknown>, key: string): string | null {
  const value = args[key];
  return typeof value === 'string' ? value : null;
}

/** The tool channel bound to one session and project. */
export class SessionToolChannel implements ToolChannel {
  constructor(
    private readonly shell: GuardedShell,
    private readonly events: EventSink,
    private readonly context: SessionContext,
    private readonly options: ToolChannelOptions,
  ) {}

  definitions(): ToolDefinition[] {
    return TOOL_DEFINITIONS;
  }

  async invoke(name: string, args: Record<string, unknown>): Promise<ToolOutcome> {
    switch (name) {
      case 'run_command':
        return this.runCommand(args);
      case 'read_file':
      case 'write_file':
      case 'list_files':
        return this.fileTool(name, args);
      default:
        return { ok: false, content: `Unknown tool: ${name}` };
    }
  }

  private async runCommand(args: Record<string, unknown>): Promise<ToolOutcome> {
    const command = stringArg(args, 'command');
    if (command === null) {
      return { ok: false, content: 'run_command requires a string "command" argument' };
    }
    const result = await this.shell.run(command, this.context, {
      timeoutMs: this.options.commandTimeoutMs,
      name: 'run_command',
    });
    const lines = [`exit_code: ${result.exit_code ?? 'none'}`];
    if (result.timed_out) lines.push('timed out');
    if (result.stdout) lines.push('[stdout]', result.stdout);
    if (result.stderr) lines.push('[stderr]', result.stderr);
    return { ok: commandSucceeded(result), content: truncate(lines.join('\n'), MAX_TOOL_OUTPUT) };
  }

  private async fileTool(name: 'read_file' | 'write_file' | 'list_files', args: Record<string, unknown>): Promise<ToolOutcome> {
    const target = name === 'list_files' ? stringArg(args, 'path') ?? '.' : stringArg(args, 'path');
    this.events.record(this.context, {
      event_type: 'tool_use',
      component: 'tool',
      name,
      payload: { tool_name: name, input_preview: target ?? '' },
    });

    const outcome = await this.fileOperation(name, target, args);
    this.events.record(this.context, {
      event_type: 'tool_result',
      component: 'tool',
      name,
      payload: { status: outcome.ok ? 'done' : 'error', path: target ?? '', output_preview: outcome.ok ? '' : outcome.content },
      ok: outcome.ok,
    });
    return outcome;
  }

  private async fileOperation(
    name: 'read_file' | 'write_file' | 'list_files',
    target: string | null,
    args: Record<string, unknown>,
  ): Promise<ToolOutcome> {
    if (target === null) {
      return { ok: false, content: `${name} requires a string "path" argument` };
    }
    const access: PathAccess = name === 'write_file' ? 'write' : 'read';
    const guard = validatePath(target, this.context.projectRoot, this.options.pathRules, access);
    if (!guard.allowed || !guard.resolved) {
      return { ok: false, content: `Access denied: ${guard.reason ?? 'path rejected'}` };
    }
    const resolved = guard.resolved;

    try {
      if (name === 'read_file') {
        const content = await fs.readFile(resolved, 'utf-8');
        return { ok: true, content: truncate(content, MAX_READ_CHARS) };
      }
      if (name === 'write_file') {
        const content = stringArg(args, 'content');
        if (content === null) {
          return { ok: false, content: 'write_file requires a string "content" argument' };
        }
        await fs.mkdir(path.dirname(resolved), { recursive: true });
        await fs.writeFile(resolved, content);
        return { ok: true, content: `Wrote ${Buffer.byteLength(content, 'utf-8')} bytes to ${guard.relative ?? target}` };
      }
      const entries = await fs.readdir(resolved, { withFileTypes: true });
      const names = entries
        .filter(e => e.name !== '.git')
        .map(e => (e.isDirectory() ? `${e.name}/` : e.name))
        .sort();
      return { ok: true, content: names.length > 0 ? names.join('\n') : '(empty directory)' };
    } catch (err) {
      return { ok: false, content: `${name} failed: ${errorMessage(err)}` };
    }
  }
}
