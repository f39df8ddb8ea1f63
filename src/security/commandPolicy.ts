import type { EventSink } from '../events/types.js';
import type { SessionContext } from '../session/context.js';
import { matchingGlob, projectRelative } from './pathGuard.js';
import { basename, commandWords, parseShell } from './shellSyntax.js';
import type { Pipeline, SimpleCommand } from './shellSyntax.js';

export type PolicyRule =
  | 'empty'
  | 'recursive-force-delete'
  | 'history-rewrite'
  | 'remote-pipe-to-shell'
  | 'privilege-escalation'
  | 'system-destruction'
  | 'protected-path'
  | 'nested-shell'
  | 'allowlist';

export interface Decision {
  allowed: boolean;
  reason: string;
  rule: PolicyRule | null;
}

export interface PolicyOptions {
  protectedGlobs: string[];
  /** When non-empty, only these program names may run. */
  allowedCommands: string[];
}

const ALLOW: Decision = { allowed: true, reason: 'no rule matched', rule: null };

const SHELLS = new Set(['sh', 'bash', 'zsh', 'dash', 'ksh', 'fish', 'python', 'python3', 'perl', 'ruby', 'node']);
const DOWNLOADERS = new Set(['curl', 'wget']);
const ESCALATORS = new Set(['sudo', 'su', 'doas', 'pkexec', 'runuser']);
const POWER = new Set(['shutdown', 'reboot', 'halt', 'poweroff']);
const PATH_WRITERS = new Set(['rm', 'mv', 'truncate', 'tee']);
const INLINE_SHELLS = new Set(['sh', 'bash', 'zsh', 'dash', 'ksh', 'fish']);
const MAX_NESTING = 3;
// Operands that mean "everything in the current directory"
const CWD_CONTENTS = /^(?:\*|\.|\.\/|\.\/\*|\.\*)$/;

const FORK_BOMB = /:\s*\(\s*\)\s*\{[^}]*:\s*\|\s*:\s*&[^}]*\}\s*;?\s*:/;
const SUBSTITUTED_DOWNLOAD =
  /\b(?:sh|bash|zsh|dash|ksh|fish|python3?|perl|ruby|node|eval|source)\b[^|;&\n]*(?:<\(|\$\(|`)\s*(?:curl|wget)\b/;
const DEVICE_TARGET = /^\/dev\/(?:sd|nvme|hd)/;

function deny(rule: PolicyRule, reason: string): Decision {
  return { allowed: false, reason, rule };
}

function splitFlags(args: string[]): { flags: string[]; operands: string[] } {
  const flags: string[] = [];
  const operands: string[] = [];
  let endOfFlags = false;
  for (const arg of args) {
    if (!endOfFlags && arg === '--') {
      endOfFlags = true;
    } else if (!endOfFlags && arg.startsWith('-') && arg.length > 1) {
      flags.push(arg);
    } else {
      operands.push(arg);
    }
  }
  return { flags, operands };
}

function hasShortFlag(flags: string[], letters: string): boolean {
  return flags.some(f => !f.startsWith('--') && [...f.slice(1)].some(c => letters.includes(c)));
}

function isRootLevelTarget(target: string): boolean {
  if (/^\/[^/]*\/?$/.test(target)) return true;
  return /^(?:~|\$HOME|\$\{HOME\})(?:\/\*?)?$/.test(target);
}

function checkRecursiveDelete(program: string, args: string[], rootCwd: string | null): Decision | null {
  if (program !== 'rm') return null;
  const { flags, operands } = splitFlags(args);
  const recursive = flags.includes('--recursive') || hasShortFlag(flags, 'rR');
  const force = flags.includes('--force') || hasShortFlag(flags, 'f');
  if (!recursive || !force) return null;
  const target = operands.find(isRootLevelTarget);
  if (target !== undefined || flags.includes('--no-preserve-root')) {
    return deny('recursive-force-delete', `recursive forced delete of ${target ?? 'the filesystem root'}`);
  }
  const relative = rootCwd === null ? undefined : operands.find(o => CWD_CONTENTS.test(o));
  if (relative !== undefined) {
    return deny('recursive-force-delete', `recursive forced delete of ${relative} under ${rootCwd}`);
  }
  return null;
}

/** Root-level directory a `cd` lands in, or null for anywhere else. */
function rootLevelCd(args: string[]): string | null {
  const target = args.find(a => !a.startsWith('-') || a === '-');
  if (target === undefined) return '~';
  return target !== '-' && isRootLevelTarget(target) ? target : null;
}

/** Script text a shell `-c` or `eval` would run, when the words carry one. */
function inlineScript(program: string, args: string[]): string | null {
  if (program === 'eval') return args.length > 0 ? args.join(' ') : null;
  if (!INLINE_SHELLS.has(program)) return null;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '-o' || arg === '+o' || arg === '-O' || arg === '+O') {
      i++;
    } else if (/^-[A-Za-z]+$/.test(arg)) {
      if (arg.includes('c')) return args[i + 1] ?? null;
    } else if (!arg.startsWith('--')) {
      return null;
    }
  }
  return null;
}

function gitSubcommand(args: string[]): { sub: string; rest: string[] } | null {
  let i = 0;
  while (i < args.length && args[i].startsWith('-')) {
    // Options that take a separate value
    i += ['-C', '-c', '--git-dir', '--work-tree'].includes(args[i]) ? 2 : 1;
  }
  if (i >= args.length) return null;
  return { sub: args[i], rest: args.slice(i + 1) };
}

function checkHistoryRewrite(program: string, args: string[]): Decision | null {
  if (program !== 'git') return null;
  const parsed = gitSubcommand(args);
  if (!parsed) return null;
  const { sub, rest } = parsed;

  switch (sub) {
    case 'push': {
      const forced = rest.some(a =>
        a === '--force' || a.startsWith('--force-with-lease') || a === '--force-if-includes'
        || (/^-[A-Za-z]+$/.test(a) && a.includes('f'))
        || (a.startsWith('+') && a.length > 1));
      return forced ? deny('history-rewrite', 'force push rewrites remote history') : null;
    }
    case 'filter-branch':
    case 'filter-repo':
      return deny('history-rewrite', `git ${sub} rewrites history`);
    case 'reset':
      return rest.includes('--hard') ? deny('history-rewrite', 'git reset --hard discards work') : null;
    case 'reflog':
      return rest[0] === 'expire' ? deny('history-rewrite', 'git reflog expire drops recovery points') : null;
    case 'update-ref':
      return rest.includes('-d') || rest.includes('--delete')
        ? deny('history-rewrite', 'git update-ref -d deletes a ref')
        : null;
    default:
      return null;
  }
}

function checkPipeToShell(pipeline: Pipeline): Decision | null {
  let downloaded = false;
  for (const command of pipeline) {
    const words = commandWords(command);
    if (words.length === 0) continue;
    const program = basename(words[0]);
    if (downloaded && SHELLS.has(program)) {
      return deny('remote-pipe-to-shell', `downloaded content piped into ${program}`);
    }
    if (DOWNLOADERS.has(program)) downloaded = true;
  }
  return null;
}

function checkPrivilege(program: string, args: string[]): Decision | null {
  if (ESCALATORS.has(program)) {
    return deny('privilege-escalation', `${program} runs with elevated privileges`);
  }
  if (program === 'chmod') {
    const { operands } = splitFlags(args);
    const mode = operands[0] ?? '';
    if (/^[ugoa]*[+=][rwxXt]*s/.test(mode) || /^[2-7][0-7]{3}$/.test(mode)) {
      return deny('privilege-escalation', `chmod ${mode} sets setuid/setgid`);
    }
  }
  if (program === 'chown') {
    const owner = splitFlags(args).operands[0] ?? '';
    if (/^root(?:[:.].*)?$/.test(owner)) {
      return deny('privilege-escalation', 'chown to root');
    }
  }
  return null;
}

function checkDestruction(program: string, args: string[], command: SimpleCommand): Decision | null {
  if (program.startsWith('mkfs')) {
    return deny('system-destruction', `${program} formats a filesystem`);
  }
  if (program === 'dd' && args.some(a => a.startsWith('of=/dev/'))) {
    return deny('system-destruction', 'dd writes to a device');
  }
  if (POWER.has(program)) {
    return deny('system-destruction', `${program} stops the machine`);
  }
  if (program === 'init' && (args[0] === '0' || args[0] === '6')) {
    return deny('system-destruction', `init ${args[0]} stops the machine`);
  }
  if (program === 'chmod') {
    const { flags, operands } = splitFlags(args);
    const recursive = flags.includes('--recursive') || hasShortFlag(flags, 'R');
    if (recursive && operands[0] === '777' && operands.slice(1).includes('/')) {
      return deny('system-destruction', 'chmod -R 777 /');
    }
  }
  for (const redirect of command.redirects) {
    if (redirect.op.startsWith('>') || redirect.op.startsWith('&>')) {
      if (DEVICE_TARGET.test(redirect.target)) {
        return deny('system-destruction', `redirect into block device ${redirect.target}`);
      }
    }
  }
  return null;
}

function checkProtectedPaths(
  program: string,
  args: string[],
  command: SimpleCommand,
  projectRoot: string,
  globs: string[],
): Decision | null {
  if (globs.length === 0) return null;
  const targets: string[] = [];
  if (PATH_WRITERS.has(program)) {
    targets.push(...splitFlags(args).operands);
  }
  for (const redirect of command.redirects) {
    const writes = redirect.op.startsWith('>') || redirect.op.startsWith('&>');
    if (writes && !redirect.op.endsWith('&')) targets.push(redirect.target);
  }

  for (const target of targets) {
    if (!target || target.startsWith('/dev/')) continue;
    const relative = projectRelative(target, projectRoot);
    if (relative === null) continue;
    const glob = matchingGlob(relative, globs);
    if (glob) {
      return deny('protected-path', `${relative} is protected (${glob})`);
    }
  }
  return null;
}

function evaluateLine(command: string, projectRoot: string, options: PolicyOptions, depth: number): Decision {
  if (!command || !command.trim()) {
    return deny('empty', 'command is empty');
  }
  if (FORK_BOMB.test(command)) {
    return deny('system-destruction', 'fork bomb');
  }
  if (SUBSTITUTED_DOWNLOAD.test(command)) {
    return deny('remote-pipe-to-shell', 'downloaded content passed to a shell');
  }

  let rootCwd: string | null = null;
  for (const pipeline of parseShell(command)) {
    const piped = checkPipeToShell(pipeline);

    for (const simple of pipeline) {
      const words = commandWords(simple);
      const program = words.length > 0 ? basename(words[0]) : '';
      const args = words.slice(1);

      const decision =
        checkRecursiveDelete(program, args, rootCwd)
        ?? checkHistoryRewrite(program, args)
        ?? piped
        ?? checkPrivilege(program, args)
        ?? checkDestruction(program, args, simple)
        ?? checkProtectedPaths(program, args, simple, projectRoot, options.protectedGlobs);
      if (decision) return decision;

      if (options.allowedCommands.length > 0 && program && !options.allowedCommands.includes(program)) {
        return deny('allowlist', `'${program}' is not in the allowed command list`);
      }

      const script = inlineScript(program, args);
      if (script !== null) {
        if (depth >= MAX_NESTING) {
          return deny('nested-shell', `shell nesting deeper than ${MAX_NESTING} levels`);
        }
        const inner = evaluateLine(script, projectRoot, options, depth + 1);
        if (!inner.allowed) {
          return { ...inner, reason: `${inner.reason} (inside ${program})` };
        }
      }

      if (program === 'cd') rootCwd = rootLevelCd(args);
    }
  }

  return ALLOW;
}

/** Pure decision over one command line; `CommandPolicy` adds the event. */
export function evaluateCommand(command: string, projectRoot: string, options: PolicyOptions): Decision {
  return evaluateLine(command, projectRoot, options, 0);
}

/**
 * The gate every shell command passes: the engine's own precheck and verify
 * commands as well as the executor's tool calls. A blocklist, not a sandbox.
 */
export class CommandPolicy {
  constructor(
    private readonly options: PolicyOptions,
    private readonly events: EventSink,
  ) {}

  authorize(command: string, context: SessionContext): Decision {
    const decision = evaluateCommand(command, context.projectRoot, this.options);
    this.events.record(context, {
      event_type: 'security_decision',
      component: 'security',
      name: 'command_policy',
      payload: {
        command,
        decision: decision.allowed ? 'allow' : 'deny',
        rule: decision.rule,
        reason: decision.reason,
      },
      ok: decision.allowed,
    });
    return decision;
  }
}
