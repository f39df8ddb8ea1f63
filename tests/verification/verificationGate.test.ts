import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CommandPolicy } from '../../src/security/commandPolicy.js';
import { GuardedShell } from '../../src/security/guardedShell.js';
import { createSessionContext } from '../../src/session/context.js';
import type { SessionContext } from '../../src/session/context.js';
import { VerificationGate, effectiveVerifyCommands } from '../../src/verification/verificationGate.js';
import { MemoryEvents, makeTempDir, removeDir } from '../helpers.js';

describe('VerificationGate', () => {
  let root: string;
  let events: MemoryEvents;
  let gate: VerificationGate;
  let context: SessionContext;

  beforeEach(() => {
    root = makeTempDir('verify-');
    events = new MemoryEvents();
    const shell = new GuardedShell(new CommandPolicy({ protectedGlobs: [], allowedCommands: [] }, events), events);
    gate = new VerificationGate(shell, events, 5000);
    context = createSessionContext(root, 'verifying', 'sess-verify');
  });

  afterEach(() => {
    removeDir(root);
  });

  it('passes vacuously with no commands', async () => {
    const result = await gate.run([], context);
    expect(result).toEqual({ ok: true, results: [], first_failure_index: null });
    expect(events.ofType('verification')[0].payload.summary).toBe('verification passed (0 commands)');
  });

  it('passes when every command exits 0', async () => {
    const result = await gate.run(['true', 'test -d .'], context);
    expect(result.ok).toBe(true);
    expect(result.results.map(r => r.exit_code)).toEqual([0, 0]);
    expect(events.ofType('verification')[0].payload.summary).toBe('verification passed (2 commands)');
  });

  it('stops at the first failing command', async () => {
    const result = await gate.run(['true', 'false', 'touch ran-third'], context);
    expect(result.ok).toBe(false);
    expect(result.first_failure_index).toBe(1);
    expect(result.results).toHaveLength(2);
    expect(events.ofType('verification')[0]).toMatchObject({
      ok: false,
      payload: { summary: 'verification failed at command 1: false', total: 3, ran: 2, first_failure_index: 1 },
    });
  });

  it('treats a denied command as a failure', async () => {
    const result = await gate.run(['sudo true'], context);
    expect(result.ok).toBe(false);
    expect(result.results[0].denied).toBe(true);
    expect(result.results[0].exit_code).toBe(126);
  });
});

describe('effectiveVerifyCommands', () => {
  it('trims commands and drops blank ones', () => {
    expect(effectiveVerifyCommands({ verify_commands: [' npm test ', '', '   ', 'npm run lint'] })).toEqual(['npm test', 'npm run lint']);
  });
});
