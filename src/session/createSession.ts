import * as path from 'node:path';
import { CheckpointAdapter } from '../checkpoint/checkpointAdapter.js';
import type { Config } from '../config.js';
import { EventLog } from '../events/eventLog.js';
import { RunLog } from '../events/runLog.js';
import { ChatCompletionsExecutor } from '../executor/chatCompletions.js';
import { SessionToolChannel } from '../executor/toolChannel.js';
import type { Executor } from '../executor/types.js';
import { CommandPolicy } from '../security/commandPolicy.js';
import { GuardedShell } from '../security/guardedShell.js';
import { ProgressLog } from '../tasks/progressLog.js';
import { FileTaskStore } from '../tasks/taskStore.js';
import { VerificationGate } from '../verification/verificationGate.js';
import { SessionRunner } from './sessionRunner.js';
import type { SessionCollaborators } from './sessionRunner.js';

export interface SessionWiringOptions {
  /** Replaces the chat-completions executor, e.g. in tests. */
  executor?: Executor;
  print?: (line: string) => void;
}

export type ProjectServices = Omit<SessionCollaborators, 'executor'> & {
  events: EventLog;
  executor: Executor;
};

/** Builds every collaborator a session needs for one project root. */
export function createProjectServices(projectRoot: string, config: Config, options: SessionWiringOptions = {}): ProjectServices {
  const root = path.resolve(projectRoot);
  const events = new EventLog(path.join(root, config.files.eventLog), {
    verbose: config.verboseEvents,
    previewLength: config.previewLength,
    print: options.print,
  });
  const policy = new CommandPolicy(
    { protectedGlobs: config.protectedGlobs, allowedCommands: config.allowedCommands },
    events,
  );
  const shell = new GuardedShell(policy, events);
  const executor = options.executor ?? new ChatCompletionsExecutor(
    {
      baseUrl: config.apiBaseUrl,
      apiKey: config.apiKey,
      model: config.model,
      temperature: config.temperature,
      maxTokens: config.maxTokens,
    },
    events,
  );

  return {
    store: new FileTaskStore(root, config.files.tasks),
    progress: new ProgressLog(root, config.files.progress),
    runLog: new RunLog(path.join(root, config.files.runLog)),
    events,
    shell,
    verifier: new VerificationGate(shell, events, config.verifyTimeoutMs),
    checkpoints: new CheckpointAdapter(root, events),
    executor,
    tools: context => new SessionToolChannel(shell, events, context, {
      commandTimeoutMs: config.commandTimeoutMs,
      pathRules: { denyGlobs: config.denyGlobs, protectedGlobs: config.protectedGlobs },
    }),
  };
}

export function createSessionRunner(projectRoot: string, config: Config, options: SessionWiringOptions = {}): SessionRunner {
  const services = createProjectServices(projectRoot, config, options);
  return new SessionRunner(services, {
    projectRoot: path.resolve(projectRoot),
    precheckScript: config.files.precheckScript,
    precheckTimeoutMs: config.precheckTimeoutMs,
    maxTurns: config.maxTurns,
    maxIterations: config.maxIterations,
    iterationDelayMs: config.iterationDelayMs,
    previewLength: config.previewLength,
  });
}
