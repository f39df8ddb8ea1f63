import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { CheckpointResult } from '../checkpoint/checkpointAdapter.js';
import { errorMessage, isNodeError } from '../errors.js';
import type { ProjectServices } from '../session/createSession.js';
import { createSessionContext } from '../session/context.js';
import { buildTask } from '../tasks/schema.js';
import type { TaskList } from '../tasks/types.js';

export const SEED_TASK_ID = 'task-001';
export const INIT_COMMIT_MESSAGE = 'chore: initialize project';

const INIT_SCRIPT = `#!/usr/bin/env bash
# Session precheck: runs before every iteration; a non-zero exit stops the run.
set -e

# Add dependency installs and environment checks here
echo "[init.sh] precheck passed"
`;

const ANALYSIS_PROMPT = `A new project is being set up. Read the requirements below and reply with a short plan:
the main components, a sensible order of work, and how each step can be verified with shell commands.

Project: {{name}}

Requirements:
{{spec}}`;

export interface InitOptions {
  projectRoot: string;
  spec: string;
  name?: string;
  techStack?: string;
  git: boolean;
  analyze: boolean;
  initScriptName: string;
}

export type AnalysisStatus = 'added' | 'skipped' | 'degraded';

export interface InitResult {
  projectName: string;
  createdTaskList: boolean;
  createdInitScript: boolean;
  analysis: AnalysisStatus;
  gitInitialized: boolean;
  commit: CheckpointResult | null;
}

async function writeIfAbsent(filePath: string, content: string, mode?: number): Promise<boolean> {
  try {
    await fs.writeFile(filePath, content, { flag: 'wx', mode });
    return true;
  } catch (err) {
    if (isNodeError(err) && err.code === 'EEXIST') return false;
    throw err;
  }
}

/**
 * Scaffolds a project: task list with a runnable seed task, progress
 * narrative, precheck script and a git root with an initial commit. An
 * existing task list is left as it is.
 */
export async function initProject(options: InitOptions, services: ProjectServices): Promise<InitResult> {
  const root = path.resolve(options.projectRoot);
  const projectName = options.name?.trim() || path.basename(root);
  const context = createSessionContext(root, 'init');
  await fs.mkdir(root, { recursive: true });

  services.events.record(context, {
    event_type: 'session_start',
    component: 'cli',
    name: 'init',
    payload: { message: `initializing ${projectName} in ${root}` },
  });

  const createdTaskList = !services.store.exists();
  if (createdTaskList) {
    const now = new Date().toISOString();
    const list: TaskList = {
      project_name: projectName,
      tech_stack: options.techStack ?? '',
      init_command: `./${options.initScriptName}`,
      created_at: now,
      updated_at: now,
      tasks: [
        buildTask({
          id: SEED_TASK_ID,
          name: 'Set up the project structure',
          description: options.spec,
          priority: 'high',
          verify_commands: ['test -f tasks.json'],
        }, now),
      ],
    };
    await services.store.save(list);
    await services.progress.initialize(projectName, options.spec, now);
  }

  const createdInitScript = await writeIfAbsent(path.join(root, options.initScriptName), INIT_SCRIPT, 0o755);

  let analysis: AnalysisStatus = 'skipped';
  if (options.analyze && createdTaskList) {
    try {
      const prompt = ANALYSIS_PROMPT.replace('{{name}}', () => projectName).replace('{{spec}}', () => options.spec);
      const reply = (await services.executor.converse(prompt, [])).trim();
      if (reply) {
        await services.progress.append(`## Initial analysis\n\n${reply}`);
        analysis = 'added';
      }
    } catch (err) {
      analysis = 'degraded';
      await services.progress.append(
        `## Initial analysis\n\n- The executor could not analyse the requirements; continuing without it.\n- Reason: ${errorMessage(err)}`,
      );
      services.events.record(context, {
        event_type: 'error',
        component: 'executor',
        name: 'init_analysis',
        payload: { message: `initial analysis skipped: ${errorMessage(err)}` },
        ok: false,
      });
    }
  }

  let gitInitialized = false;
  let commit: CheckpointResult | null = null;
  if (options.git) {
    gitInitialized = await services.checkpoints.initRepository();
    if (gitInitialized) {
      commit = await services.checkpoints.checkpoint(INIT_COMMIT_MESSAGE, context);
    }
  }

  services.events.record(context, {
    event_type: 'session_end',
    component: 'cli',
    name: 'init',
    payload: { message: `initialized ${projectName}` },
  });

  return { projectName, createdTaskList, createdInitScript, analysis, gitInitialized, commit };
}
