export interface ProjectFiles {
  tasks: string;
  progress: string;
  runLog: string;
  eventLog: string;
  precheckScript: string;
}

export interface Config {
  apiBaseUrl: string;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  maxTurns: number;
  commandTimeoutMs: number;
  precheckTimeoutMs: number;
  verifyTimeoutMs: number;
  maxIterations: number;
  iterationDelayMs: number;
  verboseEvents: boolean;
  previewLength: number;
  allowedCommands: string[];
  protectedGlobs: string[];
  denyGlobs: string[];
  port: number;
  bind: string;
  apiToken: string | null;
  files: ProjectFiles;
}

export const PROJECT_FILES: ProjectFiles = {
  tasks: 'tasks.json',
  progress: 'progress.md',
  runLog: 'run_log.jsonl',
  eventLog: 'events.jsonl',
  precheckScript: 'init.sh',
};

const MAX_TURNS_CAP = 200;

function csv(raw: string | undefined): string[] {
  return (raw || '').split(',').map(s => s.trim()).filter(Boolean);
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw || '', 10);
  return Number.isFinite(value) && value >= 1 ? value : fallback;
}

function nonNegativeInt(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw || '', 10);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
}

function flag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  return !['0', 'false', 'no', 'off'].includes(raw.trim().toLowerCase());
}

export function loadConfig(): Config {
  const env = process.env;

  const temperature = parseFloat(env.STEPWISE_TEMPERATURE || '0.1');
  const port = parseInt(env.STEPWISE_PORT || '8787', 10);

  const protectedGlobs = csv(env.STEPWISE_PROTECTED_GLOBS);
  const denyGlobs = csv(env.STEPWISE_DENY_GLOBS);

  return {
    apiBaseUrl: (env.STEPWISE_API_BASE_URL || 'http://localhost:11434/v1').replace(/\/+$/, ''),
    apiKey: env.STEPWISE_API_KEY || '',
    model: env.STEPWISE_MODEL || 'qwen3-coder:30b',
    temperature: Number.isFinite(temperature) && temperature >= 0 && temperature <= 2 ? temperature : 0.1,
    maxTokens: positiveInt(env.STEPWISE_MAX_TOKENS, 4096),
    maxTurns: Math.min(positiveInt(env.STEPWISE_MAX_TURNS, 40), MAX_TURNS_CAP),
    commandTimeoutMs: positiveInt(env.STEPWISE_COMMAND_TIMEOUT_SECONDS, 60) * 1000,
    precheckTimeoutMs: positiveInt(env.STEPWISE_PRECHECK_TIMEOUT_SECONDS, 120) * 1000,
    verifyTimeoutMs: positiveInt(env.STEPWISE_VERIFY_TIMEOUT_SECONDS, 300) * 1000,
    maxIterations: positiveInt(env.STEPWISE_MAX_ITERATIONS, 100),
    iterationDelayMs: nonNegativeInt(env.STEPWISE_ITERATION_DELAY_MS, 1000),
    verboseEvents: flag(env.STEPWISE_VERBOSE_EVENTS, true),
    previewLength: positiveInt(env.STEPWISE_PREVIEW_LENGTH, 300),
    allowedCommands: csv(env.STEPWISE_ALLOWED_COMMANDS),
    protectedGlobs: protectedGlobs.length > 0
      ? protectedGlobs
      : [PROJECT_FILES.tasks, PROJECT_FILES.eventLog, PROJECT_FILES.runLog, '.git/**'],
    denyGlobs: denyGlobs.length > 0 ? denyGlobs : ['**/.env', '**/.ssh/**'],
    port: Number.isFinite(port) && port >= 1 && port <= 65535 ? port : 8787,
    bind: env.STEPWISE_BIND || '127.0.0.1',
    apiToken: env.STEPWISE_API_TOKEN || null,
    files: { ...PROJECT_FILES },
  };
}

export function requireApiToken(config: Config): string {
  if (!config.apiToken) {
    throw new Error('STEPWISE_API_TOKEN is required but not set');
  }
  return config.apiToken;
}
