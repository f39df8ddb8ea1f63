export class SchemaError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'SchemaError';
  }
}

export class ProjectNotInitializedError extends Error {
  constructor(readonly projectRoot: string) {
    super(`No task list found in ${projectRoot}; run "stepwise init" first`);
    this.name = 'ProjectNotInitializedError';
  }
}

export class DuplicateTaskError extends Error {
  constructor(readonly taskId: string) {
    super(`Task id '${taskId}' already exists`);
    this.name = 'DuplicateTaskError';
  }
}

export class PrecheckFailure extends Error {
  constructor(readonly exitCode: number | null, readonly output: string) {
    super(`Precheck failed with exit code ${exitCode ?? 'unknown'}`);
    this.name = 'PrecheckFailure';
  }
}

export class ExecutorUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ExecutorUnavailableError';
  }
}

export class CheckpointFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CheckpointFailure';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export class InvalidInputError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'InvalidInputError';
  }
}
