export class TaskBranchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TaskBranchError";
  }
}

/** The identifier matches no configured system. Callers continue without metadata. */
export class UnresolvedTaskError extends TaskBranchError {
  constructor(readonly taskId: string) {
    super(`No task system matches '${taskId}'`);
    this.name = "UnresolvedTaskError";
  }
}

export class AdapterFailure extends TaskBranchError {
  constructor(
    readonly systemName: string,
    readonly taskId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${systemName} adapter failed for '${taskId}': ${message}`, options);
    this.name = "AdapterFailure";
  }
}

export class VcsFailure extends TaskBranchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VcsFailure";
  }
}

export class ConfigError extends TaskBranchError {
  constructor(
    message: string,
    readonly configPath?: string,
    options?: { cause?: unknown },
  ) {
    super(configPath ? `${configPath}: ${message}` : message, options);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
