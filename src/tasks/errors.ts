export type TaskLogErrorCode =
  | "INVALID_INPUT"
  | "TASK_NOT_FOUND"
  | "DUPLICATE_ID"
  | "LOCK_TIMEOUT"
  | "IO_FAILURE"
  | "COUNTER_STATE_CORRUPT"
  | "NOT_INITIALIZED"
  | "CONFIG_INVALID";

export class TaskLogError extends Error {
  constructor(
    public readonly code: TaskLogErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TaskLogError";
  }
}

export class InvalidInputError extends TaskLogError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
    this.name = "InvalidInputError";
  }
}

export class TaskNotFoundError extends TaskLogError {
  constructor(public readonly taskId: string) {
    super("TASK_NOT_FOUND", `Task not found: ${taskId}`);
    this.name = "TaskNotFoundError";
  }
}

export class DuplicateTaskIdError extends TaskLogError {
  constructor(
    public readonly taskId: string,
    count: number
  ) {
    super(
      "DUPLICATE_ID",
      `Task ID ${taskId} appears ${count} times in the log; fix the duplicate by hand first`
    );
    this.name = "DuplicateTaskIdError";
  }
}

export class LockTimeoutError extends TaskLogError {
  constructor(
    public readonly lockPath: string,
    timeoutMs: number,
    cause?: unknown
  ) {
    super("LOCK_TIMEOUT", `Timed out after ${timeoutMs}ms waiting for lock on ${lockPath}`, {
      cause,
    });
    this.name = "LockTimeoutError";
  }
}

export class IOFailureError extends TaskLogError {
  constructor(
    public readonly path: string,
    operation: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("IO_FAILURE", `Failed to ${operation} ${path}: ${reason}`, { cause });
    this.name = "IOFailureError";
  }
}

export class CounterStateCorruptError extends TaskLogError {
  constructor(
    public readonly path: string,
    reason: string
  ) {
    super("COUNTER_STATE_CORRUPT", `Counter state at ${path} is corrupt: ${reason}`);
    this.name = "CounterStateCorruptError";
  }
}

export class NotInitializedError extends TaskLogError {
  constructor(missingPath: string) {
    super("NOT_INITIALIZED", `Not initialized (${missingPath} is missing). Run 'tl init' first.`);
    this.name = "NotInitializedError";
  }
}

export class ConfigError extends TaskLogError {
  constructor(message: string, cause?: unknown) {
    super("CONFIG_INVALID", message, { cause });
    this.name = "ConfigError";
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
