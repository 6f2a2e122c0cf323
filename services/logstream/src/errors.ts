/**
 * Error hierarchy for the log reader and the HTTP surface.
 * `statusCode` is the HTTP status the router answers with.
 */
export class LogStreamError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(message: string, code: string, statusCode: number = 500) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return { error: this.message, code: this.code };
  }
}

export class TaskRunNotFoundError extends LogStreamError {
  constructor(reason: string) {
    super(`Unable to get TaskRun: ${reason}`, "TASKRUN_NOT_FOUND", 404);
  }
}

export class TaskRunNotStartedError extends LogStreamError {
  constructor(task: string) {
    super(`task ${task} has not started yet`, "TASKRUN_NOT_STARTED", 409);
  }
}

export class TaskRunFailedError extends LogStreamError {
  constructor(task: string, message: string) {
    super(`task ${task} has failed: ${message}`, "TASKRUN_FAILED", 409);
  }
}

export class PodNotAvailableError extends LogStreamError {
  constructor(message: string) {
    super(message, "POD_NOT_AVAILABLE", 409);
  }
}

export class PodWaitTimeoutError extends LogStreamError {
  constructor(task: string) {
    super(
      `task ${task} create has not started yet or pod for task not yet available`,
      "POD_WAIT_TIMEOUT",
      504
    );
  }
}

export class PodFailedError extends LogStreamError {
  constructor(task: string, reason: string, describeHint: string) {
    super(
      `task ${task} failed: ${reason.trim()}. Run ${describeHint} for more details.`,
      "POD_FAILED",
      502
    );
  }
}

/** Error record emitted on the error channel, tagged with its step. */
export class StepLogError extends LogStreamError {
  public readonly step: string;

  constructor(step: string, message: string, code: string = "STEP_LOG_ERROR") {
    super(message, code, 500);
    this.step = step;
  }

  toJSON(): Record<string, unknown> {
    return { step: this.step, error: this.message, code: this.code };
  }
}

export class ChannelClosedError extends LogStreamError {
  constructor() {
    super("send on closed channel", "CHANNEL_CLOSED", 500);
  }
}

export class AbortedError extends LogStreamError {
  constructor() {
    super("log read aborted", "ABORTED", 499);
  }
}

export class ValidationError extends LogStreamError {
  public readonly details: string[];

  constructor(details: string[]) {
    super("validation failed", "VALIDATION_FAILED", 400);
    this.details = details;
  }

  toJSON(): Record<string, unknown> {
    return { error: this.message, code: this.code, details: this.details };
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
