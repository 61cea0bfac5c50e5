import type { JobState, Platform } from "../types/jobs";

export type PipelineErrorCode =
  | "NOT_FOUND"
  | "INVALID_TRANSITION"
  | "UNSUPPORTED_PLATFORM"
  | "JOB_BUSY"
  | "COLLABORATOR_FAILURE";

export type Collaborator = "form-filler" | "resume-tailor" | "ai-answerer" | "scraper";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends PipelineError {
  readonly jobId: number;

  constructor(jobId: number) {
    super("NOT_FOUND", `Job #${jobId} not found`);
    this.jobId = jobId;
  }
}

export class InvalidTransitionError extends PipelineError {
  readonly jobId: number;
  readonly from: JobState;
  readonly action: string;

  constructor(jobId: number, from: JobState, action: string) {
    super("INVALID_TRANSITION", `Job #${jobId} cannot ${action} from state '${from}'`);
    this.jobId = jobId;
    this.from = from;
    this.action = action;
  }
}

export class UnsupportedPlatformError extends PipelineError {
  readonly jobId: number;
  readonly platform: Platform;

  constructor(jobId: number, platform: Platform) {
    super("UNSUPPORTED_PLATFORM", `Job #${jobId}: no handler registered for platform '${platform}'`);
    this.jobId = jobId;
    this.platform = platform;
  }
}

export class JobBusyError extends PipelineError {
  readonly jobId: number;

  constructor(jobId: number) {
    super("JOB_BUSY", `Job #${jobId} already has a transition in progress`);
    this.jobId = jobId;
  }
}

export class CollaboratorFailureError extends PipelineError {
  readonly collaborator: Collaborator;
  readonly timedOut: boolean;

  constructor(collaborator: Collaborator, message: string, timedOut = false) {
    super("COLLABORATOR_FAILURE", `${collaborator}: ${message}`);
    this.collaborator = collaborator;
    this.timedOut = timedOut;
  }
}

export function isPipelineError(error: unknown, code?: PipelineErrorCode): error is PipelineError {
  if (!(error instanceof PipelineError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface TimeoutOptions {
  /** On timeout, wait for the aborted call to settle before rejecting. */
  settle?: boolean;
}

/**
 * Runs a collaborator call under a deadline. Rejections and timeouts both come back
 * as CollaboratorFailureError so callers handle a single failure shape. The call's
 * signal aborts when the deadline passes.
 */
export async function withTimeout<T>(
  collaborator: Collaborator,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions = {}
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let pending: Promise<T> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new CollaboratorFailureError(collaborator, `timed out after ${timeoutMs}ms`, true));
    }, timeoutMs);
  });

  try {
    pending = run(controller.signal);
    return await Promise.race([pending, deadline]);
  } catch (error) {
    if (controller.signal.aborted && options.settle && pending) {
      await Promise.allSettled([pending]);
    }
    if (error instanceof CollaboratorFailureError) {
      throw error;
    }
    throw new CollaboratorFailureError(collaborator, errorMessage(error));
  } finally {
    clearTimeout(timer);
  }
}
