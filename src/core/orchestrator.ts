import { randomUUID } from "crypto";
import type { ScreeningAnswerResolver } from "../answers/resolver";
import type { Logger } from "../logging";
import type { JobStore } from "../storage/jobStore";
import type { JobContext, PlatformHandler, ResumeTailor } from "../types/collaborators";
import type { ApplicantProfile } from "../types/context";
import type { JobRecord, JobState, Platform } from "../types/jobs";
import {
  CollaboratorFailureError,
  InvalidTransitionError,
  JobBusyError,
  UnsupportedPlatformError,
  withTimeout,
} from "./errors";
import type { HandlerRegistry } from "./handlers";
import { detectPlatform } from "./platformDetector";
import { canPerform, type PipelineAction } from "./stateMachine";
import type { ActionThrottle } from "./throttle";

export interface OrchestratorDeps {
  store: JobStore;
  handlers: HandlerRegistry;
  resolver: ScreeningAnswerResolver;
  throttle: ActionThrottle;
  profile: ApplicantProfile;
  tailor?: ResumeTailor;
  defaultResumePath?: string | null;
  screenshotDir: string;
  timeoutMs: number;
  leaseTtlMs: number;
  logger: Logger;
}

export interface ActionOptions {
  signal?: AbortSignal;
}

export interface FillOptions extends ActionOptions {
  submit?: boolean;
}

export interface ActionOutcome {
  ok: boolean;
  job: JobRecord;
  error?: string;
}

interface AttemptResult {
  ok: boolean;
  error?: string;
  screenshotRef?: string;
}

/**
 * Performs exactly one legal transition per call. Caller errors (NotFound,
 * InvalidTransition, UnsupportedPlatform, JobBusy) throw before anything is written;
 * collaborator failures during fill/submit are recorded on the job and reported in
 * the returned outcome.
 */
export class PipelineOrchestrator {
  private readonly deps: OrchestratorDeps;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
  }

  async approve(id: number): Promise<JobRecord> {
    return this.simpleTransition(id, "approve", "approved", true);
  }

  async skip(id: number): Promise<JobRecord> {
    return this.simpleTransition(id, "skip", "skipped", false);
  }

  async reject(id: number, reason?: string): Promise<JobRecord> {
    const job = await this.simpleTransition(id, "reject", "rejected", false);
    if (reason) {
      this.deps.logger.info(`Job #${id} rejected: ${reason}`);
    }
    return job;
  }

  async tailor(id: number): Promise<JobRecord> {
    return this.withLease(id, async () => {
      const job = await this.deps.store.get(id);
      assertAction(job, "tailor");

      try {
        const tailor = this.deps.tailor;
        if (!tailor) {
          throw new CollaboratorFailureError("resume-tailor", "no resume tailor configured");
        }
        const jdText = job.jdText?.trim();
        if (!jdText) {
          throw new CollaboratorFailureError("resume-tailor", "no job description");
        }
        const { resumePath } = await withTimeout("resume-tailor", this.deps.timeoutMs, () =>
          tailor.tailor(jdText, job.roleTitle)
        );
        if (resumePath.trim().length === 0) {
          throw new CollaboratorFailureError("resume-tailor", "returned an empty resume path");
        }
        this.deps.logger.info(`Job #${id} tailored resume: ${resumePath}`);
        return await this.deps.store.update(id, (current) => ({
          state: current.state,
          resumePath,
          lastError: null,
        }));
      } catch (error) {
        if (error instanceof CollaboratorFailureError) {
          await this.deps.store.update(id, () => ({ lastError: error.message }));
          this.deps.logger.warn(`Job #${id} tailoring failed: ${error.message}`);
        }
        throw error;
      }
    });
  }

  async fill(id: number, options: FillOptions = {}): Promise<ActionOutcome> {
    const submit = options.submit === true;
    return this.browserAction(id, submit ? "fill+submit" : "fill", options.signal, async (job, handler) => {
      const outcome = await this.runAttempt(job, handler, submit);
      const success: JobState = submit ? "submitted" : "ready";
      return this.recordAttempt(id, outcome, success);
    });
  }

  async submit(id: number, options: ActionOptions = {}): Promise<ActionOutcome> {
    return this.browserAction(id, "submit", options.signal, async (job, handler) => {
      const outcome = await this.runAttempt(job, handler, true);
      return this.recordAttempt(id, outcome, "submitted");
    });
  }

  private async simpleTransition(
    id: number,
    action: PipelineAction,
    target: JobState,
    clearError: boolean
  ): Promise<JobRecord> {
    return this.withLease(id, async () => {
      const job = await this.deps.store.update(id, (current) => {
        assertAction(current, action);
        return clearError ? { state: target, lastError: null } : { state: target };
      });
      this.deps.logger.info(`Job #${id} ${action} -> ${job.state}`);
      return job;
    });
  }

  private async browserAction(
    id: number,
    action: PipelineAction,
    signal: AbortSignal | undefined,
    run: (job: JobRecord, handler: PlatformHandler) => Promise<ActionOutcome>
  ): Promise<ActionOutcome> {
    return this.withLease(id, async () => {
      let job = await this.deps.store.get(id);
      assertAction(job, action);

      let platform: Platform;
      if (job.platform === null) {
        platform = detectPlatform(job.url);
        job = await this.deps.store.update(id, () => ({ platform }));
      } else {
        platform = job.platform;
      }

      const handler = platform === "unknown" ? undefined : this.deps.handlers.get(platform);
      if (!handler) {
        throw new UnsupportedPlatformError(id, platform);
      }

      await this.deps.throttle.wait(signal);
      this.deps.logger.info(`Job #${id} ${action} via ${platform}: ${job.company} / ${job.roleTitle}`);
      return run(job, handler);
    });
  }

  private async runAttempt(job: JobRecord, handler: PlatformHandler, submit: boolean): Promise<AttemptResult> {
    const { timeoutMs } = this.deps;
    try {
      const ctx = await this.buildContext(job, handler, submit);
      // Browser calls never overlap: a timed-out call settles before the lease is released.
      const filled = await withTimeout("form-filler", timeoutMs, (signal) => handler.fill({ ...ctx, signal }), SETTLE);
      if (!filled.ok) {
        return { ok: false, error: filled.error ?? "form filler reported failure", screenshotRef: filled.screenshotRef };
      }
      if (!submit) {
        return { ok: true, screenshotRef: filled.screenshotRef };
      }

      const submitted = await withTimeout("form-filler", timeoutMs, (signal) => handler.submit({ ...ctx, signal }), SETTLE);
      const screenshotRef = submitted.screenshotRef ?? filled.screenshotRef;
      if (!submitted.ok) {
        return { ok: false, error: submitted.error ?? "submit reported failure", screenshotRef };
      }
      return { ok: true, screenshotRef };
    } catch (error) {
      if (error instanceof CollaboratorFailureError) {
        return { ok: false, error: error.message };
      }
      throw error;
    }
  }

  private async buildContext(job: JobRecord, handler: PlatformHandler, submitAfterFill: boolean): Promise<JobContext> {
    const { resolver, timeoutMs } = this.deps;
    const listQuestions = handler.listQuestions?.bind(handler);
    const discovered = listQuestions ? await withTimeout("form-filler", timeoutMs, () => listQuestions(job), SETTLE) : [];
    const questions = Array.from(new Set([...job.screeningQuestions, ...discovered]));

    const answers: Record<string, string> = {};
    for (const question of questions) {
      const resolved = await resolver.resolve(question, job);
      if (resolved.answer !== null) {
        answers[question] = resolved.answer;
      } else {
        this.deps.logger.warn(`Job #${job.id} unanswered screening question: ${question.slice(0, 80)}`);
      }
    }

    return {
      job,
      platform: handler.platform,
      resumePath: job.resumePath ?? this.deps.defaultResumePath ?? null,
      profile: this.deps.profile,
      answers,
      resolveQuestion: async (question) => (await resolver.resolve(question, job)).answer,
      screenshotDir: this.deps.screenshotDir,
      submitAfterFill,
    };
  }

  private async recordAttempt(id: number, outcome: AttemptResult, success: JobState): Promise<ActionOutcome> {
    const job = await this.deps.store.update(id, (current) => ({
      state: outcome.ok ? success : current.state,
      attemptCount: current.attemptCount + 1,
      lastError: outcome.ok ? null : outcome.error,
      screenshotRef: outcome.screenshotRef ?? null,
    }));

    if (outcome.ok) {
      this.deps.logger.info(`Job #${id} -> ${job.state} (attempt ${job.attemptCount})`);
    } else {
      this.deps.logger.warn(`Job #${id} attempt ${job.attemptCount} failed: ${outcome.error}`);
    }
    return { ok: outcome.ok, job, error: outcome.ok ? undefined : outcome.error };
  }

  private async withLease<T>(id: number, run: () => Promise<T>): Promise<T> {
    const owner = randomUUID();
    const acquired = await this.deps.store.acquireLease(id, owner, this.deps.leaseTtlMs);
    if (!acquired) {
      throw new JobBusyError(id);
    }
    try {
      return await run();
    } finally {
      await this.deps.store.releaseLease(id, owner);
    }
  }
}

const SETTLE = { settle: true } as const;

function assertAction(job: JobRecord, action: PipelineAction): void {
  if (!canPerform(action, job.state)) {
    throw new InvalidTransitionError(job.id, job.state, action);
  }
}
