import { randomBytes } from "crypto";
import type { Logger, RunLogger, RunManifest } from "../logging";
import type { JobStore } from "../storage/jobStore";
import type { JobRecord } from "../types/jobs";
import { errorMessage, isPipelineError } from "./errors";
import type { PipelineOrchestrator } from "./orchestrator";
import { sleep as defaultSleep, type Sleep } from "./throttle";

export interface TickOptions {
  dryRun?: boolean;
  autoSubmit?: boolean;
  tailor?: boolean;
  maxFillsPerRun: number;
  /** Failed jobs whose attemptCount reaches this are rejected. Unset means never. */
  maxAttempts?: number | null;
  signal?: AbortSignal;
}

export interface LoopOptions extends TickOptions {
  intervalMs: number;
  signal: AbortSignal;
}

export type TickJobStatus = "succeeded" | "failed" | "skipped" | "planned";

export interface TickJobResult {
  jobId: number;
  status: TickJobStatus;
  state: JobRecord["state"];
  attemptCount: number;
  reason?: string;
  abandoned?: boolean;
}

export interface TickSummary {
  runId: string;
  dryRun: boolean;
  considered: number;
  processed: number;
  succeeded: number;
  failed: number;
  skipped: number;
  abandoned: number;
  stoppedEarly: boolean;
  results: TickJobResult[];
}

export interface SchedulerDeps {
  store: JobStore;
  orchestrator: PipelineOrchestrator;
  logger: Logger;
  createRunLogger: (manifest: RunManifest) => RunLogger;
  sleep?: Sleep;
}

export function generateRunId(): string {
  const stamp = new Date().toISOString().replace(/[-:]/g, "").replace(/\..+$/, "");
  return `${stamp}-${randomBytes(3).toString("hex")}`;
}

/**
 * Advances approved jobs through the orchestrator. One tick is a single pass over the
 * approved queue, oldest first, capped at `maxFillsPerRun` browser attempts. Spacing
 * between attempts is the orchestrator's throttle, so it holds for manual calls too.
 */
export class Scheduler {
  private readonly deps: SchedulerDeps;
  private readonly sleep: Sleep;

  constructor(deps: SchedulerDeps) {
    this.deps = deps;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async tick(options: TickOptions): Promise<TickSummary> {
    const { store, orchestrator, logger } = this.deps;
    const runId = generateRunId();
    const dryRun = options.dryRun === true;
    const runLogger = this.deps.createRunLogger({
      runId,
      startedAt: new Date().toISOString(),
      dryRun,
      autoSubmit: options.autoSubmit === true,
      tailor: options.tailor === true,
      maxFillsPerRun: options.maxFillsPerRun,
    });
    const approved = await store.list({ state: "approved" });
    const summary: TickSummary = {
      runId,
      dryRun,
      considered: approved.length,
      processed: 0,
      succeeded: 0,
      failed: 0,
      skipped: 0,
      abandoned: 0,
      stoppedEarly: false,
      results: [],
    };

    runLogger.logEvent({ step: "tick-start", reason: `${approved.length} approved` });
    logger.info(`Tick ${runId}: ${approved.length} approved job(s), cap ${options.maxFillsPerRun}${dryRun ? " (dry run)" : ""}`);

    for (const job of approved) {
      if (options.signal?.aborted) {
        summary.stoppedEarly = true;
        logger.info("Stop requested; ending tick");
        break;
      }
      if (summary.processed >= options.maxFillsPerRun) {
        summary.stoppedEarly = true;
        logger.info(`Reached per-run cap of ${options.maxFillsPerRun}`);
        break;
      }

      if (dryRun) {
        summary.processed += 1;
        summary.results.push({ jobId: job.id, status: "planned", state: job.state, attemptCount: job.attemptCount });
        logger.info(`[dry run] would fill #${job.id}: ${job.company} / ${job.roleTitle} (${job.platform ?? "?"})`);
        continue;
      }

      const result = await this.processJob(job, options, runLogger);
      if (result === "aborted") {
        summary.stoppedEarly = true;
        break;
      }
      summary.results.push(result);
      if (result.status === "skipped") {
        summary.skipped += 1;
        continue;
      }
      summary.processed += 1;
      if (result.status === "succeeded") {
        summary.succeeded += 1;
      } else {
        summary.failed += 1;
      }
      if (result.abandoned) {
        summary.abandoned += 1;
      }
    }

    runLogger.logEvent({
      step: "tick-end",
      reason: `processed=${summary.processed} succeeded=${summary.succeeded} failed=${summary.failed} skipped=${summary.skipped}`,
    });
    logger.info(
      `Tick ${runId} done: ${summary.succeeded}/${summary.processed} succeeded, ${summary.failed} failed, ${summary.skipped} skipped`
    );
    return summary;
  }

  /** Re-ticks every `intervalMs` until the signal aborts. */
  async runLoop(options: LoopOptions): Promise<number> {
    const { logger } = this.deps;
    let ticks = 0;
    logger.info(`Daemon started. Interval: ${options.intervalMs}ms, max per run: ${options.maxFillsPerRun}`);

    while (!options.signal.aborted) {
      try {
        await this.tick(options);
      } catch (error) {
        logger.error(`Tick failed: ${errorMessage(error)}`);
      }
      ticks += 1;

      if (options.signal.aborted) {
        break;
      }
      logger.info(`Sleeping ${options.intervalMs}ms until next tick`);
      try {
        await this.sleep(options.intervalMs, options.signal);
      } catch (error) {
        if (!options.signal.aborted) {
          throw error;
        }
      }
    }

    logger.info("Daemon stopped");
    return ticks;
  }

  private async processJob(
    job: JobRecord,
    options: TickOptions,
    runLogger: RunLogger
  ): Promise<TickJobResult | "aborted"> {
    const { orchestrator, logger } = this.deps;
    const action = options.autoSubmit ? "fill+submit" : "fill";
    runLogger.logEvent({
      step: "job-start",
      jobId: job.id,
      company: job.company,
      roleTitle: job.roleTitle,
      platform: job.platform ?? undefined,
      action,
    });

    if (options.tailor && job.jdText && !job.resumePath) {
      try {
        await orchestrator.tailor(job.id);
      } catch (error) {
        logger.warn(`Job #${job.id}: continuing with default resume (${errorMessage(error)})`);
      }
    }

    try {
      const outcome = await orchestrator.fill(job.id, { submit: options.autoSubmit === true, signal: options.signal });
      let final = outcome.job;
      let abandoned = false;
      if (!outcome.ok && this.shouldAbandon(final, options.maxAttempts)) {
        try {
          final = await orchestrator.reject(job.id, `max attempts reached (${final.attemptCount})`);
          abandoned = true;
          runLogger.logEvent({ step: "job-abandoned", jobId: job.id, attemptCount: final.attemptCount });
        } catch (error) {
          // The attempt still counts; abandoning is retried on the next failure.
          logger.warn(`Job #${job.id}: could not abandon after ${final.attemptCount} attempts (${errorMessage(error)})`);
        }
      }
      runLogger.logEvent({
        step: "job-result",
        jobId: job.id,
        action,
        ok: outcome.ok,
        state: final.state,
        attemptCount: final.attemptCount,
        reason: outcome.error,
        screenshotRef: final.screenshotRef,
      });
      return {
        jobId: job.id,
        status: outcome.ok ? "succeeded" : "failed",
        state: final.state,
        attemptCount: final.attemptCount,
        reason: outcome.error,
        abandoned,
      };
    } catch (error) {
      if (options.signal?.aborted) {
        logger.info(`Stop requested before job #${job.id} started`);
        return "aborted";
      }
      if (isPipelineError(error) && error.code !== "COLLABORATOR_FAILURE") {
        logger.warn(`Job #${job.id} skipped: ${error.message}`);
        runLogger.logEvent({ step: "job-skipped", jobId: job.id, reason: error.code });
        return { jobId: job.id, status: "skipped", state: job.state, attemptCount: job.attemptCount, reason: error.message };
      }
      const reason = errorMessage(error);
      logger.error(`Job #${job.id} failed unexpectedly: ${reason}`);
      runLogger.logEvent({ step: "job-result", jobId: job.id, action, ok: false, reason });
      return { jobId: job.id, status: "failed", state: job.state, attemptCount: job.attemptCount, reason };
    }
  }

  private shouldAbandon(job: JobRecord, maxAttempts: number | null | undefined): boolean {
    return typeof maxAttempts === "number" && maxAttempts > 0 && job.attemptCount >= maxAttempts && job.state === "approved";
  }
}
