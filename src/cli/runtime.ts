import path from "path";
import { createStoreAnswerCache, ScreeningAnswerResolver } from "../answers/resolver";
import { loadAnswerTable } from "../answers/table";
import { ResumeVault } from "../assets";
import { createPlaywrightSession } from "../automation/playwright";
import type { AppConfig } from "../config";
import { createHandlerRegistry } from "../core/handlers";
import { PipelineOrchestrator } from "../core/orchestrator";
import { Scheduler } from "../core/scheduler";
import { ActionThrottle } from "../core/throttle";
import { BrowserFormFiller } from "../forms/filler";
import { createAiAnswerer } from "../llm";
import { childLogger, createLogger, createRunLogger, nullRunLogger, writeRunManifest, type Logger } from "../logging";
import { FileJobStore, type JobStore } from "../storage/jobStore";
import type { FormFiller } from "../types/collaborators";

export interface Runtime {
  config: AppConfig;
  store: JobStore;
  resolver: ScreeningAnswerResolver;
  orchestrator: PipelineOrchestrator;
  scheduler: Scheduler;
  logger: Logger;
  close(): Promise<void>;
}

export interface RuntimeOverrides {
  store?: JobStore;
  filler?: FormFiller & { close?: () => Promise<void> };
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

export function runsDir(config: AppConfig): string {
  return path.join(config.app.dataDir, "runs");
}

export function buildRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  const logger = overrides.logger ?? createLogger("jobpipe");
  const store = overrides.store ?? new FileJobStore(config.app.storePath);
  const aiAnswerer = createAiAnswerer(config.app.llm, overrides.env);
  if (config.app.llm.enabled && !aiAnswerer) {
    logger.warn("LLM answers enabled but OPENAI_API_KEY is not set; free-text questions stay unanswered");
  }

  const resolver = new ScreeningAnswerResolver(loadAnswerTable(config.app.answersPath), {
    aiAnswerer: aiAnswerer ?? undefined,
    cache: createStoreAnswerCache(store),
    profile: config.profile,
    timeoutMs: config.app.collaboratorTimeoutMs,
    logger: childLogger(logger, "[answers]"),
  });

  const filler =
    overrides.filler ??
    new BrowserFormFiller({
      openSession: () => createPlaywrightSession({ headless: config.app.headless, slowMoMs: config.app.slowMoMs }),
      logger: childLogger(logger, "[filler]"),
    });

  const vault = new ResumeVault(config.app.assetsDir, config.resumes);
  const orchestrator = new PipelineOrchestrator({
    store,
    handlers: createHandlerRegistry(filler),
    resolver,
    throttle: new ActionThrottle(store, config.app.minActionIntervalMs),
    profile: config.profile,
    tailor: vault.isEmpty() ? undefined : vault,
    defaultResumePath: vault.defaultResume()?.path ?? null,
    screenshotDir: path.join(config.app.dataDir, "screenshots"),
    timeoutMs: config.app.collaboratorTimeoutMs,
    leaseTtlMs: config.app.leaseTtlMs,
    logger,
  });

  const scheduler = new Scheduler({
    store,
    orchestrator,
    logger,
    createRunLogger: (manifest) => {
      if (manifest.dryRun) {
        return nullRunLogger;
      }
      const logDir = path.join(runsDir(config), manifest.runId);
      writeRunManifest(logDir, manifest);
      return createRunLogger(logDir, manifest.runId);
    },
  });

  return {
    config,
    store,
    resolver,
    orchestrator,
    scheduler,
    logger,
    close: async () => {
      await filler.close?.();
    },
  };
}
