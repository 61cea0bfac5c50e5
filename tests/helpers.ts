import { vi } from "vitest";
import { createStoreAnswerCache, ScreeningAnswerResolver } from "../src/answers/resolver";
import type { AnswerEntry } from "../src/answers/table";
import { createHandlerRegistry } from "../src/core/handlers";
import { PipelineOrchestrator } from "../src/core/orchestrator";
import { ActionThrottle } from "../src/core/throttle";
import type { Logger } from "../src/logging";
import type { JobStore } from "../src/storage/jobStore";
import { InMemoryJobStore } from "../src/storage/memoryJobStore";
import type { AIAnswerer, FillResult, JobContext, ResumeTailor, SubmitResult } from "../src/types/collaborators";
import type { ApplicantProfile } from "../src/types/context";
import type { Platform } from "../src/types/jobs";

export interface RecordingLogger extends Logger {
  lines: string[];
}

export function createTestLogger(): RecordingLogger {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`INFO ${message}`),
    warn: (message) => lines.push(`WARN ${message}`),
    error: (message) => lines.push(`ERROR ${message}`),
  };
}

export const testProfile: ApplicantProfile = {
  fullName: "Ada Example",
  email: "ada@example.com",
  phone: "555-0100",
  location: "Springfield",
};

export function createFakeFiller() {
  return {
    fill: vi.fn(async (_platform: Platform, _ctx: JobContext): Promise<FillResult> => ({ ok: true, screenshotRef: "fill.png" })),
    submit: vi.fn(async (_platform: Platform, _ctx: JobContext): Promise<SubmitResult> => ({ ok: true, screenshotRef: "submit.png" })),
  };
}

export type FakeFiller = ReturnType<typeof createFakeFiller>;

export interface HarnessOptions {
  store?: JobStore;
  entries?: AnswerEntry[];
  aiAnswerer?: AIAnswerer;
  tailor?: ResumeTailor;
  defaultResumePath?: string | null;
  timeoutMs?: number;
  throttle?: ActionThrottle;
}

export function createHarness(options: HarnessOptions = {}) {
  const store = options.store ?? new InMemoryJobStore();
  const filler = createFakeFiller();
  const logger = createTestLogger();
  const timeoutMs = options.timeoutMs ?? 1000;
  const resolver = new ScreeningAnswerResolver(options.entries ?? [], {
    aiAnswerer: options.aiAnswerer,
    cache: createStoreAnswerCache(store),
    profile: testProfile,
    timeoutMs,
    logger,
  });
  const orchestrator = new PipelineOrchestrator({
    store,
    handlers: createHandlerRegistry(filler),
    resolver,
    throttle: options.throttle ?? new ActionThrottle(store, 0),
    profile: testProfile,
    tailor: options.tailor,
    defaultResumePath: options.defaultResumePath,
    screenshotDir: "/tmp/jobpipe-test-shots",
    timeoutMs,
    leaseTtlMs: 60_000,
    logger,
  });
  return { store, filler, logger, resolver, orchestrator };
}

export async function addApproved(store: JobStore, harness: { orchestrator: PipelineOrchestrator }, url: string): Promise<number> {
  const { job } = await store.insert({ url, company: "Acme", roleTitle: "Engineer" });
  await harness.orchestrator.approve(job.id);
  return job.id;
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}
