import type { ApplicantContext, ApplicantProfile } from "./context";
import type { JobRecord, Platform } from "./jobs";

export interface FillResult {
  ok: boolean;
  screenshotRef?: string;
  error?: string;
}

export interface SubmitResult {
  ok: boolean;
  screenshotRef?: string;
  error?: string;
}

export interface JobContext {
  job: JobRecord;
  platform: Platform;
  resumePath: string | null;
  profile: ApplicantProfile;
  answers: Record<string, string>;
  resolveQuestion: (question: string) => Promise<string | null>;
  screenshotDir: string;
  /** Set when `submit` runs right after this fill; the filler keeps the form open. */
  submitAfterFill?: boolean;
  /** Aborts when the attempt is abandoned; the filler closes the job's page. */
  signal?: AbortSignal;
}

export interface FormFiller {
  fill(platform: Platform, ctx: JobContext): Promise<FillResult>;
  submit(platform: Platform, ctx: JobContext): Promise<SubmitResult>;
}

export interface PlatformHandler {
  platform: Platform;
  fill(ctx: JobContext): Promise<FillResult>;
  submit(ctx: JobContext): Promise<SubmitResult>;
  listQuestions?(job: JobRecord): Promise<string[]>;
}

export interface ResumeTailor {
  tailor(jdText: string, role: string): Promise<{ resumePath: string }>;
}

export interface AIAnswerer {
  answer(question: string, context: ApplicantContext): Promise<string>;
}

export interface DiscoveredPosting {
  url: string;
  company: string;
  title: string;
  jdText?: string;
  location?: string;
}

export interface ScraperBackend {
  name: string;
  discover(sourceToken: string, query?: string): AsyncIterable<DiscoveredPosting>;
}

/** The slice of `fetch` the HTTP clients use; tests pass a stub. */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
