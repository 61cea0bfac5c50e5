import type { JobState } from "../types/jobs";

export const JOB_STATES: readonly JobState[] = ["scraped", "approved", "ready", "submitted", "skipped", "rejected"];

export const TERMINAL_STATES: readonly JobState[] = ["submitted", "skipped", "rejected"];

// Self-loops on approved and ready cover failed attempts and (re-)tailoring.
const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  scraped: ["approved", "skipped", "rejected"],
  approved: ["approved", "ready", "submitted", "skipped", "rejected"],
  ready: ["ready", "submitted", "skipped", "rejected"],
  submitted: [],
  skipped: [],
  rejected: [],
};

export type PipelineAction = "approve" | "skip" | "reject" | "tailor" | "fill" | "fill+submit" | "submit";

export const ACTION_PRECONDITIONS: Record<PipelineAction, readonly JobState[]> = {
  approve: ["scraped"],
  skip: ["scraped", "approved", "ready"],
  reject: ["scraped", "approved", "ready"],
  tailor: ["approved", "ready"],
  fill: ["approved"],
  "fill+submit": ["approved"],
  submit: ["ready"],
};

export function isTerminal(state: JobState): boolean {
  return TERMINAL_STATES.includes(state);
}

export function canTransition(from: JobState, to: JobState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function allowedTargets(from: JobState): readonly JobState[] {
  return TRANSITIONS[from];
}

export function canPerform(action: PipelineAction, state: JobState): boolean {
  return ACTION_PRECONDITIONS[action].includes(state);
}

export function isJobState(value: unknown): value is JobState {
  return typeof value === "string" && JOB_STATES.some((state) => state === value);
}
