export type Platform = "lever" | "greenhouse" | "ashby" | "workday" | "unknown";

export type JobState = "scraped" | "approved" | "ready" | "submitted" | "skipped" | "rejected";

export interface JobRecord {
  id: number;
  url: string;
  company: string;
  roleTitle: string;
  platform: Platform | null;
  jdText?: string;
  state: JobState;
  resumePath?: string;
  attemptCount: number;
  lastError?: string;
  createdAt: string;
  updatedAt: string;
  screenshotRef?: string;
  source: string;
  submittedAt?: string;
  screeningQuestions: string[];
  screeningAnswers: Record<string, string>;
}

export interface NewJob {
  url: string;
  company?: string;
  roleTitle?: string;
  jdText?: string;
  platform?: Platform;
  source?: string;
  screeningQuestions?: string[];
}

export interface JobFilter {
  state?: JobState | JobState[];
  platform?: Platform;
}

/**
 * Field changes requested by a store mutator. `state` is validated against the
 * transition table; omitted fields are left as they are and `null` clears an
 * optional field.
 */
export interface JobPatch {
  state?: JobState;
  platform?: Platform;
  resumePath?: string;
  attemptCount?: number;
  lastError?: string | null;
  screenshotRef?: string | null;
  screeningAnswers?: Record<string, string>;
}

export interface QueueStats {
  total: number;
  byState: Record<JobState, number>;
  attempted: number;
  successRate: number;
}

export interface CompanyRegistryEntry {
  name: string;
  source: string;
}
