import { z } from "zod";

const platformSchema = z.enum(["lever", "greenhouse", "ashby", "workday", "unknown"]);
const stateSchema = z.enum(["scraped", "approved", "ready", "submitted", "skipped", "rejected"]);

export const jobRecordSchema = z.object({
  id: z.number().int().positive(),
  url: z.string().min(1),
  company: z.string(),
  roleTitle: z.string(),
  platform: platformSchema.nullable(),
  jdText: z.string().optional(),
  state: stateSchema,
  resumePath: z.string().optional(),
  attemptCount: z.number().int().nonnegative(),
  lastError: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
  screenshotRef: z.string().optional(),
  source: z.string().default("manual"),
  submittedAt: z.string().optional(),
  screeningQuestions: z.array(z.string()).default([]),
  screeningAnswers: z.record(z.string()).default({}),
});

export const leaseSchema = z.object({
  owner: z.string(),
  acquiredAt: z.number(),
});

export const jobTableSchema = z.object({
  version: z.literal(1),
  nextId: z.number().int().positive(),
  jobs: z.array(jobRecordSchema),
  leases: z.record(leaseSchema).default({}),
  lastActionAt: z.number().nullable().default(null),
});

export type JobTable = z.infer<typeof jobTableSchema>;
export type Lease = z.infer<typeof leaseSchema>;

export function emptyTable(): JobTable {
  return { version: 1, nextId: 1, jobs: [], leases: {}, lastActionAt: null };
}
