import fs from "fs";
import path from "path";
import { detectPlatform } from "../core/platformDetector";
import { InvalidTransitionError, NotFoundError } from "../core/errors";
import { canTransition } from "../core/stateMachine";
import type { JobFilter, JobPatch, JobRecord, JobState, NewJob, QueueStats } from "../types/jobs";
import { acquireFileLock, SerialQueue } from "./lockFile";
import { emptyTable, jobTableSchema, type JobTable } from "./schema";

export interface InsertResult {
  job: JobRecord;
  created: boolean;
}

export type JobMutator = (job: JobRecord) => JobPatch;

export interface JobStore {
  insert(input: NewJob): Promise<InsertResult>;
  get(id: number): Promise<JobRecord>;
  findByUrl(url: string): Promise<JobRecord | null>;
  list(filter?: JobFilter): Promise<JobRecord[]>;
  update(id: number, mutator: JobMutator): Promise<JobRecord>;
  resetAttempts(id: number): Promise<JobRecord>;
  stats(): Promise<QueueStats>;
  acquireLease(id: number, owner: string, ttlMs: number): Promise<boolean>;
  releaseLease(id: number, owner: string): Promise<void>;
  /** Reserves the next browser-action slot and returns how long the caller must wait for it. */
  reserveActionSlot(minIntervalMs: number, now: number): Promise<number>;
}

export interface StoreOptions {
  clock?: () => Date;
}

/**
 * Table semantics shared by every store. Subclasses only decide where the table lives
 * and how a transaction is isolated; a transaction that throws leaves nothing behind.
 */
export abstract class TableJobStore implements JobStore {
  protected readonly clock: () => Date;

  constructor(options: StoreOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  protected abstract transact<T>(write: boolean, fn: (table: JobTable) => T): Promise<T>;

  async insert(input: NewJob): Promise<InsertResult> {
    const url = input.url.trim();
    if (url.length === 0) {
      throw new Error("Job url is required");
    }

    return this.transact(true, (table) => {
      const existing = table.jobs.find((job) => job.url === url);
      if (existing) {
        return { job: structuredClone(existing), created: false };
      }

      const now = this.clock().toISOString();
      const job: JobRecord = {
        id: table.nextId,
        url,
        company: input.company?.trim() ?? "",
        roleTitle: input.roleTitle?.trim() ?? "",
        platform: input.platform ?? detectPlatform(url),
        jdText: input.jdText,
        state: "scraped",
        attemptCount: 0,
        createdAt: now,
        updatedAt: now,
        source: input.source ?? "manual",
        screeningQuestions: input.screeningQuestions ?? [],
        screeningAnswers: {},
      };
      table.nextId += 1;
      table.jobs.push(job);
      return { job: structuredClone(job), created: true };
    });
  }

  async get(id: number): Promise<JobRecord> {
    return this.transact(false, (table) => structuredClone(findJob(table, id)));
  }

  async findByUrl(url: string): Promise<JobRecord | null> {
    const target = url.trim();
    return this.transact(false, (table) => {
      const job = table.jobs.find((item) => item.url === target);
      return job ? structuredClone(job) : null;
    });
  }

  async list(filter: JobFilter = {}): Promise<JobRecord[]> {
    const states = filter.state === undefined ? null : Array.isArray(filter.state) ? filter.state : [filter.state];
    return this.transact(false, (table) =>
      table.jobs
        .filter((job) => (states ? states.includes(job.state) : true))
        .filter((job) => (filter.platform ? job.platform === filter.platform : true))
        .sort((a, b) => a.id - b.id)
        .map((job) => structuredClone(job))
    );
  }

  async update(id: number, mutator: JobMutator): Promise<JobRecord> {
    return this.transact(true, (table) => {
      const job = findJob(table, id);
      const patch = mutator(structuredClone(job));
      applyPatch(job, patch, this.clock());
      return structuredClone(job);
    });
  }

  async resetAttempts(id: number): Promise<JobRecord> {
    return this.transact(true, (table) => {
      const job = findJob(table, id);
      job.attemptCount = 0;
      job.updatedAt = this.clock().toISOString();
      return structuredClone(job);
    });
  }

  async stats(): Promise<QueueStats> {
    return this.transact(false, (table) => {
      const byState: Record<JobState, number> = {
        scraped: 0,
        approved: 0,
        ready: 0,
        submitted: 0,
        skipped: 0,
        rejected: 0,
      };
      let attempted = 0;
      for (const job of table.jobs) {
        byState[job.state] += 1;
        if (job.attemptCount > 0) {
          attempted += 1;
        }
      }
      return {
        total: table.jobs.length,
        byState,
        attempted,
        successRate: attempted === 0 ? 0 : byState.submitted / attempted,
      };
    });
  }

  async acquireLease(id: number, owner: string, ttlMs: number): Promise<boolean> {
    return this.transact(true, (table) => {
      findJob(table, id);
      const now = this.clock().getTime();
      const current = table.leases[String(id)];
      if (current && now - current.acquiredAt < ttlMs) {
        return false;
      }
      table.leases[String(id)] = { owner, acquiredAt: now };
      return true;
    });
  }

  async releaseLease(id: number, owner: string): Promise<void> {
    await this.transact(true, (table) => {
      const current = table.leases[String(id)];
      if (current && current.owner === owner) {
        delete table.leases[String(id)];
      }
    });
  }

  async reserveActionSlot(minIntervalMs: number, now: number): Promise<number> {
    return this.transact(true, (table) => {
      const slot = table.lastActionAt === null ? now : Math.max(now, table.lastActionAt + minIntervalMs);
      table.lastActionAt = slot;
      return slot - now;
    });
  }
}

export class FileJobStore extends TableJobStore {
  private readonly filePath: string;
  private readonly lockPath: string;
  private readonly queue = new SerialQueue();

  constructor(filePath: string, options: StoreOptions = {}) {
    super(options);
    this.filePath = filePath;
    this.lockPath = `${filePath}.lock`;
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  getPath(): string {
    return this.filePath;
  }

  protected transact<T>(write: boolean, fn: (table: JobTable) => T): Promise<T> {
    return this.queue.run(async () => {
      const release = await acquireFileLock(this.lockPath);
      try {
        const table = await this.readTable();
        const result = fn(table);
        if (write) {
          await this.writeTable(table);
        }
        return result;
      } finally {
        await release();
      }
    });
  }

  private async readTable(): Promise<JobTable> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return emptyTable();
      }
      throw error;
    }
    const parsed = jobTableSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Job table at ${this.filePath} is malformed: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async writeTable(table: JobTable): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.promises.writeFile(tmpPath, JSON.stringify(table, null, 2));
    await fs.promises.rename(tmpPath, this.filePath);
  }
}

function findJob(table: JobTable, id: number): JobRecord {
  const job = table.jobs.find((item) => item.id === id);
  if (!job) {
    throw new NotFoundError(id);
  }
  return job;
}

function applyPatch(job: JobRecord, patch: JobPatch, now: Date): void {
  if (patch.state !== undefined) {
    if (!canTransition(job.state, patch.state)) {
      throw new InvalidTransitionError(job.id, job.state, `move to '${patch.state}'`);
    }
    if (patch.state === "submitted") {
      job.submittedAt = now.toISOString();
    }
    job.state = patch.state;
  }

  if (patch.attemptCount !== undefined) {
    if (patch.attemptCount < job.attemptCount) {
      throw new Error(`Job #${job.id}: attemptCount cannot decrease (${job.attemptCount} -> ${patch.attemptCount})`);
    }
    job.attemptCount = patch.attemptCount;
  }

  if (patch.platform !== undefined) {
    job.platform = patch.platform;
  }
  if (patch.resumePath !== undefined) {
    job.resumePath = patch.resumePath;
  }
  if (patch.lastError === null) {
    delete job.lastError;
  } else if (patch.lastError !== undefined) {
    job.lastError = patch.lastError;
  }
  if (patch.screenshotRef === null) {
    delete job.screenshotRef;
  } else if (patch.screenshotRef !== undefined) {
    job.screenshotRef = patch.screenshotRef;
  }
  if (patch.screeningAnswers !== undefined) {
    job.screeningAnswers = { ...job.screeningAnswers, ...patch.screeningAnswers };
  }

  job.updatedAt = now.toISOString();
}
