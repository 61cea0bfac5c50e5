import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { FileJobStore, type JobStore, type StoreOptions } from "../src/storage/jobStore";
import { InMemoryJobStore } from "../src/storage/memoryJobStore";

const tempDirs: string[] = [];

function tempFile(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "jobpipe-store-"));
  tempDirs.push(dir);
  return path.join(dir, "jobs.json");
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

const factories: Array<[string, (options?: StoreOptions) => JobStore]> = [
  ["InMemoryJobStore", (options) => new InMemoryJobStore(options)],
  ["FileJobStore", (options) => new FileJobStore(tempFile(), options)],
];

describe.each(factories)("%s", (_name, createStore) => {
  it("inserts new jobs as scraped with a detected platform", async () => {
    const store = createStore();
    const { job, created } = await store.insert({ url: " https://jobs.lever.co/acme/1 ", company: "Acme", roleTitle: "Engineer" });
    expect(created).toBe(true);
    expect(job).toMatchObject({
      id: 1,
      url: "https://jobs.lever.co/acme/1",
      platform: "lever",
      state: "scraped",
      attemptCount: 0,
      source: "manual",
      screeningQuestions: [],
      screeningAnswers: {},
    });
  });

  it("returns the existing record for a duplicate url", async () => {
    const store = createStore();
    const first = await store.insert({ url: "https://jobs.lever.co/acme/1" });
    await store.update(first.job.id, () => ({ state: "approved" }));
    const second = await store.insert({ url: "https://jobs.lever.co/acme/1", company: "Other" });
    expect(second.created).toBe(false);
    expect(second.job.id).toBe(first.job.id);
    expect(second.job.state).toBe("approved");
    expect(await store.list()).toHaveLength(1);
  });

  it("assigns increasing ids and filters lists", async () => {
    const store = createStore();
    await store.insert({ url: "https://jobs.lever.co/a/1" });
    await store.insert({ url: "https://boards.greenhouse.io/b/jobs/2" });
    await store.insert({ url: "https://example.com/3" });
    await store.update(2, () => ({ state: "approved" }));

    expect((await store.list()).map((job) => job.id)).toEqual([1, 2, 3]);
    expect((await store.list({ state: "approved" })).map((job) => job.id)).toEqual([2]);
    expect((await store.list({ state: ["scraped", "approved"] })).map((job) => job.id)).toEqual([1, 2, 3]);
    expect((await store.list({ platform: "unknown" })).map((job) => job.id)).toEqual([3]);
  });

  it("throws NotFound for missing ids", async () => {
    const store = createStore();
    await expect(store.get(99)).rejects.toMatchObject({ code: "NOT_FOUND" });
    await expect(store.update(99, () => ({}))).rejects.toMatchObject({ code: "NOT_FOUND" });
  });

  it("rejects illegal transitions and leaves the record untouched", async () => {
    const store = createStore();
    const { job } = await store.insert({ url: "https://jobs.lever.co/acme/1" });
    await expect(store.update(job.id, () => ({ state: "submitted", lastError: "x" }))).rejects.toMatchObject({
      code: "INVALID_TRANSITION",
    });
    const after = await store.get(job.id);
    expect(after.state).toBe("scraped");
    expect(after.lastError).toBeUndefined();
  });

  it("never lets attemptCount go down through update", async () => {
    const store = createStore();
    const { job } = await store.insert({ url: "https://jobs.lever.co/acme/1" });
    await store.update(job.id, () => ({ attemptCount: 2 }));
    await expect(store.update(job.id, () => ({ attemptCount: 1 }))).rejects.toThrow("attemptCount cannot decrease");
    expect((await store.get(job.id)).attemptCount).toBe(2);
    expect((await store.resetAttempts(job.id)).attemptCount).toBe(0);
  });

  it("stamps submittedAt and clears optional fields with null", async () => {
    const clock = () => new Date("2026-03-01T12:00:00.000Z");
    const store = createStore({ clock });
    const { job } = await store.insert({ url: "https://jobs.lever.co/acme/1" });
    await store.update(job.id, () => ({ state: "approved", lastError: "captcha" }));
    const submitted = await store.update(job.id, () => ({ state: "submitted", lastError: null }));
    expect(submitted.submittedAt).toBe("2026-03-01T12:00:00.000Z");
    expect(submitted.lastError).toBeUndefined();
  });

  it("merges screening answers", async () => {
    const store = createStore();
    const { job } = await store.insert({ url: "https://jobs.lever.co/acme/1" });
    await store.update(job.id, () => ({ screeningAnswers: { a: "1" } }));
    const updated = await store.update(job.id, () => ({ screeningAnswers: { b: "2" } }));
    expect(updated.screeningAnswers).toEqual({ a: "1", b: "2" });
  });

  it("hands out one lease per job until released or expired", async () => {
    let now = new Date("2026-03-01T00:00:00.000Z");
    const store = createStore({ clock: () => now });
    const { job } = await store.insert({ url: "https://jobs.lever.co/acme/1" });

    expect(await store.acquireLease(job.id, "a", 1000)).toBe(true);
    expect(await store.acquireLease(job.id, "b", 1000)).toBe(false);
    await store.releaseLease(job.id, "b");
    expect(await store.acquireLease(job.id, "b", 1000)).toBe(false);
    await store.releaseLease(job.id, "a");
    expect(await store.acquireLease(job.id, "b", 1000)).toBe(true);

    now = new Date(now.getTime() + 1500);
    expect(await store.acquireLease(job.id, "c", 1000)).toBe(true);
  });

  it("spaces action slots by the minimum interval", async () => {
    const store = createStore();
    expect(await store.reserveActionSlot(1000, 10_000)).toBe(0);
    expect(await store.reserveActionSlot(1000, 10_200)).toBe(800);
    expect(await store.reserveActionSlot(1000, 10_200)).toBe(1800);
    expect(await store.reserveActionSlot(1000, 20_000)).toBe(0);
  });

  it("reports counts per state and the success rate", async () => {
    const store = createStore();
    await store.insert({ url: "https://jobs.lever.co/a/1" });
    await store.insert({ url: "https://jobs.lever.co/a/2" });
    await store.insert({ url: "https://jobs.lever.co/a/3" });
    await store.update(1, () => ({ state: "approved" }));
    await store.update(1, () => ({ state: "submitted", attemptCount: 1 }));
    await store.update(2, () => ({ state: "approved" }));
    await store.update(2, () => ({ attemptCount: 1 }));

    const stats = await store.stats();
    expect(stats.total).toBe(3);
    expect(stats.byState).toEqual({ scraped: 1, approved: 1, ready: 0, submitted: 1, skipped: 0, rejected: 0 });
    expect(stats.attempted).toBe(2);
    expect(stats.successRate).toBe(0.5);
  });

  it("serializes concurrent updates", async () => {
    const store = createStore();
    const { job } = await store.insert({ url: "https://jobs.lever.co/acme/1" });
    await Promise.all(
      Array.from({ length: 5 }, () => store.update(job.id, (current) => ({ attemptCount: current.attemptCount + 1 })))
    );
    expect((await store.get(job.id)).attemptCount).toBe(5);
  });
});

describe("FileJobStore persistence", () => {
  it("reloads records written by another instance", async () => {
    const filePath = tempFile();
    const writer = new FileJobStore(filePath);
    await writer.insert({ url: "https://jobs.ashbyhq.com/acme/1", company: "Acme", source: "ashby:acme" });
    await writer.update(1, () => ({ state: "approved" }));

    const reader = new FileJobStore(filePath);
    const job = await reader.get(1);
    expect(job).toMatchObject({ company: "Acme", state: "approved", platform: "ashby", source: "ashby:acme" });
    expect(fs.existsSync(`${filePath}.lock`)).toBe(false);
  });

  it("refuses a malformed table", async () => {
    const filePath = tempFile();
    fs.writeFileSync(filePath, JSON.stringify({ version: 2, jobs: "nope" }));
    await expect(new FileJobStore(filePath).list()).rejects.toThrow(/is malformed/);
  });

  it("keeps the table unchanged when a mutator throws", async () => {
    const filePath = tempFile();
    const store = new FileJobStore(filePath);
    await store.insert({ url: "https://jobs.lever.co/acme/1" });
    const before = fs.readFileSync(filePath, "utf8");
    await expect(
      store.update(1, () => {
        throw new Error("mutator failed");
      })
    ).rejects.toThrow("mutator failed");
    expect(fs.readFileSync(filePath, "utf8")).toBe(before);
  });
});
