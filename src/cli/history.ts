import fs from "fs";
import path from "path";
import { z } from "zod";

const manifestSchema = z.object({
  runId: z.string(),
  startedAt: z.string(),
  dryRun: z.boolean().default(false),
  autoSubmit: z.boolean().default(false),
  tailor: z.boolean().default(false),
  maxFillsPerRun: z.number().default(0),
});

const eventSchema = z.object({
  step: z.string(),
  ok: z.boolean().optional(),
});

export interface RunSummary {
  runId: string;
  startedAt: string;
  dryRun: boolean;
  autoSubmit: boolean;
  succeeded: number;
  failed: number;
  skipped: number;
  abandoned: number;
  logPath: string;
}

export function readRunSummary(runDir: string, runId: string): RunSummary {
  const manifestPath = path.join(runDir, "manifest.json");
  const logPath = path.join(runDir, `run-${runId}.jsonl`);
  const manifest = fs.existsSync(manifestPath)
    ? manifestSchema.safeParse(JSON.parse(fs.readFileSync(manifestPath, "utf8")))
    : null;

  const summary: RunSummary = {
    runId,
    startedAt: manifest?.success ? manifest.data.startedAt : fs.statSync(runDir).mtime.toISOString(),
    dryRun: manifest?.success ? manifest.data.dryRun : false,
    autoSubmit: manifest?.success ? manifest.data.autoSubmit : false,
    succeeded: 0,
    failed: 0,
    skipped: 0,
    abandoned: 0,
    logPath,
  };

  if (!fs.existsSync(logPath)) {
    return summary;
  }

  for (const line of fs.readFileSync(logPath, "utf8").split("\n")) {
    if (!line.trim()) {
      continue;
    }
    let parsedLine: unknown;
    try {
      parsedLine = JSON.parse(line);
    } catch {
      // A run killed mid-write leaves a truncated last line.
      continue;
    }
    const event = eventSchema.safeParse(parsedLine);
    if (!event.success) {
      continue;
    }
    if (event.data.step === "job-result") {
      if (event.data.ok) {
        summary.succeeded += 1;
      } else {
        summary.failed += 1;
      }
    } else if (event.data.step === "job-skipped") {
      summary.skipped += 1;
    } else if (event.data.step === "job-abandoned") {
      summary.abandoned += 1;
    }
  }
  return summary;
}

/** Newest first. */
export function listRuns(runsDir: string, limit: number): RunSummary[] {
  if (!fs.existsSync(runsDir)) {
    return [];
  }

  return fs
    .readdirSync(runsDir)
    .filter((entry) => fs.statSync(path.join(runsDir, entry)).isDirectory())
    .map((runId) => readRunSummary(path.join(runsDir, runId), runId))
    .sort((a, b) => b.startedAt.localeCompare(a.startedAt))
    .slice(0, limit);
}
