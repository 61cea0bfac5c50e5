import fs from "fs";
import path from "path";

export type RunStep = "tick-start" | "job-start" | "job-result" | "job-skipped" | "job-abandoned" | "tick-end";

export interface RunEvent {
  runId: string;
  step: RunStep;
  jobId?: number;
  company?: string;
  roleTitle?: string;
  platform?: string;
  action?: string;
  ok?: boolean;
  state?: string;
  attemptCount?: number;
  reason?: string;
  screenshotRef?: string;
  timestamp: string;
}

export interface RunManifest {
  runId: string;
  startedAt: string;
  dryRun: boolean;
  autoSubmit: boolean;
  tailor: boolean;
  maxFillsPerRun: number;
}

export interface RunLogger {
  logEvent(event: Omit<RunEvent, "runId" | "timestamp">): void;
  getLogPath(): string;
}

export function createRunLogger(logDir: string, runId: string): RunLogger {
  fs.mkdirSync(logDir, { recursive: true });
  const logPath = path.join(logDir, `run-${runId}.jsonl`);

  return {
    logEvent(event): void {
      const line = JSON.stringify({ runId, ...event, timestamp: new Date().toISOString() });
      fs.appendFileSync(logPath, `${line}\n`, "utf8");
    },
    getLogPath(): string {
      return logPath;
    },
  };
}

export function writeRunManifest(logDir: string, manifest: RunManifest): void {
  fs.mkdirSync(logDir, { recursive: true });
  fs.writeFileSync(path.join(logDir, "manifest.json"), JSON.stringify(manifest, null, 2));
}

/** Discards events; used when a tick should leave no trace on disk. */
export const nullRunLogger: RunLogger = {
  logEvent(): void {
    return;
  },
  getLogPath(): string {
    return "";
  },
};
