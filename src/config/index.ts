import fs from "fs";
import os from "os";
import path from "path";
import type { ApplicantProfile, LlmConfig, ResumeAsset } from "../types/context";
import { validateConfig } from "./validate";
import { migrateConfig } from "./migrate";

export interface AppConfig {
  schemaVersion: number;
  app: {
    dataDir: string;
    storePath: string;
    answersPath: string;
    assetsDir: string;
    headless: boolean;
    slowMoMs: number;
    maxFillsPerRun: number;
    minActionIntervalMs: number;
    tickIntervalMs: number;
    autoSubmit: boolean;
    maxAttempts: number | null;
    collaboratorTimeoutMs: number;
    leaseTtlMs: number;
    llm: LlmConfig;
  };
  profile: ApplicantProfile;
  resumes: ResumeAsset[];
}

export function homeDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.JOBPIPE_HOME;
  return override && override.length > 0 ? override : path.join(os.homedir(), ".jobpipe");
}

export function defaultConfig(dataDir = homeDir()): AppConfig {
  return {
    schemaVersion: 1,
    app: {
      dataDir,
      storePath: path.join(dataDir, "jobs.json"),
      answersPath: path.join(dataDir, "answers.json"),
      assetsDir: path.join(dataDir, "assets"),
      headless: false,
      slowMoMs: 200,
      maxFillsPerRun: 5,
      minActionIntervalMs: 30_000,
      tickIntervalMs: 30 * 60_000,
      autoSubmit: false,
      maxAttempts: null,
      collaboratorTimeoutMs: 120_000,
      leaseTtlMs: 15 * 60_000,
      llm: {
        provider: "openai",
        model: "gpt-4o-mini",
        maxOutputTokens: 300,
        enabled: false,
      },
    },
    profile: {
      fullName: "",
      email: "",
      phone: "",
    },
    resumes: [],
  };
}

export function configPath(): string {
  return path.join(homeDir(), "config.json");
}

export function loadConfig(filePath = configPath()): AppConfig {
  if (!fs.existsSync(filePath)) {
    return defaultConfig();
  }

  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = JSON.parse(raw);
  const migrated = migrateConfig(parsed);
  const validated = validateConfig(migrated.config);
  if (migrated.changed) {
    saveConfig(validated, filePath);
  }
  return validated;
}

export function saveConfig(config: AppConfig, filePath = configPath()): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(config, null, 2));
}
