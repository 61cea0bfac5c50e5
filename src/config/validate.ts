import os from "os";
import path from "path";
import type { AppConfig } from "./index";
import { defaultConfig, homeDir } from "./index";
import { CURRENT_SCHEMA_VERSION } from "./migrate";
import type { ApplicantProfile, LlmConfig, ResumeAsset } from "../types/context";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function expandHome(value: string): string {
  if (!value.startsWith("~")) {
    return value;
  }

  return path.join(os.homedir(), value.slice(1));
}

function readString(source: Record<string, unknown>, key: string, fallback: string): string {
  const value = source[key];
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

function readOptionalString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function readNumber(source: Record<string, unknown>, key: string, fallback: number): number {
  const value = source[key];
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : fallback;
}

function readBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = source[key];
  return typeof value === "boolean" ? value : fallback;
}

export function validateConfig(raw: unknown): AppConfig {
  const config = isRecord(raw) ? raw : {};
  const rawApp = isRecord(config.app) ? config.app : {};
  const dataDir = expandHome(readString(rawApp, "dataDir", homeDir()));
  const base = defaultConfig(dataDir);

  const schemaVersion = typeof config.schemaVersion === "number" ? config.schemaVersion : CURRENT_SCHEMA_VERSION;

  const maxAttempts = rawApp.maxAttempts;
  const app: AppConfig["app"] = {
    dataDir,
    storePath: expandHome(readString(rawApp, "storePath", base.app.storePath)),
    answersPath: expandHome(readString(rawApp, "answersPath", base.app.answersPath)),
    assetsDir: expandHome(readString(rawApp, "assetsDir", base.app.assetsDir)),
    headless: readBoolean(rawApp, "headless", base.app.headless),
    slowMoMs: readNumber(rawApp, "slowMoMs", base.app.slowMoMs),
    maxFillsPerRun: Math.floor(readNumber(rawApp, "maxFillsPerRun", base.app.maxFillsPerRun)),
    minActionIntervalMs: readNumber(rawApp, "minActionIntervalMs", base.app.minActionIntervalMs),
    tickIntervalMs: readNumber(rawApp, "tickIntervalMs", base.app.tickIntervalMs),
    autoSubmit: readBoolean(rawApp, "autoSubmit", base.app.autoSubmit),
    maxAttempts:
      typeof maxAttempts === "number" && Number.isInteger(maxAttempts) && maxAttempts > 0 ? maxAttempts : null,
    collaboratorTimeoutMs: readNumber(rawApp, "collaboratorTimeoutMs", base.app.collaboratorTimeoutMs),
    leaseTtlMs: readNumber(rawApp, "leaseTtlMs", base.app.leaseTtlMs),
    llm: validateLlm(rawApp.llm, base.app.llm),
  };

  return {
    schemaVersion,
    app,
    profile: validateProfile(config.profile),
    resumes: Array.isArray(config.resumes) ? config.resumes.filter(isResumeAsset) : [],
  };
}

function validateLlm(raw: unknown, base: LlmConfig): LlmConfig {
  const llm = isRecord(raw) ? raw : {};
  return {
    provider: "openai",
    model: readString(llm, "model", base.model),
    maxOutputTokens: readNumber(llm, "maxOutputTokens", base.maxOutputTokens),
    enabled: readBoolean(llm, "enabled", base.enabled),
  };
}

function validateProfile(raw: unknown): ApplicantProfile {
  const profile = isRecord(raw) ? raw : {};
  return {
    fullName: readString(profile, "fullName", ""),
    email: readString(profile, "email", ""),
    phone: readString(profile, "phone", ""),
    location: readOptionalString(profile, "location"),
    linkedin: readOptionalString(profile, "linkedin"),
    website: readOptionalString(profile, "website"),
    github: readOptionalString(profile, "github"),
    summary: readOptionalString(profile, "summary"),
    skills: isStringArray(profile.skills) ? profile.skills : undefined,
  };
}

function isResumeAsset(value: unknown): value is ResumeAsset {
  if (!isRecord(value)) {
    return false;
  }

  return (
    typeof value.label === "string" &&
    typeof value.path === "string" &&
    typeof value.sha256 === "string" &&
    typeof value.isDefault === "boolean"
  );
}
