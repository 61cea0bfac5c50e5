import type { Platform } from "../types/jobs";

interface PlatformRule {
  host: string;
  path: string;
  platform: Platform;
}

const PLATFORM_RULES: readonly PlatformRule[] = [
  { host: "jobs.lever.co", path: "/*", platform: "lever" },
  { host: "jobs.eu.lever.co", path: "/*", platform: "lever" },
  { host: "boards.greenhouse.io", path: "/*", platform: "greenhouse" },
  { host: "job-boards.greenhouse.io", path: "/*", platform: "greenhouse" },
  { host: "job-boards.eu.greenhouse.io", path: "/*", platform: "greenhouse" },
  { host: "jobs.ashbyhq.com", path: "/*", platform: "ashby" },
  { host: "*.myworkdayjobs.com", path: "/*", platform: "workday" },
  { host: "*.myworkdaysite.com", path: "/*", platform: "workday" },
];

export const SUPPORTED_PLATFORMS: readonly Platform[] = ["lever", "greenhouse", "ashby", "workday"];

export function detectPlatform(url: string): Platform {
  const parsed = parseUrl(url);
  if (!parsed) {
    return "unknown";
  }

  const host = parsed.hostname.toLowerCase();
  const pathname = parsed.pathname || "/";
  for (const rule of PLATFORM_RULES) {
    if (globMatch(rule.host, host) && globMatch(rule.path, pathname)) {
      return rule.platform;
    }
  }
  return "unknown";
}

export function isSupportedPlatform(platform: Platform | null | undefined): platform is Platform {
  return platform !== null && platform !== undefined && SUPPORTED_PLATFORMS.includes(platform);
}

export function isPlatform(value: unknown): value is Platform {
  return value === "unknown" || SUPPORTED_PLATFORMS.some((platform) => platform === value);
}

function parseUrl(url: string): URL | null {
  const trimmed = url.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  try {
    return new URL(withScheme);
  } catch {
    return null;
  }
}

function globMatch(pattern: string, value: string): boolean {
  const source = pattern
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${source}$`).test(value);
}
