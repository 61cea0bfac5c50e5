import fs from "fs";
import path from "path";
import { z } from "zod";
import type { Logger } from "../logging";
import type { JobStore } from "../storage/jobStore";
import type { ScraperBackend } from "../types/collaborators";
import type { CompanyRegistryEntry } from "../types/jobs";
import { AshbyScraper } from "./ashbyFetcher";
import { GreenhouseScraper } from "./greenhouseFetcher";
import { HackerNewsScraper } from "./hackerNewsFetcher";
import type { FetchLike } from "./http";
import { LeverScraper } from "./leverFetcher";
import { WellfoundScraper } from "./wellfoundFetcher";

export { AshbyScraper, GreenhouseScraper, HackerNewsScraper, LeverScraper, WellfoundScraper };
export { stripHtml } from "./html";

export interface SourceToken {
  backend: string;
  slug: string;
}

export interface IngestResult {
  total: number;
  added: number;
  duplicates: number;
}

export interface IngestOptions {
  query?: string;
  /** Display name that replaces the board slug on inserted records. */
  companyName?: string;
  logger?: Logger;
}

export type ScraperRegistry = Map<string, ScraperBackend>;

/** `lever:acme` -> { backend: "lever", slug: "acme" }; `hn` has no slug. */
export function parseSourceToken(token: string): SourceToken {
  const trimmed = token.trim();
  const separator = trimmed.indexOf(":");
  if (separator === -1) {
    return { backend: trimmed.toLowerCase(), slug: "" };
  }
  return {
    backend: trimmed.slice(0, separator).toLowerCase(),
    slug: trimmed.slice(separator + 1).trim(),
  };
}

export function createScraperRegistry(fetchImpl: FetchLike = fetch): ScraperRegistry {
  const scrapers: ScraperBackend[] = [
    new LeverScraper(fetchImpl),
    new GreenhouseScraper(fetchImpl),
    new AshbyScraper(fetchImpl),
    new WellfoundScraper(fetchImpl),
    new HackerNewsScraper(fetchImpl),
  ];
  return new Map(scrapers.map((scraper) => [scraper.name, scraper]));
}

export function resolveScraper(registry: ScraperRegistry, token: string): { scraper: ScraperBackend; slug: string } {
  const { backend, slug } = parseSourceToken(token);
  const scraper = registry.get(backend);
  if (!scraper) {
    const available = Array.from(registry.keys()).join(", ");
    throw new Error(`Unknown scrape source '${token}'. Available: ${available}`);
  }
  if (backend !== "hn" && slug.length === 0) {
    throw new Error(`Scrape source '${token}' needs a company slug, e.g. ${backend}:acme`);
  }
  return { scraper, slug };
}

/**
 * Streams postings from one source into the store. A backend failure stops the scrape
 * and propagates; postings inserted before it stay.
 */
export async function ingest(
  store: JobStore,
  registry: ScraperRegistry,
  token: string,
  options: IngestOptions = {}
): Promise<IngestResult> {
  const { query, companyName, logger } = options;
  const { scraper, slug } = resolveScraper(registry, token);
  const result: IngestResult = { total: 0, added: 0, duplicates: 0 };
  const source = token.trim();

  for await (const posting of scraper.discover(slug, query)) {
    result.total += 1;
    const { created } = await store.insert({
      url: posting.url,
      company: companyName ?? posting.company,
      roleTitle: posting.title,
      jdText: posting.jdText,
      source,
    });
    if (created) {
      result.added += 1;
    } else {
      result.duplicates += 1;
    }
  }

  logger?.info(`Scraped ${source}: ${result.total} found, ${result.added} added, ${result.duplicates} duplicates`);
  return result;
}

const companyRegistrySchema = z.array(
  z.object({
    name: z.string().min(1),
    source: z.string().min(1),
  })
);

export function loadCompanyRegistry(registryPath: string): CompanyRegistryEntry[] {
  const resolved = path.resolve(registryPath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Company registry not found: ${resolved}`);
  }
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, "utf8"));
  const parsed = companyRegistrySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid company registry ${resolved}: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown"}`);
  }
  return parsed.data;
}
