import type { DiscoveredPosting, ScraperBackend } from "../types/collaborators";
import { fetchText, matchesQuery, type FetchLike } from "./http";

interface ListingCandidate {
  id: string;
  slug?: string;
  title: string;
  location?: string;
  description?: string;
}

/**
 * Wellfound has no public board API; company job pages embed their listings in the
 * Next.js data blob, so listings are pulled out of `__NEXT_DATA__`.
 */
export class WellfoundScraper implements ScraperBackend {
  readonly name = "wellfound";
  private readonly fetchImpl: FetchLike;

  constructor(fetchImpl: FetchLike = fetch) {
    this.fetchImpl = fetchImpl;
  }

  async *discover(companySlug: string, query?: string): AsyncIterable<DiscoveredPosting> {
    const html = await fetchText(this.fetchImpl, `https://wellfound.com/company/${encodeURIComponent(companySlug)}/jobs`);
    const data = extractNextData(html);
    if (data === null) {
      throw new Error(`No listing data found on Wellfound page for ${companySlug}`);
    }

    const seen = new Set<string>();
    for (const listing of collectListings(data)) {
      if (seen.has(listing.id) || !matchesQuery(listing.title, query)) {
        continue;
      }
      seen.add(listing.id);
      const path = listing.slug ? `${listing.id}-${listing.slug}` : listing.id;
      yield {
        url: `https://wellfound.com/jobs/${path}`,
        company: companySlug,
        title: listing.title,
        location: listing.location,
        jdText: listing.description,
      };
    }
  }
}

export function extractNextData(html: string): unknown {
  const match = html.match(/<script[^>]*id="__NEXT_DATA__"[^>]*>([\s\S]*?)<\/script>/i);
  if (!match) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(match[1]);
    return parsed;
  } catch {
    return null;
  }
}

export function collectListings(node: unknown, out: ListingCandidate[] = []): ListingCandidate[] {
  if (Array.isArray(node)) {
    for (const item of node) {
      collectListings(item, out);
    }
    return out;
  }
  if (typeof node !== "object" || node === null) {
    return out;
  }

  const record: Record<string, unknown> = Object.fromEntries(Object.entries(node));
  const typename = record.__typename;
  const id = record.id;
  const title = record.title;
  if (
    typeof typename === "string" &&
    typename.startsWith("JobListing") &&
    (typeof id === "string" || typeof id === "number") &&
    typeof title === "string" &&
    title.length > 0
  ) {
    out.push({
      id: String(id),
      title,
      slug: typeof record.slug === "string" ? record.slug : undefined,
      location: typeof record.locationNames === "string" ? record.locationNames : readLocations(record.locationNames),
      description: typeof record.description === "string" ? record.description : undefined,
    });
  }

  for (const value of Object.values(record)) {
    collectListings(value, out);
  }
  return out;
}

function readLocations(value: unknown): string | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  const names = value.filter((item): item is string => typeof item === "string");
  return names.length > 0 ? names.join(", ") : undefined;
}
