import { z } from "zod";
import type { DiscoveredPosting, ScraperBackend } from "../types/collaborators";
import { stripHtml } from "./html";
import { fetchJson, HttpStatusError, matchesQuery, type FetchLike } from "./http";

const leverPostingSchema = z.object({
  id: z.string(),
  text: z.string().optional(),
  hostedUrl: z.string().optional(),
  categories: z
    .object({
      location: z.string().optional(),
      team: z.string().optional(),
    })
    .optional(),
  descriptionPlain: z.string().optional(),
  lists: z.array(z.object({ text: z.string().optional(), content: z.string().optional() })).optional(),
  additionalPlain: z.string().optional(),
});

const leverResponseSchema = z.array(leverPostingSchema);

type LeverPosting = z.infer<typeof leverPostingSchema>;

export class LeverScraper implements ScraperBackend {
  readonly name = "lever";
  private readonly fetchImpl: FetchLike;

  constructor(fetchImpl: FetchLike = fetch) {
    this.fetchImpl = fetchImpl;
  }

  async *discover(companySlug: string, query?: string): AsyncIterable<DiscoveredPosting> {
    const postings = await this.fetchPostings(companySlug);
    for (const posting of postings) {
      const title = posting.text ?? "";
      if (!title || !posting.hostedUrl || !matchesQuery(title, query)) {
        continue;
      }
      yield {
        url: posting.hostedUrl,
        company: companySlug,
        title,
        location: posting.categories?.location,
        jdText: buildJdText(posting),
      };
    }
  }

  private async fetchPostings(companySlug: string): Promise<LeverPosting[]> {
    const slug = encodeURIComponent(companySlug);
    try {
      return await fetchJson(this.fetchImpl, `https://api.lever.co/v0/postings/${slug}?mode=json`, leverResponseSchema);
    } catch (error) {
      // EU-hosted boards 404 on the global endpoint.
      if (error instanceof HttpStatusError && error.status === 404) {
        return fetchJson(this.fetchImpl, `https://api.eu.lever.co/v0/postings/${slug}?mode=json`, leverResponseSchema);
      }
      throw error;
    }
  }
}

function buildJdText(posting: LeverPosting): string | undefined {
  const parts: string[] = [];
  if (posting.descriptionPlain) {
    parts.push(posting.descriptionPlain);
  }
  for (const list of posting.lists ?? []) {
    if (list.text) {
      parts.push(list.text);
    }
    if (list.content) {
      parts.push(stripHtml(list.content));
    }
  }
  if (posting.additionalPlain) {
    parts.push(posting.additionalPlain);
  }
  return parts.length > 0 ? parts.join("\n\n") : undefined;
}
