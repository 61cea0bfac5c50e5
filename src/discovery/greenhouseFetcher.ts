import { z } from "zod";
import type { DiscoveredPosting, ScraperBackend } from "../types/collaborators";
import { decodeEntities, stripHtml } from "./html";
import { fetchJson, matchesQuery, type FetchLike } from "./http";

const greenhouseResponseSchema = z.object({
  jobs: z
    .array(
      z.object({
        id: z.number(),
        title: z.string().optional(),
        absolute_url: z.string().optional(),
        location: z.object({ name: z.string().optional() }).optional(),
        content: z.string().optional(),
      })
    )
    .default([]),
});

export class GreenhouseScraper implements ScraperBackend {
  readonly name = "greenhouse";
  private readonly fetchImpl: FetchLike;

  constructor(fetchImpl: FetchLike = fetch) {
    this.fetchImpl = fetchImpl;
  }

  async *discover(companySlug: string, query?: string): AsyncIterable<DiscoveredPosting> {
    const url = `https://boards-api.greenhouse.io/v1/boards/${encodeURIComponent(companySlug)}/jobs?content=true`;
    const data = await fetchJson(this.fetchImpl, url, greenhouseResponseSchema);
    for (const job of data.jobs) {
      const title = job.title ?? "";
      if (!title || !job.absolute_url || !matchesQuery(title, query)) {
        continue;
      }
      yield {
        url: job.absolute_url,
        company: companySlug,
        title,
        location: job.location?.name,
        // The board API double-escapes content: entities first, then tags.
        jdText: job.content ? stripHtml(decodeEntities(job.content)) : undefined,
      };
    }
  }
}
