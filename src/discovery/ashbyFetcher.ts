import { z } from "zod";
import type { DiscoveredPosting, ScraperBackend } from "../types/collaborators";
import { stripHtml } from "./html";
import { fetchJson, matchesQuery, type FetchLike } from "./http";

const ashbyResponseSchema = z.object({
  jobs: z
    .array(
      z.object({
        title: z.string().optional(),
        jobUrl: z.string().optional(),
        location: z.string().optional(),
        isRemote: z.boolean().optional(),
        isListed: z.boolean().optional(),
        descriptionPlain: z.string().optional(),
        descriptionHtml: z.string().optional(),
      })
    )
    .default([]),
});

export class AshbyScraper implements ScraperBackend {
  readonly name = "ashby";
  private readonly fetchImpl: FetchLike;

  constructor(fetchImpl: FetchLike = fetch) {
    this.fetchImpl = fetchImpl;
  }

  async *discover(companySlug: string, query?: string): AsyncIterable<DiscoveredPosting> {
    const url = `https://api.ashbyhq.com/posting-api/job-board/${encodeURIComponent(companySlug)}`;
    const data = await fetchJson(this.fetchImpl, url, ashbyResponseSchema);
    for (const job of data.jobs) {
      const title = job.title ?? "";
      if (!title || !job.jobUrl || job.isListed === false || !matchesQuery(title, query)) {
        continue;
      }

      let location = job.location;
      if (job.isRemote) {
        location = location ? `${location} (Remote)` : "Remote";
      }

      yield {
        url: job.jobUrl,
        company: companySlug,
        title,
        location,
        jdText: job.descriptionPlain ?? (job.descriptionHtml ? stripHtml(job.descriptionHtml) : undefined),
      };
    }
  }
}
