import { z } from "zod";
import type { DiscoveredPosting, ScraperBackend } from "../types/collaborators";
import { extractHrefs, stripHtml } from "./html";
import { fetchJson, matchesQuery, type FetchLike } from "./http";

const ALGOLIA = "https://hn.algolia.com/api/v1";
const APPLY_HINTS = ["lever", "greenhouse", "ashby", "careers", "jobs", "apply", "workday", "hire", "recruiting"];

const searchSchema = z.object({
  hits: z.array(z.object({ objectID: z.string(), title: z.string().optional() })).default([]),
});

const threadSchema = z.object({
  children: z.array(z.object({ text: z.string().nullable().optional() })).default([]),
});

export interface HackerNewsOptions {
  maxComments?: number;
}

/** Reads the newest "Who is hiring" thread; one top-level comment per posting. */
export class HackerNewsScraper implements ScraperBackend {
  readonly name = "hn";
  private readonly fetchImpl: FetchLike;
  private readonly maxComments: number;

  constructor(fetchImpl: FetchLike = fetch, options: HackerNewsOptions = {}) {
    this.fetchImpl = fetchImpl;
    this.maxComments = options.maxComments ?? 200;
  }

  async *discover(_sourceToken: string, query?: string): AsyncIterable<DiscoveredPosting> {
    const params = new URLSearchParams({
      query: "Ask HN: Who is hiring",
      tags: "story,ask_hn",
      numericFilters: "num_comments>50",
    });
    const search = await fetchJson(this.fetchImpl, `${ALGOLIA}/search_by_date?${params.toString()}`, searchSchema);
    const thread = search.hits[0];
    if (!thread) {
      return;
    }

    const item = await fetchJson(this.fetchImpl, `${ALGOLIA}/items/${encodeURIComponent(thread.objectID)}`, threadSchema);
    for (const comment of item.children.slice(0, this.maxComments)) {
      const posting = parseHiringComment(comment.text ?? "");
      if (posting && matchesQuery(posting.title, query)) {
        yield posting;
      }
    }
  }
}

/** Parses the "Company | Role | Location | ..." header convention. */
export function parseHiringComment(html: string): DiscoveredPosting | null {
  if (!html) {
    return null;
  }

  const firstLine = stripHtml(html.replace(/<p>/gi, "\n").split("\n")[0] ?? "");
  if (firstLine.length < 5) {
    return null;
  }

  const parts = firstLine.split("|").map((part) => part.trim());
  if (parts.length < 2) {
    return null;
  }

  const hrefs = extractHrefs(html);
  const url = hrefs.find((href) => APPLY_HINTS.some((hint) => href.toLowerCase().includes(hint))) ?? hrefs[0];
  if (!url) {
    return null;
  }

  return {
    url,
    company: parts[0].slice(0, 50),
    title: parts[1].slice(0, 100),
    location: parts[2] ? parts[2].slice(0, 50) : undefined,
    jdText: stripHtml(html),
  };
}
