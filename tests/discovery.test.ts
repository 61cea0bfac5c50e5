import fs from "fs";
import os from "os";
import path from "path";
import { describe, expect, it, vi } from "vitest";
import {
  AshbyScraper,
  createScraperRegistry,
  GreenhouseScraper,
  HackerNewsScraper,
  ingest,
  LeverScraper,
  loadCompanyRegistry,
  parseSourceToken,
  resolveScraper,
  WellfoundScraper,
} from "../src/discovery";
import { decodeEntities, stripHtml } from "../src/discovery/html";
import { parseHiringComment } from "../src/discovery/hackerNewsFetcher";
import { collectListings, extractNextData } from "../src/discovery/wellfoundFetcher";
import { InMemoryJobStore } from "../src/storage/memoryJobStore";
import type { DiscoveredPosting } from "../src/types/collaborators";
import { jsonResponse } from "./helpers";

type Route = (url: string) => Response | undefined;

function stubFetch(route: Route) {
  return vi.fn(async (input: string): Promise<Response> => {
    return route(input) ?? new Response("not found", { status: 404 });
  });
}

async function collect(iterable: AsyncIterable<DiscoveredPosting>): Promise<DiscoveredPosting[]> {
  const out: DiscoveredPosting[] = [];
  for await (const item of iterable) {
    out.push(item);
  }
  return out;
}

const greenhouseBoard = {
  jobs: [
    {
      id: 1,
      title: "Platform Engineer",
      absolute_url: "https://boards.greenhouse.io/acme/jobs/1",
      location: { name: "Remote" },
      content: "&lt;p&gt;Build &amp;amp; ship&lt;/p&gt;",
    },
    { id: 2, title: "Account Executive", absolute_url: "https://boards.greenhouse.io/acme/jobs/2" },
    { id: 3, title: "Untitled link missing" },
  ],
};

describe("html helpers", () => {
  it("decodes named and numeric entities", () => {
    expect(decodeEntities("a &amp; b &#39;c&#x27; &unknown;")).toBe("a & b 'c' &unknown;");
  });

  it("keeps list items and paragraphs when stripping tags", () => {
    expect(stripHtml("<p>Intro</p><ul><li>One</li><li>Two</li></ul>")).toBe("Intro\n- One\n- Two");
  });
});

describe("LeverScraper", () => {
  it("falls back to the EU endpoint when the global board is missing", async () => {
    const fetchImpl = stubFetch((url) =>
      url.startsWith("https://api.eu.lever.co/")
        ? jsonResponse([
            {
              id: "a1",
              text: "Backend Engineer",
              hostedUrl: "https://jobs.lever.co/acme/a1",
              categories: { location: "Berlin" },
              descriptionPlain: "About us",
              lists: [{ text: "Requirements", content: "<li>TypeScript</li><li>Node</li>" }],
              additionalPlain: "Benefits",
            },
            { id: "a2", text: "No link" },
          ])
        : undefined
    );

    const postings = await collect(new LeverScraper(fetchImpl).discover("acme"));

    expect(fetchImpl.mock.calls.map((call) => call[0])).toEqual([
      "https://api.lever.co/v0/postings/acme?mode=json",
      "https://api.eu.lever.co/v0/postings/acme?mode=json",
    ]);
    expect(postings).toEqual([
      {
        url: "https://jobs.lever.co/acme/a1",
        company: "acme",
        title: "Backend Engineer",
        location: "Berlin",
        jdText: "About us\n\nRequirements\n\n- TypeScript\n- Node\n\nBenefits",
      },
    ]);
  });

  it("propagates other HTTP failures", async () => {
    const fetchImpl = stubFetch(() => new Response("boom", { status: 500 }));
    await expect(collect(new LeverScraper(fetchImpl).discover("acme"))).rejects.toThrow(
      "HTTP 500 (https://api.lever.co/v0/postings/acme?mode=json)"
    );
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });
});

describe("GreenhouseScraper", () => {
  it("unescapes double-encoded content and filters by query", async () => {
    const fetchImpl = stubFetch((url) =>
      url === "https://boards-api.greenhouse.io/v1/boards/acme/jobs?content=true" ? jsonResponse(greenhouseBoard) : undefined
    );

    const postings = await collect(new GreenhouseScraper(fetchImpl).discover("acme", "ENGINEER"));

    expect(postings).toEqual([
      {
        url: "https://boards.greenhouse.io/acme/jobs/1",
        company: "acme",
        title: "Platform Engineer",
        location: "Remote",
        jdText: "Build & ship",
      },
    ]);
  });

  it("rejects payloads that do not match the board shape", async () => {
    const fetchImpl = stubFetch(() => jsonResponse({ jobs: "nope" }));
    await expect(collect(new GreenhouseScraper(fetchImpl).discover("acme"))).rejects.toThrow(
      /^Unexpected response from https:\/\/boards-api\.greenhouse\.io/
    );
  });
});

describe("AshbyScraper", () => {
  it("skips unlisted jobs and marks remote locations", async () => {
    const fetchImpl = stubFetch(() =>
      jsonResponse({
        jobs: [
          { title: "Data Engineer", jobUrl: "https://jobs.ashbyhq.com/acme/1", location: "London", isRemote: true, descriptionPlain: "Data" },
          { title: "Hidden Role", jobUrl: "https://jobs.ashbyhq.com/acme/2", isListed: false },
          { title: "Remote Only", jobUrl: "https://jobs.ashbyhq.com/acme/3", isRemote: true, descriptionHtml: "<p>Hi</p>" },
        ],
      })
    );

    const postings = await collect(new AshbyScraper(fetchImpl).discover("acme"));

    expect(fetchImpl).toHaveBeenCalledWith("https://api.ashbyhq.com/posting-api/job-board/acme", expect.anything());
    expect(postings.map((posting) => [posting.title, posting.location, posting.jdText])).toEqual([
      ["Data Engineer", "London (Remote)", "Data"],
      ["Remote Only", "Remote", "Hi"],
    ]);
  });
});

describe("WellfoundScraper", () => {
  const nextData = {
    props: {
      pageProps: {
        apolloState: {
          data: {
            "JobListingSearchResult:101": {
              __typename: "JobListingSearchResult",
              id: "101",
              title: "Founding Engineer",
              slug: "founding-engineer",
              locationNames: ["Remote", "NYC"],
              description: "Build the product",
            },
            "Startup:9": { __typename: "Startup", id: "9", title: "Acme" },
            nested: [{ __typename: "JobListingSearchResult", id: 101, title: "Founding Engineer" }],
          },
        },
      },
    },
  };
  const page = `<html><body><script id="__NEXT_DATA__" type="application/json">${JSON.stringify(nextData)}</script></body></html>`;

  it("extracts job listings from the embedded page data", () => {
    const data = extractNextData(page);
    expect(collectListings(data).map((listing) => listing.id)).toEqual(["101", "101"]);
    expect(extractNextData("<html></html>")).toBeNull();
  });

  it("yields each listing once", async () => {
    const fetchImpl = stubFetch((url) =>
      url === "https://wellfound.com/company/acme/jobs" ? new Response(page, { status: 200 }) : undefined
    );

    const postings = await collect(new WellfoundScraper(fetchImpl).discover("acme"));

    expect(postings).toEqual([
      {
        url: "https://wellfound.com/jobs/101-founding-engineer",
        company: "acme",
        title: "Founding Engineer",
        location: "Remote, NYC",
        jdText: "Build the product",
      },
    ]);
  });

  it("fails when the page carries no listing data", async () => {
    const fetchImpl = stubFetch(() => new Response("<html></html>", { status: 200 }));
    await expect(collect(new WellfoundScraper(fetchImpl).discover("acme"))).rejects.toThrow(
      "No listing data found on Wellfound page for acme"
    );
  });
});

describe("HackerNewsScraper", () => {
  const acmeComment =
    'Acme Corp | Senior Engineer | Remote (US)<p>We build rockets.<p><a href="https://acme.example.com/about">About</a> <a href="https://jobs.lever.co/acme/123">Apply</a>';

  it("parses the pipe-delimited header and prefers apply links", () => {
    expect(parseHiringComment(acmeComment)).toEqual({
      url: "https://jobs.lever.co/acme/123",
      company: "Acme Corp",
      title: "Senior Engineer",
      location: "Remote (US)",
      jdText: "Acme Corp | Senior Engineer | Remote (US)\n\nWe build rockets.\n\nAbout Apply",
    });
  });

  it("ignores comments without a header or a link", () => {
    expect(parseHiringComment("")).toBeNull();
    expect(parseHiringComment('Just a reply <a href="https://example.com">x</a>')).toBeNull();
    expect(parseHiringComment("Acme | Engineer | Remote")).toBeNull();
  });

  it("reads the newest hiring thread", async () => {
    const fetchImpl = stubFetch((url) => {
      if (url.startsWith("https://hn.algolia.com/api/v1/search_by_date?")) {
        return jsonResponse({ hits: [{ objectID: "42", title: "Ask HN: Who is hiring?" }] });
      }
      if (url === "https://hn.algolia.com/api/v1/items/42") {
        return jsonResponse({
          children: [
            { text: acmeComment },
            { text: null },
            { text: 'Beta | Designer | NYC <a href="https://beta.example.com/careers">Jobs</a>' },
          ],
        });
      }
      return undefined;
    });

    const all = await collect(new HackerNewsScraper(fetchImpl).discover(""));
    const engineers = await collect(new HackerNewsScraper(fetchImpl).discover("", "engineer"));

    expect(all.map((posting) => posting.company)).toEqual(["Acme Corp", "Beta"]);
    expect(engineers.map((posting) => posting.url)).toEqual(["https://jobs.lever.co/acme/123"]);
  });

  it("caps the number of comments read", async () => {
    const fetchImpl = stubFetch((url) =>
      url.includes("search_by_date")
        ? jsonResponse({ hits: [{ objectID: "7" }] })
        : jsonResponse({ children: [{ text: acmeComment }, { text: acmeComment }, { text: acmeComment }] })
    );
    const postings = await collect(new HackerNewsScraper(fetchImpl, { maxComments: 2 }).discover(""));
    expect(postings).toHaveLength(2);
  });
});

describe("source tokens", () => {
  it("splits backend and slug", () => {
    expect(parseSourceToken(" Lever:acme ")).toEqual({ backend: "lever", slug: "acme" });
    expect(parseSourceToken("hn")).toEqual({ backend: "hn", slug: "" });
  });

  it("reports unknown sources and missing slugs", () => {
    const registry = createScraperRegistry(stubFetch(() => undefined));
    expect(() => resolveScraper(registry, "bogus:x")).toThrow(
      "Unknown scrape source 'bogus:x'. Available: lever, greenhouse, ashby, wellfound, hn"
    );
    expect(() => resolveScraper(registry, "lever")).toThrow("Scrape source 'lever' needs a company slug, e.g. lever:acme");
    expect(resolveScraper(registry, "hn").scraper.name).toBe("hn");
  });
});

describe("ingest", () => {
  it("inserts new postings and counts duplicates on rescrape", async () => {
    const store = new InMemoryJobStore();
    const registry = createScraperRegistry(stubFetch(() => jsonResponse(greenhouseBoard)));

    const first = await ingest(store, registry, "greenhouse:acme", { companyName: "Acme Inc" });
    const second = await ingest(store, registry, "greenhouse:acme");

    expect(first).toEqual({ total: 2, added: 2, duplicates: 0 });
    expect(second).toEqual({ total: 2, added: 0, duplicates: 2 });

    const jobs = await store.list();
    expect(jobs.map((job) => [job.company, job.roleTitle, job.platform, job.state, job.source])).toEqual([
      ["Acme Inc", "Platform Engineer", "greenhouse", "scraped", "greenhouse:acme"],
      ["Acme Inc", "Account Executive", "greenhouse", "scraped", "greenhouse:acme"],
    ]);
    expect(jobs[0].jdText).toBe("Build & ship");
  });

  it("keeps postings inserted before a backend failure", async () => {
    const store = new InMemoryJobStore();
    let calls = 0;
    const registry = createScraperRegistry(
      stubFetch((url) => {
        if (url.includes("search_by_date")) {
          calls += 1;
          return jsonResponse({ hits: [{ objectID: "1" }] });
        }
        return new Response("down", { status: 503 });
      })
    );

    await expect(ingest(store, registry, "hn")).rejects.toThrow("HTTP 503 (https://hn.algolia.com/api/v1/items/1)");
    expect(calls).toBe(1);
    expect(await store.list()).toEqual([]);
  });
});

describe("company registry", () => {
  it("loads the bundled example", () => {
    const entries = loadCompanyRegistry(path.join(__dirname, "..", "data", "companies.example.json"));
    expect(entries[0]).toEqual({ name: "Example Lever Co", source: "lever:example" });
  });

  it("rejects missing files and malformed entries", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "jobpipe-registry-"));
    const bad = path.join(dir, "companies.json");
    fs.writeFileSync(bad, JSON.stringify([{ name: "", source: "lever:x" }]));

    expect(() => loadCompanyRegistry(path.join(dir, "missing.json"))).toThrow(/^Company registry not found: /);
    expect(() => loadCompanyRegistry(bad)).toThrow(/^Invalid company registry .*companies\.json: 0\.name /);
  });
});
