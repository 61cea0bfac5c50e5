import type { ZodType, ZodTypeDef } from "zod";
import type { FetchLike } from "../types/collaborators";

export type { FetchLike };

const USER_AGENT = "jobpipe";

export class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, url: string) {
    super(`HTTP ${status} (${url})`);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

export async function fetchText(fetchImpl: FetchLike, url: string): Promise<string> {
  const response = await fetchImpl(url, { headers: { "User-Agent": USER_AGENT } });
  if (!response.ok) {
    throw new HttpStatusError(response.status, url);
  }
  return response.text();
}

export async function fetchJson<T>(fetchImpl: FetchLike, url: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
  const text = await fetchText(fetchImpl, url);
  const raw: unknown = JSON.parse(text);
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Unexpected response from ${url}: ${parsed.error.issues[0]?.message ?? "invalid payload"}`);
  }
  return parsed.data;
}

export function matchesQuery(text: string, query?: string): boolean {
  if (!query || query.trim().length === 0) {
    return true;
  }
  return text.toLowerCase().includes(query.trim().toLowerCase());
}
