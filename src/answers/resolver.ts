import { CollaboratorFailureError, withTimeout } from "../core/errors";
import type { JobStore } from "../storage/jobStore";
import type { AIAnswerer } from "../types/collaborators";
import type { ApplicantProfile } from "../types/context";
import type { JobRecord } from "../types/jobs";
import type { Logger } from "../logging";
import type { AnswerEntry } from "./table";

export type AnswerSource = "lookup" | "cache" | "ai" | "none";

export interface ResolvedAnswer {
  answer: string | null;
  source: AnswerSource;
  entry?: AnswerEntry;
}

export interface AnswerCache {
  get(jobId: number, key: string): Promise<string | undefined>;
  set(jobId: number, key: string, answer: string): Promise<void>;
}

export interface ResolverOptions {
  aiAnswerer?: AIAnswerer;
  cache: AnswerCache;
  profile: ApplicantProfile;
  timeoutMs: number;
  logger?: Logger;
}

interface CompiledEntry {
  entry: AnswerEntry;
  normalized: string;
  regex?: RegExp;
}

const FREETEXT_SIGNALS = [
  "why",
  "what",
  "how",
  "describe",
  "tell us",
  "explain",
  "share",
  "elaborate",
  "additional",
  "anything else",
];

export function normalizeQuestion(question: string): string {
  return question.trim().replace(/\s+/g, " ").toLowerCase();
}

export function isFreeTextQuestion(question: string): boolean {
  const normalized = normalizeQuestion(question);
  return FREETEXT_SIGNALS.some((signal) => normalized.includes(signal));
}

export class ScreeningAnswerResolver {
  private readonly entries: CompiledEntry[];
  private readonly options: ResolverOptions;
  private readonly pending = new Map<string, Promise<string>>();

  constructor(entries: AnswerEntry[], options: ResolverOptions) {
    this.entries = entries.map((entry) => ({
      entry,
      normalized: normalizeQuestion(entry.questionPattern),
      regex: entry.matchKind === "regex" ? new RegExp(entry.questionPattern, "i") : undefined,
    }));
    this.options = options;
  }

  /** Lookup-table match only: exact beats substring beats regex, table order within a kind. */
  matchLookup(question: string): AnswerEntry | null {
    const normalized = normalizeQuestion(question);
    const exact = this.entries.find((item) => item.entry.matchKind === "exact" && item.normalized === normalized);
    if (exact) {
      return exact.entry;
    }
    const substring = this.entries.find(
      (item) => item.entry.matchKind === "substring" && normalized.includes(item.normalized)
    );
    if (substring) {
      return substring.entry;
    }
    const regex = this.entries.find((item) => item.regex?.test(normalized) === true);
    return regex ? regex.entry : null;
  }

  async resolve(question: string, job: JobRecord): Promise<ResolvedAnswer> {
    const entry = this.matchLookup(question);
    if (entry) {
      return { answer: entry.answerValue, source: "lookup", entry };
    }

    const key = normalizeQuestion(question);
    const cached = await this.options.cache.get(job.id, key);
    if (cached !== undefined) {
      return { answer: cached, source: "cache" };
    }

    const aiAnswerer = this.options.aiAnswerer;
    if (!aiAnswerer || !isFreeTextQuestion(question)) {
      return { answer: null, source: "none" };
    }

    const pendingKey = `${job.id}\u0000${key}`;
    let inFlight = this.pending.get(pendingKey);
    if (!inFlight) {
      inFlight = this.askAndCache(aiAnswerer, question, key, job).finally(() => {
        this.pending.delete(pendingKey);
      });
      this.pending.set(pendingKey, inFlight);
    }
    return { answer: await inFlight, source: "ai" };
  }

  private async askAndCache(aiAnswerer: AIAnswerer, question: string, key: string, job: JobRecord): Promise<string> {
    this.options.logger?.info(`Job #${job.id}: asking AI answerer "${question.slice(0, 60)}"`);
    const answer = await withTimeout("ai-answerer", this.options.timeoutMs, () =>
      aiAnswerer.answer(question, {
        profile: this.options.profile,
        company: job.company,
        roleTitle: job.roleTitle,
        jdText: job.jdText,
      })
    );
    const trimmed = answer.trim();
    if (trimmed.length === 0) {
      throw new CollaboratorFailureError("ai-answerer", "returned an empty answer");
    }
    await this.options.cache.set(job.id, key, trimmed);
    return trimmed;
  }
}

/** Caches AI answers on the job record so repeat fills of the same job do not re-query. */
export function createStoreAnswerCache(store: JobStore): AnswerCache {
  return {
    async get(jobId, key) {
      const { screeningAnswers } = await store.get(jobId);
      return Object.hasOwn(screeningAnswers, key) ? screeningAnswers[key] : undefined;
    },
    async set(jobId, key, answer) {
      await store.update(jobId, () => ({ screeningAnswers: { [key]: answer } }));
    },
  };
}
