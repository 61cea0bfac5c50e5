import type { AIAnswerer, FetchLike } from "../types/collaborators";
import type { ApplicantContext, LlmConfig } from "../types/context";
import { generateOpenAiAnswer } from "./openai";

export class OpenAiAnswerer implements AIAnswerer {
  private readonly config: LlmConfig;
  private readonly apiKey: string;
  private readonly fetchImpl?: FetchLike;

  constructor(config: LlmConfig, apiKey: string, fetchImpl?: FetchLike) {
    this.config = config;
    this.apiKey = apiKey;
    this.fetchImpl = fetchImpl;
  }

  answer(question: string, context: ApplicantContext): Promise<string> {
    return generateOpenAiAnswer(question, context, {
      apiKey: this.apiKey,
      model: this.config.model,
      maxOutputTokens: this.config.maxOutputTokens,
      fetchImpl: this.fetchImpl,
    });
  }
}

/** Returns null when the LLM is disabled or no API key is set; free-text questions then stay unanswered. */
export function createAiAnswerer(config: LlmConfig | undefined, env: NodeJS.ProcessEnv = process.env): AIAnswerer | null {
  if (!config || !config.enabled || config.provider !== "openai") {
    return null;
  }
  const apiKey = env.OPENAI_API_KEY;
  if (!apiKey) {
    return null;
  }
  return new OpenAiAnswerer(config, apiKey);
}

export { buildUserPrompt } from "./openai";
