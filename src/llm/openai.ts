import { z } from "zod";
import type { FetchLike } from "../types/collaborators";
import type { ApplicantContext } from "../types/context";

const OPENAI_URL = "https://api.openai.com/v1/chat/completions";

export interface OpenAiConfig {
  apiKey: string;
  model: string;
  maxOutputTokens: number;
  fetchImpl?: FetchLike;
}

const chatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }).optional() }))
    .optional(),
});

export async function generateOpenAiAnswer(
  question: string,
  context: ApplicantContext,
  config: OpenAiConfig
): Promise<string> {
  const system =
    "You are filling out a job application. Answer the screening question in 2-3 sentences, under 500 characters. Be direct and honest, use only the candidate profile, make no claims it does not support, and do not mention other companies.";

  const fetchImpl: FetchLike = config.fetchImpl ?? fetch;
  const response = await fetchImpl(OPENAI_URL, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${config.apiKey}`,
    },
    body: JSON.stringify({
      model: config.model,
      messages: [
        { role: "system", content: system },
        { role: "user", content: buildUserPrompt(question, context) },
      ],
      max_tokens: config.maxOutputTokens,
      temperature: 0.4,
    }),
  });

  if (!response.ok) {
    throw new Error(`OpenAI request failed: ${response.status}`);
  }

  const payload = chatCompletionSchema.parse(await response.json());
  const content = payload.choices?.[0]?.message?.content?.trim();
  if (!content) {
    throw new Error("OpenAI response had no content");
  }
  return content;
}

export function buildUserPrompt(question: string, context: ApplicantContext): string {
  const { profile } = context;
  const summary = profile.summary ? `Summary: ${profile.summary}` : "";
  const skills = profile.skills && profile.skills.length > 0 ? `Skills: ${profile.skills.join(", ")}` : "";
  const links = [profile.linkedin && `LinkedIn: ${profile.linkedin}`, profile.github && `GitHub: ${profile.github}`]
    .filter(Boolean)
    .join("\n");
  const description = context.jdText ? `Job description:\n${context.jdText.slice(0, 4000)}` : "";

  return [
    `Company: ${context.company || "a company"}`,
    `Role: ${context.roleTitle || "Software Engineer"}`,
    description,
    "\nCandidate Profile:",
    `Name: ${profile.fullName}`,
    `Location: ${profile.location ?? ""}`,
    summary,
    skills,
    links,
    "\nQuestion:",
    question,
    "\nAnswer:",
  ]
    .filter((line) => line && line.trim().length > 0)
    .join("\n");
}
