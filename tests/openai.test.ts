import { describe, expect, it, vi } from "vitest";
import { buildUserPrompt, createAiAnswerer, OpenAiAnswerer } from "../src/llm";
import type { ApplicantContext, LlmConfig } from "../src/types/context";
import { jsonResponse, testProfile } from "./helpers";

const llm: LlmConfig = { provider: "openai", model: "gpt-4o-mini", maxOutputTokens: 300, enabled: true };

const context: ApplicantContext = {
  profile: testProfile,
  company: "Acme",
  roleTitle: "Engineer",
  jdText: "Ship it",
};

describe("buildUserPrompt", () => {
  it("lists the job and the applicant, skipping empty sections", () => {
    expect(buildUserPrompt("Why Acme?", context)).toBe(
      "Company: Acme\nRole: Engineer\nJob description:\nShip it\n\nCandidate Profile:\nName: Ada Example\nLocation: Springfield\n\nQuestion:\nWhy Acme?\n\nAnswer:"
    );
  });

  it("includes skills and links when the profile has them", () => {
    const prompt = buildUserPrompt("Why?", {
      profile: { ...testProfile, skills: ["TypeScript", "SQL"], github: "https://github.com/example" },
      company: "",
      roleTitle: "",
    });
    expect(prompt.split("\n").slice(0, 2)).toEqual(["Company: a company", "Role: Software Engineer"]);
    expect(prompt).toContain("\nSkills: TypeScript, SQL\nGitHub: https://github.com/example\n");
  });
});

describe("OpenAiAnswerer", () => {
  it("posts a chat completion and trims the reply", async () => {
    const fetchImpl = vi.fn(async (_input: string, _init?: RequestInit): Promise<Response> =>
      jsonResponse({ choices: [{ message: { content: "  I like the mission.  " } }] })
    );
    const answerer = new OpenAiAnswerer(llm, "test-secret", fetchImpl);

    expect(await answerer.answer("Why Acme?", context)).toBe("I like the mission.");

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("https://api.openai.com/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toMatchObject({ Authorization: "Bearer test-secret" });
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({ model: "gpt-4o-mini", max_tokens: 300 });
  });

  it("reports HTTP failures with the status", async () => {
    const fetchImpl = vi.fn(async (): Promise<Response> => new Response("oops", { status: 500 }));
    const answerer = new OpenAiAnswerer(llm, "test-secret", fetchImpl);
    await expect(answerer.answer("Why?", context)).rejects.toThrow("OpenAI request failed: 500");
  });

  it("rejects replies without content", async () => {
    const fetchImpl = vi.fn(async (): Promise<Response> => jsonResponse({ choices: [{ message: { content: null } }] }));
    const answerer = new OpenAiAnswerer(llm, "test-secret", fetchImpl);
    await expect(answerer.answer("Why?", context)).rejects.toThrow("OpenAI response had no content");
  });
});

describe("createAiAnswerer", () => {
  it("needs the model enabled and an API key", () => {
    expect(createAiAnswerer({ ...llm, enabled: false }, { OPENAI_API_KEY: "test-secret" })).toBeNull();
    expect(createAiAnswerer(llm, {})).toBeNull();
    expect(createAiAnswerer(undefined, { OPENAI_API_KEY: "test-secret" })).toBeNull();
    expect(createAiAnswerer(llm, { OPENAI_API_KEY: "test-secret" })).toBeInstanceOf(OpenAiAnswerer);
  });
});
