import OpenAI from "openai";
import { z } from "zod";
import { LlmExtraction } from "../types";
import { AppConfig } from "../utils/config";
import { logger } from "../utils/logger";

const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";
const MAX_PROMPT_BODY_CHARS = 3000;
const MAX_TOKENS = 150;

export interface CompletionRequest {
  model: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

/**
 * Anything that turns a prompt into a single text completion. Failures are
 * thrown; the extractor decides what to do with them.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

export class OpenRouterClient implements CompletionClient {
  private readonly client: OpenAI;

  constructor(apiKey: string, timeoutMs: number) {
    this.client = new OpenAI({
      apiKey,
      baseURL: OPENROUTER_BASE_URL,
      timeout: timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: request.model,
      messages: [{ role: "user", content: request.prompt }],
      max_tokens: request.maxTokens,
      temperature: request.temperature,
    });
    return completion.choices[0]?.message?.content ?? "";
  }
}

const optionalField = z
  .string()
  .nullish()
  .transform((value) => value?.trim() || null);

const llmExtractionSchema = z.object({
  company: optionalField,
  position: optionalField,
});

export interface LlmExtractionInput {
  text: string;
  subject: string;
  from: string;
}

export function buildPrompt({ text, subject, from }: LlmExtractionInput): string {
  const body = text.slice(0, MAX_PROMPT_BODY_CHARS);

  return [
    "Extract the job application details from this confirmation email. Return ONLY valid JSON.",
    "",
    "Rules:",
    '- company: the company the candidate applied to. Job boards such as LinkedIn or Indeed are not the company; name the real employer.',
    '- position: the job title (e.g. "Software Engineer Intern", "Data Analyst"). Check the subject line and the body.',
    '- If the email is not a confirmation of a submitted application (a notification, newsletter or job recommendation), return {"company": null, "position": null}.',
    "",
    `Email subject: ${subject}`,
    `From: ${from}`,
    "",
    "Email body:",
    body,
    "",
    "Return valid JSON only:",
    '{"company": "Company Name", "position": "Job Title"}',
  ].join("\n");
}

const stripCodeFence = (content: string) =>
  content
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "")
    .trim();

/**
 * Parse a model reply into company/position. Throws on malformed JSON or
 * an unexpected shape.
 */
export function parseLlmResponse(content: string): LlmExtraction | null {
  const parsed: unknown = JSON.parse(stripCodeFence(content));
  // Several jobs in one email: keep the first
  const candidate: unknown = Array.isArray(parsed) ? parsed[0] : parsed;
  if (candidate === undefined || candidate === null) return null;

  return llmExtractionSchema.parse(candidate);
}

const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

export class LlmExtractor {
  constructor(
    private readonly client: CompletionClient,
    private readonly model: string
  ) {}

  /**
   * Best effort: any failure is logged and reported as no data.
   */
  async extract(input: LlmExtractionInput): Promise<LlmExtraction | null> {
    let content: string;
    try {
      content = await this.client.complete({
        model: this.model,
        prompt: buildPrompt(input),
        maxTokens: MAX_TOKENS,
        temperature: 0,
      });
    } catch (error) {
      logger.warn("LLM API request failed", describeError(error));
      return null;
    }

    try {
      const extraction = parseLlmResponse(content);
      logger.info("LLM extracted", extraction);
      return extraction;
    } catch (error) {
      logger.warn("Failed to parse LLM response", describeError(error));
      return null;
    }
  }
}

export function createLlmExtractor(
  config: AppConfig["llm"]
): LlmExtractor | null {
  if (!config.apiKey) {
    logger.debug("OPENROUTER_API_KEY not set, skipping LLM extraction");
    return null;
  }
  return new LlmExtractor(
    new OpenRouterClient(config.apiKey, config.timeoutMs),
    config.model
  );
}
