import OpenAI from "openai";
import type { z } from "zod";
import { getOpenAiApiKey, getOpenAiChatModel } from "../../config";
import { StageExecutionError } from "../../errors/StageExecutionError";
import { getCircuitBreaker, type CircuitBreaker } from "../../utils/circuitBreaker";

export type JsonCompletionRequest = {
  system: string;
  prompt: string;
  maxTokens: number;
};

/** Sends one prompt and resolves with the raw JSON text the model answered. */
export type JsonCompletion = (request: JsonCompletionRequest) => Promise<string>;

const OPENAI_BREAKER = { failureThreshold: 5, cooldownMs: 60_000 };

let openAiClient: OpenAI | null = null;

export function getOpenAIClient(): OpenAI {
  const apiKey = getOpenAiApiKey();
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY is required for AI operations.");
  }
  if (!openAiClient) {
    openAiClient = new OpenAI({ apiKey });
  }
  return openAiClient;
}

/** Every OpenAI call shares one breaker, so chat and embedding failures trip it together. */
export function getOpenAiBreaker(): CircuitBreaker {
  return getCircuitBreaker("openai", OPENAI_BREAKER);
}

export function createOpenAiJsonCompletion(
  options: { client?: OpenAI; model?: string } = {}
): JsonCompletion {
  const model = options.model ?? getOpenAiChatModel();
  return (request) =>
    getOpenAiBreaker().execute(async () => {
      const client = options.client ?? getOpenAIClient();
      const completion = await client.chat.completions.create({
        model,
        temperature: 0,
        max_tokens: request.maxTokens,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.prompt },
        ],
      });
      return completion.choices[0]?.message?.content ?? "";
    });
}

function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenced?.[1] ?? trimmed;
}

export function parseJsonCompletion<T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  context: string
): T {
  let raw: unknown;
  try {
    raw = JSON.parse(stripCodeFence(text));
  } catch {
    throw new StageExecutionError({
      stage: context,
      reason: "schema_mismatch",
      message: `${context} returned invalid JSON.`,
      detail: { excerpt: text.slice(0, 200) },
    });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new StageExecutionError({
      stage: context,
      reason: "schema_mismatch",
      message: `${context} returned an unexpected shape.`,
      detail: { issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`) },
    });
  }
  return parsed.data;
}
