import { z } from "zod";
import { parseJsonCompletion, type JsonCompletion } from "../ai/openai.service";
import type { RuleQueryResult } from "./rules.types";

export type RuleAnswer = {
  answer: string;
  citedPages: number[];
};

/** Writes a prose answer from retrieved rulebook passages. */
export interface RuleAnswerer {
  answer(question: string, results: readonly RuleQueryResult[]): Promise<RuleAnswer>;
}

const answerSchema = z.object({
  answer: z.string().trim().min(1),
  pages: z.array(z.number().int()),
});

const SYSTEM_PROMPT = [
  "You answer questions about university admission rules.",
  "Use only the rulebook passages provided. If they do not cover the question, say so.",
  "Name the page of every passage you rely on.",
  'Respond with JSON only: {"answer": string, "pages": number[]}.',
].join("\n");

const NO_PASSAGES = "The rulebook has no passage on this question.";

export class OpenAiRuleAnswerer implements RuleAnswerer {
  constructor(private readonly complete: JsonCompletion) {}

  async answer(question: string, results: readonly RuleQueryResult[]): Promise<RuleAnswer> {
    if (results.length === 0) {
      return { answer: NO_PASSAGES, citedPages: [] };
    }
    const passages = results
      .map((result) => `[${result.citation.label}]\n${result.chunkText}`)
      .join("\n\n");
    const text = await this.complete({
      system: SYSTEM_PROMPT,
      prompt: `Rulebook passages:\n${passages}\n\nQuestion: ${question}`,
      maxTokens: 600,
    });
    const parsed = parseJsonCompletion(text, answerSchema, "rule_answerer");

    // Only pages that were actually retrieved may be cited.
    const retrieved = new Set(results.map((result) => result.citation.page));
    const citedPages = [...new Set(parsed.pages)]
      .filter((page) => retrieved.has(page))
      .sort((a, b) => a - b);
    return { answer: parsed.answer, citedPages };
  }
}
