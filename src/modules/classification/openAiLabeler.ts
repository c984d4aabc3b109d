import { z } from "zod";
import { parseJsonCompletion, type JsonCompletion } from "../ai/openai.service";
import {
  DOCUMENT_LABELS,
  QUALIFICATION_HINTS,
  type DocumentLabeler,
  type LabelSuggestion,
  type SourceDocument,
} from "./classification.types";

const PREVIEW_CHARS = 1000;

const labelResponseSchema = z.object({
  document_type: z.string().min(1),
  confidence: z.number().min(0).max(1),
  qualification_hint: z.string().nullable().optional(),
  reasoning: z.string().optional(),
});

const SYSTEM_PROMPT = [
  "You classify documents uploaded for university admission.",
  `Allowed document_type values: ${DOCUMENT_LABELS.join(", ")}.`,
  `For qualification-certificate also set qualification_hint to one of: ${QUALIFICATION_HINTS.join(", ")}, or null.`,
  "Respond with JSON only: {\"document_type\": string, \"confidence\": number, \"qualification_hint\": string|null, \"reasoning\": string}.",
].join("\n");

export class OpenAiDocumentLabeler implements DocumentLabeler {
  readonly name = "openai";

  constructor(private readonly complete: JsonCompletion) {}

  async label(document: SourceDocument): Promise<LabelSuggestion> {
    const prompt = [
      `Document filename: ${document.fileName}`,
      `Document content (first ${PREVIEW_CHARS} characters):`,
      document.text.slice(0, PREVIEW_CHARS),
    ].join("\n");

    const text = await this.complete({ system: SYSTEM_PROMPT, prompt, maxTokens: 300 });
    const parsed = parseJsonCompletion(text, labelResponseSchema, "document_classifier");

    return {
      label: parsed.document_type,
      confidence: parsed.confidence,
      qualificationHint: parsed.qualification_hint ?? null,
      reasoning: parsed.reasoning,
    };
  }
}
