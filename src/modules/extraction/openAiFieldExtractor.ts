import { z } from "zod";
import { parseJsonCompletion, type JsonCompletion } from "../ai/openai.service";
import { coerceFieldValue } from "./fieldNormalizers";
import { canonicalQualificationType } from "./qualifications";
import type {
  ClassifiedSourceDocument,
  ExtractedFields,
  ExtractionTemplate,
  FieldExtractor,
} from "./extraction.types";

const MAX_DOCUMENT_CHARS = 6000;

const fieldsResponseSchema = z.record(z.unknown());

function buildPrompt(document: ClassifiedSourceDocument, template: ExtractionTemplate): string {
  const fieldLines = template.fields.map(
    (field) => `- ${field.key} (${field.kind}): ${field.description}`
  );
  return [
    `Document type: ${document.classification.label}`,
    "Extract these fields. Use null when a value is not present; do not guess.",
    ...fieldLines,
    "Dates as YYYY-MM-DD. Numbers as plain numbers.",
    "Document text:",
    document.text.slice(0, MAX_DOCUMENT_CHARS),
  ].join("\n");
}

export class OpenAiFieldExtractor implements FieldExtractor {
  readonly name = "openai";

  constructor(private readonly complete: JsonCompletion) {}

  async extract(
    document: ClassifiedSourceDocument,
    template: ExtractionTemplate
  ): Promise<ExtractedFields> {
    const text = await this.complete({
      system: "You extract structured fields from admission documents. Respond with a single JSON object.",
      prompt: buildPrompt(document, template),
      maxTokens: 800,
    });
    const raw = parseJsonCompletion(text, fieldsResponseSchema, "data_extractor");

    const fields: ExtractedFields = {};
    for (const field of template.fields) {
      const value = coerceFieldValue(field, raw[field.key]);
      fields[field.key] =
        field.key === "qualification_type" && typeof value === "string"
          ? canonicalQualificationType(value)
          : value;
    }
    return fields;
  }
}
