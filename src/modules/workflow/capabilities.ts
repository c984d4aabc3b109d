import {
  getEmbeddingDimensions,
  getOpenAiApiKey,
  getOpenAiEmbedModel,
} from "../../config";
import { logInfo } from "../../observability/logger";
import { createOpenAiJsonCompletion } from "../ai/openai.service";
import type { DocumentLabeler } from "../classification/classification.types";
import { KeywordDocumentLabeler } from "../classification/keywordLabeler";
import { OpenAiDocumentLabeler } from "../classification/openAiLabeler";
import type { RuleInterpreter } from "../decision/decision.types";
import { HeuristicRuleInterpreter } from "../decision/heuristicInterpreter";
import { OpenAiRuleInterpreter } from "../decision/openAiInterpreter";
import { PdfTextExtractor, type TextExtractor } from "../documents/textExtractor";
import type { FieldExtractor } from "../extraction/extraction.types";
import { OpenAiFieldExtractor } from "../extraction/openAiFieldExtractor";
import { TemplateFieldExtractor } from "../extraction/templateFieldExtractor";
import {
  HashingEmbeddingProvider,
  OpenAiEmbeddingProvider,
  type EmbeddingProvider,
} from "../rules/embedding.service";
import { OpenAiRuleAnswerer, type RuleAnswerer } from "../rules/ruleAnswerer";

export type Capabilities = {
  textExtractor: TextExtractor;
  labeler: DocumentLabeler;
  fieldExtractor: FieldExtractor;
  interpreter: RuleInterpreter;
  embeddings: EmbeddingProvider;
  /** Only with an AI backend; rule queries then return raw passages alone. */
  answerer?: RuleAnswerer;
};

/** OpenAI-backed capabilities when an API key is configured, local ones otherwise. */
export function createDefaultCapabilities(): Capabilities {
  const textExtractor = new PdfTextExtractor();
  if (!getOpenAiApiKey()) {
    logInfo("capabilities_selected", { backend: "local" });
    return {
      textExtractor,
      labeler: new KeywordDocumentLabeler(),
      fieldExtractor: new TemplateFieldExtractor(),
      interpreter: new HeuristicRuleInterpreter(),
      embeddings: new HashingEmbeddingProvider(getEmbeddingDimensions()),
    };
  }

  const complete = createOpenAiJsonCompletion();
  logInfo("capabilities_selected", { backend: "openai" });
  return {
    textExtractor,
    labeler: new OpenAiDocumentLabeler(complete),
    fieldExtractor: new OpenAiFieldExtractor(complete),
    interpreter: new OpenAiRuleInterpreter(complete),
    embeddings: new OpenAiEmbeddingProvider(getOpenAiEmbedModel(), getEmbeddingDimensions()),
    answerer: new OpenAiRuleAnswerer(complete),
  };
}
