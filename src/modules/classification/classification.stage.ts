import { StageExecutionError } from "../../errors/StageExecutionError";
import {
  isDocumentLabel,
  isQualificationHint,
  type ClassificationOutput,
  type ClassifiedDocument,
  type DocumentLabel,
  type DocumentLabeler,
  type LabelSuggestion,
  type QualificationHint,
  type SourceDocument,
} from "./classification.types";

export interface Classifier {
  classify(documents: SourceDocument[]): Promise<ClassificationOutput>;
}

const LABEL_ALIASES: Record<string, { label: DocumentLabel; hint?: QualificationHint }> = {
  abitur: { label: "qualification-certificate", hint: "abitur" },
  fachhochschulreife: { label: "qualification-certificate", hint: "fachhochschulreife" },
  "a-levels": { label: "qualification-certificate", hint: "a-levels" },
  "a-level": { label: "qualification-certificate", hint: "a-levels" },
  ib: { label: "qualification-certificate", hint: "ib" },
  apprenticeship: { label: "qualification-certificate", hint: "apprenticeship" },
  resume: { label: "cv" },
  "curriculum-vitae": { label: "cv" },
  "work-experience": { label: "work-certificate" },
};

function normalizeToken(value: string): string {
  return value.trim().toLowerCase().replace(/[\s_]+/g, "-");
}

function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

function resolveHint(value: string | null | undefined): QualificationHint | null {
  if (!value) {
    return null;
  }
  const token = normalizeToken(value);
  if (isQualificationHint(token)) {
    return token;
  }
  return LABEL_ALIASES[token]?.hint ?? null;
}

/**
 * Maps a backend suggestion onto the fixed vocabulary. Unknown labels and
 * answers below the threshold become "other".
 */
export function normalizeSuggestion(
  document: SourceDocument,
  suggestion: LabelSuggestion,
  params: { threshold: number; labeler: string }
): ClassifiedDocument {
  const confidence = clampConfidence(suggestion.confidence);
  const token = normalizeToken(suggestion.label);
  const alias = LABEL_ALIASES[token];

  let label: DocumentLabel = alias?.label ?? (isDocumentLabel(token) ? token : "other");
  if (confidence < params.threshold) {
    label = "other";
  }

  const hint =
    label === "qualification-certificate"
      ? resolveHint(suggestion.qualificationHint) ?? alias?.hint ?? null
      : null;

  return {
    documentId: document.documentId,
    fileName: document.fileName,
    label,
    confidence,
    qualificationHint: hint,
    suggestedLabel: suggestion.label,
    labeler: params.labeler,
  };
}

export class ClassificationStage implements Classifier {
  constructor(
    private readonly labeler: DocumentLabeler,
    private readonly options: { confidenceThreshold: number }
  ) {}

  async classify(documents: SourceDocument[]): Promise<ClassificationOutput> {
    const classified: ClassifiedDocument[] = [];
    for (const document of documents) {
      const suggestion = await this.labeler.label(document);
      classified.push(
        normalizeSuggestion(document, suggestion, {
          threshold: this.options.confidenceThreshold,
          labeler: this.labeler.name,
        })
      );
    }

    const confident = classified.filter(
      (document) => document.confidence > this.options.confidenceThreshold
    );
    if (confident.length === 0) {
      throw new StageExecutionError({
        stage: "classification",
        reason: "low_confidence",
        message: "No documents classified with sufficient confidence.",
        detail: {
          threshold: this.options.confidenceThreshold,
          confidences: classified.map((document) => document.confidence),
        },
      });
    }

    return { documents: classified };
  }
}
