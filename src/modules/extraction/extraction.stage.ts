import { StageExecutionError } from "../../errors/StageExecutionError";
import { buildApplicantProfile } from "./applicantProfile";
import { getTemplateForLabel } from "./fieldTemplates";
import type {
  ClassifiedSourceDocument,
  ExtractedDocument,
  ExtractedFields,
  ExtractionOutput,
  ExtractionTemplate,
  FieldExtractor,
} from "./extraction.types";

export interface Extractor {
  extract(
    documents: ClassifiedSourceDocument[],
    context: { entity: string }
  ): Promise<ExtractionOutput>;
}

const BEST_EFFORT_PENALTY = 0.5;

function ratio(part: number, whole: number): number {
  return whole === 0 ? 0 : part / whole;
}

/**
 * Share of template fields with a value, blended 50/50 with the share of
 * critical fields when the template names any.
 */
export function scoreDocumentConfidence(
  fields: ExtractedFields,
  template: ExtractionTemplate
): number {
  const present = (key: string) => fields[key] !== null && fields[key] !== undefined;
  const fieldRatio = ratio(template.fields.filter((field) => present(field.key)).length, template.fields.length);
  let confidence = fieldRatio;
  if (template.criticalFields.length > 0) {
    const criticalRatio = ratio(
      template.criticalFields.filter(present).length,
      template.criticalFields.length
    );
    confidence = 0.5 * fieldRatio + 0.5 * criticalRatio;
  }
  if (template.bestEffort) {
    confidence *= BEST_EFFORT_PENALTY;
  }
  return Math.round(confidence * 1000) / 1000;
}

export class ExtractionStage implements Extractor {
  constructor(
    private readonly fieldExtractor: FieldExtractor,
    private readonly options: { minConfidence: number }
  ) {}

  async extract(
    documents: ClassifiedSourceDocument[],
    context: { entity: string }
  ): Promise<ExtractionOutput> {
    const extracted: ExtractedDocument[] = [];
    for (const document of documents) {
      const template = getTemplateForLabel(document.classification.label);
      const fields = await this.fieldExtractor.extract(document, template);
      extracted.push({
        documentId: document.documentId,
        fileName: document.fileName,
        label: document.classification.label,
        template: template.id,
        fields,
        confidence: scoreDocumentConfidence(fields, template),
        lowConfidence: template.bestEffort,
      });
    }

    if (!extracted.some((document) => document.confidence > this.options.minConfidence)) {
      throw new StageExecutionError({
        stage: "extraction",
        reason: "low_confidence",
        message: "No document yielded usable fields.",
        detail: {
          minConfidence: this.options.minConfidence,
          confidences: extracted.map((document) => document.confidence),
        },
      });
    }

    return {
      profile: buildApplicantProfile(extracted, context.entity),
      documents: extracted,
    };
  }
}
