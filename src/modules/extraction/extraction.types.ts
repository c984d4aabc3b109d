import type {
  ClassifiedDocument,
  DocumentLabel,
  SourceDocument,
} from "../classification/classification.types";

export type FieldValue = string | number | null;

export type ExtractedFields = Record<string, FieldValue>;

export type ClassifiedSourceDocument = SourceDocument & {
  classification: ClassifiedDocument;
};

export type FieldDefinition = {
  key: string;
  label: string;
  kind: "text" | "number" | "date";
  description: string;
  aliases?: readonly string[];
};

export type ExtractionTemplate = {
  id: string;
  labels: readonly DocumentLabel[];
  fields: readonly FieldDefinition[];
  criticalFields: readonly string[];
  bestEffort: boolean;
};

export interface FieldExtractor {
  readonly name: string;
  extract(document: ClassifiedSourceDocument, template: ExtractionTemplate): Promise<ExtractedFields>;
}

export type ExtractedDocument = {
  documentId: string;
  fileName: string;
  label: DocumentLabel;
  template: string;
  fields: ExtractedFields;
  confidence: number;
  lowConfidence: boolean;
};

export type GradeScale =
  | "german_1_to_4"
  | "ib_points"
  | "uk_a_levels"
  | "percentage"
  | "unknown";

export type ApplicantProfile = {
  qualificationType: string | null;
  grade: number | null;
  gradeScale: GradeScale | null;
  normalizedScore: number | null;
  identifiers: Record<string, string>;
  dates: Record<string, string>;
  workExperienceMonths: number | null;
  documentLabels: DocumentLabel[];
  missingFields: string[];
  missingDocuments: string[];
  confidence: number;
};

export type ExtractionOutput = {
  profile: ApplicantProfile;
  documents: ExtractedDocument[];
};
