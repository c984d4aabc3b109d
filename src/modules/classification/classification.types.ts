export const DOCUMENT_LABELS = [
  "transcript",
  "qualification-certificate",
  "cv",
  "work-certificate",
  "other",
] as const;

export type DocumentLabel = (typeof DOCUMENT_LABELS)[number];

export const QUALIFICATION_HINTS = [
  "abitur",
  "fachhochschulreife",
  "a-levels",
  "ib",
  "apprenticeship",
] as const;

export type QualificationHint = (typeof QUALIFICATION_HINTS)[number];

export type SourceDocument = {
  documentId: string;
  fileName: string;
  mimeType: string;
  text: string;
};

/** Raw answer of a labeling backend, before vocabulary and threshold checks. */
export type LabelSuggestion = {
  label: string;
  confidence: number;
  qualificationHint?: string | null;
  reasoning?: string;
};

export interface DocumentLabeler {
  readonly name: string;
  label(document: SourceDocument): Promise<LabelSuggestion>;
}

export type ClassifiedDocument = {
  documentId: string;
  fileName: string;
  label: DocumentLabel;
  confidence: number;
  qualificationHint: QualificationHint | null;
  suggestedLabel: string;
  labeler: string;
};

export type ClassificationOutput = {
  documents: ClassifiedDocument[];
};

export function isDocumentLabel(value: string): value is DocumentLabel {
  return (DOCUMENT_LABELS as readonly string[]).includes(value);
}

export function isQualificationHint(value: string): value is QualificationHint {
  return (QUALIFICATION_HINTS as readonly string[]).includes(value);
}
