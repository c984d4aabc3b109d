import type { DocumentLabel } from "../classification/classification.types";

export type DocumentRequirement = {
  documentType: DocumentLabel;
  required: boolean;
};

const REQUIREMENTS_BY_ENTITY: Record<string, DocumentRequirement[]> = {
  DE: [
    { documentType: "qualification-certificate", required: true },
    { documentType: "cv", required: false },
    { documentType: "work-certificate", required: false },
  ],
  UK: [
    { documentType: "qualification-certificate", required: true },
    { documentType: "cv", required: false },
  ],
  CA: [
    { documentType: "transcript", required: true },
    { documentType: "cv", required: false },
  ],
};

export function normalizeEntity(entity: string | undefined): string {
  const trimmed = entity?.trim().toUpperCase();
  return trimmed && trimmed.length > 0 ? trimmed : "DE";
}

export function getRequirements(entity: string): DocumentRequirement[] {
  return REQUIREMENTS_BY_ENTITY[normalizeEntity(entity)] ?? [];
}

/** Entities with a document requirement list; blank falls back to DE. */
export function isSupportedEntity(entity: string): boolean {
  return Boolean(REQUIREMENTS_BY_ENTITY[normalizeEntity(entity)]);
}

/** Required document types with no matching label among the classified documents. */
export function findMissingDocuments(entity: string, labels: readonly DocumentLabel[]): string[] {
  const present = new Set(labels);
  return getRequirements(entity)
    .filter((requirement) => requirement.required && !present.has(requirement.documentType))
    .map((requirement) => requirement.documentType);
}
