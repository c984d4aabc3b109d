import { findMissingDocuments } from "../applications/documentRequirements";
import type { DocumentLabel } from "../classification/classification.types";
import { monthsBetween } from "./fieldNormalizers";
import { gradeScaleFor, normalizeGrade } from "./qualifications";
import type { ApplicantProfile, ExtractedDocument, FieldValue } from "./extraction.types";

const IDENTIFIER_FIELDS = ["applicant_name", "full_name", "email", "candidate_number"] as const;
const DATE_FIELDS = ["date_of_birth", "graduation_date"] as const;

function asString(value: FieldValue | undefined): string | null {
  return typeof value === "string" ? value : null;
}

function asNumber(value: FieldValue | undefined): number | null {
  return typeof value === "number" ? value : null;
}

function bestOf(documents: ExtractedDocument[], label: DocumentLabel): ExtractedDocument | null {
  return documents
    .filter((document) => document.label === label)
    .reduce<ExtractedDocument | null>(
      (best, document) => (!best || document.confidence > best.confidence ? document : best),
      null
    );
}

function sumWorkExperience(documents: ExtractedDocument[]): number | null {
  let total: number | null = null;
  for (const document of documents) {
    if (document.label !== "work-certificate") {
      continue;
    }
    const start = asString(document.fields.start_date);
    const end = asString(document.fields.end_date);
    if (!start || !end) {
      continue;
    }
    const months = monthsBetween(start, end);
    if (months !== null) {
      total = (total ?? 0) + months;
    }
  }
  return total;
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/** Folds per-document fields into the profile the decision stage reads. */
export function buildApplicantProfile(documents: ExtractedDocument[], entity: string): ApplicantProfile {
  const qualification = bestOf(documents, "qualification-certificate");
  const transcript = bestOf(documents, "transcript");

  let qualificationType: string | null = null;
  let grade: number | null = null;
  let graduation: string | null = null;

  if (qualification) {
    qualificationType = asString(qualification.fields.qualification_type);
    grade = asNumber(qualification.fields.overall_grade);
    const year = asNumber(qualification.fields.graduation_year);
    graduation = year !== null ? String(year) : null;
  } else if (transcript) {
    qualificationType = asString(transcript.fields.degree_type);
    grade = asNumber(transcript.fields.final_grade);
    graduation = asString(transcript.fields.graduation_date);
  }

  const scale = gradeScaleFor(qualificationType);
  if (scale === "ib_points" && qualification) {
    grade = asNumber(qualification.fields.total_points) ?? grade;
  }

  const identifiers: Record<string, string> = {};
  const dates: Record<string, string> = {};
  for (const document of documents) {
    for (const key of IDENTIFIER_FIELDS) {
      const value = asString(document.fields[key]);
      if (value && !identifiers[key]) {
        identifiers[key] = value;
      }
    }
    for (const key of DATE_FIELDS) {
      const value = asString(document.fields[key]);
      if (value && !dates[key]) {
        dates[key] = value;
      }
    }
  }
  if (graduation && !dates.graduation) {
    dates.graduation = graduation;
  }

  const missingFields: string[] = [];
  if (!qualificationType) missingFields.push("qualification_type");
  if (grade === null) missingFields.push("grade");
  if (!graduation) missingFields.push("graduation_date");

  const documentLabels = Array.from(new Set(documents.map((document) => document.label)));
  const informative = documents.filter((document) => document.label !== "other");
  const scored = informative.length > 0 ? informative : documents;
  const confidence =
    scored.length > 0
      ? scored.reduce((sum, document) => sum + document.confidence, 0) / scored.length
      : 0;

  return {
    qualificationType,
    grade,
    gradeScale: grade === null ? null : scale,
    normalizedScore: normalizeGrade(grade, scale),
    identifiers,
    dates,
    workExperienceMonths: sumWorkExperience(documents),
    documentLabels,
    missingFields,
    missingDocuments: findMissingDocuments(entity, documentLabels),
    confidence: round(confidence),
  };
}
