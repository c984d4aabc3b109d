import type { QualificationHint } from "../classification/classification.types";
import type { GradeScale } from "./extraction.types";

export const QUALIFICATION_DISPLAY_NAMES: Record<QualificationHint, string> = {
  abitur: "Abitur",
  fachhochschulreife: "Fachhochschulreife",
  "a-levels": "A-Levels",
  ib: "International Baccalaureate",
  apprenticeship: "Apprenticeship",
};

const QUALIFICATION_PATTERNS: ReadonlyArray<[RegExp, QualificationHint]> = [
  [/fachhochschulreife|fachabitur/i, "fachhochschulreife"],
  [/allgemeinen? hochschulreife|abitur/i, "abitur"],
  [/international baccalaureate|\bib diploma\b/i, "ib"],
  [/\ba[- ]levels?\b|gce advanced/i, "a-levels"],
  [/apprenticeship|berufsausbildung|gesellenbrief/i, "apprenticeship"],
];

export function detectQualificationHint(text: string): QualificationHint | null {
  for (const [pattern, hint] of QUALIFICATION_PATTERNS) {
    if (pattern.test(text)) {
      return hint;
    }
  }
  return null;
}

export function detectQualificationHints(text: string): QualificationHint[] {
  return QUALIFICATION_PATTERNS.filter(([pattern]) => pattern.test(text)).map(([, hint]) => hint);
}

/** Maps free text such as "Allgemeine Hochschulreife" onto a display name. */
export function canonicalQualificationType(value: string): string {
  const hint = detectQualificationHint(value);
  return hint ? QUALIFICATION_DISPLAY_NAMES[hint] : value.trim();
}

export function gradeScaleFor(qualificationType: string | null): GradeScale {
  switch (qualificationType) {
    case QUALIFICATION_DISPLAY_NAMES.abitur:
    case QUALIFICATION_DISPLAY_NAMES.fachhochschulreife:
      return "german_1_to_4";
    case QUALIFICATION_DISPLAY_NAMES.ib:
      return "ib_points";
    case QUALIFICATION_DISPLAY_NAMES["a-levels"]:
      return "uk_a_levels";
    default:
      return "unknown";
  }
}

/**
 * Maps a grade onto 0..1 where 1 is best. German grades run 1.0 (best) to
 * 4.0 (lowest pass); IB diplomas score up to 45 points.
 */
export function normalizeGrade(grade: number | null, scale: GradeScale): number | null {
  if (grade === null) {
    return null;
  }
  let score: number;
  switch (scale) {
    case "german_1_to_4":
      score = (4 - grade) / 3;
      break;
    case "ib_points":
      score = grade / 45;
      break;
    case "percentage":
      score = grade / 100;
      break;
    default:
      return null;
  }
  return Math.round(Math.min(1, Math.max(0, score)) * 1000) / 1000;
}
