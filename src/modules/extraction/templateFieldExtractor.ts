import { QUALIFICATION_DISPLAY_NAMES, canonicalQualificationType, detectQualificationHint } from "./qualifications";
import { coerceFieldValue, findDateTokens } from "./fieldNormalizers";
import type {
  ClassifiedSourceDocument,
  ExtractedFields,
  ExtractionTemplate,
  FieldDefinition,
  FieldExtractor,
} from "./extraction.types";

type FieldDetector = (document: ClassifiedSourceDocument) => string | number | null;

const INSTITUTION_PATTERN = /(universit|hochschule|college|school|schule|gymnasium|gmbh|\bag\b|ltd|inc\b)/i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function labelPattern(label: string): string {
  return `(?<![\\p{L}\\p{N}])${escapeRegExp(label).replace(/\s+/g, "\\s+")}(?![\\p{L}\\p{N}])`;
}

/** "Label: value" on its own line. */
function readLabeledValue(text: string, labels: readonly string[]): string | null {
  for (const label of labels) {
    const match = text.match(new RegExp(`^[ \\t]*${labelPattern(label)}[ \\t]*:[ \\t]*(.+)$`, "imu"));
    const value = match?.[1]?.trim();
    if (value) {
      return value;
    }
  }
  return null;
}

/** A number printed after its label, with or without a colon. */
function readInlineNumber(text: string, labels: readonly string[]): string | null {
  for (const label of labels) {
    const match = text.match(new RegExp(`${labelPattern(label)}[\\s:=\\-]*(\\d+(?:[.,]\\d+)?)`, "iu"));
    if (match?.[1]) {
      return match[1];
    }
  }
  return null;
}

function nonEmptyLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

const DETECTORS: Record<string, FieldDetector> = {
  qualification_type: (document) => {
    const hint = document.classification.qualificationHint ?? detectQualificationHint(document.text);
    return hint ? QUALIFICATION_DISPLAY_NAMES[hint] : null;
  },
  graduation_year: (document) => {
    const years = findDateTokens(document.text).map((date) => Number(date.slice(0, 4)));
    return years.length > 0 ? Math.max(...years) : null;
  },
  degree_type: (document) => {
    const match = document.text.match(/\b(bachelor|master|diplom|magister|ph\.?d)\b/i);
    if (!match?.[1]) {
      return null;
    }
    const value = match[1];
    return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
  },
  email: (document) => document.text.match(/[\w.+-]+@[\w-]+(?:\.[\w-]+)+/)?.[0] ?? null,
  employment_type: (document) => {
    const text = document.text.toLowerCase();
    if (/full[- ]time|vollzeit/.test(text)) return "full-time";
    if (/part[- ]time|teilzeit/.test(text)) return "part-time";
    if (/internship|praktikum/.test(text)) return "internship";
    if (/apprentice|ausbildung/.test(text)) return "apprenticeship";
    return null;
  },
  document_hint: (document) => {
    const first = nonEmptyLines(document.text)[0];
    return first ? first.slice(0, 120) : null;
  },
  dates_found: (document) => {
    const dates = findDateTokens(document.text);
    return dates.length > 0 ? dates.join(", ") : null;
  },
  institutions: (document) => {
    const matches = nonEmptyLines(document.text)
      .filter((line) => line.length <= 120 && INSTITUTION_PATTERN.test(line))
      .slice(0, 3);
    return matches.length > 0 ? matches.join("; ") : null;
  },
};

function readField(document: ClassifiedSourceDocument, field: FieldDefinition): string | number | null {
  const labels = [field.label, ...(field.aliases ?? [])];
  const labeled = readLabeledValue(document.text, labels);
  if (labeled !== null) {
    return labeled;
  }
  if (field.kind === "number") {
    const inline = readInlineNumber(document.text, labels);
    if (inline !== null) {
      return inline;
    }
  }
  return DETECTORS[field.key]?.(document) ?? null;
}

/** Reads template fields from "Label: value" lines with per-field fallbacks. */
export class TemplateFieldExtractor implements FieldExtractor {
  readonly name = "template";

  async extract(
    document: ClassifiedSourceDocument,
    template: ExtractionTemplate
  ): Promise<ExtractedFields> {
    const fields: ExtractedFields = {};
    for (const field of template.fields) {
      const value = coerceFieldValue(field, readField(document, field));
      fields[field.key] =
        field.key === "qualification_type" && typeof value === "string"
          ? canonicalQualificationType(value)
          : value;
    }
    return fields;
  }
}
