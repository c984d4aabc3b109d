import type { DocumentLabel } from "../classification/classification.types";
import type { ExtractionTemplate, FieldDefinition } from "./extraction.types";

const QUALIFICATION_FIELDS: FieldDefinition[] = [
  {
    key: "qualification_type",
    label: "Qualification",
    kind: "text",
    description: "Type of school-leaving qualification (Abitur, A-Levels, IB, ...)",
    aliases: ["Qualifikation", "Abschluss", "Certificate"],
  },
  {
    key: "applicant_name",
    label: "Name",
    kind: "text",
    description: "Full name of the certificate holder",
    aliases: ["Candidate name", "Vor- und Zuname"],
  },
  {
    key: "school_name",
    label: "School",
    kind: "text",
    description: "Name of the issuing school",
    aliases: ["Schule", "Name der Schule", "Gymnasium"],
  },
  {
    key: "overall_grade",
    label: "Overall grade",
    kind: "number",
    description: "Final grade average as printed on the certificate",
    aliases: ["Durchschnittsnote", "Gesamtnote", "Final grade", "Note"],
  },
  {
    key: "total_points",
    label: "Total points",
    kind: "number",
    description: "Total points, where the scale uses points",
    aliases: ["Gesamtpunktzahl", "Punkte", "Points"],
  },
  {
    key: "graduation_year",
    label: "Graduation year",
    kind: "number",
    description: "Year the qualification was awarded",
    aliases: ["Abschlussjahr", "Year of award", "Jahr"],
  },
  {
    key: "candidate_number",
    label: "Candidate number",
    kind: "text",
    description: "Examination or candidate identifier",
    aliases: ["Kandidatennummer", "Candidate no"],
  },
];

const TRANSCRIPT_FIELDS: FieldDefinition[] = [
  {
    key: "institution_name",
    label: "Institution",
    kind: "text",
    description: "Issuing university or college",
    aliases: ["University", "Universität", "Hochschule", "College"],
  },
  {
    key: "degree_type",
    label: "Degree",
    kind: "text",
    description: "Degree awarded (Bachelor, Master, Diplom)",
    aliases: ["Degree type", "Akademischer Grad"],
  },
  {
    key: "field_of_study",
    label: "Field of study",
    kind: "text",
    description: "Programme or major",
    aliases: ["Studiengang", "Major", "Programme"],
  },
  {
    key: "final_grade",
    label: "Final grade",
    kind: "number",
    description: "Overall grade or GPA",
    aliases: ["Abschlussnote", "Gesamtnote", "GPA", "Overall grade"],
  },
  {
    key: "graduation_date",
    label: "Graduation date",
    kind: "date",
    description: "Date the degree was conferred",
    aliases: ["Date of graduation", "Abschlussdatum"],
  },
  {
    key: "credits",
    label: "Credits",
    kind: "number",
    description: "Total credits earned",
    aliases: ["ECTS", "Total credits"],
  },
];

const CV_FIELDS: FieldDefinition[] = [
  {
    key: "full_name",
    label: "Name",
    kind: "text",
    description: "Applicant's full name",
    aliases: ["Full name", "Vor- und Nachname"],
  },
  {
    key: "email",
    label: "Email",
    kind: "text",
    description: "Contact email address",
    aliases: ["E-Mail"],
  },
  {
    key: "phone",
    label: "Phone",
    kind: "text",
    description: "Contact phone number",
    aliases: ["Telefon", "Tel"],
  },
  {
    key: "date_of_birth",
    label: "Date of birth",
    kind: "date",
    description: "Applicant's date of birth",
    aliases: ["Geburtsdatum"],
  },
];

const WORK_CERTIFICATE_FIELDS: FieldDefinition[] = [
  {
    key: "company_name",
    label: "Company",
    kind: "text",
    description: "Employer issuing the reference",
    aliases: ["Employer", "Arbeitgeber", "Firma"],
  },
  {
    key: "position_title",
    label: "Position",
    kind: "text",
    description: "Role held by the applicant",
    aliases: ["Job title", "Tätigkeit", "Stelle"],
  },
  {
    key: "start_date",
    label: "Start date",
    kind: "date",
    description: "First day of employment",
    aliases: ["From", "Beginn", "Eintritt"],
  },
  {
    key: "end_date",
    label: "End date",
    kind: "date",
    description: "Last day of employment",
    aliases: ["Until", "Ende", "Austritt"],
  },
  {
    key: "employment_type",
    label: "Employment type",
    kind: "text",
    description: "Full-time, part-time, internship or apprenticeship",
    aliases: ["Beschäftigungsart"],
  },
];

const GENERIC_FIELDS: FieldDefinition[] = [
  {
    key: "document_hint",
    label: "Title",
    kind: "text",
    description: "What the document appears to be",
    aliases: ["Titel", "Document"],
  },
  {
    key: "dates_found",
    label: "Dates",
    kind: "text",
    description: "Dates mentioned in the document",
  },
  {
    key: "institutions",
    label: "Institutions",
    kind: "text",
    description: "Schools, universities or companies mentioned",
  },
];

const GENERIC_TEMPLATE: ExtractionTemplate = {
  id: "generic",
  labels: ["other"],
  fields: GENERIC_FIELDS,
  criticalFields: [],
  bestEffort: true,
};

export const EXTRACTION_TEMPLATES: readonly ExtractionTemplate[] = [
  {
    id: "qualification",
    labels: ["qualification-certificate"],
    fields: QUALIFICATION_FIELDS,
    criticalFields: ["qualification_type", "overall_grade", "graduation_year"],
    bestEffort: false,
  },
  {
    id: "transcript",
    labels: ["transcript"],
    fields: TRANSCRIPT_FIELDS,
    criticalFields: ["institution_name", "graduation_date", "final_grade"],
    bestEffort: false,
  },
  {
    id: "cv",
    labels: ["cv"],
    fields: CV_FIELDS,
    criticalFields: [],
    bestEffort: false,
  },
  {
    id: "work_certificate",
    labels: ["work-certificate"],
    fields: WORK_CERTIFICATE_FIELDS,
    criticalFields: ["company_name", "start_date"],
    bestEffort: false,
  },
  GENERIC_TEMPLATE,
];

export function getTemplateForLabel(label: DocumentLabel): ExtractionTemplate {
  return EXTRACTION_TEMPLATES.find((template) => template.labels.includes(label)) ?? GENERIC_TEMPLATE;
}

