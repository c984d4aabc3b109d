import { describe, expect, it } from "vitest";
import { KeywordDocumentLabeler } from "../keywordLabeler";
import { ABITUR_CERTIFICATE, CURRICULUM_VITAE, WORK_CERTIFICATE } from "../../../test/fakes";

function source(fileName: string, text: string) {
  return { documentId: "APP-1-D1", fileName, mimeType: "application/pdf", text };
}

describe("KeywordDocumentLabeler", () => {
  const labeler = new KeywordDocumentLabeler();

  it("labels an Abitur certificate and caps the confidence", async () => {
    const suggestion = await labeler.label(source("abiturzeugnis.pdf", ABITUR_CERTIFICATE));
    expect(suggestion).toMatchObject({
      label: "qualification-certificate",
      confidence: 0.95,
      qualificationHint: "abitur",
      reasoning: "3 keyword(s) matched",
    });
  });

  it("scores on keywords alone when the file name says nothing", async () => {
    const suggestion = await labeler.label(source("scan.pdf", ABITUR_CERTIFICATE));
    expect(suggestion.label).toBe("qualification-certificate");
    expect(suggestion.confidence).toBeCloseTo(0.8, 6);
  });

  it("recognizes work certificates and CVs", async () => {
    const work = await labeler.label(source("arbeitszeugnis.pdf", WORK_CERTIFICATE));
    expect(work.label).toBe("work-certificate");
    expect(work.confidence).toBeCloseTo(0.7, 6);
    expect(work.qualificationHint).toBeNull();

    const cv = await labeler.label(source("cv.pdf", CURRICULUM_VITAE));
    expect(cv.label).toBe("cv");
    expect(cv.confidence).toBeCloseTo(0.7, 6);
  });

  it("falls back to other with a low confidence", async () => {
    const suggestion = await labeler.label(source("scan.pdf", "Lorem ipsum dolor sit amet"));
    expect(suggestion).toEqual({ label: "other", confidence: 0.3, reasoning: "no keyword matched" });
  });
});
