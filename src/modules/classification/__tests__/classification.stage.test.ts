import { describe, expect, it } from "vitest";
import { StageExecutionError } from "../../../errors/StageExecutionError";
import { ClassificationStage, normalizeSuggestion } from "../classification.stage";
import type { DocumentLabeler, LabelSuggestion, SourceDocument } from "../classification.types";
import { KeywordDocumentLabeler } from "../keywordLabeler";
import { ABITUR_CERTIFICATE } from "../../../test/fakes";

const document: SourceDocument = {
  documentId: "APP-1-D1",
  fileName: "upload.pdf",
  mimeType: "application/pdf",
  text: "",
};

class FixedLabeler implements DocumentLabeler {
  readonly name = "fixed";

  constructor(private readonly suggestion: LabelSuggestion) {}

  async label(): Promise<LabelSuggestion> {
    return this.suggestion;
  }
}

describe("normalizeSuggestion", () => {
  const params = { threshold: 0.5, labeler: "fixed" };

  it("maps qualification aliases onto the certificate label", () => {
    const result = normalizeSuggestion(document, { label: "A Level", confidence: 0.9 }, params);
    expect(result).toEqual({
      documentId: "APP-1-D1",
      fileName: "upload.pdf",
      label: "qualification-certificate",
      confidence: 0.9,
      qualificationHint: "a-levels",
      suggestedLabel: "A Level",
      labeler: "fixed",
    });
  });

  it("prefers an explicit qualification hint over the alias", () => {
    const result = normalizeSuggestion(
      document,
      { label: "qualification-certificate", confidence: 0.8, qualificationHint: "IB" },
      params
    );
    expect(result.qualificationHint).toBe("ib");
  });

  it("turns unknown labels into other and drops their hint", () => {
    const result = normalizeSuggestion(
      document,
      { label: "passport", confidence: 0.9, qualificationHint: "abitur" },
      params
    );
    expect(result.label).toBe("other");
    expect(result.qualificationHint).toBeNull();
    expect(result.suggestedLabel).toBe("passport");
  });

  it("demotes answers below the threshold and clamps confidence", () => {
    expect(normalizeSuggestion(document, { label: "cv", confidence: 0.4 }, params).label).toBe("other");
    expect(normalizeSuggestion(document, { label: "cv", confidence: 3 }, params).confidence).toBe(1);
    expect(normalizeSuggestion(document, { label: "cv", confidence: Number.NaN }, params).confidence).toBe(0);
  });
});

describe("ClassificationStage", () => {
  it("classifies every document with the labeler name", async () => {
    const stage = new ClassificationStage(new KeywordDocumentLabeler(), { confidenceThreshold: 0.5 });
    const output = await stage.classify([
      { ...document, fileName: "abiturzeugnis.pdf", text: ABITUR_CERTIFICATE },
      { ...document, documentId: "APP-1-D2", fileName: "scan.pdf", text: "Lorem ipsum" },
    ]);

    expect(output.documents.map((entry) => [entry.documentId, entry.label, entry.labeler])).toEqual([
      ["APP-1-D1", "qualification-certificate", "keyword"],
      ["APP-1-D2", "other", "keyword"],
    ]);
  });

  it("fails with low_confidence when nothing clears the threshold", async () => {
    const stage = new ClassificationStage(new FixedLabeler({ label: "cv", confidence: 0.2 }), {
      confidenceThreshold: 0.5,
    });

    const error = await stage.classify([document]).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(StageExecutionError);
    expect(error).toMatchObject({ stage: "classification", reason: "low_confidence", retryable: false });
  });

  it("requires confidence strictly above the threshold to continue", async () => {
    const atThreshold = new ClassificationStage(new FixedLabeler({ label: "cv", confidence: 0.5 }), {
      confidenceThreshold: 0.5,
    });
    const above = new ClassificationStage(new FixedLabeler({ label: "cv", confidence: 0.51 }), {
      confidenceThreshold: 0.5,
    });

    await expect(atThreshold.classify([document])).rejects.toMatchObject({ reason: "low_confidence" });
    await expect(above.classify([document])).resolves.toMatchObject({
      documents: [{ label: "cv", confidence: 0.51 }],
    });
  });
});
