import { describe, expect, it, vi } from "vitest";
import type { JsonCompletionRequest } from "../../ai/openai.service";
import { OpenAiDocumentLabeler } from "../openAiLabeler";

const document = {
  documentId: "APP-1-D1",
  fileName: "zeugnis.pdf",
  mimeType: "application/pdf",
  text: "x".repeat(1500),
};

describe("OpenAiDocumentLabeler", () => {
  it("sends a truncated preview and maps the answer", async () => {
    const complete = vi.fn<(request: JsonCompletionRequest) => Promise<string>>().mockResolvedValue(
      JSON.stringify({
        document_type: "qualification-certificate",
        confidence: 0.88,
        qualification_hint: "abitur",
        reasoning: "certificate header",
      })
    );
    const labeler = new OpenAiDocumentLabeler(complete);

    const suggestion = await labeler.label(document);

    expect(suggestion).toEqual({
      label: "qualification-certificate",
      confidence: 0.88,
      qualificationHint: "abitur",
      reasoning: "certificate header",
    });
    const request = complete.mock.calls[0]?.[0];
    expect(request?.maxTokens).toBe(300);
    expect(request?.prompt).toContain("Document filename: zeugnis.pdf");
    expect(request?.prompt).toContain("x".repeat(1000));
    expect(request?.prompt).not.toContain("x".repeat(1001));
  });

  it("rejects answers outside the response schema", async () => {
    const complete = vi
      .fn<(request: JsonCompletionRequest) => Promise<string>>()
      .mockResolvedValue(JSON.stringify({ document_type: "cv", confidence: 1.7 }));
    const labeler = new OpenAiDocumentLabeler(complete);

    await expect(labeler.label(document)).rejects.toMatchObject({
      reason: "schema_mismatch",
      stage: "document_classifier",
    });
  });
});
