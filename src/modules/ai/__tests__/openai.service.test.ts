import { afterEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { StageExecutionError } from "../../../errors/StageExecutionError";
import { resetCircuitBreakers } from "../../../utils/circuitBreaker";
import { createOpenAiJsonCompletion, getOpenAiBreaker, parseJsonCompletion } from "../openai.service";

const schema = z.object({ label: z.string(), confidence: z.number() });

describe("parseJsonCompletion", () => {
  it("parses plain and fenced JSON", () => {
    expect(parseJsonCompletion('{"label":"cv","confidence":0.5}', schema, "classifier")).toEqual({
      label: "cv",
      confidence: 0.5,
    });
    expect(
      parseJsonCompletion('```json\n{"label":"cv","confidence":0.5}\n```', schema, "classifier")
    ).toEqual({ label: "cv", confidence: 0.5 });
  });

  it("reports invalid JSON as a schema mismatch", () => {
    expect(() => parseJsonCompletion("not json", schema, "classifier")).toThrow(
      "classifier returned invalid JSON."
    );
  });

  it("reports the failing paths of an unexpected shape", () => {
    let caught: unknown;
    try {
      parseJsonCompletion('{"label":"cv"}', schema, "classifier");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(StageExecutionError);
    expect(caught).toMatchObject({
      reason: "schema_mismatch",
      retryable: false,
      message: "classifier returned an unexpected shape.",
    });
  });
});

describe("createOpenAiJsonCompletion", () => {
  afterEach(() => {
    resetCircuitBreakers();
  });

  it("fails fast while the breaker is open", async () => {
    const breaker = getOpenAiBreaker();
    for (let i = 0; i < 5; i += 1) {
      await expect(breaker.execute(() => Promise.reject(new Error("503")))).rejects.toThrow("503");
    }
    const complete = createOpenAiJsonCompletion({ model: "test-model" });

    await expect(complete({ system: "s", prompt: "p", maxTokens: 10 })).rejects.toMatchObject({
      reason: "circuit_open",
      retryable: false,
    });
  });
});
