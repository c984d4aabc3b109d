import { describe, expect, it, vi } from "vitest";
import type { JsonCompletionRequest } from "../../ai/openai.service";
import { OpenAiRuleInterpreter } from "../openAiInterpreter";
import { buildProfile } from "../../../test/fakes";

const input = {
  rule: { ruleId: "rule-p2-c0", chunkId: "p2-c0", text: "Abitur grants access.", citationLabel: "page 2" },
  profile: buildProfile(),
  targetProgram: "Finanzmanagement",
  entity: "DE",
};

describe("OpenAiRuleInterpreter", () => {
  it("returns the parsed interpretation with a null pathway by default", async () => {
    const complete = vi.fn<(request: JsonCompletionRequest) => Promise<string>>().mockResolvedValue(
      JSON.stringify({ outcome: "satisfied", required: true, confidence: 0.9, reasoning: "Abitur held." })
    );

    await expect(new OpenAiRuleInterpreter(complete).interpret(input)).resolves.toEqual({
      outcome: "satisfied",
      required: true,
      confidence: 0.9,
      reasoning: "Abitur held.",
      pathway: null,
    });
    expect(complete.mock.calls[0]?.[0].prompt).toContain("Rule (page 2):\nAbitur grants access.");
  });

  it("rejects outcomes outside the vocabulary", async () => {
    const complete = vi.fn<(request: JsonCompletionRequest) => Promise<string>>().mockResolvedValue(
      JSON.stringify({ outcome: "maybe", required: true, confidence: 0.9, reasoning: "?" })
    );

    await expect(new OpenAiRuleInterpreter(complete).interpret(input)).rejects.toMatchObject({
      reason: "schema_mismatch",
      stage: "rule_interpreter",
    });
  });

  it("passes an out-of-range confidence through for the decision maker to clamp", async () => {
    const complete = vi.fn<(request: JsonCompletionRequest) => Promise<string>>().mockResolvedValue(
      JSON.stringify({ outcome: "satisfied", required: true, confidence: 1.2, reasoning: "Certain." })
    );

    await expect(new OpenAiRuleInterpreter(complete).interpret(input)).resolves.toMatchObject({
      outcome: "satisfied",
      confidence: 1.2,
    });
  });
});
