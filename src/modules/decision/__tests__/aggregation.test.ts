import { describe, expect, it } from "vitest";
import { aggregateDecision, computeDecisionConfidence, isWeakEvaluation } from "../aggregation";
import type { RuleEvaluation } from "../decision.types";

function evaluation(overrides: Partial<RuleEvaluation>): RuleEvaluation {
  return {
    ruleId: "rule-p1-c0",
    chunkId: "p1-c0",
    ruleText: "rule",
    outcome: "satisfied",
    required: true,
    confidence: 0.9,
    reasoning: "",
    pathway: null,
    ...overrides,
  };
}

describe("computeDecisionConfidence", () => {
  it("takes the weakest required rule and penalizes weak evaluations", () => {
    expect(computeDecisionConfidence(0.95, [evaluation({})])).toBe(0.9);
    expect(
      computeDecisionConfidence(0.95, [evaluation({}), evaluation({ required: false, confidence: 0.5 })])
    ).toBe(0.765);
    expect(computeDecisionConfidence(0.7, [evaluation({})])).toBe(0.7);
  });

  it("caps confidence when no rule applies as a requirement", () => {
    expect(computeDecisionConfidence(0.95, [evaluation({ required: false, confidence: 0.7 })])).toBe(0.5);
    expect(computeDecisionConfidence(0.95, [])).toBe(0.5);
  });

  it("never rises as weak evaluations are added", () => {
    const added = [
      evaluation({ required: false, confidence: 0.7 }),
      evaluation({ confidence: 0.595 }),
      evaluation({ outcome: "insufficient_data", confidence: 0.58 }),
      evaluation({ required: false, confidence: 0.3 }),
    ];
    const evaluations: RuleEvaluation[] = [];
    let previous = computeDecisionConfidence(0.95, evaluations);

    for (const next of added) {
      evaluations.push(next);
      const current = computeDecisionConfidence(0.95, evaluations);
      expect(current).toBeLessThanOrEqual(previous);
      previous = current;
    }
  });

  it("keeps the cap when the only required rule is weak", () => {
    expect(
      computeDecisionConfidence(0.95, [
        evaluation({ required: false, confidence: 0.7 }),
        evaluation({ confidence: 0.595 }),
      ])
    ).toBe(0.425);
  });

  it("counts insufficient data as weak", () => {
    expect(isWeakEvaluation(evaluation({ outcome: "insufficient_data" }))).toBe(true);
    expect(isWeakEvaluation(evaluation({ confidence: 0.59 }))).toBe(true);
    expect(isWeakEvaluation(evaluation({}))).toBe(false);
  });
});

describe("aggregateDecision", () => {
  const base = { confidence: 0.9, threshold: 0.8, policy: "strict" as const };

  it("reports missing documents before anything else", () => {
    expect(
      aggregateDecision({
        ...base,
        evaluations: [
          evaluation({ outcome: "insufficient_data" }),
          evaluation({ outcome: "not_satisfied" }),
        ],
      })
    ).toBe("MISSING_DOCS");
  });

  it("rejects on any failed requirement under the strict policy", () => {
    expect(aggregateDecision({ ...base, evaluations: [evaluation({ outcome: "not_satisfied" })] })).toBe(
      "REJECTED"
    );
    expect(
      aggregateDecision({ ...base, evaluations: [evaluation({ outcome: "not_satisfied", required: false })] })
    ).toBe("APPROVED");
  });

  it("accepts any fully satisfied pathway under the pathways policy", () => {
    const evaluations = [
      evaluation({ outcome: "not_satisfied", pathway: "abitur" }),
      evaluation({ outcome: "satisfied", pathway: "professional-experience" }),
    ];
    expect(aggregateDecision({ ...base, evaluations })).toBe("REJECTED");
    expect(aggregateDecision({ ...base, policy: "pathways", evaluations })).toBe("APPROVED");
    expect(
      aggregateDecision({
        ...base,
        policy: "pathways",
        evaluations: [evaluation({ outcome: "not_satisfied", pathway: "abitur" })],
      })
    ).toBe("REJECTED");
    expect(
      aggregateDecision({
        ...base,
        policy: "pathways",
        evaluations: [...evaluations, evaluation({ outcome: "not_satisfied" })],
      })
    ).toBe("REJECTED");
  });

  it("sends low-confidence outcomes to review", () => {
    expect(aggregateDecision({ ...base, confidence: 0.79, evaluations: [evaluation({})] })).toBe(
      "REVIEW_REQUIRED"
    );
  });
});
