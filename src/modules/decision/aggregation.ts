import type { AggregationPolicyName } from "../../config";
import type { DecisionStatus, RuleEvaluation } from "./decision.types";

const WEAK_PENALTY = 0.85;
const WEAK_CONFIDENCE = 0.6;
const NO_RULE_BASIS_CAP = 0.5;

export function isWeakEvaluation(evaluation: RuleEvaluation): boolean {
  return evaluation.outcome === "insufficient_data" || evaluation.confidence < WEAK_CONFIDENCE;
}

/**
 * min(profile confidence, weakest required rule) scaled by 0.85 per weak
 * evaluation. Unless some required rule was evaluated with confidence, the
 * result is capped at 0.5, so adding a weak evaluation never raises it.
 */
export function computeDecisionConfidence(
  profileConfidence: number,
  evaluations: readonly RuleEvaluation[]
): number {
  const required = evaluations.filter((evaluation) => evaluation.required);
  const hasRuleBasis = required.some((evaluation) => !isWeakEvaluation(evaluation));
  const base = Math.min(
    profileConfidence,
    ...required.map((evaluation) => evaluation.confidence),
    hasRuleBasis ? 1 : NO_RULE_BASIS_CAP
  );
  const weak = evaluations.filter(isWeakEvaluation).length;
  const confidence = base * WEAK_PENALTY ** weak;
  return Math.round(Math.min(1, Math.max(0, confidence)) * 1000) / 1000;
}

function rejectsStrict(evaluations: readonly RuleEvaluation[]): boolean {
  return evaluations.some(
    (evaluation) => evaluation.required && evaluation.outcome === "not_satisfied"
  );
}

/** Rules outside any pathway must hold, and at least one pathway must hold completely. */
function rejectsPathways(evaluations: readonly RuleEvaluation[]): boolean {
  const unconditional = evaluations.filter(
    (evaluation) => evaluation.required && evaluation.pathway === null
  );
  if (unconditional.some((evaluation) => evaluation.outcome !== "satisfied")) {
    return true;
  }
  const groups = new Map<string, RuleEvaluation[]>();
  for (const evaluation of evaluations) {
    if (evaluation.pathway !== null) {
      groups.set(evaluation.pathway, [...(groups.get(evaluation.pathway) ?? []), evaluation]);
    }
  }
  if (groups.size === 0) {
    return false;
  }
  return ![...groups.values()].some((group) =>
    group.every((evaluation) => evaluation.outcome === "satisfied")
  );
}

export function aggregateDecision(params: {
  evaluations: readonly RuleEvaluation[];
  confidence: number;
  threshold: number;
  policy: AggregationPolicyName;
}): DecisionStatus {
  const { evaluations } = params;
  if (
    evaluations.some(
      (evaluation) => evaluation.required && evaluation.outcome === "insufficient_data"
    )
  ) {
    return "MISSING_DOCS";
  }
  const rejected =
    params.policy === "pathways" ? rejectsPathways(evaluations) : rejectsStrict(evaluations);
  if (rejected) {
    return "REJECTED";
  }
  if (params.confidence < params.threshold) {
    return "REVIEW_REQUIRED";
  }
  return "APPROVED";
}
