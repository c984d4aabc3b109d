import type { AggregationPolicyName } from "../../config";
import { StageExecutionError } from "../../errors/StageExecutionError";
import { logInfo } from "../../observability/logger";
import type { RuleMatch, RuleRetriever } from "../rules/rules.types";
import { aggregateDecision, computeDecisionConfidence } from "./aggregation";
import { buildRuleQueries, retrieveCandidateRules } from "./ruleQuery";
import type {
  Decision,
  DecisionCitation,
  DecisionInput,
  DecisionStatus,
  RuleEvaluation,
  RuleInterpreter,
} from "./decision.types";

export interface DecisionMaker {
  decide(input: DecisionInput): Promise<Decision>;
}

export type DecisionMakerOptions = {
  retriever: RuleRetriever;
  interpreter: RuleInterpreter;
  k: number;
  confidenceThreshold: number;
  policy: AggregationPolicyName;
  now?: () => Date;
};

function clamp(value: number): number {
  return Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 0;
}

function selectCitations(
  evaluations: readonly RuleEvaluation[],
  retrieved: ReadonlyMap<string, RuleMatch>
): DecisionCitation[] {
  const required = evaluations.filter((evaluation) => evaluation.required);
  const cited = required.length > 0 ? required : evaluations;
  const citations: DecisionCitation[] = [];
  const seen = new Set<string>();
  for (const evaluation of cited) {
    const match = retrieved.get(evaluation.chunkId);
    if (!match || seen.has(evaluation.chunkId)) {
      continue;
    }
    seen.add(evaluation.chunkId);
    citations.push({
      chunkId: match.chunk.id,
      page: match.chunk.citation.page,
      section: match.chunk.citation.section,
      label: match.chunk.citation.label,
      text: match.chunk.text,
    });
  }
  return citations;
}

/** Every citation must reproduce a chunk retrieved for this decision. */
export function assertCitationsRetrieved(
  citations: readonly DecisionCitation[],
  retrieved: ReadonlyMap<string, RuleMatch>
): void {
  for (const citation of citations) {
    const match = retrieved.get(citation.chunkId);
    if (!match || match.chunk.text !== citation.text) {
      throw new StageExecutionError({
        stage: "decision",
        reason: "capability_error",
        message: "Decision cites text that was not retrieved.",
        detail: { chunkId: citation.chunkId },
        retryable: false,
      });
    }
  }
}

function summarize(status: DecisionStatus, confidence: number, evaluations: readonly RuleEvaluation[]): string {
  if (evaluations.length === 0) {
    return "No applicable rules were retrieved; manual review required.";
  }
  const lines = evaluations
    .filter((evaluation) => evaluation.required)
    .map((evaluation) => `${evaluation.ruleId} ${evaluation.outcome}: ${evaluation.reasoning}`);
  const header = `${status} with confidence ${confidence.toFixed(2)} after evaluating ${evaluations.length} rule(s).`;
  return lines.length > 0 ? [header, ...lines].join("\n") : `${header}\nNo rule applied as a requirement.`;
}

export class RetrievalAugmentedDecisionMaker implements DecisionMaker {
  constructor(private readonly options: DecisionMakerOptions) {}

  async decide(input: DecisionInput): Promise<Decision> {
    const queries = buildRuleQueries(input);
    const matches = await retrieveCandidateRules(this.options.retriever, queries, this.options.k);
    const retrieved = new Map(matches.map((match) => [match.chunk.id, match]));

    const evaluations: RuleEvaluation[] = [];
    for (const match of matches) {
      const ruleId = `rule-${match.chunk.id}`;
      const interpretation = await this.options.interpreter.interpret({
        rule: {
          ruleId,
          chunkId: match.chunk.id,
          text: match.chunk.text,
          citationLabel: match.chunk.citation.label,
        },
        profile: input.profile,
        targetProgram: input.targetProgram,
        entity: input.entity,
      });
      evaluations.push({
        ruleId,
        chunkId: match.chunk.id,
        ruleText: match.chunk.text,
        outcome: interpretation.outcome,
        required: interpretation.required,
        confidence: clamp(interpretation.confidence),
        reasoning: interpretation.reasoning,
        pathway: interpretation.pathway ?? null,
      });
    }

    const confidence = computeDecisionConfidence(input.profile.confidence, evaluations);
    const status = aggregateDecision({
      evaluations,
      confidence,
      threshold: this.options.confidenceThreshold,
      policy: this.options.policy,
    });
    const citations = selectCitations(evaluations, retrieved);
    assertCitationsRetrieved(citations, retrieved);

    logInfo("decision_evaluated", {
      applicationId: input.applicationId,
      status,
      confidence,
      ruleCount: evaluations.length,
      interpreter: this.options.interpreter.name,
    });

    return {
      status,
      confidence,
      reasoning: summarize(status, confidence, evaluations),
      citations,
      evaluations,
      missingDocuments: [...input.profile.missingDocuments],
      policy: this.options.policy,
      queries,
      decidedAt: (this.options.now ?? (() => new Date()))().toISOString(),
    };
  }
}
