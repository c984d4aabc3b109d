import type { AggregationPolicyName } from "../../config";
import type { ApplicantProfile } from "../extraction/extraction.types";

export const DECISION_STATUSES = [
  "APPROVED",
  "REJECTED",
  "REVIEW_REQUIRED",
  "MISSING_DOCS",
] as const;

export type DecisionStatus = (typeof DECISION_STATUSES)[number];

export const RULE_OUTCOMES = ["satisfied", "not_satisfied", "insufficient_data"] as const;

export type RuleOutcome = (typeof RULE_OUTCOMES)[number];

export type CandidateRule = {
  ruleId: string;
  chunkId: string;
  text: string;
  citationLabel: string;
};

export type RuleInterpretation = {
  outcome: RuleOutcome;
  required: boolean;
  confidence: number;
  reasoning: string;
  pathway?: string | null;
};

export type RuleInterpretationInput = {
  rule: CandidateRule;
  profile: ApplicantProfile;
  targetProgram: string;
  entity: string;
};

export interface RuleInterpreter {
  readonly name: string;
  interpret(input: RuleInterpretationInput): Promise<RuleInterpretation>;
}

export type RuleEvaluation = {
  ruleId: string;
  chunkId: string;
  ruleText: string;
  outcome: RuleOutcome;
  required: boolean;
  confidence: number;
  reasoning: string;
  pathway: string | null;
};

export type DecisionCitation = {
  chunkId: string;
  page: number;
  section: string | null;
  label: string;
  text: string;
};

export type Decision = {
  status: DecisionStatus;
  confidence: number;
  reasoning: string;
  citations: DecisionCitation[];
  evaluations: RuleEvaluation[];
  missingDocuments: string[];
  policy: AggregationPolicyName;
  queries: string[];
  decidedAt: string;
};

export type DecisionInput = {
  applicationId: string;
  profile: ApplicantProfile;
  targetProgram: string;
  entity: string;
};
