import { z } from "zod";
import { parseJsonCompletion, type JsonCompletion } from "../ai/openai.service";
import {
  RULE_OUTCOMES,
  type RuleInterpretation,
  type RuleInterpretationInput,
  type RuleInterpreter,
} from "./decision.types";

const interpretationSchema = z.object({
  outcome: z.enum(RULE_OUTCOMES),
  required: z.boolean(),
  confidence: z.number(),
  reasoning: z.string(),
  pathway: z.string().nullable().optional(),
});

const SYSTEM_PROMPT = [
  "You evaluate one admission rule against an applicant profile.",
  `outcome is one of: ${RULE_OUTCOMES.join(", ")}. Use insufficient_data when the profile lacks what the rule needs.`,
  "required is true when the rule must hold for this applicant to be admitted.",
  "pathway names the access route the rule belongs to when it is one of several alternatives, else null.",
  "Respond with JSON only: {\"outcome\", \"required\", \"confidence\", \"reasoning\", \"pathway\"}.",
].join("\n");

export class OpenAiRuleInterpreter implements RuleInterpreter {
  readonly name = "openai";

  constructor(private readonly complete: JsonCompletion) {}

  async interpret(input: RuleInterpretationInput): Promise<RuleInterpretation> {
    const prompt = [
      `Target program: ${input.targetProgram}`,
      `Entity: ${input.entity}`,
      `Rule (${input.rule.citationLabel}):`,
      input.rule.text,
      "Applicant profile:",
      JSON.stringify(input.profile),
    ].join("\n");

    const text = await this.complete({ system: SYSTEM_PROMPT, prompt, maxTokens: 400 });
    const parsed = parseJsonCompletion(text, interpretationSchema, "rule_interpreter");
    return { ...parsed, pathway: parsed.pathway ?? null };
  }
}
