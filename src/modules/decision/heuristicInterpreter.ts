import {
  QUALIFICATION_DISPLAY_NAMES,
  detectQualificationHint,
  detectQualificationHints,
} from "../extraction/qualifications";
import type { ApplicantProfile } from "../extraction/extraction.types";
import type { RuleInterpretation, RuleInterpretationInput, RuleInterpreter } from "./decision.types";

const EXPERIENCE_PATHWAY = "professional-experience";

function parseThreshold(text: string, pattern: RegExp): number | null {
  const match = text.match(pattern);
  return match?.[1] ? Number(match[1].replace(",", ".")) : null;
}

function interpretWorkExperience(
  requiredMonths: number,
  profile: ApplicantProfile
): RuleInterpretation {
  const hint = profile.qualificationType ? detectQualificationHint(profile.qualificationType) : null;
  const applies = hint === null || hint === "apprenticeship";
  const months = profile.workExperienceMonths;

  if (!applies) {
    return {
      outcome: "not_satisfied",
      required: false,
      confidence: 0.8,
      reasoning: "Alternative access route; the applicant holds a direct-access qualification.",
      pathway: EXPERIENCE_PATHWAY,
    };
  }
  if (months === null) {
    return {
      outcome: "insufficient_data",
      required: true,
      confidence: 0.4,
      reasoning: `Rule requires ${requiredMonths} months of work experience; no dated employer reference was found.`,
      pathway: EXPERIENCE_PATHWAY,
    };
  }
  const satisfied = months >= requiredMonths;
  return {
    outcome: satisfied ? "satisfied" : "not_satisfied",
    required: true,
    confidence: satisfied ? 0.9 : 0.85,
    reasoning: `${months} months of documented work experience against ${requiredMonths} required.`,
    pathway: EXPERIENCE_PATHWAY,
  };
}

function interpretQualification(
  text: string,
  ruleHints: ReturnType<typeof detectQualificationHints>,
  profile: ApplicantProfile
): RuleInterpretation {
  if (!profile.qualificationType) {
    return {
      outcome: "insufficient_data",
      required: true,
      confidence: 0.4,
      reasoning: "Rule concerns the school-leaving qualification, which could not be determined.",
    };
  }

  const hint = detectQualificationHint(profile.qualificationType);
  const firstHint = ruleHints[0];
  if (!hint || !ruleHints.includes(hint)) {
    return {
      outcome: "not_satisfied",
      required: false,
      confidence: hint ? 0.8 : 0.6,
      reasoning: `Rule concerns ${ruleHints.map((entry) => QUALIFICATION_DISPLAY_NAMES[entry]).join(", ")}, not ${profile.qualificationType}.`,
      pathway: firstHint ?? null,
    };
  }

  const name = QUALIFICATION_DISPLAY_NAMES[hint];
  const maxGrade =
    profile.gradeScale === "german_1_to_4" ? parseThreshold(text, /(\d[.,]\d)\s+or better/i) : null;
  const minPoints =
    profile.gradeScale === "ib_points" ? parseThreshold(text, /at least\s+(\d+)\s+points/i) : null;

  if (maxGrade === null && minPoints === null) {
    return {
      outcome: "satisfied",
      required: true,
      confidence: 0.92,
      reasoning: `${name} is recognised by this rule.`,
      pathway: hint,
    };
  }
  if (profile.grade === null) {
    return {
      outcome: "insufficient_data",
      required: true,
      confidence: 0.4,
      reasoning: `Rule sets a grade condition for ${name}; no grade was extracted.`,
      pathway: hint,
    };
  }

  const satisfied = maxGrade !== null ? profile.grade <= maxGrade : profile.grade >= (minPoints ?? 0);
  const condition = maxGrade !== null ? `${maxGrade} or better` : `at least ${minPoints} points`;
  return {
    outcome: satisfied ? "satisfied" : "not_satisfied",
    required: true,
    confidence: 0.95,
    reasoning: `${name} with grade ${profile.grade}; rule requires ${condition}.`,
    pathway: hint,
  };
}

/**
 * Local rule interpreter: reads qualification names, grade thresholds,
 * experience durations and document requirements out of the rule text.
 */
export class HeuristicRuleInterpreter implements RuleInterpreter {
  readonly name = "heuristic";

  async interpret(input: RuleInterpretationInput): Promise<RuleInterpretation> {
    const text = input.rule.text;
    const { profile } = input;

    const months = text.match(/(\d+)\s+months/i);
    if (months?.[1] && /experience|berufserfahrung/i.test(text)) {
      return interpretWorkExperience(Number(months[1]), profile);
    }

    const ruleHints = detectQualificationHints(text);
    if (ruleHints.length > 0) {
      return interpretQualification(text, ruleHints, profile);
    }

    if (/must (include|submit)|required documents|erforderliche unterlagen/i.test(text)) {
      if (profile.missingDocuments.length > 0) {
        return {
          outcome: "insufficient_data",
          required: true,
          confidence: 0.5,
          reasoning: `Required documents missing: ${profile.missingDocuments.join(", ")}.`,
        };
      }
      return {
        outcome: "satisfied",
        required: true,
        confidence: 0.9,
        reasoning: "All required documents were submitted.",
      };
    }

    return {
      outcome: "satisfied",
      required: false,
      confidence: 0.7,
      reasoning: "No applicable requirement in this passage.",
    };
  }
}
