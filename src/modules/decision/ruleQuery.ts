import type { ApplicantProfile } from "../extraction/extraction.types";
import type { RuleMatch, RuleRetriever } from "../rules/rules.types";

export function buildRuleQueries(input: {
  profile: ApplicantProfile;
  targetProgram: string;
  entity: string;
}): string[] {
  const { profile, targetProgram, entity } = input;
  const missing = [...profile.missingFields, ...profile.missingDocuments];

  const queries = [
    `${targetProgram} admission requirements for applicants from ${entity}` +
      (missing.length > 0 ? `; missing: ${missing.join(", ")}` : ""),
    profile.qualificationType
      ? `${profile.qualificationType} recognition and direct university access for ${targetProgram}`
      : `school-leaving qualification required for ${targetProgram}`,
  ];
  if (profile.workExperienceMonths !== null) {
    queries.push(
      `work experience of ${profile.workExperienceMonths} months as access route to ${targetProgram}`
    );
  }
  return queries;
}

/** Runs every query and keeps the best score per chunk, capped at k overall. */
export async function retrieveCandidateRules(
  retriever: RuleRetriever,
  queries: readonly string[],
  k: number
): Promise<RuleMatch[]> {
  const best = new Map<string, RuleMatch>();
  for (const query of queries) {
    const matches = await retriever.query(query, k);
    for (const match of matches) {
      const existing = best.get(match.chunk.id);
      if (!existing || match.score > existing.score) {
        best.set(match.chunk.id, match);
      }
    }
  }
  return [...best.values()]
    .sort((a, b) => b.score - a.score || a.chunk.id.localeCompare(b.chunk.id))
    .slice(0, k);
}
