import keywordTable from "./documentKeywords.json";
import type { DocumentLabeler, LabelSuggestion, SourceDocument } from "./classification.types";

type KeywordRule = {
  label: string;
  hint: string | null;
  keywords: string[];
  fileNameHints: string[];
};

const BASE_CONFIDENCE = 0.35;
const KEYWORD_WEIGHT = 0.15;
const FILE_NAME_WEIGHT = 0.2;
const MAX_CONFIDENCE = 0.95;
const UNMATCHED_CONFIDENCE = 0.3;

const RULES: readonly KeywordRule[] = keywordTable.rules;

function scoreRule(rule: KeywordRule, text: string, fileName: string): { hits: number; confidence: number } {
  const hits = rule.keywords.filter((keyword) => text.includes(keyword)).length;
  const fileNameHit = rule.fileNameHints.some((hint) => fileName.includes(hint));
  if (hits === 0 && !fileNameHit) {
    return { hits: 0, confidence: 0 };
  }
  const confidence = Math.min(
    MAX_CONFIDENCE,
    BASE_CONFIDENCE + hits * KEYWORD_WEIGHT + (fileNameHit ? FILE_NAME_WEIGHT : 0)
  );
  return { hits, confidence };
}

/** Local labeler: keyword and file-name matching against documentKeywords.json. */
export class KeywordDocumentLabeler implements DocumentLabeler {
  readonly name = "keyword";

  async label(document: SourceDocument): Promise<LabelSuggestion> {
    const text = document.text.toLowerCase();
    const fileName = document.fileName.toLowerCase();

    let best: { rule: KeywordRule; hits: number; confidence: number } | null = null;
    for (const rule of RULES) {
      const score = scoreRule(rule, text, fileName);
      if (score.confidence > 0 && (!best || score.confidence > best.confidence)) {
        best = { rule, ...score };
      }
    }

    if (!best) {
      return { label: "other", confidence: UNMATCHED_CONFIDENCE, reasoning: "no keyword matched" };
    }

    return {
      label: best.rule.label,
      confidence: best.confidence,
      qualificationHint: best.rule.hint,
      reasoning: `${best.hits} keyword(s) matched`,
    };
  }
}
