import { AppError, ValidationError } from "../../errors/AppError";
import { describeError, logInfo, logWarn } from "../../observability/logger";
import type { RuleAnswer, RuleAnswerer } from "./ruleAnswerer";
import { loadRulebookPages } from "./rulebook.loader";
import { readRuleIndexSnapshot, writeRuleIndexSnapshot } from "./ruleIndex.repo";
import type { RuleIndex, RuleIndexStatus } from "./ruleIndex";
import type { RuleQueryResult, RulebookPage } from "./rules.types";

export type RulesServiceOptions = {
  rulebookPath: string;
  indexPath: string | null;
  chunkSize: number;
  chunkOverlap: number;
  defaultK: number;
  loadPages?: (path: string) => Promise<RulebookPage[]>;
  answerer?: RuleAnswerer | null;
};

export type AnsweredRuleQuery = {
  results: RuleQueryResult[];
  answer: RuleAnswer;
};

const MAX_K = 50;

export class RulesService {
  private readonly loadPages: (path: string) => Promise<RulebookPage[]>;

  constructor(
    private readonly index: RuleIndex,
    private readonly options: RulesServiceOptions
  ) {
    this.loadPages = options.loadPages ?? loadRulebookPages;
  }

  /** Loads the persisted snapshot, or builds one when it is missing, invalid or stale. */
  async initialize(): Promise<RuleIndexStatus> {
    if (this.options.indexPath) {
      const snapshot = await readRuleIndexSnapshot(this.options.indexPath);
      if (snapshot && this.index.isCompatible(snapshot)) {
        this.index.load(snapshot);
        logInfo("rule_index_loaded", { version: snapshot.version, chunkCount: snapshot.chunks.length });
        return this.index.status();
      }
      if (snapshot) {
        logWarn("rule_index_snapshot_stale", { embeddingModel: snapshot.embeddingModel });
      }
    }
    return this.rebuild();
  }

  async rebuild(): Promise<RuleIndexStatus> {
    const pages = await this.loadPages(this.options.rulebookPath);
    const snapshot = await this.index.rebuild(pages, {
      chunkSize: this.options.chunkSize,
      chunkOverlap: this.options.chunkOverlap,
    });
    if (this.options.indexPath) {
      try {
        await writeRuleIndexSnapshot(this.options.indexPath, snapshot);
      } catch (err) {
        logWarn("rule_index_persist_failed", { path: this.options.indexPath, error: describeError(err) });
      }
    }
    logInfo("rule_index_built", {
      version: snapshot.version,
      pageCount: pages.length,
      chunkCount: snapshot.chunks.length,
    });
    return this.index.status();
  }

  async queryRules(question: string, k?: number): Promise<RuleQueryResult[]> {
    const trimmed = question.trim();
    if (!trimmed) {
      throw new ValidationError("Question is required.", [
        { field: "question", message: "must not be empty" },
      ]);
    }
    const limit = k ?? this.options.defaultK;
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_K) {
      throw new ValidationError(`k must be an integer between 1 and ${MAX_K}.`, [
        { field: "k", message: "out of range" },
      ]);
    }
    const matches = await this.index.query(trimmed, limit);
    return matches.map(({ chunk, score }) => ({
      chunkId: chunk.id,
      chunkText: chunk.text,
      citation: { ...chunk.citation },
      score: Math.round(score * 10_000) / 10_000,
    }));
  }

  /** Retrieves passages as queryRules does, then has the answerer write them up. */
  async answerQuestion(question: string, k?: number): Promise<AnsweredRuleQuery> {
    const answerer = this.options.answerer;
    if (!answerer) {
      throw new AppError(
        "rule_answer_unavailable",
        "Answers need an AI backend; query without answer for the raw passages.",
        503
      );
    }
    const results = await this.queryRules(question, k);
    const answer = await answerer.answer(question.trim(), results);
    logInfo("rule_question_answered", { resultCount: results.length, citedPages: answer.citedPages });
    return { results, answer };
  }

  status(): RuleIndexStatus {
    return this.index.status();
  }
}
