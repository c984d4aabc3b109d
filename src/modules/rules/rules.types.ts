export type RulebookPage = {
  page: number;
  text: string;
};

export type Citation = {
  page: number;
  section: string | null;
  label: string;
};

export type RuleChunk = {
  readonly id: string;
  readonly text: string;
  readonly citation: Citation;
  readonly embedding: readonly number[];
};

export type RuleMatch = {
  chunk: RuleChunk;
  score: number;
};

export type RuleQueryResult = {
  chunkId: string;
  chunkText: string;
  citation: Citation;
  score: number;
};

/** Read side of the index, shared by every decision evaluation. */
export interface RuleRetriever {
  query(text: string, k: number): Promise<RuleMatch[]>;
}
