import { AppError } from "../../errors/AppError";
import { logInfo } from "../../observability/logger";
import { KeyedLock } from "../../utils/keyedLock";
import { chunkRulebook } from "./ruleChunker";
import { cosineSimilarity, type EmbeddingProvider } from "./embedding.service";
import type { RuleChunk, RuleMatch, RuleRetriever, RulebookPage } from "./rules.types";

export type RuleIndexSnapshot = {
  readonly version: number;
  readonly builtAt: string;
  readonly embeddingModel: string;
  readonly dimensions: number;
  readonly chunks: readonly RuleChunk[];
};

export type RuleIndexStatus = {
  ready: boolean;
  version: number;
  chunkCount: number;
  builtAt: string | null;
  embeddingModel: string | null;
};

export type BuildOptions = {
  chunkSize: number;
  chunkOverlap: number;
};

const EMBED_BATCH_SIZE = 64;
const REBUILD_LOCK_KEY = "rule-index";

function freezeChunk(chunk: RuleChunk): RuleChunk {
  return Object.freeze({
    id: chunk.id,
    text: chunk.text,
    citation: Object.freeze({ ...chunk.citation }),
    embedding: Object.freeze([...chunk.embedding]),
  });
}

export function freezeSnapshot(snapshot: RuleIndexSnapshot): RuleIndexSnapshot {
  return Object.freeze({
    ...snapshot,
    chunks: Object.freeze(snapshot.chunks.map(freezeChunk)),
  });
}

export async function buildRuleIndexSnapshot(
  pages: readonly RulebookPage[],
  embeddings: EmbeddingProvider,
  options: BuildOptions & { version: number; now?: () => Date }
): Promise<RuleIndexSnapshot> {
  const drafts = chunkRulebook(pages, { size: options.chunkSize, overlap: options.chunkOverlap });
  const chunks: RuleChunk[] = [];
  for (let i = 0; i < drafts.length; i += EMBED_BATCH_SIZE) {
    const batch = drafts.slice(i, i + EMBED_BATCH_SIZE);
    const vectors = await embeddings.embed(batch.map((draft) => draft.text));
    batch.forEach((draft, offset) => {
      chunks.push({ ...draft, embedding: vectors[offset] ?? [] });
    });
  }
  return freezeSnapshot({
    version: options.version,
    builtAt: (options.now ?? (() => new Date()))().toISOString(),
    embeddingModel: embeddings.model,
    dimensions: embeddings.dimensions,
    chunks,
  });
}

/**
 * Read-mostly vector index over rulebook chunks. Queries run against the
 * snapshot active when they start; rebuilds swap in a complete new snapshot.
 */
export class RuleIndex implements RuleRetriever {
  private active: RuleIndexSnapshot | null = null;
  private readonly rebuildLock = new KeyedLock();

  constructor(private readonly embeddings: EmbeddingProvider) {}

  /** Whether a persisted snapshot was built with the current embedding model. */
  isCompatible(snapshot: RuleIndexSnapshot): boolean {
    return (
      snapshot.dimensions === this.embeddings.dimensions &&
      snapshot.embeddingModel === this.embeddings.model
    );
  }

  load(snapshot: RuleIndexSnapshot): void {
    if (!this.isCompatible(snapshot)) {
      throw new AppError(
        "rule_index_incompatible",
        "Rule index snapshot was built with a different embedding model.",
        500
      );
    }
    this.active = freezeSnapshot(snapshot);
  }

  async rebuild(pages: readonly RulebookPage[], options: BuildOptions): Promise<RuleIndexSnapshot> {
    return this.rebuildLock.runExclusive(REBUILD_LOCK_KEY, async () => {
      const version = (this.active?.version ?? 0) + 1;
      const next = await buildRuleIndexSnapshot(pages, this.embeddings, { ...options, version });
      this.active = next;
      logInfo("rule_index_swapped", { version, chunkCount: next.chunks.length });
      return next;
    });
  }

  async query(text: string, k: number): Promise<RuleMatch[]> {
    const snapshot = this.active;
    if (!snapshot) {
      throw new AppError("rule_index_unavailable", "Rule index has not been built.", 503);
    }
    const [vector] = await this.embeddings.embed([text]);
    const queryVector = vector ?? [];
    return snapshot.chunks
      .map((chunk) => ({ chunk, score: cosineSimilarity(queryVector, chunk.embedding) }))
      .sort((a, b) => b.score - a.score || a.chunk.id.localeCompare(b.chunk.id))
      .slice(0, Math.max(0, k));
  }

  status(): RuleIndexStatus {
    const snapshot = this.active;
    return {
      ready: snapshot !== null,
      version: snapshot?.version ?? 0,
      chunkCount: snapshot?.chunks.length ?? 0,
      builtAt: snapshot?.builtAt ?? null,
      embeddingModel: snapshot?.embeddingModel ?? null,
    };
  }
}
