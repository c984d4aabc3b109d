import { describe, expect, it } from "vitest";
import { HashingEmbeddingProvider, type EmbeddingProvider } from "../embedding.service";
import { RuleIndex } from "../ruleIndex";
import { createDeferred } from "../../../test/fakes";

const BUILD = { chunkSize: 1000, chunkOverlap: 100 };

const PAGES = [
  { page: 1, text: "1 Scope\nThese regulations govern admission to Finanzmanagement." },
  { page: 2, text: "2.1 Direct access\nThe Allgemeine Hochschulreife grants direct university access." },
  { page: 3, text: "3.1 Fees\nTuition fees are payable every semester." },
  { page: 4, text: "4.1 Housing\nStudent housing is allocated by lottery." },
  { page: 5, text: "5.1 Library\nLibrary cards are issued at enrolment." },
];

/** Holds back the embedding of one query text until released. */
class GatedEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;
  readonly gate = createDeferred();

  constructor(
    private readonly inner: EmbeddingProvider,
    private readonly blockedText: string
  ) {
    this.model = inner.model;
    this.dimensions = inner.dimensions;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    if (texts[0] === this.blockedText) {
      await this.gate.promise;
    }
    return this.inner.embed(texts);
  }
}

describe("RuleIndex", () => {
  it("refuses queries before the first build", async () => {
    const index = new RuleIndex(new HashingEmbeddingProvider(64));
    await expect(index.query("anything", 3)).rejects.toMatchObject({
      code: "rule_index_unavailable",
      status: 503,
    });
    expect(index.status()).toEqual({
      ready: false,
      version: 0,
      chunkCount: 0,
      builtAt: null,
      embeddingModel: null,
    });
  });

  it("ranks the chunk sharing the most terms first", async () => {
    const index = new RuleIndex(new HashingEmbeddingProvider(256));
    await index.rebuild(PAGES, BUILD);

    const matches = await index.query("Allgemeine Hochschulreife direct university access", 3);

    expect(matches).toHaveLength(3);
    expect(matches[0]?.chunk.id).toBe("p2-c0");
    expect(matches[0]?.chunk.citation.label).toBe("page 2, section 2.1");
    expect(matches[0]?.score).toBeGreaterThan(0.5);
  });

  it("finds the direct access rule for a program requirements question", async () => {
    const index = new RuleIndex(new HashingEmbeddingProvider(256));
    await index.rebuild(PAGES, BUILD);

    const matches = await index.query("Finanzmanagement direct access requirements", 3);

    expect(matches.map((match) => match.chunk.id)).toContain("p2-c0");
  });

  it("numbers snapshots and serializes concurrent rebuilds", async () => {
    const index = new RuleIndex(new HashingEmbeddingProvider(64));
    const [first, second] = await Promise.all([index.rebuild(PAGES, BUILD), index.rebuild(PAGES, BUILD)]);

    expect([first.version, second.version]).toEqual([1, 2]);
    expect(index.status()).toMatchObject({ ready: true, version: 2, chunkCount: 5, embeddingModel: "feature-hashing" });
    expect(Object.isFrozen(second.chunks)).toBe(true);
  });

  it("answers an in-flight query from the snapshot it started on", async () => {
    const question = "Tuition fees every semester";
    const embeddings = new GatedEmbeddingProvider(new HashingEmbeddingProvider(64), question);
    const index = new RuleIndex(embeddings);
    await index.rebuild(PAGES, BUILD);

    const pending = index.query(question, 5);
    await index.rebuild([{ page: 9, text: "9.1 New rules\nTuition fees are waived." }], BUILD);
    embeddings.gate.resolve();
    const matches = await pending;

    expect(matches.map((match) => match.chunk.id).sort()).toEqual(["p1-c0", "p2-c0", "p3-c0", "p4-c0", "p5-c0"]);
    expect(index.status().version).toBe(2);
    expect((await index.query(question, 5)).map((match) => match.chunk.id)).toEqual(["p9-c0"]);
  });

  it("rejects snapshots built with another embedding setup", async () => {
    const builder = new RuleIndex(new HashingEmbeddingProvider(32));
    const snapshot = await builder.rebuild(PAGES, BUILD);
    const index = new RuleIndex(new HashingEmbeddingProvider(64));

    expect(index.isCompatible(snapshot)).toBe(false);
    expect(() => index.load(snapshot)).toThrow("Rule index snapshot was built with a different embedding model.");
  });
});
