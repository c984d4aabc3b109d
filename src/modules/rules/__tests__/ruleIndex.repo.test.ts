import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parseRuleIndexSnapshot, readRuleIndexSnapshot, writeRuleIndexSnapshot } from "../ruleIndex.repo";
import type { RuleIndexSnapshot } from "../ruleIndex";

const snapshot: RuleIndexSnapshot = {
  version: 3,
  builtAt: "2026-01-01T00:00:00.000Z",
  embeddingModel: "feature-hashing",
  dimensions: 2,
  chunks: [
    {
      id: "p1-c0",
      text: "1 Scope",
      citation: { page: 1, section: "1", label: "page 1, section 1" },
      embedding: [1, 0],
    },
  ],
};

describe("rule index persistence", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "rule-index-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("stores chunks keyed by id and reads them back", async () => {
    const path = join(dir, "nested", "index.json");
    await writeRuleIndexSnapshot(path, snapshot);

    const raw: unknown = JSON.parse(await readFile(path, "utf8"));
    expect(raw).toMatchObject({ chunks: { "p1-c0": { text: "1 Scope" } } });
    await expect(readRuleIndexSnapshot(path)).resolves.toEqual(snapshot);
  });

  it("treats a missing or unreadable file as no snapshot", async () => {
    await expect(readRuleIndexSnapshot(join(dir, "missing.json"))).resolves.toBeNull();

    const broken = join(dir, "broken.json");
    await writeFile(broken, "{not json", "utf8");
    await expect(readRuleIndexSnapshot(broken)).resolves.toBeNull();
  });

  it("rejects embeddings that do not match the declared dimensions", () => {
    expect(
      parseRuleIndexSnapshot({
        version: 1,
        builtAt: "2026-01-01T00:00:00.000Z",
        embeddingModel: "feature-hashing",
        dimensions: 3,
        chunks: { "p1-c0": { text: "x", citation: { page: 1, section: null, label: "page 1" }, embedding: [1, 0] } },
      })
    ).toBeNull();
  });
});
