import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";
import { describeError, logWarn } from "../../observability/logger";
import type { RuleIndexSnapshot } from "./ruleIndex";

const citationSchema = z.object({
  page: z.number().int().positive(),
  section: z.string().nullable(),
  label: z.string(),
});

const persistedChunkSchema = z.object({
  text: z.string(),
  citation: citationSchema,
  embedding: z.array(z.number()),
});

/** On disk the chunks are keyed by chunk id. */
const persistedSnapshotSchema = z.object({
  version: z.number().int().nonnegative(),
  builtAt: z.string(),
  embeddingModel: z.string(),
  dimensions: z.number().int().positive(),
  chunks: z.record(persistedChunkSchema),
});

type PersistedSnapshot = z.infer<typeof persistedSnapshotSchema>;

function toPersisted(snapshot: RuleIndexSnapshot): PersistedSnapshot {
  const chunks: PersistedSnapshot["chunks"] = {};
  for (const chunk of snapshot.chunks) {
    chunks[chunk.id] = {
      text: chunk.text,
      citation: { ...chunk.citation },
      embedding: [...chunk.embedding],
    };
  }
  return {
    version: snapshot.version,
    builtAt: snapshot.builtAt,
    embeddingModel: snapshot.embeddingModel,
    dimensions: snapshot.dimensions,
    chunks,
  };
}

export function parseRuleIndexSnapshot(raw: unknown): RuleIndexSnapshot | null {
  const parsed = persistedSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  const { chunks, ...meta } = parsed.data;
  const entries = Object.entries(chunks).map(([id, chunk]) => ({ id, ...chunk }));
  if (entries.some((chunk) => chunk.embedding.length !== meta.dimensions)) {
    return null;
  }
  return { ...meta, chunks: entries };
}

export async function readRuleIndexSnapshot(path: string): Promise<RuleIndexSnapshot | null> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    logWarn("rule_index_snapshot_unreadable", { path, error: describeError(err) });
    return null;
  }

  const snapshot = parseRuleIndexSnapshot(json);
  if (!snapshot) {
    logWarn("rule_index_snapshot_invalid", { path });
  }
  return snapshot;
}

export async function writeRuleIndexSnapshot(path: string, snapshot: RuleIndexSnapshot): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.tmp`;
  await writeFile(tempPath, JSON.stringify(toPersisted(snapshot)), "utf8");
  await rename(tempPath, path);
}
