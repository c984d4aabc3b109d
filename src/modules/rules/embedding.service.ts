import { createHash } from "crypto";
import type OpenAI from "openai";
import { getOpenAIClient, getOpenAiBreaker } from "../ai/openai.service";
import stopwordTable from "./stopwords.json";

export interface EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;
  embed(texts: readonly string[]): Promise<number[][]>;
}

const STOPWORDS = new Set<string>([...stopwordTable.en, ...stopwordTable.de]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 1 && !STOPWORDS.has(token));
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function normalize(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  return norm === 0 ? vector : vector.map((value) => value / norm);
}

/** Deterministic feature-hashing embedding; used when no API key is configured. */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly model = "feature-hashing";

  constructor(readonly dimensions: number) {}

  async embed(texts: readonly string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      const digest = createHash("sha256").update(token).digest();
      const bucket = digest.readUInt32BE(0) % this.dimensions;
      const sign = (digest[4] ?? 0) & 1 ? -1 : 1;
      vector[bucket] = (vector[bucket] ?? 0) + sign;
    }
    return normalize(vector);
  }
}

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  constructor(
    readonly model: string,
    readonly dimensions: number,
    private readonly client?: OpenAI
  ) {}

  async embed(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const response = await getOpenAiBreaker().execute(() => {
      const openai = this.client ?? getOpenAIClient();
      return openai.embeddings.create({
        model: this.model,
        input: [...texts],
        dimensions: this.dimensions,
      });
    });
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((entry) => entry.embedding);
  }
}
