import dotenv from "dotenv";

dotenv.config();

export type AggregationPolicyName = "strict" | "pathways";

const AGGREGATION_POLICIES: readonly AggregationPolicyName[] = ["strict", "pathways"];

function getEnvValue(key: string): string | undefined {
  const value = process.env[key];
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.floor(parsed);
}

function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    return fallback;
  }
  return Math.floor(parsed);
}

function parseUnitInterval(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    return fallback;
  }
  return parsed;
}

function parseCsv(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const entries = value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
  return entries.length > 0 ? entries : fallback;
}

function isTestEnv(): boolean {
  return process.env.NODE_ENV === "test";
}

export function getPort(): number {
  return parsePositiveInt(getEnvValue("PORT"), 8000);
}

export function getCorsAllowlist(): string[] {
  return parseCsv(getEnvValue("CORS_ALLOWED_ORIGINS"), ["*"]);
}

export function getWorkflowConcurrency(): number {
  return parsePositiveInt(getEnvValue("WORKFLOW_CONCURRENCY"), 4);
}

export function getStageMaxAttempts(): number {
  return parsePositiveInt(getEnvValue("STAGE_MAX_ATTEMPTS"), 3);
}

export function getStageRetryBaseMs(): number {
  return parseNonNegativeInt(getEnvValue("STAGE_RETRY_BASE_MS"), isTestEnv() ? 0 : 250);
}

export function getStageTimeoutMs(): number {
  return parsePositiveInt(getEnvValue("STAGE_TIMEOUT_MS"), 60_000);
}

export function getClassifierConfidenceThreshold(): number {
  return parseUnitInterval(getEnvValue("CLASSIFIER_CONFIDENCE_THRESHOLD"), 0.5);
}

export function getExtractionMinConfidence(): number {
  return parseUnitInterval(getEnvValue("EXTRACTION_MIN_CONFIDENCE"), 0.1);
}

export function getDecisionConfidenceThreshold(): number {
  return parseUnitInterval(getEnvValue("DECISION_CONFIDENCE_THRESHOLD"), 0.8);
}

export function getAggregationPolicy(): AggregationPolicyName {
  const value = getEnvValue("DECISION_AGGREGATION_POLICY")?.toLowerCase();
  const match = AGGREGATION_POLICIES.find((policy) => policy === value);
  return match ?? "strict";
}

export function getRetrievalK(): number {
  return parsePositiveInt(getEnvValue("RETRIEVAL_K"), 5);
}

export function getRuleChunkSize(): number {
  return parsePositiveInt(getEnvValue("RULE_CHUNK_SIZE"), 1500);
}

export function getRuleChunkOverlap(): number {
  const overlap = parseNonNegativeInt(getEnvValue("RULE_CHUNK_OVERLAP"), 200);
  return Math.min(overlap, getRuleChunkSize() - 1);
}

export function getEmbeddingDimensions(): number {
  return parsePositiveInt(getEnvValue("EMBEDDING_DIMENSIONS"), 256);
}

export function getRulebookPath(): string {
  return getEnvValue("RULEBOOK_PATH") ?? "data/rulebook.txt";
}

export function getRuleIndexPath(): string {
  return getEnvValue("RULE_INDEX_PATH") ?? "data/rule-index.json";
}

export function getOpenAiApiKey(): string | undefined {
  return getEnvValue("OPENAI_API_KEY");
}

export function getOpenAiChatModel(): string {
  return getEnvValue("OPENAI_CHAT_MODEL") ?? "gpt-4o-mini";
}

export function getOpenAiEmbedModel(): string {
  return getEnvValue("OPENAI_EMBED_MODEL") ?? "text-embedding-3-small";
}

export function getMaxUploadBytes(): number {
  return parsePositiveInt(getEnvValue("MAX_UPLOAD_BYTES"), 20 * 1024 * 1024);
}

export function getSubmitRateLimitMax(): number {
  return parsePositiveInt(getEnvValue("SUBMIT_RATE_LIMIT_MAX"), isTestEnv() ? 1000 : 20);
}

export function getSubmitRateLimitWindowMs(): number {
  return parsePositiveInt(getEnvValue("SUBMIT_RATE_LIMIT_WINDOW_MS"), 60_000);
}
