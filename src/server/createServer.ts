import type express from "express";
import { buildApp } from "../app";
import {
  getAggregationPolicy,
  getClassifierConfidenceThreshold,
  getDecisionConfidenceThreshold,
  getExtractionMinConfidence,
  getRetrievalK,
  getRuleChunkOverlap,
  getRuleChunkSize,
  getRuleIndexPath,
  getRulebookPath,
  getStageMaxAttempts,
  getStageRetryBaseMs,
  getStageTimeoutMs,
  getWorkflowConcurrency,
} from "../config";
import { logError } from "../observability/logger";
import { InMemoryApplicationStore, type ApplicationStore } from "../modules/applications/applications.store";
import { ClassificationStage } from "../modules/classification/classification.stage";
import { RetrievalAugmentedDecisionMaker } from "../modules/decision/decisionMaker";
import { InMemoryDocumentBlobStore, type DocumentBlobStore } from "../modules/documents/documents.store";
import { ExtractionStage } from "../modules/extraction/extraction.stage";
import { RuleIndex } from "../modules/rules/ruleIndex";
import { RulesService, type RulesServiceOptions } from "../modules/rules/rules.service";
import { createDefaultCapabilities, type Capabilities } from "../modules/workflow/capabilities";
import { WorkflowOrchestrator } from "../modules/workflow/workflowOrchestrator";

export type CreateServerOptions = {
  config?: {
    skipRuleIndexInit?: boolean;
  };
  capabilities?: Partial<Capabilities>;
  store?: ApplicationStore;
  blobs?: DocumentBlobStore;
  rules?: Partial<RulesServiceOptions>;
  workflow?: {
    concurrency?: number;
    maxAttempts?: number;
    retryBaseMs?: number;
    stageTimeoutMs?: number;
  };
};

export type ServerContext = {
  app: express.Express;
  orchestrator: WorkflowOrchestrator;
  rules: RulesService;
  ruleIndex: RuleIndex;
};

export async function createServer(options: CreateServerOptions = {}): Promise<ServerContext> {
  const capabilities: Capabilities =
    options.capabilities && isComplete(options.capabilities)
      ? options.capabilities
      : { ...createDefaultCapabilities(), ...options.capabilities };

  const ruleIndex = new RuleIndex(capabilities.embeddings);
  const rules = new RulesService(ruleIndex, {
    rulebookPath: getRulebookPath(),
    indexPath: getRuleIndexPath(),
    chunkSize: getRuleChunkSize(),
    chunkOverlap: getRuleChunkOverlap(),
    defaultK: getRetrievalK(),
    answerer: capabilities.answerer ?? null,
    ...options.rules,
  });

  const orchestrator = new WorkflowOrchestrator({
    store: options.store ?? new InMemoryApplicationStore(),
    blobs: options.blobs ?? new InMemoryDocumentBlobStore(),
    textExtractor: capabilities.textExtractor,
    classifier: new ClassificationStage(capabilities.labeler, {
      confidenceThreshold: getClassifierConfidenceThreshold(),
    }),
    extractor: new ExtractionStage(capabilities.fieldExtractor, {
      minConfidence: getExtractionMinConfidence(),
    }),
    decisionMaker: new RetrievalAugmentedDecisionMaker({
      retriever: ruleIndex,
      interpreter: capabilities.interpreter,
      k: getRetrievalK(),
      confidenceThreshold: getDecisionConfidenceThreshold(),
      policy: getAggregationPolicy(),
    }),
    concurrency: options.workflow?.concurrency ?? getWorkflowConcurrency(),
    maxAttempts: options.workflow?.maxAttempts ?? getStageMaxAttempts(),
    retryBaseMs: options.workflow?.retryBaseMs ?? getStageRetryBaseMs(),
    stageTimeoutMs: options.workflow?.stageTimeoutMs ?? getStageTimeoutMs(),
  });

  if (!options.config?.skipRuleIndexInit) {
    try {
      await rules.initialize();
    } catch (err) {
      logError("fatal_rule_index_init", {
        message: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  const app = buildApp({ orchestrator, rules });
  app.set("trust proxy", 1);

  return { app, orchestrator, rules, ruleIndex };
}

function isComplete(partial: Partial<Capabilities>): partial is Capabilities {
  return Boolean(
    partial.textExtractor &&
      partial.labeler &&
      partial.fieldExtractor &&
      partial.interpreter &&
      partial.embeddings
  );
}
