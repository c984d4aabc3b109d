import pLimit from "p-limit";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { AppError, NotFoundError, ValidationError } from "../../errors/AppError";
import {
  isRetryableStageError,
  toStageExecutionError,
  type StageExecutionError,
} from "../../errors/StageExecutionError";
import { runWithRequestContext } from "../../middleware/requestContext";
import { describeError, logError, logInfo, logWarn } from "../../observability/logger";
import { retryWithBackoff } from "../../utils/retry";
import { withTimeout } from "../../utils/withTimeout";
import { WorkflowStage, isTerminalStage } from "../applications/applicationStage";
import type {
  ApplicationRecord,
  StageOutputs,
  SubmitApplicationInput,
  UploadedFile,
  WorkflowEvent,
} from "../applications/application.types";
import type { ApplicationStore } from "../applications/applications.store";
import { isSupportedEntity, normalizeEntity } from "../applications/documentRequirements";
import type { Classifier } from "../classification/classification.stage";
import type { SourceDocument } from "../classification/classification.types";
import type { DecisionMaker } from "../decision/decisionMaker";
import type { DocumentBlobStore, StoredDocument } from "../documents/documents.store";
import { isPdfFile, type TextExtractor } from "../documents/textExtractor";
import type { Extractor } from "../extraction/extraction.stage";
import type { ClassifiedSourceDocument } from "../extraction/extraction.types";
import type { ApplicationStatus, ApplicationSummary, SubmitResult } from "./workflow.types";

export type WorkflowDependencies = {
  store: ApplicationStore;
  blobs: DocumentBlobStore;
  textExtractor: TextExtractor;
  classifier: Classifier;
  extractor: Extractor;
  decisionMaker: DecisionMaker;
  concurrency: number;
  maxAttempts: number;
  retryBaseMs: number;
  stageTimeoutMs: number;
  now?: () => Date;
};

type EventDraft = Omit<WorkflowEvent, "timestamp">;

const STAGE_AGENTS: Partial<Record<WorkflowStage, string>> = {
  [WorkflowStage.CLASSIFYING]: "DocumentClassifier",
  [WorkflowStage.EXTRACTING]: "DataExtractor",
  [WorkflowStage.DECIDING]: "AdmissionDecision",
};

const MAX_ID_ATTEMPTS = 3;

const submitSchema = z.object({
  applicantId: z.string().trim().min(1, "applicantId is required"),
  targetProgram: z.string().trim().min(1, "targetProgram is required"),
  entity: z
    .string()
    .trim()
    .optional()
    .refine((value) => value === undefined || isSupportedEntity(value), "entity is not supported"),
  files: z.array(
    z.object({
      fileName: z.string().min(1),
      mimeType: z.string(),
      buffer: z.instanceof(Buffer),
    })
  ),
});

function generateApplicationId(): string {
  return `APP-${uuidv4().replace(/-/g, "").slice(0, 8).toUpperCase()}`;
}

function toStatus(record: ApplicationRecord): ApplicationStatus {
  return {
    applicationId: record.id,
    applicantId: record.applicantId,
    targetProgram: record.targetProgram,
    entity: record.entity,
    currentStage: record.currentStage,
    documents: record.documents,
    outputs: record.outputs,
    decision: record.outputs.decision ?? null,
    failure: record.failure,
    history: record.history,
    logs: record.events,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
}

function toSummary(record: ApplicationRecord): ApplicationSummary {
  return {
    applicationId: record.id,
    applicantId: record.applicantId,
    targetProgram: record.targetProgram,
    entity: record.entity,
    currentStage: record.currentStage,
    createdAt: record.createdAt,
    documentCount: record.documents.length,
    decisionStatus: record.outputs.decision?.status ?? null,
  };
}

/**
 * Drives each application through classification, extraction and decision.
 * Runs for different applications share a bounded worker pool; a single
 * application's stages run one after another.
 */
export class WorkflowOrchestrator {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly now: () => Date;

  constructor(private readonly deps: WorkflowDependencies) {
    this.limit = pLimit(Math.max(1, deps.concurrency));
    this.now = deps.now ?? (() => new Date());
  }

  async submit(input: SubmitApplicationInput): Promise<SubmitResult> {
    const parsed = submitSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(
        parsed.error.issues[0]?.message ?? "Invalid submission.",
        parsed.error.issues.map((issue) => ({
          field: issue.path.join(".") || "input",
          message: issue.message,
        }))
      );
    }
    const { applicantId, targetProgram } = parsed.data;
    const pdfs = parsed.data.files.filter((file) => isPdfFile(file));
    if (pdfs.length === 0) {
      throw new ValidationError("At least one PDF document is required.", [
        { field: "files", message: "no PDF documents" },
      ]);
    }
    const skipped = parsed.data.files.filter((file) => !isPdfFile(file)).map((file) => file.fileName);

    const entity = normalizeEntity(parsed.data.entity);
    const record = await this.insertWithFreshId({ applicantId, targetProgram, entity, pdfs, skipped });

    logInfo("application_submitted", {
      applicationId: record.id,
      documentCount: record.documents.length,
      entity,
    });
    this.schedule(record.id);
    return { applicationId: record.id, currentStage: record.currentStage };
  }

  async getStatus(applicationId: string): Promise<ApplicationStatus> {
    const record = await this.deps.store.get(applicationId);
    if (!record) {
      throw new NotFoundError("Application", applicationId);
    }
    return toStatus(record);
  }

  async listApplications(): Promise<ApplicationSummary[]> {
    const records = await this.deps.store.list();
    return records.map(toSummary);
  }

  /** Resolves once every scheduled run has finished. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private async insertWithFreshId(params: {
    applicantId: string;
    targetProgram: string;
    entity: string;
    pdfs: UploadedFile[];
    skipped: string[];
  }): Promise<ApplicationRecord> {
    const timestamp = this.timestamp();
    for (let attempt = 1; ; attempt += 1) {
      const id = generateApplicationId();
      const stored: StoredDocument[] = params.pdfs.map((file, index) => ({
        descriptor: {
          documentId: `${id}-D${index + 1}`,
          fileName: file.fileName,
          mimeType: file.mimeType,
          sizeBytes: file.buffer.length,
        },
        buffer: file.buffer,
      }));
      const record: ApplicationRecord = {
        id,
        applicantId: params.applicantId,
        targetProgram: params.targetProgram,
        entity: params.entity,
        documents: stored.map((document) => document.descriptor),
        currentStage: WorkflowStage.READY,
        outputs: {},
        failure: null,
        createdAt: timestamp,
        updatedAt: timestamp,
        events: [
          {
            timestamp,
            agent: "Workflow",
            action: "application_submitted",
            details: {
              documentCount: stored.length,
              ...(params.skipped.length > 0 ? { skippedFiles: params.skipped } : {}),
            },
          },
        ],
        history: [{ stage: WorkflowStage.READY, at: timestamp }],
      };
      try {
        await this.deps.blobs.put(id, stored);
        await this.deps.store.insert(record);
        return record;
      } catch (err) {
        await this.deps.blobs.release(id);
        const duplicate = err instanceof AppError && err.code === "duplicate_application";
        if (!duplicate || attempt >= MAX_ID_ATTEMPTS) {
          throw err;
        }
      }
    }
  }

  private schedule(applicationId: string): void {
    const task: Promise<void> = this.limit(() => this.run(applicationId))
      .catch((err: unknown) => {
        logError("workflow_run_failed", { applicationId, error: describeError(err) });
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private run(applicationId: string): Promise<void> {
    return runWithRequestContext(
      { requestId: `workflow-${applicationId}`, applicationId },
      async () => {
        try {
          await this.advance(applicationId);
        } finally {
          await this.deps.blobs.release(applicationId);
        }
      }
    );
  }

  private async advance(applicationId: string): Promise<void> {
    let stage = WorkflowStage.CLASSIFYING;
    let record = await this.commit(applicationId, stage, {}, {
      agent: "Workflow",
      action: "processing_started",
    });

    try {
      const blobs = await this.deps.blobs.get(applicationId);
      const sources = await this.runStage("text_extraction", () => this.readDocuments(blobs));
      const classification = await this.runStage("classification", () =>
        this.deps.classifier.classify(sources)
      );
      stage = WorkflowStage.EXTRACTING;
      record = await this.commit(applicationId, stage, { classification }, {
        agent: "DocumentClassifier",
        action: "documents_classified",
        details: {
          labels: classification.documents.map((document) => document.label),
        },
      });

      const classified: ClassifiedSourceDocument[] = [];
      for (const source of sources) {
        const match = classification.documents.find((entry) => entry.documentId === source.documentId);
        if (match) {
          classified.push({ ...source, classification: match });
        }
      }
      const extraction = await this.runStage("extraction", () =>
        this.deps.extractor.extract(classified, { entity: record.entity })
      );
      stage = WorkflowStage.DECIDING;
      record = await this.commit(applicationId, stage, { extraction }, {
        agent: "DataExtractor",
        action: "profile_extracted",
        details: {
          qualificationType: extraction.profile.qualificationType,
          confidence: extraction.profile.confidence,
          missingFields: extraction.profile.missingFields,
        },
      });

      const decision = await this.runStage("decision", () =>
        this.deps.decisionMaker.decide({
          applicationId,
          profile: extraction.profile,
          targetProgram: record.targetProgram,
          entity: record.entity,
        })
      );
      stage = WorkflowStage.DECISION_MADE;
      await this.commit(applicationId, stage, { decision }, {
        agent: "AdmissionDecision",
        action: "decision_made",
        details: {
          status: decision.status,
          confidence: decision.confidence,
          citationCount: decision.citations.length,
        },
      });
      logInfo("application_decided", {
        applicationId,
        status: decision.status,
        confidence: decision.confidence,
      });
    } catch (err) {
      await this.fail(applicationId, stage, toStageExecutionError(stage, err));
    }
  }

  private async readDocuments(blobs: StoredDocument[]): Promise<SourceDocument[]> {
    const sources: SourceDocument[] = [];
    for (const blob of blobs) {
      const text = await this.deps.textExtractor.extract({
        fileName: blob.descriptor.fileName,
        mimeType: blob.descriptor.mimeType,
        buffer: blob.buffer,
      });
      sources.push({
        documentId: blob.descriptor.documentId,
        fileName: blob.descriptor.fileName,
        mimeType: blob.descriptor.mimeType,
        text,
      });
    }
    return sources;
  }

  /** Bounded retry of one idempotent backing call; outputs are written only on success. */
  private async runStage<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await retryWithBackoff(() => withTimeout(fn(), this.deps.stageTimeoutMs, `${label} stage`), {
        attempts: this.deps.maxAttempts,
        baseDelayMs: this.deps.retryBaseMs,
        shouldRetry: (err) => isRetryableStageError(err),
        onRetry: (err, attempt, delayMs) => {
          logWarn("stage_retry", { stage: label, attempt, delayMs, error: describeError(err) });
        },
      });
    } catch (err) {
      throw toStageExecutionError(label, err);
    }
  }

  private async commit(
    applicationId: string,
    next: WorkflowStage,
    outputs: StageOutputs,
    event: EventDraft
  ): Promise<ApplicationRecord> {
    const at = this.timestamp();
    return this.deps.store.update(applicationId, (current) => ({
      ...current,
      currentStage: next,
      outputs: { ...current.outputs, ...outputs },
      updatedAt: at,
      events: [...current.events, { timestamp: at, ...event }],
      history: [...current.history, { stage: next, at }],
    }));
  }

  private async fail(
    applicationId: string,
    stage: WorkflowStage,
    error: StageExecutionError
  ): Promise<void> {
    const existing = await this.deps.store.get(applicationId);
    if (!existing || isTerminalStage(existing.currentStage)) {
      return;
    }
    const at = this.timestamp();
    const agent = STAGE_AGENTS[stage] ?? "Workflow";
    await this.deps.store.update(applicationId, (current) => {
      return {
        ...current,
        currentStage: WorkflowStage.ERROR,
        failure: {
          stage,
          code: error.code,
          reason: error.reason,
          message: error.message,
          detail: error.detail,
          failedAt: at,
        },
        updatedAt: at,
        events: [
          ...current.events,
          {
            timestamp: at,
            agent,
            action: "stage_failed",
            details: { stage, reason: error.reason, message: error.message },
          },
        ],
        history: [...current.history, { stage: WorkflowStage.ERROR, at }],
      };
    });
    logWarn("application_failed", {
      applicationId,
      stage,
      reason: error.reason,
      error: describeError(error),
    });
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
