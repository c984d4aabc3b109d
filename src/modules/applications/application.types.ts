import type { ClassificationOutput } from "../classification/classification.types";
import type { Decision } from "../decision/decision.types";
import type { ExtractionOutput } from "../extraction/extraction.types";
import type { StageFailureReason } from "../../errors/StageExecutionError";
import type { WorkflowStage } from "./applicationStage";

export type UploadedFile = {
  fileName: string;
  mimeType: string;
  buffer: Buffer;
};

export type DocumentDescriptor = {
  documentId: string;
  fileName: string;
  mimeType: string;
  sizeBytes: number;
};

export type WorkflowEvent = {
  timestamp: string;
  agent: string;
  action: string;
  details?: Record<string, unknown>;
};

export type StageOutputs = {
  classification?: ClassificationOutput;
  extraction?: ExtractionOutput;
  decision?: Decision;
};

export type StageFailure = {
  stage: WorkflowStage;
  code: string;
  reason: StageFailureReason;
  message: string;
  detail?: unknown;
  failedAt: string;
};

export type StageHistoryEntry = {
  stage: WorkflowStage;
  at: string;
};

export type ApplicationRecord = {
  id: string;
  applicantId: string;
  targetProgram: string;
  entity: string;
  documents: DocumentDescriptor[];
  currentStage: WorkflowStage;
  outputs: StageOutputs;
  failure: StageFailure | null;
  createdAt: string;
  updatedAt: string;
  events: WorkflowEvent[];
  history: StageHistoryEntry[];
};

export type SubmitApplicationInput = {
  applicantId: string;
  targetProgram: string;
  entity?: string;
  files: UploadedFile[];
};
