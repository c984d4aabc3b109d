import type { WorkflowStage } from "../applications/applicationStage";
import type {
  DocumentDescriptor,
  StageFailure,
  StageHistoryEntry,
  StageOutputs,
  WorkflowEvent,
} from "../applications/application.types";
import type { Decision, DecisionStatus } from "../decision/decision.types";

export type ApplicationStatus = {
  applicationId: string;
  applicantId: string;
  targetProgram: string;
  entity: string;
  currentStage: WorkflowStage;
  documents: DocumentDescriptor[];
  outputs: StageOutputs;
  decision: Decision | null;
  failure: StageFailure | null;
  history: StageHistoryEntry[];
  logs: WorkflowEvent[];
  createdAt: string;
  updatedAt: string;
};

export type ApplicationSummary = {
  applicationId: string;
  applicantId: string;
  targetProgram: string;
  entity: string;
  currentStage: WorkflowStage;
  createdAt: string;
  documentCount: number;
  decisionStatus: DecisionStatus | null;
};

export type SubmitResult = {
  applicationId: string;
  currentStage: WorkflowStage;
};
