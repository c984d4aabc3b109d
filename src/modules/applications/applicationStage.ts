import { InvalidTransitionError } from "../../errors/AppError";

export enum WorkflowStage {
  READY = "READY",
  CLASSIFYING = "CLASSIFYING",
  EXTRACTING = "EXTRACTING",
  DECIDING = "DECIDING",
  DECISION_MADE = "DECISION_MADE",
  ERROR = "ERROR",
}

export const LEGAL_TRANSITIONS: Record<WorkflowStage, readonly WorkflowStage[]> = {
  [WorkflowStage.READY]: [WorkflowStage.CLASSIFYING, WorkflowStage.ERROR],
  [WorkflowStage.CLASSIFYING]: [WorkflowStage.EXTRACTING, WorkflowStage.ERROR],
  [WorkflowStage.EXTRACTING]: [WorkflowStage.DECIDING, WorkflowStage.ERROR],
  [WorkflowStage.DECIDING]: [WorkflowStage.DECISION_MADE, WorkflowStage.ERROR],
  [WorkflowStage.DECISION_MADE]: [],
  [WorkflowStage.ERROR]: [],
};

export function isTerminalStage(stage: WorkflowStage): boolean {
  return LEGAL_TRANSITIONS[stage].length === 0;
}

export function canTransition(current: WorkflowStage, next: WorkflowStage): boolean {
  return LEGAL_TRANSITIONS[current].includes(next);
}

export function assertStageTransition(current: WorkflowStage, next: WorkflowStage): void {
  if (isTerminalStage(current)) {
    throw new InvalidTransitionError("Application is in a terminal stage.", { current, next });
  }
  if (!canTransition(current, next)) {
    throw new InvalidTransitionError("Invalid workflow transition.", { current, next });
  }
}
