import { describe, expect, it } from "vitest";
import { InvalidTransitionError } from "../../../errors/AppError";
import {
  LEGAL_TRANSITIONS,
  WorkflowStage,
  assertStageTransition,
  canTransition,
  isTerminalStage,
} from "../applicationStage";

describe("workflow stage machine", () => {
  it("only moves forward one step or into ERROR", () => {
    const happyPath = [
      WorkflowStage.READY,
      WorkflowStage.CLASSIFYING,
      WorkflowStage.EXTRACTING,
      WorkflowStage.DECIDING,
      WorkflowStage.DECISION_MADE,
    ];
    happyPath.forEach((stage, index) => {
      const next = happyPath[index + 1];
      const allowed = LEGAL_TRANSITIONS[stage];
      if (next) {
        expect(allowed).toEqual([next, WorkflowStage.ERROR]);
      } else {
        expect(allowed).toEqual([]);
      }
    });
    expect(LEGAL_TRANSITIONS[WorkflowStage.ERROR]).toEqual([]);
  });

  it("never allows a regression", () => {
    expect(canTransition(WorkflowStage.DECIDING, WorkflowStage.EXTRACTING)).toBe(false);
    expect(canTransition(WorkflowStage.EXTRACTING, WorkflowStage.READY)).toBe(false);
    expect(canTransition(WorkflowStage.READY, WorkflowStage.EXTRACTING)).toBe(false);
  });

  it("treats DECISION_MADE and ERROR as terminal", () => {
    expect(isTerminalStage(WorkflowStage.DECISION_MADE)).toBe(true);
    expect(isTerminalStage(WorkflowStage.ERROR)).toBe(true);
    expect(isTerminalStage(WorkflowStage.DECIDING)).toBe(false);
  });

  it("rejects transitions out of terminal stages", () => {
    expect(() => assertStageTransition(WorkflowStage.ERROR, WorkflowStage.CLASSIFYING)).toThrow(
      "Application is in a terminal stage."
    );
    expect(() => assertStageTransition(WorkflowStage.READY, WorkflowStage.DECIDING)).toThrow(
      InvalidTransitionError
    );
  });
});
