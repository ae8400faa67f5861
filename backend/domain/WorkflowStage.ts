// Stage ordinals double as the step number carried by the resumption token.
// Order matters: transitions only move forward, except restart and the
// explicit re-entry of an already completed stage.

export enum WorkflowStage {
  Intake = 1,
  Clarification = 2,
  Recommendation = 3,
  FacilityLookup = 4,
  SpecialistEnrichment = 5,
  NoteGeneration = 6,
}

export const STAGE_NAMES: Readonly<Record<WorkflowStage, string>> = {
  [WorkflowStage.Intake]: "Intake",
  [WorkflowStage.Clarification]: "Clarification",
  [WorkflowStage.Recommendation]: "Recommendation",
  [WorkflowStage.FacilityLookup]: "FacilityLookup",
  [WorkflowStage.SpecialistEnrichment]: "SpecialistEnrichment",
  [WorkflowStage.NoteGeneration]: "NoteGeneration",
};

export function isWorkflowStage(value: unknown): value is WorkflowStage {
  return typeof value === "number" && Number.isInteger(value) && value >= WorkflowStage.Intake && value <= WorkflowStage.NoteGeneration;
}

export function stageName(stage: WorkflowStage): string {
  return STAGE_NAMES[stage];
}
