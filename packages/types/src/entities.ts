export type CostType = "local" | "foreign" | "unspecified";

export interface CostItem {
  kind: "cost_item";
  sequence: number;
  itemRef: string | null;
  description: string;
  quantity: number;
  unit: string;
  unitRate: number;
  amount: number;
  currency: string | null;
  costType: CostType;
}

export interface ProjectTask {
  kind: "project_task";
  sequence: number;
  taskRef: string | null;
  name: string;
  /** Heading of the phase/stage the task is listed under. */
  phase: string | null;
  durationDays: number | null;
  startDate: string | null;
  finishDate: string | null;
}

export interface RegulatoryRule {
  kind: "regulatory_rule";
  sequence: number;
  clauseRef: string;
  clauseText: string;
  thresholdValue: number | null;
  thresholdUnit: string | null;
  measurementBasis: string | null;
}

export interface ApprovalStep {
  kind: "approval_step";
  sequence: number;
  stepNumber: number;
  description: string;
  authority: string | null;
}

export type EntityRecord = CostItem | ProjectTask | RegulatoryRule | ApprovalStep;

export type EntityKind = EntityRecord["kind"];
