import type {
  ApprovalStep,
  CostItem,
  Document,
  EntityRecord,
  ProjectTask,
  RegulatoryRule,
} from "@sitedocs/types";
import type {
  ApprovalStepRow,
  CostItemRow,
  DocumentRow,
  NewApprovalStepRow,
  NewCostItemRow,
  NewProjectTaskRow,
  NewRegulatoryRuleRow,
  ProjectTaskRow,
  RegulatoryRuleRow,
} from "./schema/index.js";

export function toDocument(row: DocumentRow): Document {
  return {
    id: row.id,
    pdfName: row.pdfName,
    storagePath: row.storagePath,
    mimeType: row.mimeType,
    pdfType: row.pdfType,
    status: row.status,
    stageReached: row.stageReached,
    errorKind: row.errorKind,
    errorCode: row.errorCode,
    errorDetail: row.errorDetail,
    extractedText: row.extractedText,
    pageCount: row.pageCount,
    pageOffsets: row.pageOffsets,
    classificationScores: row.classificationScores,
    entityCount: row.entityCount,
    chunkCount: row.chunkCount,
    entitiesPersistedAt: row.entitiesPersistedAt,
    vectorsPersistedAt: row.vectorsPersistedAt,
    cancelRequestedAt: row.cancelRequestedAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export interface EntityRows {
  costItems: NewCostItemRow[];
  projectTasks: NewProjectTaskRow[];
  regulatoryRules: NewRegulatoryRuleRow[];
  approvalSteps: NewApprovalStepRow[];
}

/** Splits an extractor's output into insert rows for each entity table. */
export function toEntityRows(documentId: string, entities: EntityRecord[]): EntityRows {
  const rows: EntityRows = {
    costItems: [],
    projectTasks: [],
    regulatoryRules: [],
    approvalSteps: [],
  };

  for (const entity of entities) {
    switch (entity.kind) {
      case "cost_item":
        rows.costItems.push({
          documentId,
          sequence: entity.sequence,
          itemRef: entity.itemRef,
          description: entity.description,
          quantity: entity.quantity,
          unit: entity.unit,
          unitRate: entity.unitRate,
          amount: entity.amount,
          currency: entity.currency,
          costType: entity.costType,
        });
        break;
      case "project_task":
        rows.projectTasks.push({
          documentId,
          sequence: entity.sequence,
          taskRef: entity.taskRef,
          name: entity.name,
          phase: entity.phase,
          durationDays: entity.durationDays,
          startDate: entity.startDate,
          finishDate: entity.finishDate,
        });
        break;
      case "regulatory_rule":
        rows.regulatoryRules.push({
          documentId,
          sequence: entity.sequence,
          clauseRef: entity.clauseRef,
          clauseText: entity.clauseText,
          thresholdValue: entity.thresholdValue,
          thresholdUnit: entity.thresholdUnit,
          measurementBasis: entity.measurementBasis,
        });
        break;
      case "approval_step":
        rows.approvalSteps.push({
          documentId,
          sequence: entity.sequence,
          stepNumber: entity.stepNumber,
          description: entity.description,
          authority: entity.authority,
        });
        break;
    }
  }

  return rows;
}

export function toCostItem(row: CostItemRow): CostItem {
  return {
    kind: "cost_item",
    sequence: row.sequence,
    itemRef: row.itemRef,
    description: row.description,
    quantity: row.quantity,
    unit: row.unit,
    unitRate: row.unitRate,
    amount: row.amount,
    currency: row.currency,
    costType: row.costType,
  };
}

export function toProjectTask(row: ProjectTaskRow): ProjectTask {
  return {
    kind: "project_task",
    sequence: row.sequence,
    taskRef: row.taskRef,
    name: row.name,
    phase: row.phase,
    durationDays: row.durationDays,
    startDate: row.startDate,
    finishDate: row.finishDate,
  };
}

export function toRegulatoryRule(row: RegulatoryRuleRow): RegulatoryRule {
  return {
    kind: "regulatory_rule",
    sequence: row.sequence,
    clauseRef: row.clauseRef,
    clauseText: row.clauseText,
    thresholdValue: row.thresholdValue,
    thresholdUnit: row.thresholdUnit,
    measurementBasis: row.measurementBasis,
  };
}

export function toApprovalStep(row: ApprovalStepRow): ApprovalStep {
  return {
    kind: "approval_step",
    sequence: row.sequence,
    stepNumber: row.stepNumber,
    description: row.description,
    authority: row.authority,
  };
}
