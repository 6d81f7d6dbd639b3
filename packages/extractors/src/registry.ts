import type { PdfType } from "@sitedocs/types";
import type { IEntityExtractor } from "./extractor.interface.js";
import { CostScheduleExtractor } from "./cost-schedule-extractor.js";
import { TaskListExtractor } from "./task-list-extractor.js";
import { UraCircularExtractor } from "./ura-circular-extractor.js";
import { ApprovalProcessExtractor } from "./approval-process-extractor.js";
import { NoopExtractor } from "./noop-extractor.js";

export type ExtractorRegistry = Readonly<Record<PdfType, IEntityExtractor>>;

export function createExtractorRegistry(): ExtractorRegistry {
  return {
    unknown: new NoopExtractor(),
    cost_schedule: new CostScheduleExtractor(),
    task_list: new TaskListExtractor(),
    ura_circular: new UraCircularExtractor(),
    approval_process: new ApprovalProcessExtractor(),
  };
}

const defaultRegistry = createExtractorRegistry();

export function getExtractor(pdfType: PdfType): IEntityExtractor {
  return defaultRegistry[pdfType];
}
