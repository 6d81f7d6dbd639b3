export type { IEntityExtractor } from "./extractor.interface.js";
export { CostScheduleExtractor } from "./cost-schedule-extractor.js";
export { TaskListExtractor } from "./task-list-extractor.js";
export { UraCircularExtractor } from "./ura-circular-extractor.js";
export { ApprovalProcessExtractor } from "./approval-process-extractor.js";
export { NoopExtractor } from "./noop-extractor.js";
export { createExtractorRegistry, getExtractor } from "./registry.js";
export type { ExtractorRegistry } from "./registry.js";
export { parseDate, parseDecimal } from "./parse-utils.js";
