export {
  classify,
  scoreDocument,
  CONFIDENCE_THRESHOLD,
  COSTING_OVERRIDE_THRESHOLD,
} from "./classifier.js";
export type { ClassificationResult } from "./classifier.js";
export type { ScoredType } from "./signals.js";
