import type { PdfType } from "@sitedocs/types";
import { SIGNALS, type ScoredType } from "./signals.js";

/** Minimum score for any type to be chosen. */
export const CONFIDENCE_THRESHOLD = 3;

/** A costing score at this level wins regardless of other types. */
export const COSTING_OVERRIDE_THRESHOLD = 3;

/** Order used when two types share the highest score. */
const TIE_BREAK_ORDER: readonly ScoredType[] = [
  "cost_schedule",
  "task_list",
  "approval_process",
  "ura_circular",
];

export interface ClassificationResult {
  pdfType: PdfType;
  scores: Record<ScoredType, number>;
  /** Labels of the signals that fired, per type. */
  matched: Record<ScoredType, string[]>;
  reason: string;
}

/**
 * Score every document type against the text. Each signal counts once no
 * matter how often it occurs, so scores stay bounded and comparable.
 */
export function scoreDocument(text: string): ClassificationResult {
  const scores: Record<ScoredType, number> = {
    cost_schedule: 0,
    task_list: 0,
    approval_process: 0,
    ura_circular: 0,
  };
  const matched: Record<ScoredType, string[]> = {
    cost_schedule: [],
    task_list: [],
    approval_process: [],
    ura_circular: [],
  };

  for (const type of TIE_BREAK_ORDER) {
    for (const signal of SIGNALS[type]) {
      if (signal.test(text)) {
        scores[type] += signal.weight;
        matched[type].push(signal.label);
      }
    }
  }

  if (scores.cost_schedule >= COSTING_OVERRIDE_THRESHOLD) {
    return {
      pdfType: "cost_schedule",
      scores,
      matched,
      reason: `costing override: ${matched.cost_schedule.join(", ")}`,
    };
  }

  let best: ScoredType = "cost_schedule";
  for (const type of TIE_BREAK_ORDER) {
    if (scores[type] > scores[best]) best = type;
  }

  if (scores[best] < CONFIDENCE_THRESHOLD) {
    return {
      pdfType: "unknown",
      scores,
      matched,
      reason: `no type reached the confidence threshold (${String(CONFIDENCE_THRESHOLD)})`,
    };
  }

  return {
    pdfType: best,
    scores,
    matched,
    reason: `highest score ${String(scores[best])}: ${matched[best].join(", ")}`,
  };
}

export function classify(text: string): PdfType {
  return scoreDocument(text).pdfType;
}
