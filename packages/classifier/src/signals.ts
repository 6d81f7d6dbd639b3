import type { PdfType } from "@sitedocs/types";

export type ScoredType = Exclude<PdfType, "unknown">;

export interface Signal {
  label: string;
  weight: number;
  test: (text: string) => boolean;
}

const DATE_PATTERN = /\b\d{4}-\d{2}-\d{2}\b|\b\d{1,2}\/\d{1,2}\/\d{4}\b/g;
const NUMBER_PATTERN = /\d[\d,]*(?:\.\d+)?/g;

function pattern(label: string, weight: number, regex: RegExp): Signal {
  return { label, weight, test: (text) => regex.test(text) };
}

/** At least `minRows` lines carry three or more numbers (dates excluded). */
function numericRows(minRows: number): Signal {
  return {
    label: "numeric table rows",
    weight: 2,
    test: (text) => {
      let rows = 0;
      for (const line of text.split("\n")) {
        const numbers = line.replace(DATE_PATTERN, " ").match(NUMBER_PATTERN);
        if (numbers && numbers.length >= 3) rows++;
        if (rows >= minRows) return true;
      }
      return false;
    },
  };
}

export const SIGNALS: Record<ScoredType, Signal[]> = {
  cost_schedule: [
    pattern("bill of quantities", 3, /\b(?:bill of quantities|boq)\b/i),
    pattern("unit rate", 2, /\b(?:unit rate|rate per)\b/i),
    pattern("currency marker", 2, /(?:\bRs\.|\b(?:INR|AED|SGD|USD|UGX)\b|[₹$€])/),
    pattern("quantity column", 1, /\b(?:qty|quantity)\b/i),
    pattern("amount", 1, /\b(?:amount|total cost|estimate|estimation)\b/i),
    pattern("item number", 1, /\bitem\s+(?:no|number)\b/i),
    pattern("material unit", 1, /\d\s*(?:sqm|sq\.m|m2|m²|cum|m3|m³|kg|mt|nos|ltr|litres?)(?![A-Za-z])/i),
    numericRows(3),
  ],
  task_list: [
    pattern("duration", 2, /\bdurations?\b/i),
    pattern("milestone", 2, /\b(?:milestones?|gantt|critical path|dependenc(?:y|ies)|predecessors?)\b/i),
    pattern("start or finish", 1, /\b(?:start|finish)\b/i),
    pattern("elapsed time", 1, /\b\d+\s*(?:days?|weeks?|months?)\b/i),
    pattern("activity", 1, /\b(?:activity|activities|tasks?|phase|stage)\b/i),
    pattern("date", 1, /\b\d{4}-\d{2}-\d{2}\b|\b\d{1,2}\/\d{1,2}\/\d{4}\b/),
  ],
  approval_process: [
    pattern("approval", 2, /\b(?:approval|approved?)\b/i),
    pattern("numbered steps", 2, /^\s*step\s+\d+/im),
    pattern("submission", 1, /\b(?:permit|no objection certificate|NOC|submission|application form)\b/i),
    pattern("authority", 1, /\b(?:authority|council|committee)\b/i),
    pattern("checklist", 1, /\b(?:checklist|compliance)\b/i),
  ],
  ura_circular: [
    pattern("circular", 2, /\bcircular\b/i),
    pattern("issuing body", 2, /\b(?:Urban Redevelopment Authority|URA)\b/),
    pattern("numbered clauses", 2, /^\s*\d+\.\d+(?:\.\d+)*\.?\s+\S/m),
    pattern("statutory wording", 1, /\b(?:shall|pursuant|hereby|with effect from)\b/i),
    pattern("regulation", 1, /\b(?:gross floor area|GFA|guidelines?|regulations?|statutory)\b/i),
  ],
};
