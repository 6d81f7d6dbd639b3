import { UnparseableInputError } from "@sitedocs/errors";
import type { ApprovalStep } from "@sitedocs/types";
import type { IEntityExtractor } from "./extractor.interface.js";
import { splitLines } from "./parse-utils.js";

const STEP_PATTERN = /^(?:step\s+)?(?<number>\d+)\s*[.):]\s+(?<description>\S.*)$/i;

const AUTHORITY_PATTERN =
  /\b(?:the\s+)?(?<authority>(?:(?!(?:the|by|to|from|with|of|and)\b)[\w-]+\s+){0,2}(?:authority|council|committee|department|office|board|agency))\b/i;

/** Numbered approval steps ("Step 1: ...", "2. ...", "3) ..."). */
export class ApprovalProcessExtractor implements IEntityExtractor<ApprovalStep> {
  readonly pdfType = "approval_process" as const;

  extract(text: string): ApprovalStep[] {
    const steps: ApprovalStep[] = [];

    for (const line of splitLines(text)) {
      const groups = STEP_PATTERN.exec(line)?.groups;
      if (!groups) continue;

      const description = groups["description"] ?? "";
      steps.push({
        kind: "approval_step",
        sequence: steps.length,
        stepNumber: Number(groups["number"]),
        description,
        authority: AUTHORITY_PATTERN.exec(description)?.groups?.["authority"] ?? null,
      });
    }

    if (steps.length === 0) {
      throw new UnparseableInputError("No numbered approval steps found", {
        code: "STEPS_MISSING",
      });
    }
    return steps;
  }
}
