import { UnparseableInputError } from "@sitedocs/errors";
import type { RegulatoryRule } from "@sitedocs/types";
import type { IEntityExtractor } from "./extractor.interface.js";
import { splitLines } from "./parse-utils.js";

const CLAUSE_PATTERN = /^(?<ref>\d+(?:\.\d+)+\.?|\d+[.)])\s+(?<text>\S.*)$/;

const THRESHOLD_PATTERN =
  /(?<value>\d+(?:\.\d+)?)\s*(?<unit>%|per\s?cent|sqm|m²|m2|metres|meters|m|storeys|stories|years)(?![A-Za-z0-9])/i;

const BASIS_PATTERN = /\b(?:computed|calculated|measured|included|excluded|counted)\b/i;

const UNIT_ALIASES: Record<string, string> = {
  "per cent": "%",
  percent: "%",
  sqm: "m²",
  m2: "m²",
  metres: "m",
  meters: "m",
  stories: "storeys",
};

interface Clause {
  ref: string;
  text: string;
}

function collectClauses(lines: string[]): Clause[] {
  const clauses: Clause[] = [];
  let current: Clause | null = null;

  for (const line of lines) {
    const match = CLAUSE_PATTERN.exec(line)?.groups;
    if (match) {
      current = { ref: (match["ref"] ?? "").replace(/[.)]$/, ""), text: match["text"] ?? "" };
      clauses.push(current);
    } else if (line.length === 0) {
      current = null;
    } else if (current) {
      current.text = `${current.text} ${line}`;
    }
  }

  return clauses;
}

function normaliseUnit(unit: string): string {
  const lower = unit.toLowerCase();
  return UNIT_ALIASES[lower] ?? lower;
}

/**
 * Numbered clauses of a regulatory circular ("1.", "2.3", "4)"). A clause
 * runs on over following lines until a blank line or the next clause.
 */
export class UraCircularExtractor implements IEntityExtractor<RegulatoryRule> {
  readonly pdfType = "ura_circular" as const;

  extract(text: string): RegulatoryRule[] {
    const clauses = collectClauses(splitLines(text));
    if (clauses.length === 0) {
      throw new UnparseableInputError("No numbered clauses found", {
        code: "CLAUSES_MISSING",
      });
    }

    return clauses.map((clause, sequence): RegulatoryRule => {
      const threshold = THRESHOLD_PATTERN.exec(clause.text)?.groups;
      const sentences = clause.text.split(/(?<=[.;])\s+/);
      return {
        kind: "regulatory_rule",
        sequence,
        clauseRef: clause.ref,
        clauseText: clause.text,
        thresholdValue: threshold?.["value"] !== undefined ? Number(threshold["value"]) : null,
        thresholdUnit: threshold?.["unit"] !== undefined ? normaliseUnit(threshold["unit"]) : null,
        measurementBasis: sentences.find((s) => BASIS_PATTERN.test(s)) ?? null,
      };
    });
  }
}
