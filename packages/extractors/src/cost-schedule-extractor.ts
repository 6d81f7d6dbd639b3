import { UnparseableInputError } from "@sitedocs/errors";
import type { CostItem, CostType } from "@sitedocs/types";
import type { IEntityExtractor } from "./extractor.interface.js";
import { parseDecimal, splitLines } from "./parse-utils.js";

const HEADER_PATTERNS = [/\b(?:description|item)\b/i, /\b(?:qty|quantity)\b/i, /\b(?:amount|total)\b/i];

const SECTION_PATTERN = /^(local|foreign)\s+costs?\s*:?$/i;
const TOTAL_PATTERN = /^(?:sub-?\s*total|grand\s+total|total)\b/i;

const ROW_PATTERN =
  /^(?:(?<ref>\d+(?:\.\d+)*)\s+)?(?<description>.*?[A-Za-z].*?)\s+(?<quantity>\d[\d,]*(?:\.\d+)?)\s+(?<unit>[A-Za-z][A-Za-z0-9/.²³]*)\s+(?:(?<currency>Rs\.?|INR|USD|UGX|SGD|AED|Rp|yen|[₹$€])\s*)?(?<rate>\d[\d,]*(?:\.\d+)?)\s+(?:(?:Rs\.?|INR|USD|UGX|SGD|AED|Rp|yen|[₹$€])\s*)?(?<amount>\d[\d,]*(?:\.\d+)?)$/;

/**
 * Bill-of-quantities rows:
 *
 *   [ref] description quantity unit [currency] rate [currency] amount
 *
 * Rows are read after the table header. "Local Cost" / "Foreign Cost"
 * headings set the cost type of the rows below them; total lines are skipped.
 */
export class CostScheduleExtractor implements IEntityExtractor<CostItem> {
  readonly pdfType = "cost_schedule" as const;

  extract(text: string): CostItem[] {
    const lines = splitLines(text);
    const headerIndex = lines.findIndex((line) => HEADER_PATTERNS.every((p) => p.test(line)));
    if (headerIndex === -1) {
      throw new UnparseableInputError("Cost schedule table header not found", {
        code: "COST_TABLE_HEADER_MISSING",
      });
    }

    const items: CostItem[] = [];
    let costType: CostType = "unspecified";

    for (const line of lines.slice(headerIndex + 1)) {
      const section = SECTION_PATTERN.exec(line);
      if (section) {
        costType = section[1]?.toLowerCase() === "local" ? "local" : "foreign";
        continue;
      }
      if (TOTAL_PATTERN.test(line)) continue;

      const groups = ROW_PATTERN.exec(line)?.groups;
      if (!groups) continue;

      items.push({
        kind: "cost_item",
        sequence: items.length,
        itemRef: groups["ref"] ?? null,
        description: groups["description"] ?? "",
        quantity: parseDecimal(groups["quantity"] ?? "0"),
        unit: groups["unit"] ?? "",
        unitRate: parseDecimal(groups["rate"] ?? "0"),
        amount: parseDecimal(groups["amount"] ?? "0"),
        currency: groups["currency"] ?? null,
        costType,
      });
    }

    return items;
  }
}
