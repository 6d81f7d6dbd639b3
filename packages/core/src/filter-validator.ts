import { PDF_TYPES, SEARCH_FILTER_ALLOWLIST } from "@sitedocs/types";
import type { PdfType, SearchFilter } from "@sitedocs/types";
import { ValidationError } from "@sitedocs/errors";

function isPdfType(value: unknown): value is PdfType {
  return PDF_TYPES.some((t) => t === value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

/**
 * Allowlist-only filter validation.
 * Rejects unknown filter fields so nothing but whitelisted keys reaches the
 * vector store query.
 */
export function validateSearchFilter(filter: unknown): SearchFilter {
  if (typeof filter !== "object" || filter === null || Array.isArray(filter)) {
    throw new ValidationError("filter must be a plain object", { filter: "must be an object" });
  }

  const allowedFields = new Set<string>(SEARCH_FILTER_ALLOWLIST);
  for (const key of Object.keys(filter)) {
    if (!allowedFields.has(key)) {
      throw new ValidationError(
        `Invalid filter field: "${key}". Allowed fields: ${[...allowedFields].join(", ")}`,
        { [key]: "not allowed" },
      );
    }
  }

  const result: SearchFilter = {};

  if ("documentIds" in filter && filter.documentIds !== undefined) {
    if (!isStringArray(filter.documentIds)) {
      throw new ValidationError("filter.documentIds must be an array of strings", {
        documentIds: "must be an array of strings",
      });
    }
    result.documentIds = filter.documentIds;
  }

  if ("pdfTypes" in filter && filter.pdfTypes !== undefined) {
    const pdfTypes = filter.pdfTypes;
    if (!Array.isArray(pdfTypes)) {
      throw new ValidationError("filter.pdfTypes must be an array", {
        pdfTypes: "must be an array",
      });
    }
    const valid: PdfType[] = [];
    for (const value of pdfTypes) {
      if (!isPdfType(value)) {
        throw new ValidationError(`Unknown pdf type: ${String(value)}`, {
          pdfTypes: `must be one of ${PDF_TYPES.join(", ")}`,
        });
      }
      valid.push(value);
    }
    result.pdfTypes = valid;
  }

  return result;
}
