import type { EntityRecord } from "@sitedocs/types";
import type { IEntityExtractor } from "./extractor.interface.js";

/** Documents that could not be classified carry no entities. */
export class NoopExtractor implements IEntityExtractor {
  readonly pdfType = "unknown" as const;

  extract(): EntityRecord[] {
    return [];
  }
}
