import type { EntityRecord, PdfType } from "@sitedocs/types";

/**
 * Turns the text of one document type into entity records, in document
 * order. Implementations throw `UnparseableInputError` only when the
 * structure they rely on is missing; finding no rows is a valid result.
 */
export interface IEntityExtractor<T extends EntityRecord = EntityRecord> {
  readonly pdfType: PdfType;
  extract(text: string): T[];
}
