import { z } from "zod";
import { ValidationError } from "@sitedocs/errors";
import type { IngestJobData, ReconcileJobData } from "@sitedocs/types";

const ingestJobSchema = z.object({
  type: z.literal("ingest"),
  documentId: z.string().min(1),
});

const reconcileJobSchema = z.object({
  type: z.literal("reconcile"),
  documentId: z.string().min(1),
  reason: z.string().default("manual"),
});

function fieldsOf(error: z.ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    fields[issue.path.join(".") || "data"] = issue.message;
  }
  return fields;
}

export function parseIngestJob(data: unknown): IngestJobData {
  const result = ingestJobSchema.safeParse(data);
  if (!result.success) {
    throw new ValidationError("Invalid ingest job payload", fieldsOf(result.error));
  }
  return result.data;
}

export function parseReconcileJob(data: unknown): ReconcileJobData {
  const result = reconcileJobSchema.safeParse(data);
  if (!result.success) {
    throw new ValidationError("Invalid reconcile job payload", fieldsOf(result.error));
  }
  return result.data;
}
