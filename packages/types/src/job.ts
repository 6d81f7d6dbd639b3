export type JobType = "ingest" | "reconcile";

export interface JobData {
  type: JobType;
  documentId: string;
}

export interface IngestJobData extends JobData {
  type: "ingest";
}

export interface ReconcileJobData extends JobData {
  type: "reconcile";
  reason: string;
}

export type AnyJobData = IngestJobData | ReconcileJobData;
