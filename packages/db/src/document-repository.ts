import { asc, eq } from "drizzle-orm";
import { NotFoundError, PersistenceConflictError } from "@sitedocs/errors";
import type { Document, DocumentPatch, EntityRecord, NewDocument } from "@sitedocs/types";
import type { Database } from "./client.js";
import type { IDocumentRepository } from "./document-repository.interface.js";
import {
  toApprovalStep,
  toCostItem,
  toDocument,
  toEntityRows,
  toProjectTask,
  toRegulatoryRule,
} from "./mappers.js";
import { approvalSteps, costItems, documents, projectTasks, regulatoryRules } from "./schema/index.js";

const UNIQUE_VIOLATION = "23505";

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === "object" && error !== null && "code" in error && error.code === UNIQUE_VIOLATION
  );
}

export class DrizzleDocumentRepository implements IDocumentRepository {
  constructor(private readonly db: Database) {}

  async create(input: NewDocument): Promise<Document> {
    const [row] = await this.db
      .insert(documents)
      .values({
        pdfName: input.pdfName,
        storagePath: input.storagePath,
        mimeType: input.mimeType ?? "application/pdf",
      })
      .returning();
    if (!row) throw new Error("Document insert returned no row");
    return toDocument(row);
  }

  async findById(id: string): Promise<Document | null> {
    const [row] = await this.db.select().from(documents).where(eq(documents.id, id)).limit(1);
    return row ? toDocument(row) : null;
  }

  async update(id: string, patch: DocumentPatch): Promise<Document> {
    const [row] = await this.db
      .update(documents)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(documents.id, id))
      .returning();
    if (!row) throw new NotFoundError(`Document ${id} not found`);
    return toDocument(row);
  }

  async requestCancellation(id: string): Promise<Document> {
    const now = new Date();
    const [row] = await this.db
      .update(documents)
      .set({ cancelRequestedAt: now, updatedAt: now })
      .where(eq(documents.id, id))
      .returning();
    if (!row) throw new NotFoundError(`Document ${id} not found`);
    return toDocument(row);
  }

  async persistEntities(id: string, entities: EntityRecord[]): Promise<void> {
    const rows = toEntityRows(id, entities);

    try {
      await this.db.transaction(async (tx) => {
        const [current] = await tx
          .select({ entitiesPersistedAt: documents.entitiesPersistedAt })
          .from(documents)
          .where(eq(documents.id, id))
          .for("update");
        if (!current) throw new NotFoundError(`Document ${id} not found`);
        if (current.entitiesPersistedAt) {
          throw new PersistenceConflictError(`Entities for document ${id} are already persisted`);
        }

        if (rows.costItems.length > 0) await tx.insert(costItems).values(rows.costItems);
        if (rows.projectTasks.length > 0) await tx.insert(projectTasks).values(rows.projectTasks);
        if (rows.regulatoryRules.length > 0) {
          await tx.insert(regulatoryRules).values(rows.regulatoryRules);
        }
        if (rows.approvalSteps.length > 0) await tx.insert(approvalSteps).values(rows.approvalSteps);

        const now = new Date();
        await tx
          .update(documents)
          .set({ entitiesPersistedAt: now, entityCount: entities.length, updatedAt: now })
          .where(eq(documents.id, id));
      });
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new PersistenceConflictError(`Entities for document ${id} are already persisted`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  async markVectorsPersisted(id: string, chunkCount: number): Promise<void> {
    const now = new Date();
    const updated = await this.db
      .update(documents)
      .set({ vectorsPersistedAt: now, chunkCount, updatedAt: now })
      .where(eq(documents.id, id))
      .returning({ id: documents.id });
    if (updated.length === 0) throw new NotFoundError(`Document ${id} not found`);
  }

  async listEntities(id: string): Promise<EntityRecord[]> {
    const [costs, tasks, rules, steps] = await Promise.all([
      this.db.select().from(costItems).where(eq(costItems.documentId, id)).orderBy(asc(costItems.sequence)),
      this.db
        .select()
        .from(projectTasks)
        .where(eq(projectTasks.documentId, id))
        .orderBy(asc(projectTasks.sequence)),
      this.db
        .select()
        .from(regulatoryRules)
        .where(eq(regulatoryRules.documentId, id))
        .orderBy(asc(regulatoryRules.sequence)),
      this.db
        .select()
        .from(approvalSteps)
        .where(eq(approvalSteps.documentId, id))
        .orderBy(asc(approvalSteps.sequence)),
    ]);

    const entities: EntityRecord[] = [
      ...costs.map(toCostItem),
      ...tasks.map(toProjectTask),
      ...rules.map(toRegulatoryRule),
      ...steps.map(toApprovalStep),
    ];
    return entities.sort((a, b) => a.sequence - b.sequence);
  }
}
