import type { IDocumentRepository } from "@sitedocs/db";
import { NotFoundError, PersistenceConflictError } from "@sitedocs/errors";
import type { Document, DocumentPatch, EntityRecord, NewDocument } from "@sitedocs/types";

/** Process-local stand-in for the drizzle repository. */
export class InMemoryDocumentRepository implements IDocumentRepository {
  private readonly documents = new Map<string, Document>();
  private readonly entities = new Map<string, EntityRecord[]>();
  private nextId = 1;

  /** Every status written, per document, in order. */
  readonly statusHistory = new Map<string, string[]>();

  async create(input: NewDocument): Promise<Document> {
    const now = new Date();
    const document: Document = {
      id: `doc-${String(this.nextId++)}`,
      pdfName: input.pdfName,
      storagePath: input.storagePath,
      mimeType: input.mimeType ?? "application/pdf",
      pdfType: "unknown",
      status: "pending",
      stageReached: null,
      errorKind: null,
      errorCode: null,
      errorDetail: null,
      extractedText: null,
      pageCount: null,
      pageOffsets: null,
      classificationScores: null,
      entityCount: 0,
      chunkCount: 0,
      entitiesPersistedAt: null,
      vectorsPersistedAt: null,
      cancelRequestedAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.documents.set(document.id, document);
    this.statusHistory.set(document.id, ["pending"]);
    return { ...document };
  }

  async findById(id: string): Promise<Document | null> {
    const document = this.documents.get(id);
    return document ? { ...document } : null;
  }

  async update(id: string, patch: DocumentPatch): Promise<Document> {
    const document = this.require(id);
    const updated: Document = { ...document, ...patch, updatedAt: new Date() };
    this.documents.set(id, updated);
    if (patch.status && patch.status !== document.status) {
      this.statusHistory.get(id)?.push(patch.status);
    }
    return { ...updated };
  }

  async requestCancellation(id: string): Promise<Document> {
    const document = this.require(id);
    const updated: Document = { ...document, cancelRequestedAt: new Date() };
    this.documents.set(id, updated);
    return { ...updated };
  }

  async persistEntities(id: string, entities: EntityRecord[]): Promise<void> {
    const document = this.require(id);
    if (document.entitiesPersistedAt) {
      throw new PersistenceConflictError(`Entities for document ${id} are already persisted`);
    }
    this.entities.set(id, entities.map((e) => ({ ...e })));
    this.documents.set(id, {
      ...document,
      entitiesPersistedAt: new Date(),
      entityCount: entities.length,
    });
  }

  async markVectorsPersisted(id: string, chunkCount: number): Promise<void> {
    const document = this.require(id);
    this.documents.set(id, { ...document, vectorsPersistedAt: new Date(), chunkCount });
  }

  async listEntities(id: string): Promise<EntityRecord[]> {
    return (this.entities.get(id) ?? []).map((e) => ({ ...e }));
  }

  private require(id: string): Document {
    const document = this.documents.get(id);
    if (!document) throw new NotFoundError(`Document ${id} not found`);
    return document;
  }
}
