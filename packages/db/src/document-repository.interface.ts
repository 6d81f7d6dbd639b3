import type { Document, DocumentPatch, EntityRecord, NewDocument } from "@sitedocs/types";

/**
 * Relational store for documents and their entity rows. Status changes go
 * through `update`; entity rows are only ever written by `persistEntities`.
 */
export interface IDocumentRepository {
  create(input: NewDocument): Promise<Document>;
  findById(id: string): Promise<Document | null>;
  /** Throws NotFoundError when the document does not exist. */
  update(id: string, patch: DocumentPatch): Promise<Document>;
  requestCancellation(id: string): Promise<Document>;
  /**
   * Writes every entity row and the document's `entitiesPersistedAt` in one
   * transaction. Throws PersistenceConflictError when rows already exist.
   */
  persistEntities(id: string, entities: EntityRecord[]): Promise<void>;
  markVectorsPersisted(id: string, chunkCount: number): Promise<void>;
  listEntities(id: string): Promise<EntityRecord[]>;
}
