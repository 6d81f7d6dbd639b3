export * from "./schema/index.js";
export { createDbClient, type Database, type DbClient, type DbClientOptions } from "./client.js";
export type { IDocumentRepository } from "./document-repository.interface.js";
export { DrizzleDocumentRepository } from "./document-repository.js";
export {
  toDocument,
  toEntityRows,
  toCostItem,
  toProjectTask,
  toRegulatoryRule,
  toApprovalStep,
  type EntityRows,
} from "./mappers.js";
