export { IngestionOrchestrator } from "./orchestrator.js";
export type { OrchestratorDependencies } from "./orchestrator.js";

export { RelationalPersister, VectorPersister, toVectorRecord } from "./persisters.js";
export type {
  RelationalPersisterOptions,
  VectorPersisterOptions,
  EntityPersistResult,
} from "./persisters.js";

export {
  STATUS_FOR_STAGE,
  canTransition,
  assertTransition,
  firstMissingStage,
  isTerminal,
  stagesFrom,
} from "./state-machine.js";

export { search, DEFAULT_TOP_K } from "./semantic-search.js";
export type { SearchDependencies } from "./semantic-search.js";

export { validateSearchFilter } from "./filter-validator.js";
