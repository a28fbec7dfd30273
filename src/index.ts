export { Orchestrator } from "./orchestrator.js";
export type {
  IngestSessionOptions,
  MaintainResult,
  OrchestratorOptions,
  RememberResult,
  SaveOptions,
  SaveResult,
} from "./orchestrator.js";
export { registerCli, type CliIo } from "./cli.js";
export { DEFAULT_COLLECTIONS, FALLBACK_COLLECTION, loadConfigFile, parseConfig } from "./config.js";
export { initLogger, log, type LoggerBackend } from "./logger.js";
export {
  BackendUnavailableError,
  ConfigInvalidError,
  LedgerWriteError,
  MalformedRecordError,
  MemoryError,
  NotFoundError,
  type MemoryErrorCode,
} from "./errors.js";
export { TrackingLedger } from "./ledger.js";
export { TieredStore, type StoreContext } from "./storage.js";
export { EntityQuarantine, type QuarantineOutcome, type QuarantineStatus, type ValidateOptions } from "./quarantine.js";
export { RetrievalRouter, LEXICAL_FALLBACK_SCORE, type QueryOptions } from "./retrieval.js";
export { ConflictDetector, conflictQuestion, findConflicts } from "./conflicts.js";
export { Indexer, type IndexOptions } from "./indexer.js";
export { evaluateTurn, filterTurns, isSignificant, detectMemoryTrigger } from "./significance.js";
export {
  capitalizedPhraseExtractor,
  collectionClassifier,
  consolidationClassifier,
  contradictionClassifier,
  keywordClassifier,
  type Classifier,
  type EntityExtractor,
} from "./classify.js";
export { findSessionFiles, readSessionFile } from "./transcript.js";
export {
  OpenAiEmbedder,
  QdrantBackend,
  pointIdFor,
  type EmbeddingBackend,
  type Embedder,
  type SimilarPoint,
} from "./vector-backend.js";
export { MemoryPayloadSchema, type MemoryPayload } from "./schemas.js";
export type * from "./types.js";
export { IMPORTANCE_LEVELS } from "./types.js";
