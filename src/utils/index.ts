/**
 * Utility functions and classes for the ingestion engine
 */

export { VectorUtils, type Vector } from './vector-utils.js';
export { KeyedLock } from './keyed-lock.js';
export { summarizeNounPhrase } from './noun-phrase.js';
export { AiEmbeddingService, type Embedder, type EmbeddingServiceConfig } from './embedding-service.js';
export {
  ErrorHandler,
  ErrorCategory,
  ErrorSeverity,
  toError,
  type ErrorInfo,
  type ErrorResult,
  type SuccessResult,
  type OperationResult,
  type RetryPolicy
} from './error-handler.js';
export {
  PipelineError,
  RetrievalUnavailable,
  OracleFailure,
  CommitFailure,
  BackupFailure,
  SyncConflict,
  StoreLocked,
  ConfigurationError,
  InputError
} from './errors.js';
