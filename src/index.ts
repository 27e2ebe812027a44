/**
 * Public exports of the concept graph ingestion engine
 */

// Engine assembly and configuration
export { createEngine } from './engine.js';
export type { Engine, EngineOverrides } from './engine.js';
export { loadConfig } from './config.js';
export type { EngineConfig } from './config.js';

// Core graph
export { ConceptGraph, relationKey } from './core/graph.js';
export type { ConceptGraphMetrics } from './core/graph.js';

// Storage
export { JsonlGraphStore } from './storage/jsonl-graph-store.js';
export { StagingStore, normalizePhrase, stagingKey, entryKey, clusterFingerprint } from './storage/staging-store.js';
export { PromotionManifest, manifestEntryId } from './storage/promotion-manifest.js';
export { StoreLock } from './storage/store-lock.js';
export { openStores, openMemoryStores } from './storage/factory.js';
export type { Stores } from './storage/factory.js';
export { VectorIndex } from './indexing/vector-index.js';

// Oracle
export { OracleClient, isRetryableOracleError } from './oracle/oracle-client.js';
export { AiOracleBackend } from './oracle/ai-backend.js';
export type { OracleBackend, OracleRequest, OracleTask } from './oracle/schemas.js';

// Resolution, clustering and promotion
export { CandidateRetriever } from './resolution/candidate-retriever.js';
export { MatchResolver } from './resolution/match-resolver.js';
export { ClusterDetector } from './clustering/cluster-detector.js';
export type { CandidateCluster, ClusterCheckReport } from './clustering/cluster-detector.js';
export { ClusterValidator, pickRepresentative } from './clustering/cluster-validator.js';
export { OntologyCommitter } from './ontology/ontology-committer.js';
export type { CommitResult } from './ontology/ontology-committer.js';
export { RelationBuilder } from './ontology/relation-builder.js';

// Pipeline
export { IngestionPipeline } from './pipeline/ingestion-pipeline.js';
export type { PromotionCycleResult, RunOptions } from './pipeline/ingestion-pipeline.js';
export { loadMentions, parseMentions } from './pipeline/input-loader.js';

// Sync and backups
export { SyncManager } from './sync/sync-manager.js';
export type { SyncOptions } from './sync/sync-manager.js';
export { BackupManager } from './sync/backup-manager.js';
export type { RestoreResult } from './sync/backup-manager.js';

// Operator API
export { createApi } from './server/api.js';

// Utilities and errors
export * from './utils/index.js';

// Type definitions
export type {
  Partition,
  Mention,
  Candidate,
  Concept,
  StagedConcept,
  Relation,
  StagedEntry,
  Cluster,
  PromotionManifestEntry,
  BackupRecord,
  MatchResolution,
  BatchSummary,
  SyncReport,
  SyncVerification
} from './core/types.js';
export type { GraphStore, VectorStore, StorageResult, VectorEntry, VectorMatch } from './storage/types.js';
