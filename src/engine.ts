/**
 * Engine assembly
 *
 * Wires the stores, the oracle and the pipeline components from one
 * configuration. The oracle backend, the embedder and the clock can be
 * replaced, which is how the tests run without a network.
 */

import { ClusterDetector } from './clustering/cluster-detector.js';
import { ClusterValidator } from './clustering/cluster-validator.js';
import type { EngineConfig } from './config.js';
import { OntologyCommitter } from './ontology/ontology-committer.js';
import { RelationBuilder } from './ontology/relation-builder.js';
import { AiOracleBackend } from './oracle/ai-backend.js';
import { OracleClient } from './oracle/oracle-client.js';
import type { OracleBackend } from './oracle/schemas.js';
import { IngestionPipeline } from './pipeline/ingestion-pipeline.js';
import { CandidateRetriever } from './resolution/candidate-retriever.js';
import { MatchResolver } from './resolution/match-resolver.js';
import { openStores, type Stores } from './storage/factory.js';
import { BackupManager } from './sync/backup-manager.js';
import { SyncManager } from './sync/sync-manager.js';
import { AiEmbeddingService, type Embedder } from './utils/embedding-service.js';
import { KeyedLock } from './utils/keyed-lock.js';

export interface EngineOverrides {
  oracleBackend?: OracleBackend;
  embedder?: Embedder;
  stores?: Stores;
  clock?: () => Date;
}

export interface Engine {
  config: EngineConfig;
  stores: Stores;
  oracle: OracleClient;
  embedder: Embedder;
  detector: ClusterDetector;
  pipeline: IngestionPipeline;
  backups: BackupManager;
  sync: SyncManager;
}

export async function createEngine(config: EngineConfig, overrides: EngineOverrides = {}): Promise<Engine> {
  const clock = overrides.clock ?? (() => new Date());
  const stores = overrides.stores ?? (await openStores(config.paths));

  if (config.oracle.apiKey === '' && (!overrides.oracleBackend || !overrides.embedder)) {
    console.warn('⚠️ OPENAI_API_KEY is not set; oracle and embedding calls will fail');
  }

  const backend = overrides.oracleBackend ?? new AiOracleBackend({
    apiKey: config.oracle.apiKey,
    baseURL: config.oracle.baseURL,
    model: config.oracle.model,
    timeoutMs: config.oracle.timeoutMs
  });
  const embedder = overrides.embedder ?? new AiEmbeddingService({
    apiKey: config.oracle.apiKey,
    baseURL: config.oracle.baseURL,
    model: config.oracle.embeddingModel,
    timeoutMs: config.oracle.timeoutMs
  });

  const oracle = new OracleClient(backend, {
    maxAttempts: config.oracle.maxAttempts,
    retryBaseDelayMs: config.oracle.retryBaseDelayMs
  });

  const detector = new ClusterDetector({
    similarityThreshold: config.cluster.similarityThreshold,
    minClusterSize: config.cluster.minClusterSize
  });

  const pipeline = new IngestionPipeline(
    {
      retriever: new CandidateRetriever(oracle, embedder, stores.vectors, {
        topK: config.retrieval.topK,
        rootConceptId: config.rootConceptId
      }),
      resolver: new MatchResolver(oracle),
      staging: stores.staging,
      detector,
      validator: new ClusterValidator(oracle, stores.staging, { ambiguityWarnAfter: config.cluster.ambiguityWarnAfter }, clock),
      committer: new OntologyCommitter(stores, oracle, embedder, { rootConceptId: config.rootConceptId }, clock),
      relations: new RelationBuilder(stores.graph, new KeyedLock(), clock),
      graph: stores.graph,
      vectors: stores.vectors,
      lock: stores.lock
    },
    { concurrency: config.pipeline.concurrency, checkEvery: config.cluster.checkEvery },
    clock
  );

  const backups = new BackupManager(
    stores.graph,
    stores.vectors,
    { graphDir: config.paths.backupDir, vectorDir: config.paths.snapshotDir, keep: config.backup.keep },
    clock
  );

  const sync = new SyncManager(
    { graph: stores.graph, vectors: stores.vectors, manifest: stores.manifest, embedder, backups, lock: stores.lock },
    clock
  );

  return { config, stores, oracle, embedder, detector, pipeline, backups, sync };
}
