/**
 * Engine configuration
 *
 * Read from environment variables (the entry points load `.env` first) and
 * validated with zod. Every path defaults to a location under DATA_DIR.
 */

import { join } from 'path';
import { z } from 'zod';
import { ConfigurationError } from './utils/errors.js';

export interface EngineConfig {
  paths: {
    dataDir: string;
    graphDir: string;
    vectorDir: string;
    stagingPath: string;
    manifestPath: string;
    lockPath: string;
    backupDir: string;
    snapshotDir: string;
  };
  backup: {
    keep: number;
  };
  oracle: {
    apiKey: string;
    baseURL?: string;
    model: string;
    embeddingModel: string;
    maxAttempts: number;
    retryBaseDelayMs: number;
    timeoutMs: number;
  };
  retrieval: {
    topK: number;
  };
  cluster: {
    similarityThreshold: number;
    minClusterSize: number;
    checkEvery: number;
    ambiguityWarnAfter: number;
  };
  rootConceptId: string;
  pipeline: {
    concurrency: number;
  };
  server: {
    port: number;
    host: string;
  };
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  DATA_DIR: z.string().default('./data'),
  GRAPH_STORE_DIR: z.string().optional(),
  VECTOR_DB_PATH: z.string().optional(),
  STAGING_DB_PATH: z.string().optional(),
  MANIFEST_PATH: z.string().optional(),
  BACKUP_DIR: z.string().optional(),
  SNAPSHOT_DIR: z.string().optional(),
  BACKUP_KEEP: positiveInt(10),
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_BASE_URL: z.string().url().optional(),
  ORACLE_MODEL: z.string().default('gpt-4o-mini'),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  ORACLE_MAX_ATTEMPTS: positiveInt(3),
  ORACLE_RETRY_BASE_MS: z.coerce.number().int().min(0).default(1000),
  ORACLE_TIMEOUT_MS: positiveInt(60_000),
  RETRIEVAL_TOP_K: positiveInt(5),
  CLUSTER_SIMILARITY_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.7),
  CLUSTER_MIN_SIZE: z.coerce.number().int().min(2).default(5),
  CLUSTER_CHECK_EVERY: positiveInt(3),
  CLUSTER_AMBIGUITY_WARN_AFTER: positiveInt(3),
  ROOT_CONCEPT_ID: z.string().min(1).default('Concept'),
  INGEST_CONCURRENCY: positiveInt(1),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  HOST: z.string().default('127.0.0.1')
});

/**
 * Build the configuration from an environment. Blank variables count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter((pair): pair is [string, string] => pair[1] !== undefined && pair[1].trim() !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const e = parsed.data;
  const dataDir = e.DATA_DIR;

  return {
    paths: {
      dataDir,
      graphDir: e.GRAPH_STORE_DIR ?? join(dataDir, 'graph'),
      vectorDir: e.VECTOR_DB_PATH ?? join(dataDir, 'vectors'),
      stagingPath: e.STAGING_DB_PATH ?? join(dataDir, 'staging.jsonl'),
      manifestPath: e.MANIFEST_PATH ?? join(dataDir, 'promotion-manifest.jsonl'),
      lockPath: join(dataDir, '.lock'),
      backupDir: e.BACKUP_DIR ?? join(dataDir, 'backups'),
      snapshotDir: e.SNAPSHOT_DIR ?? join(dataDir, 'snapshots')
    },
    backup: {
      keep: e.BACKUP_KEEP
    },
    oracle: {
      apiKey: e.OPENAI_API_KEY,
      baseURL: e.OPENAI_BASE_URL,
      model: e.ORACLE_MODEL,
      embeddingModel: e.EMBEDDING_MODEL,
      maxAttempts: e.ORACLE_MAX_ATTEMPTS,
      retryBaseDelayMs: e.ORACLE_RETRY_BASE_MS,
      timeoutMs: e.ORACLE_TIMEOUT_MS
    },
    retrieval: {
      topK: e.RETRIEVAL_TOP_K
    },
    cluster: {
      similarityThreshold: e.CLUSTER_SIMILARITY_THRESHOLD,
      minClusterSize: e.CLUSTER_MIN_SIZE,
      checkEvery: e.CLUSTER_CHECK_EVERY,
      ambiguityWarnAfter: e.CLUSTER_AMBIGUITY_WARN_AFTER
    },
    rootConceptId: e.ROOT_CONCEPT_ID,
    pipeline: {
      concurrency: e.INGEST_CONCURRENCY
    },
    server: {
      port: e.PORT,
      host: e.HOST
    }
  };
}
