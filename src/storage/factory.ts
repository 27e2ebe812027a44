/**
 * Store factory
 *
 * Creates the file-backed stores from the engine configuration and loads their
 * persisted state. A store that fails to load stops startup.
 */

import type { EngineConfig } from '../config.js';
import { VectorIndex } from '../indexing/vector-index.js';
import { JsonlGraphStore } from './jsonl-graph-store.js';
import { PromotionManifest } from './promotion-manifest.js';
import { StagingStore } from './staging-store.js';
import { StoreLock } from './store-lock.js';
import type { GraphStore, StorageResult, VectorStore } from './types.js';

export interface Stores {
  graph: GraphStore;
  vectors: VectorStore;
  staging: StagingStore;
  manifest: PromotionManifest;
  lock: StoreLock;
}

export async function openStores(paths: EngineConfig['paths']): Promise<Stores> {
  const stores: Stores = {
    graph: new JsonlGraphStore({ directory: paths.graphDir }),
    vectors: new VectorIndex({ directory: paths.vectorDir }),
    staging: new StagingStore({ filePath: paths.stagingPath }),
    manifest: new PromotionManifest({ filePath: paths.manifestPath }),
    lock: new StoreLock(paths.lockPath)
  };

  await initializeAll(stores);
  return stores;
}

/**
 * Stores that live only in memory; nothing touches the disk
 */
export async function openMemoryStores(): Promise<Stores> {
  const stores: Stores = {
    graph: new JsonlGraphStore({ directory: null }),
    vectors: new VectorIndex({ directory: null }),
    staging: new StagingStore({ filePath: null }),
    manifest: new PromotionManifest({ filePath: null }),
    lock: new StoreLock(null)
  };

  await initializeAll(stores);
  return stores;
}

async function initializeAll(stores: Stores): Promise<void> {
  const results: Array<[string, StorageResult]> = [
    ['graph store', await stores.graph.initialize()],
    ['vector index', await stores.vectors.initialize()],
    ['staging store', await stores.staging.initialize()],
    ['promotion manifest', await stores.manifest.initialize()]
  ];

  const failures = results.filter(([, result]) => !result.success);
  if (failures.length > 0) {
    throw new Error(
      `Failed to initialize storage: ${failures.map(([name, r]) => `${name} (${r.errors?.join(', ') ?? 'unknown error'})`).join('; ')}`
    );
  }

  const loaded = results.reduce((sum, [, result]) => sum + result.count, 0);
  console.log(`📂 Stores ready (${loaded} records loaded)`);
}
