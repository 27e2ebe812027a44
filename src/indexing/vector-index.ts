/**
 * Vector Index Implementation
 *
 * Partitioned similarity index over concept description embeddings. Exact
 * linear search with cosine similarity; the authoritative and staged
 * partitions live side by side and a query chooses whether staged vectors take
 * part. When a directory is configured the index persists to
 * `vectors.jsonl`, one record per line.
 *
 * Example: find the five concepts whose descriptions are closest to a new
 * mention, including concepts promoted but not yet synced.
 */

import { join } from 'path';
import { PARTITIONS, type Partition } from '../core/types.js';
import { readJsonl, writeJsonlAtomic } from '../storage/jsonl-file.js';
import { VectorRecordSchema, type VectorRecord } from '../storage/records.js';
import type { StorageResult, VectorEntry, VectorMatch, VectorMetadata, VectorStore } from '../storage/types.js';
import { VectorUtils } from '../utils/vector-utils.js';

export interface VectorIndexConfig {
  /** Directory for `vectors.jsonl`; null keeps the index in memory only */
  directory: string | null;
}

export class VectorIndex implements VectorStore {
  private config: VectorIndexConfig;
  private partitions: Record<Partition, Map<string, VectorEntry>> = {
    authoritative: new Map(),
    staged: new Map()
  };
  private dimension = 0;
  private dirty = false;
  private initialized = false;
  private queryCount = 0;

  constructor(config: Partial<VectorIndexConfig> = {}) {
    this.config = {
      directory: config.directory ?? null
    };
  }

  get filePath(): string | null {
    return this.config.directory === null ? null : join(this.config.directory, 'vectors.jsonl');
  }

  async initialize(): Promise<StorageResult> {
    const startTime = Date.now();
    if (this.initialized || this.filePath === null) {
      this.initialized = true;
      return { success: true, count: 0, processingTime: 0 };
    }

    try {
      const records = await readJsonl(this.filePath, VectorRecordSchema);
      for (const record of records) {
        this.store(fromRecord(record));
      }
      this.initialized = true;
      return { success: true, count: records.length, processingTime: Date.now() - startTime };
    } catch (error) {
      return {
        success: false,
        count: 0,
        processingTime: Date.now() - startTime,
        errors: [error instanceof Error ? error.message : 'Unknown initialization error']
      };
    }
  }

  async upsert(id: string, embedding: Float32Array, metadata: VectorMetadata, partition: Partition): Promise<void> {
    if (embedding.length === 0) {
      throw new Error(`Empty embedding for ${id}`);
    }
    if (!VectorUtils.isValid(embedding)) {
      throw new Error(`Embedding for ${id} contains NaN or infinite values`);
    }

    this.store({ id, partition, embedding: new Float32Array(embedding), metadata: { ...metadata } });
    this.dirty = true;
  }

  async query(embedding: Float32Array, k: number, includeStaged: boolean): Promise<VectorMatch[]> {
    this.queryCount++;

    if (this.dimension === 0 || k <= 0) {
      return [];
    }
    if (embedding.length !== this.dimension) {
      throw new Error(`Query vector dimension mismatch: expected ${this.dimension}, got ${embedding.length}`);
    }

    const searched: Partition[] = includeStaged ? ['authoritative', 'staged'] : ['authoritative'];
    const best = new Map<string, VectorMatch>();

    for (const partition of searched) {
      for (const entry of this.partitions[partition].values()) {
        const similarity = VectorUtils.cosineSimilarity(embedding, entry.embedding);
        const existing = best.get(entry.id);
        // An id present in both partitions is reported once; authoritative wins ties
        if (!existing || similarity > existing.similarity) {
          best.set(entry.id, { id: entry.id, partition, similarity, metadata: { ...entry.metadata } });
        }
      }
    }

    return [...best.values()]
      .sort((a, b) => b.similarity - a.similarity || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .slice(0, k);
  }

  async get(id: string, partition: Partition): Promise<VectorEntry | undefined> {
    const entry = this.partitions[partition].get(id);
    return entry ? { ...entry, embedding: new Float32Array(entry.embedding), metadata: { ...entry.metadata } } : undefined;
  }

  async remove(id: string, partition: Partition): Promise<boolean> {
    const removed = this.partitions[partition].delete(id);
    if (removed) {
      this.dirty = true;
      if (this.totalSize() === 0) this.dimension = 0;
    }
    return removed;
  }

  async listIds(partition: Partition): Promise<string[]> {
    return [...this.partitions[partition].keys()].sort();
  }

  async count(partition: Partition): Promise<number> {
    return this.partitions[partition].size;
  }

  async exportEntries(): Promise<VectorEntry[]> {
    const entries: VectorEntry[] = [];
    for (const partition of PARTITIONS) {
      const ids = [...this.partitions[partition].keys()].sort();
      for (const id of ids) {
        const entry = this.partitions[partition].get(id);
        if (entry) entries.push(entry);
      }
    }
    return entries;
  }

  async importEntries(entries: VectorEntry[], partitions: Partition[]): Promise<void> {
    for (const partition of partitions) {
      this.partitions[partition].clear();
    }
    if (this.totalSize() === 0) this.dimension = 0;

    for (const entry of entries) {
      if (partitions.includes(entry.partition)) {
        this.store(entry);
      }
    }
    this.dirty = true;
  }

  async flush(): Promise<StorageResult> {
    const startTime = Date.now();
    if (!this.dirty || this.filePath === null) {
      this.dirty = false;
      return { success: true, count: 0, processingTime: 0 };
    }

    try {
      const records = (await this.exportEntries()).map(toRecord);
      await writeJsonlAtomic(this.filePath, records);
      this.dirty = false;
      return { success: true, count: records.length, processingTime: Date.now() - startTime };
    } catch (error) {
      return {
        success: false,
        count: 0,
        processingTime: Date.now() - startTime,
        errors: [error instanceof Error ? error.message : 'Unknown flush error']
      };
    }
  }

  getStats(): { authoritative: number; staged: number; dimension: number; queryCount: number } {
    return {
      authoritative: this.partitions.authoritative.size,
      staged: this.partitions.staged.size,
      dimension: this.dimension,
      queryCount: this.queryCount
    };
  }

  private store(entry: VectorEntry): void {
    if (this.dimension === 0) {
      this.dimension = entry.embedding.length;
    } else if (entry.embedding.length !== this.dimension) {
      throw new Error(`Vector dimension mismatch: expected ${this.dimension}, got ${entry.embedding.length}`);
    }
    this.partitions[entry.partition].set(entry.id, entry);
  }

  private totalSize(): number {
    return this.partitions.authoritative.size + this.partitions.staged.size;
  }
}

export function toRecord(entry: VectorEntry): VectorRecord {
  return {
    id: entry.id,
    partition: entry.partition,
    embedding: Array.from(entry.embedding),
    metadata: {
      label: entry.metadata.label,
      description: entry.metadata.description,
      parentConceptId: entry.metadata.parentConceptId
    }
  };
}

export function fromRecord(record: VectorRecord): VectorEntry {
  return {
    id: record.id,
    partition: record.partition,
    embedding: new Float32Array(record.embedding),
    metadata: {
      label: typeof record.metadata.label === 'string' ? record.metadata.label : record.id,
      description: typeof record.metadata.description === 'string' ? record.metadata.description : '',
      parentConceptId: typeof record.metadata.parentConceptId === 'string' ? record.metadata.parentConceptId : null
    }
  };
}
