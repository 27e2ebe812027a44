/**
 * Storage interfaces for the concept graph ingestion engine
 *
 * Two independent stores are kept consistent by the Sync step: a graph store
 * of concepts and relations, and a vector index used for similarity search.
 * Both expose the staged and authoritative partitions explicitly; callers pass
 * the partition on every read and write.
 */

import type { Concept, Partition, Relation, StagedConcept } from '../core/types.js';
import type { ConceptGraphMetrics } from '../core/graph.js';

/**
 * Storage operation result with metadata
 */
export interface StorageResult {
  /** Whether the operation was successful */
  success: boolean;
  /** Number of items processed */
  count: number;
  /** Processing time in milliseconds */
  processingTime: number;
  /** Any errors encountered */
  errors?: string[];
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Portable export of the authoritative partition
 */
export interface GraphExport {
  concepts: Concept[];
  relations: Relation[];
}

/**
 * Graph store with a staged and an authoritative partition
 */
export interface GraphStore {
  /**
   * Load persisted state; safe to call more than once
   */
  initialize(): Promise<StorageResult>;

  getConcept(conceptId: string, partition: Partition): Promise<Concept | undefined>;

  getStagedConcept(conceptId: string): Promise<StagedConcept | undefined>;

  /**
   * Look the id up in the authoritative partition first, then the staged one
   */
  findConcept(conceptId: string): Promise<{ concept: Concept; partition: Partition } | undefined>;

  listConcepts(partition: Partition): Promise<Concept[]>;

  listStagedConcepts(): Promise<StagedConcept[]>;

  putAuthoritativeConcept(concept: Concept): Promise<void>;

  putStagedConcept(concept: StagedConcept): Promise<void>;

  removeConcept(conceptId: string, partition: Partition): Promise<boolean>;

  /**
   * Atomic read-increment-write of one directed edge
   */
  upsertRelation(fromConceptId: string, toConceptId: string, at: Date): Promise<Relation>;

  getRelation(fromConceptId: string, toConceptId: string): Promise<Relation | undefined>;

  listRelations(conceptId?: string): Promise<Relation[]>;

  /**
   * Children of a concept across both partitions
   */
  getChildren(parentId: string): Promise<Concept[]>;

  /**
   * Ids from the concept up to the topmost ancestor, the concept first
   */
  pathToRoot(conceptId: string): Promise<string[]>;

  exportAuthoritative(): Promise<GraphExport>;

  /**
   * Replace the authoritative partition (restore from backup)
   */
  importAuthoritative(data: GraphExport): Promise<void>;

  getMetrics(partition: Partition): Promise<ConceptGraphMetrics>;

  /**
   * Persist pending changes; a no-op when nothing changed
   */
  flush(): Promise<StorageResult>;
}

/**
 * A stored vector with its metadata
 */
export interface VectorEntry {
  id: string;
  partition: Partition;
  embedding: Float32Array;
  metadata: VectorMetadata;
}

export interface VectorMetadata {
  label: string;
  description: string;
  parentConceptId: string | null;
}

export interface VectorMatch {
  id: string;
  partition: Partition;
  similarity: number;
  metadata: VectorMetadata;
}

/**
 * Vector index with a staged and an authoritative partition
 */
export interface VectorStore {
  initialize(): Promise<StorageResult>;

  upsert(id: string, embedding: Float32Array, metadata: VectorMetadata, partition: Partition): Promise<void>;

  /**
   * Top-k by cosine similarity, descending. Staged entries are searched only when
   * `includeStaged` is true.
   */
  query(embedding: Float32Array, k: number, includeStaged: boolean): Promise<VectorMatch[]>;

  get(id: string, partition: Partition): Promise<VectorEntry | undefined>;

  remove(id: string, partition: Partition): Promise<boolean>;

  listIds(partition: Partition): Promise<string[]>;

  count(partition: Partition): Promise<number>;

  exportEntries(): Promise<VectorEntry[]>;

  /**
   * Replace the contents of the partitions present in `entries`
   */
  importEntries(entries: VectorEntry[], partitions: Partition[]): Promise<void>;

  flush(): Promise<StorageResult>;
}
