/**
 * JSONL-based graph store
 *
 * Keeps each partition in memory as a ConceptGraph and persists it as a JSON
 * Lines file: `authoritative.jsonl` holds concepts and every relation,
 * `staged.jsonl` holds staged concepts. Each line is `{type, data}`.
 * Writes are buffered until `flush()`, which rewrites only the partitions that
 * changed.
 *
 * References:
 * - JSONL specification: https://jsonlines.org/
 */

import { join } from 'path';
import { ConceptGraph, type ConceptGraphMetrics } from '../core/graph.js';
import type { Concept, Partition, Relation, StagedConcept } from '../core/types.js';
import { readJsonl, writeJsonlAtomic } from './jsonl-file.js';
import { AuthoritativeLineSchema, StagedLineSchema } from './records.js';
import type { GraphExport, GraphStore, StorageResult } from './types.js';

export interface JsonlGraphStoreConfig {
  /** Directory holding the partition files; null keeps both partitions in memory */
  directory: string | null;
  /** Longest parent chain followed by `pathToRoot` */
  maxPathDepth: number;
}

export class JsonlGraphStore implements GraphStore {
  private config: JsonlGraphStoreConfig;
  private authoritative = new ConceptGraph<Concept>();
  private staged = new ConceptGraph<StagedConcept>();
  private dirty = new Set<Partition>();
  private initialized = false;

  constructor(config: Partial<JsonlGraphStoreConfig> = {}) {
    this.config = {
      directory: config.directory === undefined ? './data/graph' : config.directory,
      maxPathDepth: config.maxPathDepth ?? 64
    };
  }

  get authoritativePath(): string | null {
    return this.config.directory === null ? null : join(this.config.directory, 'authoritative.jsonl');
  }

  get stagedPath(): string | null {
    return this.config.directory === null ? null : join(this.config.directory, 'staged.jsonl');
  }

  async initialize(): Promise<StorageResult> {
    const startTime = Date.now();
    if (this.initialized || this.authoritativePath === null || this.stagedPath === null) {
      this.initialized = true;
      return { success: true, count: 0, processingTime: 0 };
    }

    try {
      const authoritativeLines = await readJsonl(this.authoritativePath, AuthoritativeLineSchema);
      for (const line of authoritativeLines) {
        if (line.type === 'concept') {
          this.authoritative.putConcept(line.data);
        } else {
          this.authoritative.insertRelation(line.data);
        }
      }

      const stagedLines = await readJsonl(this.stagedPath, StagedLineSchema);
      for (const line of stagedLines) {
        this.staged.putConcept(line.data);
      }

      this.initialized = true;
      return {
        success: true,
        count: authoritativeLines.length + stagedLines.length,
        processingTime: Date.now() - startTime
      };
    } catch (error) {
      return {
        success: false,
        count: 0,
        processingTime: Date.now() - startTime,
        errors: [error instanceof Error ? error.message : 'Unknown initialization error']
      };
    }
  }

  async getConcept(conceptId: string, partition: Partition): Promise<Concept | undefined> {
    return this.graphFor(partition).getConcept(conceptId);
  }

  async getStagedConcept(conceptId: string): Promise<StagedConcept | undefined> {
    return this.staged.getConcept(conceptId);
  }

  async findConcept(conceptId: string): Promise<{ concept: Concept; partition: Partition } | undefined> {
    const authoritative = this.authoritative.getConcept(conceptId);
    if (authoritative) return { concept: authoritative, partition: 'authoritative' };

    const staged = this.staged.getConcept(conceptId);
    if (staged) return { concept: staged, partition: 'staged' };

    return undefined;
  }

  async listConcepts(partition: Partition): Promise<Concept[]> {
    return this.graphFor(partition).getAllConcepts();
  }

  async listStagedConcepts(): Promise<StagedConcept[]> {
    return this.staged.getAllConcepts();
  }

  async putAuthoritativeConcept(concept: Concept): Promise<void> {
    this.authoritative.putConcept({ ...concept });
    this.dirty.add('authoritative');
  }

  async putStagedConcept(concept: StagedConcept): Promise<void> {
    this.staged.putConcept({ ...concept });
    this.dirty.add('staged');
  }

  async removeConcept(conceptId: string, partition: Partition): Promise<boolean> {
    const removed = this.graphFor(partition).removeConcept(conceptId);
    if (removed) this.dirty.add(partition);
    return removed;
  }

  async upsertRelation(fromConceptId: string, toConceptId: string, at: Date): Promise<Relation> {
    const relation = this.authoritative.upsertRelation(fromConceptId, toConceptId, at);
    this.dirty.add('authoritative');
    return relation;
  }

  async getRelation(fromConceptId: string, toConceptId: string): Promise<Relation | undefined> {
    return this.authoritative.getRelation(fromConceptId, toConceptId);
  }

  async listRelations(conceptId?: string): Promise<Relation[]> {
    return conceptId === undefined
      ? this.authoritative.getAllRelations()
      : this.authoritative.getOutgoingRelations(conceptId);
  }

  async getChildren(parentId: string): Promise<Concept[]> {
    const children: Concept[] = [];
    const seen = new Set<string>();

    for (const graph of [this.authoritative, this.staged]) {
      for (const childId of graph.getChildren(parentId)) {
        const child = graph.getConcept(childId);
        if (child && !seen.has(childId)) {
          seen.add(childId);
          children.push(child);
        }
      }
    }

    return children;
  }

  async pathToRoot(conceptId: string): Promise<string[]> {
    const path: string[] = [];
    let currentId: string | null = conceptId;

    while (currentId !== null && path.length < this.config.maxPathDepth) {
      if (path.includes(currentId)) {
        console.warn(`⚠️ Parent cycle detected at ${currentId}`);
        break;
      }
      path.push(currentId);
      const found = await this.findConcept(currentId);
      currentId = found?.concept.parentConceptId ?? null;
    }

    return path;
  }

  async exportAuthoritative(): Promise<GraphExport> {
    return {
      concepts: this.authoritative.getAllConcepts(),
      relations: this.authoritative.getAllRelations()
    };
  }

  async importAuthoritative(data: GraphExport): Promise<void> {
    this.authoritative.clear();
    for (const concept of data.concepts) {
      this.authoritative.putConcept({ ...concept });
    }
    for (const relation of data.relations) {
      this.authoritative.insertRelation(relation);
    }
    this.dirty.add('authoritative');
  }

  async getMetrics(partition: Partition): Promise<ConceptGraphMetrics> {
    return this.graphFor(partition).getMetrics();
  }

  async flush(): Promise<StorageResult> {
    const startTime = Date.now();
    let count = 0;

    if (this.authoritativePath === null || this.stagedPath === null) {
      this.dirty.clear();
      return { success: true, count: 0, processingTime: 0 };
    }

    try {
      if (this.dirty.has('authoritative')) {
        const lines = [
          ...this.authoritative.getAllConcepts().map(data => ({ type: 'concept', data })),
          ...this.authoritative.getAllRelations().map(data => ({ type: 'relation', data }))
        ];
        await writeJsonlAtomic(this.authoritativePath, lines);
        this.dirty.delete('authoritative');
        count += lines.length;
      }

      if (this.dirty.has('staged')) {
        const lines = this.staged.getAllConcepts().map(data => ({ type: 'concept', data }));
        await writeJsonlAtomic(this.stagedPath, lines);
        this.dirty.delete('staged');
        count += lines.length;
      }

      return { success: true, count, processingTime: Date.now() - startTime };
    } catch (error) {
      return {
        success: false,
        count,
        processingTime: Date.now() - startTime,
        errors: [error instanceof Error ? error.message : 'Unknown flush error']
      };
    }
  }

  private graphFor(partition: Partition): ConceptGraph {
    return partition === 'authoritative' ? this.authoritative : this.staged;
  }
}
