/**
 * In-memory concept graph using adjacency lists
 *
 * Holds the concepts of one partition plus weighted `related` edges. Edges are
 * keyed by concept id only and may point at a concept that currently lives in
 * the other partition: Sync moves a concept between partitions without
 * touching its relations.
 *
 * Memory complexity: O(n + m) where n=concepts, m=relations
 *
 * References:
 * - Sparse graph efficiency: https://stackoverflow.com/questions/2218322/what-is-better-adjacency-lists-or-adjacency-matrices-for-graph-problems-in-c
 */

import type { Concept, Relation } from './types.js';

export interface ConceptGraphMetrics {
  conceptCount: number;
  relationCount: number;
  /** Relations divided by the possible directed pairs */
  density: number;
}

export function relationKey(fromConceptId: string, toConceptId: string): string {
  return `${fromConceptId}\u0000${toConceptId}`;
}

/**
 * Concept graph for a single partition
 */
export class ConceptGraph<C extends Concept = Concept> {
  private concepts: Map<string, C> = new Map();
  private children: Map<string, Set<string>> = new Map();

  // Forward and reverse adjacency, both holding the same Relation objects
  private adjacencyList: Map<string, Map<string, Relation>> = new Map();
  private reverseAdjacencyList: Map<string, Map<string, Relation>> = new Map();
  private relationCount = 0;

  /**
   * Insert or replace a concept, keeping the parent index current
   */
  putConcept(concept: C): void {
    const previous = this.concepts.get(concept.conceptId);
    if (previous && previous.parentConceptId !== concept.parentConceptId) {
      this.detachFromParent(previous);
    }

    this.concepts.set(concept.conceptId, concept);

    if (concept.parentConceptId !== null) {
      const siblings = this.children.get(concept.parentConceptId) ?? new Set<string>();
      siblings.add(concept.conceptId);
      this.children.set(concept.parentConceptId, siblings);
    }
  }

  getConcept(conceptId: string): C | undefined {
    return this.concepts.get(conceptId);
  }

  hasConcept(conceptId: string): boolean {
    return this.concepts.has(conceptId);
  }

  /**
   * Remove a concept. Its relations are kept; see the module comment.
   */
  removeConcept(conceptId: string): boolean {
    const concept = this.concepts.get(conceptId);
    if (!concept) {
      return false;
    }

    this.detachFromParent(concept);
    this.concepts.delete(conceptId);
    return true;
  }

  /**
   * All concepts, ordered by id so that serialized output is stable
   */
  getAllConcepts(): C[] {
    return [...this.concepts.values()].sort((a, b) => compareIds(a.conceptId, b.conceptId));
  }

  /**
   * Ids of concepts whose parent is `parentId` within this partition
   */
  getChildren(parentId: string): string[] {
    return [...(this.children.get(parentId) ?? [])].sort(compareIds);
  }

  /**
   * Create the edge with weight 1 or add one observation to it.
   * Synchronous, so a single call is atomic with respect to other callers.
   */
  upsertRelation(fromConceptId: string, toConceptId: string, at: Date): Relation {
    if (fromConceptId === toConceptId) {
      throw new Error(`Self relation is not allowed: ${fromConceptId}`);
    }

    const timestamp = at.toISOString();
    const outgoing = this.adjacencyList.get(fromConceptId) ?? new Map<string, Relation>();
    const existing = outgoing.get(toConceptId);

    if (existing) {
      existing.weight += 1;
      existing.lastReinforcedAt = timestamp;
      return { ...existing };
    }

    const relation: Relation = {
      fromConceptId,
      toConceptId,
      relationType: 'related',
      weight: 1,
      createdAt: timestamp,
      lastReinforcedAt: timestamp
    };
    this.insertRelation(relation);
    return { ...relation };
  }

  /**
   * Load a relation record as-is (used when reading from disk)
   */
  insertRelation(relation: Relation): void {
    const outgoing = this.adjacencyList.get(relation.fromConceptId) ?? new Map<string, Relation>();
    const isNew = !outgoing.has(relation.toConceptId);
    const stored = { ...relation };

    outgoing.set(relation.toConceptId, stored);
    this.adjacencyList.set(relation.fromConceptId, outgoing);

    const incoming = this.reverseAdjacencyList.get(relation.toConceptId) ?? new Map<string, Relation>();
    incoming.set(relation.fromConceptId, stored);
    this.reverseAdjacencyList.set(relation.toConceptId, incoming);

    if (isNew) {
      this.relationCount++;
    }
  }

  getRelation(fromConceptId: string, toConceptId: string): Relation | undefined {
    const relation = this.adjacencyList.get(fromConceptId)?.get(toConceptId);
    return relation ? { ...relation } : undefined;
  }

  getOutgoingRelations(conceptId: string): Relation[] {
    return [...(this.adjacencyList.get(conceptId)?.values() ?? [])].map(r => ({ ...r }));
  }

  getIncomingRelations(conceptId: string): Relation[] {
    return [...(this.reverseAdjacencyList.get(conceptId)?.values() ?? [])].map(r => ({ ...r }));
  }

  getAllRelations(): Relation[] {
    const relations: Relation[] = [];
    for (const outgoing of this.adjacencyList.values()) {
      for (const relation of outgoing.values()) {
        relations.push({ ...relation });
      }
    }
    return relations.sort((a, b) =>
      compareIds(relationKey(a.fromConceptId, a.toConceptId), relationKey(b.fromConceptId, b.toConceptId))
    );
  }

  getMetrics(): ConceptGraphMetrics {
    const n = this.concepts.size;
    const possible = n * (n - 1);
    return {
      conceptCount: n,
      relationCount: this.relationCount,
      density: possible > 0 ? this.relationCount / possible : 0
    };
  }

  clear(): void {
    this.concepts.clear();
    this.children.clear();
    this.adjacencyList.clear();
    this.reverseAdjacencyList.clear();
    this.relationCount = 0;
  }

  /**
   * Check that the forward and reverse adjacency lists and the parent index agree
   */
  validateConsistency(): string[] {
    const issues: string[] = [];

    for (const [from, outgoing] of this.adjacencyList) {
      for (const [to, relation] of outgoing) {
        if (this.reverseAdjacencyList.get(to)?.get(from) !== relation) {
          issues.push(`Relation ${from} -> ${to} missing from reverse adjacency list`);
        }
      }
    }

    for (const [parentId, childIds] of this.children) {
      for (const childId of childIds) {
        if (this.concepts.get(childId)?.parentConceptId !== parentId) {
          issues.push(`Parent index lists ${childId} under ${parentId} but the concept disagrees`);
        }
      }
    }

    return issues;
  }

  private detachFromParent(concept: C): void {
    if (concept.parentConceptId === null) return;
    const siblings = this.children.get(concept.parentConceptId);
    siblings?.delete(concept.conceptId);
    if (siblings && siblings.size === 0) {
      this.children.delete(concept.parentConceptId);
    }
  }
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
