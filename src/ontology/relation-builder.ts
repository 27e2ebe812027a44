/**
 * Relation Builder
 *
 * Concepts resolved in the same input group co-occur. Every unordered pair of
 * distinct concepts in a group gets one observation per batch, recorded as a
 * weight increment on both directed edges.
 */

import type { GraphStore } from '../storage/types.js';
import { relationKey } from '../core/graph.js';
import { KeyedLock } from '../utils/keyed-lock.js';

export interface GroupResolution {
  groupId: string;
  conceptId: string;
}

export interface RelationBuildResult {
  groups: number;
  pairs: number;
  /** Directed edges created or reinforced */
  edgesUpdated: number;
}

export class RelationBuilder {
  constructor(
    private readonly graph: GraphStore,
    private readonly lock: KeyedLock = new KeyedLock(),
    private readonly clock: () => Date = () => new Date()
  ) {}

  async build(resolutions: readonly GroupResolution[]): Promise<RelationBuildResult> {
    const groups = new Map<string, Set<string>>();
    for (const { groupId, conceptId } of resolutions) {
      const concepts = groups.get(groupId) ?? new Set<string>();
      concepts.add(conceptId);
      groups.set(groupId, concepts);
    }

    const at = this.clock();
    let pairs = 0;
    const upserts: Promise<unknown>[] = [];

    for (const concepts of groups.values()) {
      const ids = [...concepts].sort();
      for (let i = 0; i < ids.length; i++) {
        for (let j = i + 1; j < ids.length; j++) {
          pairs++;
          upserts.push(this.reinforce(ids[i], ids[j], at), this.reinforce(ids[j], ids[i], at));
        }
      }
    }

    await Promise.all(upserts);

    if (pairs > 0) {
      console.log(`🔗 Reinforced ${pairs} concept pairs across ${groups.size} groups`);
    }

    return { groups: groups.size, pairs, edgesUpdated: upserts.length };
  }

  private reinforce(fromConceptId: string, toConceptId: string, at: Date): Promise<unknown> {
    return this.lock.runExclusive(relationKey(fromConceptId, toConceptId), () =>
      this.graph.upsertRelation(fromConceptId, toConceptId, at)
    );
  }
}
