/**
 * Ontology Committer
 *
 * Writes a validated cluster into the staged partitions of the graph store and
 * the vector index, appends the promotion manifest entry and only then removes
 * the members from the staging store. A failure at any step leaves the staging
 * entries in place; every write is keyed, so a retry converges.
 */

import type { Cluster, PromotionManifestEntry, StagedConcept, StagedEntry } from '../core/types.js';
import type { OracleClient } from '../oracle/oracle-client.js';
import type { ParentOption } from '../oracle/prompts.js';
import { manifestEntryId, type PromotionManifest } from '../storage/promotion-manifest.js';
import { entryKey, type StagingStore } from '../storage/staging-store.js';
import { assertFlushed } from '../storage/flush.js';
import type { GraphStore, VectorStore } from '../storage/types.js';
import type { Embedder } from '../utils/embedding-service.js';
import { CommitFailure, SyncConflict } from '../utils/errors.js';

export interface OntologyCommitterConfig {
  /** Parent used when the oracle names nothing usable */
  rootConceptId: string;
  /** Similar concepts offered as parents besides the root's children */
  parentOptionLimit: number;
}

export interface CommitterStores {
  graph: GraphStore;
  vectors: VectorStore;
  staging: StagingStore;
  manifest: PromotionManifest;
}

export interface CommitResult {
  conceptId: string;
  manifestEntryId: string;
  parentConceptId: string;
  /** True when an existing staged concept absorbed the cluster */
  merged: boolean;
  removedEntries: number;
}

export class OntologyCommitter {
  private config: OntologyCommitterConfig;

  constructor(
    private readonly stores: CommitterStores,
    private readonly oracle: OracleClient,
    private readonly embedder: Embedder,
    config: Partial<OntologyCommitterConfig> = {},
    private readonly clock: () => Date = () => new Date()
  ) {
    this.config = {
      rootConceptId: config.rootConceptId ?? 'Concept',
      parentOptionLimit: config.parentOptionLimit ?? 5
    };
  }

  /**
   * Throws SyncConflict when the id is already authoritative, OracleFailure
   * when the parent cannot be decided, CommitFailure when a write fails.
   */
  async commit(cluster: Cluster): Promise<CommitResult> {
    const conceptId = cluster.representativePhrase.trim();
    if (!cluster.validated || conceptId.length === 0) {
      throw new CommitFailure(conceptId || '(unnamed)', 'cluster is not validated');
    }

    const { graph, vectors, staging, manifest } = this.stores;

    if (await graph.getConcept(conceptId, 'authoritative')) {
      throw new SyncConflict([conceptId]);
    }

    const memberKeys = cluster.members.map(entryKey);
    const entryId = manifestEntryId(conceptId, memberKeys);
    const existing = await graph.getStagedConcept(conceptId);
    const now = this.clock().toISOString();

    const description = existing?.description ?? cluster.unifiedDescription;
    const embedding = await this.embed(conceptId, description);
    const parentConceptId = existing
      ? existing.parentConceptId ?? this.config.rootConceptId
      : await this.chooseParent(conceptId, description, embedding);

    const concept = existing
      ? mergeInto(existing, cluster.members, entryId)
      : this.newConcept(conceptId, cluster, parentConceptId, entryId, now);

    const entry: PromotionManifestEntry = {
      id: entryId,
      clusterRepresentative: conceptId,
      memberMentions: cluster.members.map(m => ({ conceptText: m.conceptText, source: m.source })),
      parentConceptId,
      promotedAt: now
    };

    let removedEntries: number;
    try {
      await graph.putStagedConcept(concept);
      await vectors.upsert(
        conceptId,
        embedding,
        { label: concept.label, description: concept.description, parentConceptId: concept.parentConceptId },
        'staged'
      );
      await manifest.append(entry);
      assertFlushed(await graph.flush(), 'graph store');
      assertFlushed(await vectors.flush(), 'vector index');

      removedEntries = await staging.deleteMany(memberKeys);
    } catch (error) {
      throw new CommitFailure(conceptId, error instanceof Error ? error.message : 'Unknown commit error', {
        cause: error
      });
    }

    console.log(
      `✅ ${existing ? 'Merged' : 'Staged'} concept "${conceptId}" under "${parentConceptId}" ` +
        `(${cluster.members.length} mentions)`
    );

    return { conceptId, manifestEntryId: entryId, parentConceptId, merged: existing !== undefined, removedEntries };
  }

  private async embed(conceptId: string, description: string): Promise<Float32Array> {
    try {
      return await this.embedder.embed(description);
    } catch (error) {
      throw new CommitFailure(
        conceptId,
        `embedding failed: ${error instanceof Error ? error.message : 'Unknown embedding error'}`,
        { cause: error }
      );
    }
  }

  /**
   * Offers the root's children plus the most similar concepts, each with its
   * path to the root. Null, self and unknown answers fall back to the root.
   */
  private async chooseParent(conceptId: string, description: string, embedding: Float32Array): Promise<string> {
    const { graph, vectors } = this.stores;
    const root = this.config.rootConceptId;
    const options = new Map<string, ParentOption>();

    options.set(root, { conceptId: root, description: 'Root of the taxonomy', path: [root] });

    for (const child of await graph.getChildren(root)) {
      options.set(child.conceptId, {
        conceptId: child.conceptId,
        description: child.description,
        path: await graph.pathToRoot(child.conceptId)
      });
    }

    const similar = await vectors.query(embedding, this.config.parentOptionLimit + 2, true);
    let added = 0;
    for (const match of similar) {
      if (added >= this.config.parentOptionLimit) break;
      if (match.id === conceptId || options.has(match.id)) continue;
      added++;
      options.set(match.id, {
        conceptId: match.id,
        description: match.metadata.description,
        path: await graph.pathToRoot(match.id)
      });
    }

    const chosen = await this.oracle.chooseParent({ phrase: conceptId, description, options: [...options.values()] });
    if (chosen === null || chosen === conceptId) return root;
    if (options.has(chosen) || (await graph.findConcept(chosen))) return chosen;

    console.warn(`⚠️ Oracle chose unknown parent "${chosen}" for "${conceptId}"; using "${root}"`);
    return root;
  }

  private newConcept(
    conceptId: string,
    cluster: Cluster,
    parentConceptId: string,
    entryId: string,
    now: string
  ): StagedConcept {
    return {
      conceptId,
      label: conceptId,
      description: cluster.unifiedDescription,
      parentConceptId,
      contributors: uniqueSorted(cluster.members.map(m => m.source)),
      createdAt: now,
      metadata: { cohesion: cluster.cohesion, memberCount: cluster.members.length },
      stagedAt: now,
      sourceMentions: cluster.members.map(mentionLabel),
      promotionReason: cluster.reason,
      manifestEntryIds: [entryId]
    };
  }
}

function mergeInto(existing: StagedConcept, members: readonly StagedEntry[], entryId: string): StagedConcept {
  const sourceMentions = [...existing.sourceMentions];
  for (const label of members.map(mentionLabel)) {
    if (!sourceMentions.includes(label)) sourceMentions.push(label);
  }

  return {
    ...existing,
    contributors: uniqueSorted([...existing.contributors, ...members.map(m => m.source)]),
    sourceMentions,
    manifestEntryIds: existing.manifestEntryIds.includes(entryId)
      ? existing.manifestEntryIds
      : [...existing.manifestEntryIds, entryId],
    metadata: { ...existing.metadata, memberCount: sourceMentions.length }
  };
}

function mentionLabel(entry: StagedEntry): string {
  return `${entry.conceptText} @ ${entry.source}`;
}

function uniqueSorted(values: string[]): string[] {
  return [...new Set(values)].sort();
}
