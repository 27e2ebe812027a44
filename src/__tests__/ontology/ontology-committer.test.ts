/**
 * Ontology committer tests
 *
 * Write order into the staged partitions, parent choice, merges into an
 * existing staged concept, conflicts with authoritative ids and failure
 * handling that keeps the staging entries.
 */

import { beforeEach, describe, expect, test } from 'vitest';
import type { Cluster } from '../../core/types.js';
import { VectorIndex } from '../../indexing/vector-index.js';
import { OntologyCommitter } from '../../ontology/ontology-committer.js';
import { OracleClient } from '../../oracle/oracle-client.js';
import { openMemoryStores, type Stores } from '../../storage/factory.js';
import { manifestEntryId } from '../../storage/promotion-manifest.js';
import { entryKey } from '../../storage/staging-store.js';
import { CommitFailure, SyncConflict } from '../../utils/errors.js';
import { FakeEmbedder, FakeOracleBackend, fixedClock, makeEntry, vec } from '../helpers.js';

const members = [
  makeEntry({ conceptText: 'LoRA', source: 'chapter-2' }),
  makeEntry({ conceptText: 'low-rank adaptation', source: 'chapter-1' })
];

function cluster(overrides: Partial<Cluster> = {}): Cluster {
  return {
    members,
    representativePhrase: 'Low-Rank Adaptation',
    unifiedDescription: 'Fine-tuning through low-rank updates',
    validated: true,
    reason: 'paraphrases',
    cohesion: 0.95,
    ...overrides
  };
}

describe('OntologyCommitter', () => {
  let stores: Stores;
  let backend: FakeOracleBackend;
  let committer: OntologyCommitter;

  beforeEach(async () => {
    stores = await openMemoryStores();
    backend = new FakeOracleBackend();
    committer = new OntologyCommitter(
      stores,
      new OracleClient(backend, { retryBaseDelayMs: 0 }),
      new FakeEmbedder(),
      {},
      fixedClock()
    );

    await stores.graph.putAuthoritativeConcept({
      conceptId: 'Concept', label: 'Concept', description: 'Root', parentConceptId: null,
      contributors: [], createdAt: '2024-01-01T00:00:00.000Z', metadata: {}
    });
    await stores.graph.putAuthoritativeConcept({
      conceptId: 'Fine-tuning', label: 'Fine-tuning', description: 'Adapting a pretrained model', parentConceptId: 'Concept',
      contributors: [], createdAt: '2024-01-01T00:00:00.000Z', metadata: {}
    });
    await stores.vectors.upsert('Fine-tuning', vec(0, 0, 1), { label: 'Fine-tuning', description: 'Adapting a pretrained model', parentConceptId: 'Concept' }, 'authoritative');
    for (const member of members) {
      await stores.staging.insertIfAbsent(member);
    }
  });

  test('should stage the concept, record the manifest entry and clear staging', async () => {
    backend.on('choose-parent', () => ({ parent_concept_id: 'Fine-tuning' }));
    const expectedId = manifestEntryId('Low-Rank Adaptation', members.map(entryKey));

    const result = await committer.commit(cluster());

    expect(result).toEqual({
      conceptId: 'Low-Rank Adaptation',
      manifestEntryId: expectedId,
      parentConceptId: 'Fine-tuning',
      merged: false,
      removedEntries: 2
    });
    expect(await stores.graph.getStagedConcept('Low-Rank Adaptation')).toEqual({
      conceptId: 'Low-Rank Adaptation',
      label: 'Low-Rank Adaptation',
      description: 'Fine-tuning through low-rank updates',
      parentConceptId: 'Fine-tuning',
      contributors: ['chapter-1', 'chapter-2'],
      createdAt: '2024-03-01T12:00:00.000Z',
      metadata: { cohesion: 0.95, memberCount: 2 },
      stagedAt: '2024-03-01T12:00:00.000Z',
      sourceMentions: ['LoRA @ chapter-2', 'low-rank adaptation @ chapter-1'],
      promotionReason: 'paraphrases',
      manifestEntryIds: [expectedId]
    });
    expect(await stores.graph.getConcept('Low-Rank Adaptation', 'authoritative')).toBeUndefined();
    expect(await stores.vectors.listIds('staged')).toEqual(['Low-Rank Adaptation']);
    expect(stores.manifest.get(expectedId)).toMatchObject({
      clusterRepresentative: 'Low-Rank Adaptation',
      memberMentions: [
        { conceptText: 'LoRA', source: 'chapter-2' },
        { conceptText: 'low-rank adaptation', source: 'chapter-1' }
      ],
      parentConceptId: 'Fine-tuning',
      promotedAt: '2024-03-01T12:00:00.000Z'
    });
    expect(stores.staging.count()).toBe(0);
  });

  test('should offer the root and its children with their paths', async () => {
    await committer.commit(cluster());

    const prompt = backend.callsFor('choose-parent')[0].prompt;
    expect(prompt).toContain('- id="Concept" path: Concept');
    expect(prompt).toContain('- id="Fine-tuning" path: Fine-tuning > Concept');
  });

  test('should place the concept under the root when the oracle names an unknown parent', async () => {
    backend.on('choose-parent', () => ({ parent_concept_id: 'Parameter-Efficient Methods' }));

    const result = await committer.commit(cluster());

    expect(result.parentConceptId).toBe('Concept');
  });

  test('should refuse an id that is already authoritative before writing anything', async () => {
    const error = await committer.commit(cluster({ representativePhrase: 'Fine-tuning' })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SyncConflict);
    expect(error).toMatchObject({ conceptIds: ['Fine-tuning'] });
    expect(stores.staging.count()).toBe(2);
    expect(stores.manifest.list()).toEqual([]);
    expect(backend.calls).toEqual([]);
  });

  test('should merge into a staged concept with the same id', async () => {
    await committer.commit(cluster());
    const later = makeEntry({ conceptText: 'LoRA fine-tuning', source: 'chapter-3' });
    await stores.staging.insertIfAbsent(later);

    const result = await committer.commit(cluster({ members: [later] }));

    expect(result).toMatchObject({ merged: true, parentConceptId: 'Concept', removedEntries: 1 });
    expect(backend.callsFor('choose-parent')).toHaveLength(1);
    const concept = await stores.graph.getStagedConcept('Low-Rank Adaptation');
    expect(concept?.contributors).toEqual(['chapter-1', 'chapter-2', 'chapter-3']);
    expect(concept?.sourceMentions).toHaveLength(3);
    expect(concept?.manifestEntryIds).toHaveLength(2);
    expect(concept?.metadata).toEqual({ cohesion: 0.95, memberCount: 3 });
  });

  test('should keep the staging entries when a write fails', async () => {
    class FailingVectorIndex extends VectorIndex {
      async upsert(): Promise<void> {
        throw new Error('disk full');
      }
    }
    const failing = new OntologyCommitter(
      { ...stores, vectors: new FailingVectorIndex() },
      new OracleClient(backend, { retryBaseDelayMs: 0 }),
      new FakeEmbedder(),
      {},
      fixedClock()
    );

    const error = await failing.commit(cluster()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommitFailure);
    expect(String(error)).toContain('Commit of "Low-Rank Adaptation" failed: disk full');
    expect(stores.staging.count()).toBe(2);
    expect(stores.manifest.list()).toEqual([]);
  });

  test('should not commit an unvalidated cluster', async () => {
    await expect(committer.commit(cluster({ validated: false }))).rejects.toThrow('cluster is not validated');
  });

  test('should fail with CommitFailure when the description cannot be embedded', async () => {
    const failing = new OntologyCommitter(
      stores,
      new OracleClient(backend, { retryBaseDelayMs: 0 }),
      new FakeEmbedder().failWith(new Error('timeout')),
      {},
      fixedClock()
    );

    await expect(failing.commit(cluster())).rejects.toThrow('Commit of "Low-Rank Adaptation" failed: embedding failed: timeout');
    expect(stores.staging.count()).toBe(2);
  });
});
