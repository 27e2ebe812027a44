import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { access } from 'fs/promises';
import type { Concept } from '../../core/types.js';
import { JsonlGraphStore } from '../../storage/jsonl-graph-store.js';
import { makeStagedConcept, makeTempDir, removeTempDir } from '../helpers.js';

function concept(conceptId: string, parentConceptId: string | null): Concept {
  return {
    conceptId,
    label: conceptId,
    description: `About ${conceptId}`,
    parentConceptId,
    contributors: [],
    createdAt: '2024-03-01T12:00:00.000Z',
    metadata: {}
  };
}

describe('JsonlGraphStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  test('should keep the partitions apart', async () => {
    const store = new JsonlGraphStore({ directory: dir });
    await store.initialize();

    await store.putAuthoritativeConcept(concept('Concept', null));
    await store.putStagedConcept(makeStagedConcept());

    expect(await store.getConcept('Low-Rank Adaptation', 'authoritative')).toBeUndefined();
    expect(await store.getStagedConcept('Low-Rank Adaptation')).toMatchObject({ manifestEntryIds: ['entry-1'] });
    expect(await store.findConcept('Low-Rank Adaptation')).toMatchObject({ partition: 'staged' });
    expect(await store.findConcept('Concept')).toMatchObject({ partition: 'authoritative' });
  });

  test('should write nothing until flushed', async () => {
    const store = new JsonlGraphStore({ directory: dir });
    await store.initialize();
    await store.putAuthoritativeConcept(concept('Concept', null));

    const authoritativePath = store.authoritativePath ?? '';
    await expect(access(authoritativePath)).rejects.toThrow();

    const result = await store.flush();
    expect(result).toMatchObject({ success: true, count: 1 });
    await access(authoritativePath);
  });

  test('should reload concepts and relations after a flush', async () => {
    const store = new JsonlGraphStore({ directory: dir });
    await store.initialize();
    await store.putAuthoritativeConcept(concept('Concept', null));
    await store.putAuthoritativeConcept(concept('RAG', 'Concept'));
    await store.putStagedConcept(makeStagedConcept());
    await store.upsertRelation('RAG', 'Low-Rank Adaptation', new Date('2024-03-01T12:00:00.000Z'));
    await store.upsertRelation('RAG', 'Low-Rank Adaptation', new Date('2024-03-02T12:00:00.000Z'));
    await store.flush();

    const reloaded = new JsonlGraphStore({ directory: dir });
    const result = await reloaded.initialize();

    expect(result.success).toBe(true);
    expect((await reloaded.listConcepts('authoritative')).map(c => c.conceptId)).toEqual(['Concept', 'RAG']);
    expect((await reloaded.listStagedConcepts()).map(c => c.conceptId)).toEqual(['Low-Rank Adaptation']);
    expect(await reloaded.getRelation('RAG', 'Low-Rank Adaptation')).toMatchObject({
      weight: 2,
      createdAt: '2024-03-01T12:00:00.000Z',
      lastReinforcedAt: '2024-03-02T12:00:00.000Z'
    });
  });

  test('should list children and the path to the root across partitions', async () => {
    const store = new JsonlGraphStore({ directory: null });
    await store.putAuthoritativeConcept(concept('Concept', null));
    await store.putAuthoritativeConcept(concept('Fine-tuning', 'Concept'));
    await store.putStagedConcept(makeStagedConcept({ parentConceptId: 'Fine-tuning' }));

    expect((await store.getChildren('Fine-tuning')).map(c => c.conceptId)).toEqual(['Low-Rank Adaptation']);
    expect(await store.pathToRoot('Low-Rank Adaptation')).toEqual(['Low-Rank Adaptation', 'Fine-tuning', 'Concept']);
  });

  test('should stop at a parent cycle', async () => {
    const store = new JsonlGraphStore({ directory: null });
    await store.putAuthoritativeConcept(concept('A', 'B'));
    await store.putAuthoritativeConcept(concept('B', 'A'));

    expect(await store.pathToRoot('A')).toEqual(['A', 'B']);
  });

  test('should replace the authoritative partition on import', async () => {
    const store = new JsonlGraphStore({ directory: null });
    await store.putAuthoritativeConcept(concept('Old', null));
    await store.putStagedConcept(makeStagedConcept());

    await store.importAuthoritative({ concepts: [concept('Concept', null)], relations: [] });

    expect((await store.listConcepts('authoritative')).map(c => c.conceptId)).toEqual(['Concept']);
    expect(await store.listStagedConcepts()).toHaveLength(1);
  });
});
