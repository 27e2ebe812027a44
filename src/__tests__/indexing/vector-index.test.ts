/**
 * Vector index tests: partitioned search, dimension checks and persistence.
 */

import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { VectorIndex } from '../../indexing/vector-index.js';
import type { VectorMetadata } from '../../storage/types.js';
import { makeTempDir, removeTempDir, vec } from '../helpers.js';

function meta(label: string): VectorMetadata {
  return { label, description: `About ${label}`, parentConceptId: 'Concept' };
}

describe('VectorIndex', () => {
  let index: VectorIndex;

  beforeEach(async () => {
    index = new VectorIndex();
    await index.initialize();
    await index.upsert('RAG', vec(1), meta('RAG'), 'authoritative');
    await index.upsert('Embeddings', vec(1, 1), meta('Embeddings'), 'authoritative');
    await index.upsert('LoRA', vec(0.9, 0.1), meta('LoRA'), 'staged');
  });

  describe('Query', () => {
    test('should search only the authoritative partition by default', async () => {
      const matches = await index.query(vec(1), 5, false);

      expect(matches.map(m => m.id)).toEqual(['RAG', 'Embeddings']);
      expect(matches[0].similarity).toBeCloseTo(1);
      expect(matches[1].similarity).toBeCloseTo(Math.SQRT1_2);
    });

    test('should include staged vectors when asked', async () => {
      const matches = await index.query(vec(1), 2, true);

      expect(matches.map(m => [m.id, m.partition])).toEqual([
        ['RAG', 'authoritative'],
        ['LoRA', 'staged']
      ]);
    });

    test('should reject a query of the wrong dimension', async () => {
      await expect(index.query(new Float32Array(3), 5, false)).rejects.toThrow('dimension mismatch');
    });

    test('should return nothing from an empty index', async () => {
      expect(await new VectorIndex().query(vec(1), 5, true)).toEqual([]);
    });
  });

  describe('Writes', () => {
    test('should reject invalid embeddings', async () => {
      await expect(index.upsert('X', new Float32Array(0), meta('X'), 'staged')).rejects.toThrow('Empty embedding');
      await expect(index.upsert('X', vec(Number.NaN), meta('X'), 'staged')).rejects.toThrow('NaN');
    });

    test('should move an entry between partitions', async () => {
      const entry = await index.get('LoRA', 'staged');
      expect(entry).toBeDefined();
      if (!entry) return;

      await index.upsert('LoRA', entry.embedding, entry.metadata, 'authoritative');
      await index.remove('LoRA', 'staged');

      expect(await index.listIds('authoritative')).toEqual(['Embeddings', 'LoRA', 'RAG']);
      expect(await index.count('staged')).toBe(0);
    });

    test('should replace only the imported partitions', async () => {
      await index.importEntries(
        [{ id: 'Restored', partition: 'authoritative', embedding: vec(0, 1), metadata: meta('Restored') }],
        ['authoritative']
      );

      expect(await index.listIds('authoritative')).toEqual(['Restored']);
      expect(await index.listIds('staged')).toEqual(['LoRA']);
    });
  });

  describe('Persistence', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeTempDir(dir);
    });

    test('should reload both partitions after a flush', async () => {
      const persisted = new VectorIndex({ directory: dir });
      await persisted.initialize();
      await persisted.upsert('RAG', vec(1), meta('RAG'), 'authoritative');
      await persisted.upsert('LoRA', vec(0, 1), meta('LoRA'), 'staged');
      expect(await persisted.flush()).toMatchObject({ success: true, count: 2 });

      const reloaded = new VectorIndex({ directory: dir });
      await reloaded.initialize();

      expect(reloaded.getStats()).toMatchObject({ authoritative: 1, staged: 1, dimension: 64 });
      expect((await reloaded.get('LoRA', 'staged'))?.metadata).toEqual(meta('LoRA'));
    });
  });
});
