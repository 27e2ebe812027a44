/**
 * Staging store tests: key normalization, idempotent inserts, persistence,
 * compaction and rejected cluster fingerprints.
 */

import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { join } from 'path';
import { readFile } from 'fs/promises';
import { StagingStore, clusterFingerprint, normalizePhrase, stagingKey } from '../../storage/staging-store.js';
import { makeEntry, makeTempDir, removeTempDir, vec } from '../helpers.js';

describe('StagingStore', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    filePath = join(dir, 'staging.jsonl');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('Keys', () => {
    test('should normalize case and whitespace of the phrase', () => {
      expect(normalizePhrase('  Low-Rank   Adaptation ')).toBe('low-rank adaptation');
      expect(stagingKey('LoRA', 'chapter-1')).toBe('lora\u0000chapter-1');
    });

    test('should fingerprint memberships independent of order', () => {
      expect(clusterFingerprint(['b', 'a'])).toBe(clusterFingerprint(['a', 'b']));
    });
  });

  describe('Inserts', () => {
    test('should store an entry once per key', async () => {
      const store = new StagingStore({ filePath });
      await store.initialize();

      const first = await store.insertIfAbsent(makeEntry());
      const second = await store.insertIfAbsent(makeEntry({ conceptText: '  lora ', description: 'Other text' }));

      expect(first.inserted).toBe(true);
      expect(second.inserted).toBe(false);
      expect(second.entry.description).toBe('A parameter-efficient fine-tuning method');
      expect(store.count()).toBe(1);
    });

    test('should keep the same phrase from different sources apart', async () => {
      const store = new StagingStore();
      await store.insertIfAbsent(makeEntry({ source: 'chapter-1' }));
      await store.insertIfAbsent(makeEntry({ source: 'chapter-2' }));

      expect(store.count()).toBe(2);
      expect(store.has('LORA', 'chapter-2')).toBe(true);
    });

    test('should reload persisted entries', async () => {
      const store = new StagingStore({ filePath });
      await store.initialize();
      await store.insertIfAbsent(makeEntry({ conceptText: 'QLoRA', createdAt: '2024-03-01T12:00:01.000Z' }));
      await store.insertIfAbsent(makeEntry());

      const reloaded = new StagingStore({ filePath });
      const result = await reloaded.initialize();

      expect(result.success).toBe(true);
      expect(reloaded.list().map(entry => entry.conceptText)).toEqual(['LoRA', 'QLoRA']);
      expect(reloaded.get('qlora', 'chapter-1')?.embedding).toHaveLength(64);
    });
  });

  describe('Similarity', () => {
    test('should return entries within the similarity band, closest first', async () => {
      const store = new StagingStore();
      await store.insertIfAbsent(makeEntry({ conceptText: 'A', embedding: Array.from(vec(1)) }));
      await store.insertIfAbsent(makeEntry({ conceptText: 'B', embedding: Array.from(vec(0, 1)) }));
      await store.insertIfAbsent(makeEntry({ conceptText: 'C', embedding: Array.from(vec(1, 1)) }));

      const similar = store.findSimilar(Array.from(vec(1)), 0.5);

      expect(similar.map(match => match.entry.conceptText)).toEqual(['A', 'C']);
      expect(similar[0].similarity).toBeCloseTo(1);
    });
  });

  describe('Deletion', () => {
    test('should compact the log when entries are removed', async () => {
      const store = new StagingStore({ filePath });
      await store.initialize();
      await store.insertIfAbsent(makeEntry({ conceptText: 'A' }));
      await store.insertIfAbsent(makeEntry({ conceptText: 'B' }));

      const removed = await store.deleteMany([stagingKey('A', 'chapter-1'), stagingKey('missing', 'chapter-1')]);

      expect(removed).toBe(1);
      const lines = (await readFile(filePath, 'utf-8')).trim().split('\n');
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0]).data.conceptText).toBe('B');
    });

    test('should discard a single entry by phrase and source', async () => {
      const store = new StagingStore();
      await store.insertIfAbsent(makeEntry());

      expect(await store.discard('lora', 'chapter-1')).toBe(true);
      expect(await store.discard('lora', 'chapter-1')).toBe(false);
      expect(store.count()).toBe(0);
    });
  });

  describe('Rejections', () => {
    const keys = [stagingKey('A', 'chapter-1'), stagingKey('B', 'chapter-1')];

    test('should count repeated sightings of a rejected membership', async () => {
      const store = new StagingStore({ filePath });
      await store.initialize();

      await store.recordRejection(keys, 'different ideas', new Date('2024-03-01T12:00:00.000Z'));
      const again = await store.recordRejection([...keys].reverse(), 'ignored', new Date('2024-03-02T12:00:00.000Z'));

      expect(again).toEqual({
        fingerprint: clusterFingerprint(keys),
        memberKeys: [...keys].sort(),
        reason: 'different ideas',
        firstRejectedAt: '2024-03-01T12:00:00.000Z',
        lastSeenAt: '2024-03-02T12:00:00.000Z',
        timesSeen: 2
      });

      const reloaded = new StagingStore({ filePath });
      await reloaded.initialize();
      expect(reloaded.getRejection(keys)?.timesSeen).toBe(2);
    });

    test('should rewrite the log once enough rejection lines are superseded', async () => {
      const store = new StagingStore({ filePath, compactAfter: 2 });
      await store.initialize();
      await store.insertIfAbsent(makeEntry({ conceptText: 'A' }));
      await store.insertIfAbsent(makeEntry({ conceptText: 'B' }));

      await store.recordRejection(keys, 'different ideas', new Date('2024-03-01T12:00:00.000Z'));
      await store.recordRejection(keys, 'different ideas', new Date('2024-03-02T12:00:00.000Z'));
      expect((await readFile(filePath, 'utf-8')).trim().split('\n')).toHaveLength(4);

      await store.recordRejection(keys, 'different ideas', new Date('2024-03-03T12:00:00.000Z'));

      const lines = (await readFile(filePath, 'utf-8')).trim().split('\n').map(line => JSON.parse(line));
      expect(lines.map(line => line.type)).toEqual(['entry', 'entry', 'rejection']);
      expect(lines[2].data).toMatchObject({ timesSeen: 3, lastSeenAt: '2024-03-03T12:00:00.000Z' });

      const reloaded = new StagingStore({ filePath });
      await reloaded.initialize();
      expect(reloaded.getRejection(keys)?.timesSeen).toBe(3);
      expect(reloaded.count()).toBe(2);
    });

    test('should drop rejections that mention a removed entry', async () => {
      const store = new StagingStore();
      await store.insertIfAbsent(makeEntry({ conceptText: 'A' }));
      await store.insertIfAbsent(makeEntry({ conceptText: 'B' }));
      await store.recordRejection(keys, 'different ideas', new Date('2024-03-01T12:00:00.000Z'));

      await store.discard('A', 'chapter-1');

      expect(store.listRejections()).toEqual([]);
    });
  });
});
