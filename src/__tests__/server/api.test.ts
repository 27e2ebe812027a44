import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import type { Hono } from 'hono';
import { createApi } from '../../server/api.js';
import { createTestEngine, makeEntry, makeStagedConcept, makeTempDir, removeTempDir, type TestEngine } from '../helpers.js';

describe('Operator API', () => {
  let dir: string;
  let ctx: TestEngine;
  let app: Hono;

  beforeEach(async () => {
    dir = await makeTempDir();
    ctx = await createTestEngine(dir);
    app = createApi(ctx.engine);
    await ctx.engine.stores.staging.insertIfAbsent(makeEntry());
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  test('should report health', async () => {
    const res = await app.request('/api/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'healthy', service: 'concept-graph-ingest' });
  });

  test('should report store sizes', async () => {
    const res = await app.request('/api/status');
    const body = await res.json();

    expect(body).toMatchObject({
      vectors: { authoritative: 0, staged: 0 },
      staging: { entries: 1, rejectedClusters: 0 },
      manifest: { entries: 0, unsynced: 0 },
      locked: false
    });
  });

  describe('Staging', () => {
    test('should list staged entries without embeddings', async () => {
      const body = await (await app.request('/api/staging')).json();

      expect(body.entries).toHaveLength(1);
      expect(body.entries[0].conceptText).toBe('LoRA');
      expect(body.entries[0].embedding).toBeUndefined();
    });

    test('should discard an entry', async () => {
      const res = await app.request('/api/staging', {
        method: 'DELETE',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ conceptText: 'lora', source: 'chapter-1' })
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ discarded: true });
      expect(ctx.engine.stores.staging.count()).toBe(0);
    });

    test('should answer 404 for an unknown entry and 400 for a bad body', async () => {
      const missing = await app.request('/api/staging', {
        method: 'DELETE',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ conceptText: 'RAG', source: 'chapter-1' })
      });
      const invalid = await app.request('/api/staging', { method: 'DELETE', body: 'nope' });

      expect(missing.status).toBe(404);
      expect(invalid.status).toBe(400);
    });

    test('should answer 409 while the store is locked', async () => {
      await ctx.engine.stores.lock.acquire('ingest');

      const res = await app.request('/api/staging', {
        method: 'DELETE',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ conceptText: 'LoRA', source: 'chapter-1' })
      });

      expect(res.status).toBe(409);
      expect(ctx.engine.stores.staging.count()).toBe(1);
    });
  });

  test('should return a concept with its path', async () => {
    await ctx.engine.stores.graph.putStagedConcept(makeStagedConcept());

    const res = await app.request(`/api/concepts/${encodeURIComponent('Low-Rank Adaptation')}`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ partition: 'staged', path: ['Low-Rank Adaptation', 'Concept'], children: [], relations: [] });
    expect((await app.request('/api/concepts/Unknown')).status).toBe(404);
  });

  test('should filter unsynced manifest entries', async () => {
    await ctx.engine.stores.manifest.append({
      id: 'entry-1', clusterRepresentative: 'X', memberMentions: [], parentConceptId: 'Concept', promotedAt: '2024-03-01T12:00:00.000Z'
    });
    await ctx.engine.stores.manifest.markSynced(['entry-1'], new Date('2024-03-02T00:00:00.000Z'));

    const all = await (await app.request('/api/manifest')).json();
    const unsynced = await (await app.request('/api/manifest?unsynced=true')).json();

    expect(all.entries).toHaveLength(1);
    expect(unsynced.entries).toEqual([]);
  });

  test('should run a sync and validate its body', async () => {
    const ok = await app.request('/api/sync', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ skipBackup: true })
    });
    const bad = await app.request('/api/sync', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ skipBackup: 'yes' })
    });

    expect(ok.status).toBe(200);
    expect(await ok.json()).toMatchObject({ merged: [], backups: [], verification: { consistent: true } });
    expect(bad.status).toBe(400);
  });

  test('should list backups and verify the stores', async () => {
    await ctx.engine.backups.backupGraph();

    const backups = await (await app.request('/api/backups')).json();
    const verification = await (await app.request('/api/verify')).json();

    expect(backups.graph).toHaveLength(1);
    expect(backups.vector).toEqual([]);
    expect(verification).toMatchObject({ consistent: true, graphCount: 0 });
  });

  test('should report clusters in the staging store', async () => {
    const body = await (await app.request('/api/clusters')).json();

    expect(body).toMatchObject({ stagedCount: 1, minClusterSize: 5, groups: [] });
  });
});
