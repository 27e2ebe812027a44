/**
 * Operator HTTP API
 *
 * Read-mostly endpoints for inspecting the stores, plus the two operator
 * actions: discarding a staged entry and running a sync. Mutating routes take
 * the store lock and answer 409 while an ingestion run holds it.
 */

import { Hono, type Context } from 'hono';
import { z } from 'zod';
import type { Engine } from '../engine.js';
import { BackupFailure, StoreLocked } from '../utils/errors.js';

const DiscardRequestSchema = z.object({
  conceptText: z.string().trim().min(1),
  source: z.string().trim().min(1)
});

const SyncRequestSchema = z.object({
  skipBackup: z.boolean().optional()
});

export function createApi(engine: Engine): Hono {
  const app = new Hono();
  const { stores, detector, backups, sync } = engine;

  /**
   * GET /api/health
   */
  app.get('/api/health', c => {
    return c.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'concept-graph-ingest'
    });
  });

  /**
   * GET /api/status
   * Partition sizes of every store
   */
  app.get('/api/status', async c => {
    const manifestEntries = stores.manifest.list();
    return c.json({
      graph: {
        authoritative: await stores.graph.getMetrics('authoritative'),
        staged: await stores.graph.getMetrics('staged')
      },
      vectors: {
        authoritative: await stores.vectors.count('authoritative'),
        staged: await stores.vectors.count('staged')
      },
      staging: {
        entries: stores.staging.count(),
        rejectedClusters: stores.staging.listRejections().length
      },
      manifest: {
        entries: manifestEntries.length,
        unsynced: stores.manifest.listUnsynced().length
      },
      locked: stores.lock.isHeld()
    });
  });

  /**
   * GET /api/staging
   * Staged entries without their embeddings, and remembered rejections
   */
  app.get('/api/staging', c => {
    return c.json({
      entries: stores.staging.list().map(({ embedding: _embedding, ...entry }) => entry),
      rejections: stores.staging.listRejections()
    });
  });

  /**
   * DELETE /api/staging
   * Discard one staged entry: { conceptText, source }
   */
  app.delete('/api/staging', async c => {
    const parsed = DiscardRequestSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return c.json({ error: 'conceptText and source are required' }, 400);
    }

    try {
      const { conceptText, source } = parsed.data;
      const discarded = await stores.lock.withLock('discard', () => stores.staging.discard(conceptText, source));
      if (!discarded) {
        return c.json({ error: 'Staged entry not found' }, 404);
      }
      console.log(`🗑️ Discarded staged entry "${conceptText}" @ ${source}`);
      return c.json({ discarded: true });
    } catch (error) {
      return failure(c, error, 'Failed to discard staged entry');
    }
  });

  /**
   * GET /api/clusters
   * Similarity groups currently in the staging store
   */
  app.get('/api/clusters', c => {
    return c.json(detector.report(stores.staging.list()));
  });

  /**
   * GET /api/manifest?unsynced=true
   */
  app.get('/api/manifest', c => {
    const entries = c.req.query('unsynced') === 'true' ? stores.manifest.listUnsynced() : stores.manifest.list();
    return c.json({ entries });
  });

  /**
   * GET /api/concepts/:id
   * A concept from either partition with its relations and path to the root
   */
  app.get('/api/concepts/:id', async c => {
    const conceptId = c.req.param('id');
    const found = await stores.graph.findConcept(conceptId);
    if (!found) {
      return c.json({ error: 'Concept not found' }, 404);
    }

    return c.json({
      concept: found.concept,
      partition: found.partition,
      path: await stores.graph.pathToRoot(conceptId),
      children: (await stores.graph.getChildren(conceptId)).map(child => child.conceptId),
      relations: await stores.graph.listRelations(conceptId)
    });
  });

  /**
   * GET /api/backups
   */
  app.get('/api/backups', async c => {
    try {
      return c.json({
        graph: await backups.list('graph'),
        vector: await backups.list('vector')
      });
    } catch (error) {
      return failure(c, error, 'Failed to list backups');
    }
  });

  /**
   * POST /api/sync
   * Body: { skipBackup?: boolean }
   */
  app.post('/api/sync', async c => {
    const parsed = SyncRequestSchema.safeParse((await readJson(c)) ?? {});
    if (!parsed.success) {
      return c.json({ error: 'skipBackup must be a boolean' }, 400);
    }

    try {
      const report = await sync.sync({ skipBackup: parsed.data.skipBackup ?? false });
      return c.json(report);
    } catch (error) {
      return failure(c, error, 'Sync failed');
    }
  });

  /**
   * GET /api/verify
   */
  app.get('/api/verify', async c => {
    return c.json(await sync.verify());
  });

  return app;
}

/**
 * Parsed JSON body, or undefined for an empty or malformed one
 */
async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return undefined;
  }
}

function failure(c: Context, error: unknown, message: string) {
  const detail = error instanceof Error ? error.message : 'Unknown error';
  if (error instanceof StoreLocked) {
    return c.json({ error: 'Store is locked by another run', detail }, 409);
  }
  console.error(`❌ ${message}:`, detail);
  if (error instanceof BackupFailure) {
    return c.json({ error: 'Backup failed; sync aborted', detail }, 500);
  }
  return c.json({ error: message, detail }, 500);
}
