/**
 * Sync/Consistency Manager
 *
 * Operator-invoked merge of staged data into the authoritative partitions.
 * Replays the unsynced promotion manifest entries like a write-ahead log:
 * each staged concept moves to the authoritative graph partition and its
 * vector to the authoritative index partition, then the entry is marked
 * synced. Stores are flushed before the manifest is updated, so an
 * interrupted run is finished by the next one.
 */

import type { Concept, PromotionManifestEntry, SyncReport, SyncVerification } from '../core/types.js';
import type { PromotionManifest } from '../storage/promotion-manifest.js';
import type { StoreLock } from '../storage/store-lock.js';
import { assertFlushed } from '../storage/flush.js';
import type { GraphStore, VectorStore } from '../storage/types.js';
import type { Embedder } from '../utils/embedding-service.js';
import { ErrorCategory, ErrorHandler, ErrorSeverity } from '../utils/error-handler.js';
import { PipelineError } from '../utils/errors.js';
import type { BackupManager } from './backup-manager.js';

export interface SyncOptions {
  /** Skip the pre-sync backup. Operator's responsibility. */
  skipBackup?: boolean;
}

export interface SyncDependencies {
  graph: GraphStore;
  vectors: VectorStore;
  manifest: PromotionManifest;
  embedder: Embedder;
  backups: BackupManager;
  lock: StoreLock;
}

type EntryOutcome = 'merged' | 'already-synced' | 'conflict';

export class SyncManager {
  constructor(
    private readonly deps: SyncDependencies,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Throws BackupFailure (nothing merged) or StoreLocked. Conflicts are
   * reported, never overwritten.
   */
  async sync(options: SyncOptions = {}): Promise<SyncReport> {
    return this.deps.lock.withLock('sync', () => this.runSync(options));
  }

  /**
   * Ids present in only one of the authoritative graph and vector partitions
   */
  async verify(): Promise<SyncVerification> {
    const graphIds = new Set((await this.deps.graph.listConcepts('authoritative')).map(c => c.conceptId));
    const vectorIds = new Set(await this.deps.vectors.listIds('authoritative'));

    const missingInVector = [...graphIds].filter(id => !vectorIds.has(id)).sort();
    const extraInVector = [...vectorIds].filter(id => !graphIds.has(id)).sort();

    return {
      graphCount: graphIds.size,
      vectorCount: vectorIds.size,
      missingInVector,
      extraInVector,
      consistent: missingInVector.length === 0 && extraInVector.length === 0
    };
  }

  private async runSync(options: SyncOptions): Promise<SyncReport> {
    const { manifest, backups } = this.deps;
    console.log('🔄 Starting sync...');

    const backupRecords = options.skipBackup ? [] : await backups.backupAll();
    if (options.skipBackup) {
      console.warn('⚠️ Sync running without a backup');
    }

    const report: SyncReport = {
      backups: backupRecords,
      merged: [],
      alreadySynced: [],
      conflicts: [],
      vectorsPopulated: [],
      verification: { graphCount: 0, vectorCount: 0, missingInVector: [], extraInVector: [], consistent: true }
    };
    const synced: string[] = [];
    const syncedAt = this.clock();

    for (const entry of manifest.listUnsynced()) {
      const conceptId = entry.clusterRepresentative;
      const outcome = await this.mergeEntry(entry, syncedAt);

      if (outcome === 'conflict') {
        if (!report.conflicts.includes(conceptId)) report.conflicts.push(conceptId);
        continue;
      }

      synced.push(entry.id);
      if (outcome === 'merged') {
        report.merged.push(conceptId);
      } else if (!report.merged.includes(conceptId) && !report.alreadySynced.includes(conceptId)) {
        report.alreadySynced.push(conceptId);
      }
    }

    report.vectorsPopulated = await this.populateVectors();

    if (report.merged.length > 0 || report.vectorsPopulated.length > 0 || synced.length > 0) {
      assertFlushed(await this.deps.graph.flush(), 'graph store', syncError);
      assertFlushed(await this.deps.vectors.flush(), 'vector index', syncError);
      await manifest.markSynced(synced, syncedAt);
    }

    if (report.conflicts.length > 0) {
      ErrorHandler.handle(
        ErrorCategory.SYNC,
        ErrorSeverity.HIGH,
        `Staged concept id(s) collide with authoritative concepts: ${report.conflicts.join(', ')}`,
        undefined,
        { conflicts: report.conflicts },
        'Merge or rename the colliding concepts manually, then run sync again'
      );
    }

    report.verification = await this.verify();
    if (!report.verification.consistent) {
      console.warn(
        `⚠️ Stores disagree: ${report.verification.missingInVector.length} missing from the vector index, ` +
          `${report.verification.extraInVector.length} extra`
      );
    }

    console.log(
      `✅ Sync complete: ${report.merged.length} merged, ${report.alreadySynced.length} already synced, ` +
        `${report.conflicts.length} conflicts, ${report.vectorsPopulated.length} vectors populated`
    );
    return report;
  }

  private async mergeEntry(entry: PromotionManifestEntry, syncedAt: Date): Promise<EntryOutcome> {
    const { graph, vectors, embedder } = this.deps;
    const conceptId = entry.clusterRepresentative;

    const authoritative = await graph.getConcept(conceptId, 'authoritative');
    if (authoritative) {
      if (!producedBy(authoritative, entry.id)) return 'conflict';

      // An interrupted run may have left staged copies behind
      await graph.removeConcept(conceptId, 'staged');
      await vectors.remove(conceptId, 'staged');
      return 'already-synced';
    }

    const staged = await graph.getStagedConcept(conceptId);
    if (!staged) {
      console.warn(`⚠️ Manifest entry ${entry.id} names "${conceptId}" but no staged concept exists`);
      return 'conflict';
    }

    const concept: Concept = {
      conceptId: staged.conceptId,
      label: staged.label,
      description: staged.description,
      parentConceptId: staged.parentConceptId,
      contributors: staged.contributors,
      createdAt: staged.createdAt,
      metadata: {
        ...staged.metadata,
        stagedAt: staged.stagedAt,
        sourceMentions: staged.sourceMentions,
        promotionReason: staged.promotionReason,
        manifestEntryIds: staged.manifestEntryIds,
        syncedAt: syncedAt.toISOString()
      }
    };

    const stagedVector = await vectors.get(conceptId, 'staged');
    const embedding = stagedVector?.embedding ?? (await embedder.embed(concept.description));

    await graph.putAuthoritativeConcept(concept);
    await vectors.upsert(
      conceptId,
      embedding,
      { label: concept.label, description: concept.description, parentConceptId: concept.parentConceptId },
      'authoritative'
    );
    await vectors.remove(conceptId, 'staged');
    await graph.removeConcept(conceptId, 'staged');

    console.log(`✅ Merged "${conceptId}" into the authoritative stores`);
    return 'merged';
  }

  /**
   * Embed authoritative concepts the vector index does not know yet
   */
  private async populateVectors(): Promise<string[]> {
    const { graph, vectors, embedder } = this.deps;
    const indexed = new Set(await vectors.listIds('authoritative'));
    const missing = (await graph.listConcepts('authoritative')).filter(c => !indexed.has(c.conceptId));

    if (missing.length > 0) {
      console.log(`🔍 Populating ${missing.length} vectors from the graph store`);
    }

    for (const concept of missing) {
      await vectors.upsert(
        concept.conceptId,
        await embedder.embed(concept.description || concept.label),
        { label: concept.label, description: concept.description, parentConceptId: concept.parentConceptId },
        'authoritative'
      );
    }

    return missing.map(c => c.conceptId);
  }
}

function producedBy(concept: Concept, manifestEntryId: string): boolean {
  const ids = concept.metadata.manifestEntryIds;
  return Array.isArray(ids) && ids.includes(manifestEntryId);
}

function syncError(message: string): PipelineError {
  return new PipelineError(message, ErrorCategory.SYNC);
}
