/**
 * Ingestion Pipeline
 *
 * Runs one batch of mentions through retrieval, resolution and staging, runs
 * promotion cycles on a fixed cadence and builds co-occurrence relations at
 * the end of the batch. The store lock is held for the whole batch, so a Sync
 * cannot interleave with it.
 *
 * Key points:
 * - Mentions already staged under the same key skip the oracle entirely
 * - Retrieval and resolution run in parallel within a chunk; staging writes
 *   are applied in input order
 * - A failed mention is reported and the batch continues
 * - Aborting stops between chunks; everything written so far stays
 */

import type { BatchSummary, Mention, MatchResolution, MentionFailure, StagedEntry } from '../core/types.js';
import type { ClusterDetector } from '../clustering/cluster-detector.js';
import type { ClusterValidator, ValidationOutcome } from '../clustering/cluster-validator.js';
import type { CommitResult, OntologyCommitter } from '../ontology/ontology-committer.js';
import type { GroupResolution, RelationBuilder } from '../ontology/relation-builder.js';
import type { CandidateRetriever, RetrievalResult } from '../resolution/candidate-retriever.js';
import type { MatchResolver } from '../resolution/match-resolver.js';
import { clusterFingerprint, stagingKey, type StagingStore } from '../storage/staging-store.js';
import type { StoreLock } from '../storage/store-lock.js';
import { assertFlushed } from '../storage/flush.js';
import type { GraphStore, VectorStore } from '../storage/types.js';
import { ErrorCategory, ErrorHandler, ErrorSeverity, toError } from '../utils/error-handler.js';
import { PipelineError, SyncConflict } from '../utils/errors.js';

export interface IngestionPipelineConfig {
  /** Mentions resolved in parallel */
  concurrency: number;
  /** Newly staged entries between promotion cycles */
  checkEvery: number;
}

export interface PipelineComponents {
  retriever: CandidateRetriever;
  resolver: MatchResolver;
  staging: StagingStore;
  detector: ClusterDetector;
  validator: ClusterValidator;
  committer: OntologyCommitter;
  relations: RelationBuilder;
  graph: GraphStore;
  vectors: VectorStore;
  lock: StoreLock;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface PromotedCluster {
  commit: CommitResult;
  memberKeys: string[];
}

export interface PromotionCycleResult {
  promoted: PromotedCluster[];
  rejected: number;
  /** Clusters whose validation or commit failed; members stay staged */
  failed: number;
  /** Representative ids that are already authoritative */
  conflicts: string[];
}

type MentionOutcome =
  | { kind: 'resolved'; mention: Mention; retrieval: RetrievalResult; resolution: MatchResolution }
  | { kind: 'failed'; mention: Mention; error: Error };

export class IngestionPipeline {
  private config: IngestionPipelineConfig;
  // Memberships that hit a conflict in the current batch; not validated again
  private conflictedClusters = new Set<string>();

  constructor(
    private readonly components: PipelineComponents,
    config: Partial<IngestionPipelineConfig> = {},
    private readonly clock: () => Date = () => new Date()
  ) {
    this.config = {
      concurrency: Math.max(1, config.concurrency ?? 1),
      checkEvery: Math.max(1, config.checkEvery ?? 3)
    };
  }

  async runBatch(mentions: readonly Mention[], options: RunOptions = {}): Promise<BatchSummary> {
    return this.components.lock.withLock('ingest', () => this.processBatch(mentions, options));
  }

  /**
   * Detect, validate and commit clusters in the staging store. Callers outside
   * a batch must hold the store lock.
   */
  async runPromotionCycle(): Promise<PromotionCycleResult> {
    const { staging, detector, validator, committer } = this.components;
    const result: PromotionCycleResult = { promoted: [], rejected: 0, failed: 0, conflicts: [] };

    const candidates = detector.detect(staging.list());
    if (candidates.length > 0) {
      console.log(`🔍 ${candidates.length} candidate cluster(s) found in ${staging.count()} staged entries`);
    }

    for (const candidate of candidates) {
      const fingerprint = clusterFingerprint(candidate.memberKeys);
      if (this.conflictedClusters.has(fingerprint)) continue;

      let outcome: ValidationOutcome;
      try {
        outcome = await validator.validate(candidate);
      } catch (error) {
        this.report(ErrorCategory.CLUSTERING, 'Cluster validation failed; members stay staged', error, {
          members: candidate.members.map(m => m.conceptText)
        });
        result.failed++;
        continue;
      }

      if (!outcome.cluster.validated) {
        if (!outcome.skipped) result.rejected++;
        continue;
      }

      try {
        const commit = await committer.commit(outcome.cluster);
        result.promoted.push({ commit, memberKeys: candidate.memberKeys });
      } catch (error) {
        if (error instanceof SyncConflict) {
          result.conflicts.push(...error.conceptIds);
          this.conflictedClusters.add(fingerprint);
        }
        this.report(ErrorCategory.COMMIT, 'Cluster promotion failed; members stay staged', error, {
          representative: outcome.cluster.representativePhrase
        });
        result.failed++;
      }
    }

    return result;
  }

  private async processBatch(mentions: readonly Mention[], options: RunOptions): Promise<BatchSummary> {
    const startTime = Date.now();
    const { staging, relations, graph, vectors, validator } = this.components;
    const summary = emptySummary(mentions.length);

    // Staging keys seen in this batch, with the groups they appeared in
    const batchKeys = new Map<string, Set<string>>();
    const resolutions: GroupResolution[] = [];
    let stagedSinceCheck = 0;

    validator.startRun();
    this.conflictedClusters.clear();
    console.log(`🔄 Processing batch of ${mentions.length} mentions (concurrency ${this.config.concurrency})`);

    for (let offset = 0; offset < mentions.length; offset += this.config.concurrency) {
      if (options.signal?.aborted) {
        console.warn(`⚠️ Batch aborted after ${offset} of ${mentions.length} mentions`);
        summary.aborted = true;
        break;
      }

      const chunk = mentions.slice(offset, offset + this.config.concurrency);
      const pending: Mention[] = [];

      for (const mention of chunk) {
        const key = stagingKey(mention.conceptText, mention.source);
        if (staging.has(mention.conceptText, mention.source)) {
          summary.duplicates++;
          noteKey(batchKeys, key, mention.groupId);
        } else {
          pending.push(mention);
        }
      }

      const outcomes = await Promise.all(pending.map(mention => this.resolveMention(mention)));

      for (const outcome of outcomes) {
        const { mention } = outcome;

        if (outcome.kind === 'failed') {
          summary.failed++;
          summary.failures.push(toFailure(mention, outcome.error));
          this.report(categoryOf(outcome.error), `Mention "${mention.conceptText}" failed; retry in a later batch`, outcome.error, {
            source: mention.source
          });
          continue;
        }

        if (outcome.resolution.kind === 'matched') {
          summary.matched++;
          resolutions.push({ groupId: mention.groupId, conceptId: outcome.resolution.conceptId });
          continue;
        }

        try {
          const { inserted } = await staging.insertIfAbsent(
            this.toStagedEntry(mention, outcome.retrieval, outcome.resolution)
          );
          noteKey(batchKeys, stagingKey(mention.conceptText, mention.source), mention.groupId);
          if (inserted) {
            summary.staged++;
            stagedSinceCheck++;
          } else {
            summary.duplicates++;
          }
        } catch (error) {
          summary.failed++;
          summary.failures.push(toFailure(mention, toError(error)));
          this.report(ErrorCategory.STAGING, `Could not stage "${mention.conceptText}"`, error, { source: mention.source });
        }
      }

      if (stagedSinceCheck >= this.config.checkEvery) {
        this.applyPromotions(await this.runPromotionCycle(), summary, batchKeys, resolutions);
        stagedSinceCheck = 0;
      }
    }

    if (!summary.aborted) {
      this.applyPromotions(await this.runPromotionCycle(), summary, batchKeys, resolutions);
    }

    const built = await relations.build(resolutions);
    summary.relationsUpdated = built.edgesUpdated;

    assertFlushed(await graph.flush(), 'graph store', relationError);
    assertFlushed(await vectors.flush(), 'vector index', relationError);

    summary.durationMs = Date.now() - startTime;
    logSummary(summary);
    return summary;
  }

  private async resolveMention(mention: Mention): Promise<MentionOutcome> {
    try {
      const retrieval = await this.components.retriever.retrieve(mention);
      const resolution = await this.components.resolver.resolve(mention, retrieval.candidates);
      return { kind: 'resolved', mention, retrieval, resolution };
    } catch (error) {
      return { kind: 'failed', mention, error: toError(error) };
    }
  }

  private toStagedEntry(mention: Mention, retrieval: RetrievalResult, resolution: MatchResolution): StagedEntry {
    return {
      conceptText: mention.conceptText.trim(),
      description: retrieval.description,
      source: mention.source.trim(),
      canonicalPhraseSummary: resolution.canonicalPhraseSummary,
      resolutionReason: resolution.reason,
      createdAt: this.clock().toISOString(),
      groupId: mention.groupId,
      metadata: { ...mention.metadata, groupTitle: mention.groupTitle },
      embedding: Array.from(retrieval.embedding)
    };
  }

  /**
   * Promoted concepts join the relation groups of their members from this batch
   */
  private applyPromotions(
    cycle: PromotionCycleResult,
    summary: BatchSummary,
    batchKeys: Map<string, Set<string>>,
    resolutions: GroupResolution[]
  ): void {
    summary.clustersRejected += cycle.rejected;
    summary.commitFailures += cycle.failed;
    for (const conceptId of cycle.conflicts) {
      if (!summary.conflicts.includes(conceptId)) summary.conflicts.push(conceptId);
    }

    for (const { commit, memberKeys } of cycle.promoted) {
      if (!summary.conceptsPromoted.includes(commit.conceptId)) {
        summary.conceptsPromoted.push(commit.conceptId);
      }
      for (const key of memberKeys) {
        const groups = batchKeys.get(key);
        if (!groups) continue;
        summary.promoted++;
        for (const groupId of groups) {
          resolutions.push({ groupId, conceptId: commit.conceptId });
        }
      }
    }
  }

  private report(category: ErrorCategory, message: string, error: unknown, context: Record<string, unknown>): void {
    ErrorHandler.handle(category, ErrorSeverity.MEDIUM, message, toError(error), context);
  }
}

function relationError(message: string): PipelineError {
  return new PipelineError(`${message} (after batch)`, ErrorCategory.RELATION);
}

function emptySummary(total: number): BatchSummary {
  return {
    total,
    matched: 0,
    staged: 0,
    duplicates: 0,
    promoted: 0,
    failed: 0,
    conceptsPromoted: [],
    clustersRejected: 0,
    commitFailures: 0,
    conflicts: [],
    relationsUpdated: 0,
    failures: [],
    aborted: false,
    durationMs: 0
  };
}

function noteKey(batchKeys: Map<string, Set<string>>, key: string, groupId: string): void {
  const groups = batchKeys.get(key) ?? new Set<string>();
  groups.add(groupId);
  batchKeys.set(key, groups);
}

function toFailure(mention: Mention, error: Error): MentionFailure {
  return {
    conceptText: mention.conceptText,
    source: mention.source,
    errorType: error.name,
    message: error.message
  };
}

function categoryOf(error: Error): ErrorCategory {
  return error instanceof PipelineError ? error.category : ErrorCategory.RETRIEVAL;
}

function logSummary(summary: BatchSummary): void {
  console.log(
    `📊 Batch ${summary.aborted ? 'aborted' : 'complete'}: ${summary.total} mentions, ${summary.matched} matched, ` +
      `${summary.staged} staged, ${summary.duplicates} duplicates, ${summary.promoted} promoted, ` +
      `${summary.failed} failed (${summary.durationMs}ms)`
  );
  if (summary.conceptsPromoted.length > 0) {
    console.log(`✅ Concepts staged for sync: ${summary.conceptsPromoted.join(', ')}`);
  }
  if (summary.conflicts.length > 0) {
    console.warn(`⚠️ Promotions blocked by authoritative concepts: ${summary.conflicts.join(', ')}`);
  }
}
