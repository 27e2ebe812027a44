/**
 * Staging store for unmatched mentions
 *
 * Durable key space keyed by `(conceptText, source)`. Inserts are appended to
 * a JSONL log and never duplicate a key; deletions (after promotion or an
 * operator discard) compact the log by rewriting it. The store also remembers
 * cluster memberships the validator rejected, so an unchanged cluster is not
 * sent to the oracle again. Each sighting appends a superseding rejection line;
 * the log is rewritten once `compactAfter` lines are superseded.
 */

import type { StagedEntry } from '../core/types.js';
import { VectorUtils, type Vector } from '../utils/vector-utils.js';
import { appendJsonl, readJsonl, writeJsonlAtomic } from './jsonl-file.js';
import { StagingLineSchema, type ClusterRejection } from './records.js';
import type { StorageResult } from './types.js';

export interface StagingStoreConfig {
  /** JSONL log path; null keeps entries in memory only */
  filePath: string | null;
  /** Superseded rejection lines tolerated before the log is rewritten */
  compactAfter: number;
}

/**
 * Case and whitespace are not significant in a staged phrase
 */
export function normalizePhrase(phrase: string): string {
  return phrase.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function stagingKey(conceptText: string, source: string): string {
  return `${normalizePhrase(conceptText)}\u0000${source.trim()}`;
}

export function entryKey(entry: Pick<StagedEntry, 'conceptText' | 'source'>): string {
  return stagingKey(entry.conceptText, entry.source);
}

/**
 * Stable identity of a cluster membership
 */
export function clusterFingerprint(memberKeys: readonly string[]): string {
  return [...memberKeys].sort().join('\u0001');
}

export interface SimilarEntry {
  entry: StagedEntry;
  similarity: number;
}

export class StagingStore {
  private config: StagingStoreConfig;
  private entries = new Map<string, StagedEntry>();
  private rejections = new Map<string, ClusterRejection>();
  private initialized = false;
  private supersededLines = 0;

  constructor(config: Partial<StagingStoreConfig> = {}) {
    this.config = {
      filePath: config.filePath ?? null,
      compactAfter: Math.max(1, config.compactAfter ?? 100)
    };
  }

  async initialize(): Promise<StorageResult> {
    const startTime = Date.now();
    if (this.initialized || this.config.filePath === null) {
      this.initialized = true;
      return { success: true, count: this.entries.size, processingTime: 0 };
    }

    try {
      const lines = await readJsonl(this.config.filePath, StagingLineSchema);
      for (const line of lines) {
        if (line.type === 'entry') {
          const key = entryKey(line.data);
          if (!this.entries.has(key)) {
            this.entries.set(key, line.data);
          }
        } else {
          // Later rejection lines supersede earlier ones
          if (this.rejections.has(line.data.fingerprint)) this.supersededLines++;
          this.rejections.set(line.data.fingerprint, line.data);
        }
      }
      this.initialized = true;
      return { success: true, count: this.entries.size, processingTime: Date.now() - startTime };
    } catch (error) {
      return {
        success: false,
        count: 0,
        processingTime: Date.now() - startTime,
        errors: [error instanceof Error ? error.message : 'Unknown initialization error']
      };
    }
  }

  /**
   * Store the entry unless its key is already present. Durable once resolved.
   */
  async insertIfAbsent(entry: StagedEntry): Promise<{ inserted: boolean; entry: StagedEntry }> {
    const key = entryKey(entry);
    const existing = this.entries.get(key);
    if (existing) {
      return { inserted: false, entry: existing };
    }

    const stored: StagedEntry = { ...entry, embedding: [...entry.embedding], metadata: { ...entry.metadata } };
    if (this.config.filePath !== null) {
      await appendJsonl(this.config.filePath, [{ type: 'entry', data: stored }]);
    }
    this.entries.set(key, stored);
    return { inserted: true, entry: stored };
  }

  has(conceptText: string, source: string): boolean {
    return this.entries.has(stagingKey(conceptText, source));
  }

  get(conceptText: string, source: string): StagedEntry | undefined {
    return this.entries.get(stagingKey(conceptText, source));
  }

  /**
   * Entries ordered by creation time, then key
   */
  list(): StagedEntry[] {
    return [...this.entries.entries()]
      .sort(([keyA, a], [keyB, b]) => compare(a.createdAt, b.createdAt) || compare(keyA, keyB))
      .map(([, entry]) => entry);
  }

  count(): number {
    return this.entries.size;
  }

  /**
   * Entries whose description embedding is within the similarity band of `embedding`
   */
  findSimilar(embedding: Vector, minSimilarity: number): SimilarEntry[] {
    const matches: SimilarEntry[] = [];
    for (const entry of this.list()) {
      if (entry.embedding.length !== embedding.length) continue;
      const similarity = VectorUtils.cosineSimilarity(embedding, entry.embedding);
      if (similarity >= minSimilarity) {
        matches.push({ entry, similarity });
      }
    }
    return matches.sort((a, b) => b.similarity - a.similarity);
  }

  /**
   * Remove a promoted cluster's members
   */
  async deleteMany(keys: readonly string[]): Promise<number> {
    const present = keys.filter(key => this.entries.has(key));
    if (present.length === 0) return 0;

    const remaining = new Map(this.entries);
    for (const key of present) {
      remaining.delete(key);
    }

    await this.persistAll(remaining, this.rejections);
    this.entries = remaining;
    return present.length;
  }

  /**
   * Manual operator discard of a single entry
   */
  async discard(conceptText: string, source: string): Promise<boolean> {
    return (await this.deleteMany([stagingKey(conceptText, source)])) === 1;
  }

  getRejection(memberKeys: readonly string[]): ClusterRejection | undefined {
    return this.rejections.get(clusterFingerprint(memberKeys));
  }

  listRejections(): ClusterRejection[] {
    return [...this.rejections.values()];
  }

  /**
   * Record a rejected membership, or count another sighting of one
   */
  async recordRejection(memberKeys: readonly string[], reason: string, at: Date): Promise<ClusterRejection> {
    const fingerprint = clusterFingerprint(memberKeys);
    const previous = this.rejections.get(fingerprint);
    const timestamp = at.toISOString();

    const rejection: ClusterRejection = previous
      ? { ...previous, lastSeenAt: timestamp, timesSeen: previous.timesSeen + 1 }
      : {
          fingerprint,
          memberKeys: [...memberKeys].sort(),
          reason,
          firstRejectedAt: timestamp,
          lastSeenAt: timestamp,
          timesSeen: 1
        };

    if (this.config.filePath !== null) {
      await appendJsonl(this.config.filePath, [{ type: 'rejection', data: rejection }]);
    }
    this.rejections.set(fingerprint, rejection);

    if (previous) this.supersededLines++;
    if (this.supersededLines >= this.config.compactAfter) {
      await this.persistAll(this.entries, this.rejections);
    }
    return rejection;
  }

  private async persistAll(entries: Map<string, StagedEntry>, rejections: Map<string, ClusterRejection>): Promise<void> {
    // Rejections that mention a removed entry can never match again
    const liveRejections = [...rejections.values()].filter(r => r.memberKeys.every(key => entries.has(key)));

    if (this.config.filePath !== null) {
      await writeJsonlAtomic(this.config.filePath, [
        ...[...entries.values()].map(data => ({ type: 'entry', data })),
        ...liveRejections.map(data => ({ type: 'rejection', data }))
      ]);
    }

    this.rejections = new Map(liveRejections.map(r => [r.fingerprint, r]));
    this.supersededLines = 0;
  }
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
