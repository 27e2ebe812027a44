/**
 * Cluster detection over the staging store
 *
 * Candidate clusters are groups of staged entries whose description
 * embeddings are pairwise similar at or above the threshold. Each entry seeds
 * one greedy clique: neighbours are added in descending similarity when they
 * clear the threshold against every current member. Overlapping candidates
 * are then resolved largest first, so every entry lands in at most one
 * cluster.
 */

import type { StagedEntry } from '../core/types.js';
import { clusterFingerprint, entryKey } from '../storage/staging-store.js';
import { VectorUtils } from '../utils/vector-utils.js';

export interface ClusterDetectorConfig {
  /** Minimum pairwise cosine similarity inside a cluster */
  similarityThreshold: number;
  /** Smallest cluster considered for promotion */
  minClusterSize: number;
}

export interface CandidateCluster {
  /** Oldest first */
  members: StagedEntry[];
  memberKeys: string[];
  /** Mean pairwise similarity */
  cohesion: number;
}

export interface ClusterCheckGroup {
  size: number;
  meetsMinimum: boolean;
  cohesion: number;
  /** `conceptText @ source`, oldest first */
  members: string[];
}

export interface ClusterCheckReport {
  stagedCount: number;
  similarityThreshold: number;
  minClusterSize: number;
  groups: ClusterCheckGroup[];
}

interface IndexedEntry {
  entry: StagedEntry;
  key: string;
}

export class ClusterDetector {
  private config: ClusterDetectorConfig;

  constructor(config: Partial<ClusterDetectorConfig> = {}) {
    this.config = {
      similarityThreshold: config.similarityThreshold ?? 0.7,
      minClusterSize: config.minClusterSize ?? 5
    };

    if (this.config.minClusterSize < 2) {
      throw new Error(`minClusterSize must be at least 2 (got ${this.config.minClusterSize})`);
    }
  }

  get minClusterSize(): number {
    return this.config.minClusterSize;
  }

  /**
   * Disjoint clusters of at least `minClusterSize` members, in processing order
   */
  detect(entries: readonly StagedEntry[]): CandidateCluster[] {
    return this.cluster(entries, this.config.minClusterSize);
  }

  /**
   * Every similarity group of two or more entries, flagged by whether it could
   * be promoted
   */
  report(entries: readonly StagedEntry[]): ClusterCheckReport {
    const groups = this.cluster(entries, 2).map(candidate => ({
      size: candidate.members.length,
      meetsMinimum: candidate.members.length >= this.config.minClusterSize,
      cohesion: candidate.cohesion,
      members: candidate.members.map(m => `${m.conceptText} @ ${m.source}`)
    }));

    return {
      stagedCount: entries.length,
      similarityThreshold: this.config.similarityThreshold,
      minClusterSize: this.config.minClusterSize,
      groups
    };
  }

  private cluster(entries: readonly StagedEntry[], minSize: number): CandidateCluster[] {
    const indexed = sortEntries(entries);
    if (indexed.length < minSize) return [];

    const similarity = this.similarityMatrix(indexed);
    const candidates = this.seedCliques(similarity, minSize);
    const resolved = resolveOverlaps(candidates, indexed, minSize);

    return resolved.map(indices => {
      const members = indices.map(i => indexed[i].entry);
      return {
        members,
        memberKeys: indices.map(i => indexed[i].key),
        cohesion: VectorUtils.meanPairwiseSimilarity(members.map(m => m.embedding))
      };
    });
  }

  private similarityMatrix(indexed: readonly IndexedEntry[]): number[][] {
    const n = indexed.length;
    const matrix = Array.from({ length: n }, () => new Array<number>(n).fill(0));

    for (let i = 0; i < n; i++) {
      matrix[i][i] = 1;
      for (let j = i + 1; j < n; j++) {
        const a = indexed[i].entry.embedding;
        const b = indexed[j].entry.embedding;
        // Entries embedded by a different model never cluster together
        const value = a.length === b.length && a.length > 0 ? VectorUtils.cosineSimilarity(a, b) : -1;
        matrix[i][j] = value;
        matrix[j][i] = value;
      }
    }

    return matrix;
  }

  private seedCliques(similarity: number[][], minSize: number): number[][] {
    const threshold = this.config.similarityThreshold;
    const seen = new Set<string>();
    const cliques: number[][] = [];

    for (let seed = 0; seed < similarity.length; seed++) {
      const neighbours = similarity[seed]
        .map((value, index) => ({ index, value }))
        .filter(n => n.index !== seed && n.value >= threshold)
        .sort((a, b) => b.value - a.value || a.index - b.index);

      if (neighbours.length + 1 < minSize) continue;

      const members = [seed];
      for (const { index } of neighbours) {
        if (members.every(m => similarity[index][m] >= threshold)) {
          members.push(index);
        }
      }

      if (members.length < minSize) continue;

      members.sort((a, b) => a - b);
      const signature = members.join(',');
      if (!seen.has(signature)) {
        seen.add(signature);
        cliques.push(members);
      }
    }

    return cliques;
  }
}

/**
 * Oldest first, then by key. Index order doubles as age order below.
 */
function sortEntries(entries: readonly StagedEntry[]): IndexedEntry[] {
  return entries
    .map(entry => ({ entry, key: entryKey(entry) }))
    .sort((a, b) => compare(a.entry.createdAt, b.entry.createdAt) || compare(a.key, b.key));
}

/**
 * Largest candidate first; ties go to the one holding the oldest entry, then
 * to the smaller fingerprint. The winner's members are removed from every
 * other candidate, and candidates that shrink below `minSize` are dropped.
 */
function resolveOverlaps(candidates: number[][], indexed: readonly IndexedEntry[], minSize: number): number[][] {
  let remaining = candidates.map(members => [...members]);
  const resolved: number[][] = [];
  const fingerprint = (members: number[]): string => clusterFingerprint(members.map(i => indexed[i].key));

  while (remaining.length > 0) {
    remaining.sort(
      (a, b) => b.length - a.length || a[0] - b[0] || compare(fingerprint(a), fingerprint(b))
    );

    const [winner, ...rest] = remaining;
    resolved.push(winner);
    const consumed = new Set(winner);

    const seen = new Set<string>();
    remaining = [];
    for (const candidate of rest) {
      const members = candidate.filter(i => !consumed.has(i));
      const signature = members.join(',');
      if (members.length >= minSize && !seen.has(signature)) {
        seen.add(signature);
        remaining.push(members);
      }
    }
  }

  return resolved;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
