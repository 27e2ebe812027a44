/**
 * Core type definitions for the concept graph ingestion engine
 *
 * Defines the records that flow through resolution, staging, promotion and
 * sync. Persisted records carry ISO-8601 strings for timestamps so that the
 * JSONL stores round-trip them without conversion.
 */

/**
 * The two partitions every store keeps apart. Ingestion only ever writes to
 * `staged`; only Sync writes to `authoritative`.
 */
export type Partition = 'authoritative' | 'staged';

export const PARTITIONS: readonly Partition[] = ['authoritative', 'staged'];

/**
 * One occurrence of a candidate concept phrase in a source document chunk
 */
export interface Mention {
  /** The extracted phrase as it appeared */
  conceptText: string;
  /** Source context the phrase was extracted from */
  chunkText: string;
  /** Groups co-occurring mentions (e.g. a section) */
  groupId: string;
  /** Title of the group, passed to the oracle as a hint */
  groupTitle: string;
  /** Provenance label; part of the staging key */
  source: string;
  /** Free-form fields carried through from the input record */
  metadata: Record<string, unknown>;
}

/**
 * A concept retrieved by similarity for a mention
 */
export interface Candidate {
  conceptId: string;
  description: string;
  /** Cosine similarity between the mention description and the concept */
  similarity: number;
  partition: Partition;
}

/**
 * A normalized node of the concept graph
 */
export interface Concept {
  /** The canonical phrase; unique within a partition */
  conceptId: string;
  label: string;
  description: string;
  parentConceptId: string | null;
  /** Sources that contributed mentions to this concept */
  contributors: string[];
  createdAt: string;
  metadata: Record<string, unknown>;
}

/**
 * A concept written by the Ontology Committer and awaiting Sync
 */
export interface StagedConcept extends Concept {
  stagedAt: string;
  /** Member mentions as `conceptText @ source` */
  sourceMentions: string[];
  promotionReason: string;
  /** Manifest entries that produced or extended this concept */
  manifestEntryIds: string[];
}

export type RelationType = 'related';

/**
 * Weighted co-occurrence edge. Created in both directions.
 */
export interface Relation {
  fromConceptId: string;
  toConceptId: string;
  relationType: RelationType;
  /** Number of observations; never decreases */
  weight: number;
  createdAt: string;
  lastReinforcedAt: string;
}

/**
 * An unmatched mention held in the Staging Store until its cluster is promoted
 */
export interface StagedEntry {
  conceptText: string;
  /** Synthesized description used for clustering */
  description: string;
  source: string;
  canonicalPhraseSummary: string;
  resolutionReason: string;
  createdAt: string;
  groupId: string;
  metadata: Record<string, unknown>;
  /** Embedding of `description` */
  embedding: number[];
}

/**
 * A group of staged entries judged (or about to be judged) to denote one concept
 */
export interface Cluster {
  members: StagedEntry[];
  representativePhrase: string;
  unifiedDescription: string;
  validated: boolean;
  reason: string;
  /** Mean pairwise cosine similarity of the members */
  cohesion: number;
}

/**
 * Reference to a staged mention inside a manifest entry
 */
export interface MentionRef {
  conceptText: string;
  source: string;
}

/**
 * Append-only audit record of one promotion, replayed by Sync
 */
export interface PromotionManifestEntry {
  id: string;
  clusterRepresentative: string;
  memberMentions: MentionRef[];
  parentConceptId: string;
  promotedAt: string;
  syncedAt?: string;
}

export type StoreKind = 'graph' | 'vector';

/**
 * A backup or snapshot file on disk
 */
export interface BackupRecord {
  path: string;
  createdAt: Date;
  storeKind: StoreKind;
}

/**
 * Outcome of resolving one mention
 */
export type MatchResolution =
  | { kind: 'matched'; conceptId: string; canonicalPhraseSummary: string; reason: string }
  | { kind: 'new'; canonicalPhraseSummary: string; reason: string };

/**
 * A mention that could not be processed in this batch
 */
export interface MentionFailure {
  conceptText: string;
  source: string;
  errorType: string;
  message: string;
}

/**
 * Batch-level report returned by the ingestion pipeline
 */
export interface BatchSummary {
  total: number;
  /** Mentions folded into an existing concept */
  matched: number;
  /** Mentions newly written to the Staging Store */
  staged: number;
  /** Mentions whose staging key already existed */
  duplicates: number;
  /** Mentions of this batch whose cluster was promoted */
  promoted: number;
  failed: number;
  conceptsPromoted: string[];
  clustersRejected: number;
  commitFailures: number;
  /** Promoted ids already authoritative; their members stay staged */
  conflicts: string[];
  relationsUpdated: number;
  failures: MentionFailure[];
  aborted: boolean;
  durationMs: number;
}

/**
 * Ids that differ between the graph store and the vector index
 */
export interface SyncVerification {
  graphCount: number;
  vectorCount: number;
  missingInVector: string[];
  extraInVector: string[];
  consistent: boolean;
}

/**
 * Result of one Sync run
 */
export interface SyncReport {
  backups: BackupRecord[];
  merged: string[];
  alreadySynced: string[];
  conflicts: string[];
  vectorsPopulated: string[];
  verification: SyncVerification;
}
