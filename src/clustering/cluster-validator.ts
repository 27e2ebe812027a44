/**
 * Oracle validation of candidate clusters
 *
 * One oracle call per cluster decides whether the members differ only in
 * phrasing, picks the representative summary and writes the unified
 * description. Rejected memberships are remembered in the staging store and
 * are not sent to the oracle again until the membership changes.
 */

import type { Cluster, StagedEntry } from '../core/types.js';
import type { OracleClient } from '../oracle/oracle-client.js';
import type { ClusterRejection } from '../storage/records.js';
import { normalizePhrase, type StagingStore } from '../storage/staging-store.js';
import { summarizeNounPhrase } from '../utils/noun-phrase.js';
import type { CandidateCluster } from './cluster-detector.js';

export interface ClusterValidatorConfig {
  /** Runs a rejected membership may be seen before it is surfaced as a warning */
  ambiguityWarnAfter: number;
}

export interface ValidationOutcome {
  cluster: Cluster;
  /** True when a stored rejection was reused instead of asking the oracle */
  skipped: boolean;
  rejection?: ClusterRejection;
}

export class ClusterValidator {
  private config: ClusterValidatorConfig;
  private seenThisRun = new Set<string>();

  constructor(
    private readonly oracle: OracleClient,
    private readonly staging: StagingStore,
    config: Partial<ClusterValidatorConfig> = {},
    private readonly clock: () => Date = () => new Date()
  ) {
    this.config = {
      ambiguityWarnAfter: config.ambiguityWarnAfter ?? 3
    };
  }

  /**
   * Start counting rejection sightings for a new ingestion run
   */
  startRun(): void {
    this.seenThisRun.clear();
  }

  async validate(candidate: CandidateCluster): Promise<ValidationOutcome> {
    const previous = this.staging.getRejection(candidate.memberKeys);
    if (previous) {
      const rejection = this.seenThisRun.has(previous.fingerprint)
        ? previous
        : await this.noteRejection(candidate, previous.reason);
      return {
        cluster: this.toCluster(candidate, '', '', false, `previously rejected: ${previous.reason}`),
        skipped: true,
        rejection
      };
    }

    const result = await this.oracle.validateCluster(
      candidate.members.map(member => ({
        conceptText: member.conceptText,
        canonicalPhraseSummary: member.canonicalPhraseSummary,
        description: member.description,
        source: member.source
      }))
    );

    if (!result.accepted) {
      console.log(`⚠️ Cluster of ${candidate.members.length} rejected: ${result.reason}`);
      const rejection = await this.noteRejection(candidate, result.reason);
      return {
        cluster: this.toCluster(candidate, result.representative_phrase.trim(), '', false, result.reason),
        skipped: false,
        rejection
      };
    }

    const representative = pickRepresentative(result.representative_phrase, candidate.members);
    console.log(`✅ Cluster of ${candidate.members.length} accepted as "${representative}"`);

    return {
      cluster: this.toCluster(candidate, representative, result.unified_description.trim(), true, result.reason),
      skipped: false
    };
  }

  private async noteRejection(candidate: CandidateCluster, reason: string): Promise<ClusterRejection> {
    const rejection = await this.staging.recordRejection(candidate.memberKeys, reason, this.clock());
    this.seenThisRun.add(rejection.fingerprint);

    if (rejection.timesSeen >= this.config.ambiguityWarnAfter) {
      console.warn(
        `⚠️ Cluster [${candidate.members.map(m => m.conceptText).join(', ')}] has stayed ambiguous for ` +
          `${rejection.timesSeen} runs (${reason}); review or discard its entries`
      );
    }
    return rejection;
  }

  private toCluster(
    candidate: CandidateCluster,
    representativePhrase: string,
    unifiedDescription: string,
    validated: boolean,
    reason: string
  ): Cluster {
    return {
      members: candidate.members,
      representativePhrase,
      unifiedDescription,
      validated,
      reason,
      cohesion: candidate.cohesion
    };
  }
}

/**
 * The member summary the oracle named, or the oldest member's summary when it
 * named none of them
 */
export function pickRepresentative(phrase: string, members: readonly StagedEntry[]): string {
  const wanted = normalizePhrase(phrase);
  const match = members.find(m => normalizePhrase(m.canonicalPhraseSummary) === wanted);
  if (match && wanted.length > 0) return match.canonicalPhraseSummary.trim();

  const oldest = members[0];
  return oldest.canonicalPhraseSummary.trim() || summarizeNounPhrase(oldest.conceptText);
}
