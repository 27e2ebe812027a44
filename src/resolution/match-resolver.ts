import type { Candidate, MatchResolution, Mention } from '../core/types.js';
import type { OracleClient } from '../oracle/oracle-client.js';
import { summarizeNounPhrase } from '../utils/noun-phrase.js';

/**
 * Match-vs-new decision for one mention. The oracle client rejects any match
 * outside the candidate set, so a `matched` result always names a candidate.
 */
export class MatchResolver {
  constructor(private readonly oracle: OracleClient) {}

  async resolve(mention: Mention, candidates: readonly Candidate[]): Promise<MatchResolution> {
    const decision = await this.oracle.resolveMatch({
      conceptText: mention.conceptText,
      chunkText: mention.chunkText,
      groupTitle: mention.groupTitle,
      candidates
    });

    const summary = decision.canonical_phrase_summary.trim();

    if (decision.matched_concept_id !== null) {
      return {
        kind: 'matched',
        conceptId: decision.matched_concept_id,
        canonicalPhraseSummary: summary || decision.matched_concept_id,
        reason: decision.reason
      };
    }

    return {
      kind: 'new',
      canonicalPhraseSummary: summary || summarizeNounPhrase(mention.conceptText),
      reason: decision.reason
    };
  }
}
