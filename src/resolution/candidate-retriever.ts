/**
 * Candidate retrieval for one mention
 *
 * Synthesizes a description of the mention in its context, embeds it and
 * searches the vector index across the authoritative and staged partitions,
 * so recently promoted concepts can absorb near-duplicates before they are
 * synced.
 */

import type { Candidate, Mention } from '../core/types.js';
import type { OracleClient } from '../oracle/oracle-client.js';
import type { VectorMatch, VectorStore } from '../storage/types.js';
import type { Embedder } from '../utils/embedding-service.js';
import { RetrievalUnavailable } from '../utils/errors.js';

export interface CandidateRetrieverConfig {
  /** Candidates kept per mention */
  topK: number;
  /** Taxonomy root; never offered as a match */
  rootConceptId: string;
  /** Characters of context used when the oracle returns no description */
  fallbackDescriptionChars: number;
}

export interface RetrievalResult {
  description: string;
  embedding: Float32Array;
  /** Most similar first; possibly empty */
  candidates: Candidate[];
}

export class CandidateRetriever {
  private config: CandidateRetrieverConfig;

  constructor(
    private readonly oracle: OracleClient,
    private readonly embedder: Embedder,
    private readonly vectors: VectorStore,
    config: Partial<CandidateRetrieverConfig> = {}
  ) {
    this.config = {
      topK: config.topK ?? 5,
      rootConceptId: config.rootConceptId ?? 'Concept',
      fallbackDescriptionChars: config.fallbackDescriptionChars ?? 500
    };
  }

  /**
   * Throws OracleFailure or RetrievalUnavailable; an empty candidate list
   * always means the search ran and found nothing.
   */
  async retrieve(mention: Mention): Promise<RetrievalResult> {
    const description = await this.describe(mention);

    let embedding: Float32Array;
    try {
      embedding = await this.embedder.embed(description);
    } catch (error) {
      if (error instanceof RetrievalUnavailable) throw error;
      throw new RetrievalUnavailable(
        `Embedding failed for "${mention.conceptText}": ${error instanceof Error ? error.message : 'Unknown embedding error'}`,
        { cause: error }
      );
    }

    let matches: VectorMatch[];
    try {
      // One extra slot in case the root is among the hits
      matches = await this.vectors.query(embedding, this.config.topK + 1, true);
    } catch (error) {
      throw new RetrievalUnavailable(
        `Vector index query failed: ${error instanceof Error ? error.message : 'Unknown index error'}`,
        { cause: error }
      );
    }

    const candidates = matches
      .filter(match => match.id !== this.config.rootConceptId)
      .slice(0, this.config.topK)
      .map(match => ({
        conceptId: match.id,
        description: match.metadata.description,
        similarity: match.similarity,
        partition: match.partition
      }));

    return { description, embedding, candidates };
  }

  private async describe(mention: Mention): Promise<string> {
    const synthesized = await this.oracle.describeMention(mention.conceptText, mention.chunkText);
    if (synthesized.length > 0) return synthesized;

    const fallback = mention.chunkText.slice(0, this.config.fallbackDescriptionChars).trim();
    return fallback.length > 0 ? fallback : mention.conceptText.trim();
  }
}
