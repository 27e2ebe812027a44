/**
 * Oracle client
 *
 * Contract wrapper around the external text-understanding capability. Every
 * response is re-validated against its schema and, where the caller needs it,
 * an acceptance check; violations are retried with exponential backoff and
 * surface as OracleFailure once the attempts are spent.
 */

import type { Candidate } from '../core/types.js';
import { ErrorCategory, ErrorHandler } from '../utils/error-handler.js';
import { OracleFailure } from '../utils/errors.js';
import {
  chooseParentPrompt,
  describeMentionPrompt,
  resolveMatchPrompt,
  validateClusterPrompt,
  type ClusterMemberView,
  type ParentOption
} from './prompts.js';
import {
  ClusterValidationSchema,
  DescriptionSchema,
  MatchDecisionSchema,
  ParentDecisionSchema,
  type ClusterValidation,
  type MatchDecision,
  type OracleBackend,
  type OracleRequest
} from './schemas.js';

export interface OracleClientConfig {
  /** Attempts per call, including the first */
  maxAttempts: number;
  /** Backoff before the second attempt; doubles after that */
  retryBaseDelayMs: number;
  /** Context passed to the oracle is cut to this many characters */
  chunkCharLimit: number;
}

export interface ResolveMatchInput {
  conceptText: string;
  chunkText: string;
  groupTitle: string;
  candidates: readonly Candidate[];
}

export interface ChooseParentInput {
  phrase: string;
  description: string;
  options: readonly ParentOption[];
}

/** Returns a problem description, or null when the value is acceptable */
type Acceptance<T> = (value: T) => string | null;

export class OracleClient {
  private config: OracleClientConfig;

  constructor(private readonly backend: OracleBackend, config: Partial<OracleClientConfig> = {}) {
    this.config = {
      maxAttempts: config.maxAttempts ?? 3,
      retryBaseDelayMs: config.retryBaseDelayMs ?? 1000,
      chunkCharLimit: config.chunkCharLimit ?? 2000
    };
  }

  async describeMention(conceptText: string, chunkText: string): Promise<string> {
    const { system, prompt } = describeMentionPrompt(conceptText, chunkText, this.config.chunkCharLimit);
    const result = await this.call({ task: 'describe-mention', system, prompt, schema: DescriptionSchema });
    return result.description.trim();
  }

  /**
   * A matched id outside the candidate set is a contract violation and is retried
   */
  async resolveMatch(input: ResolveMatchInput): Promise<MatchDecision> {
    const { system, prompt } = resolveMatchPrompt(
      input.conceptText,
      input.chunkText,
      input.groupTitle,
      input.candidates,
      this.config.chunkCharLimit
    );
    const candidateIds = new Set(input.candidates.map(c => c.conceptId));

    return this.call({ task: 'resolve-match', system, prompt, schema: MatchDecisionSchema }, decision =>
      decision.matched_concept_id !== null && !candidateIds.has(decision.matched_concept_id)
        ? `matched_concept_id "${decision.matched_concept_id}" is not a candidate`
        : null
    );
  }

  async validateCluster(members: readonly ClusterMemberView[]): Promise<ClusterValidation> {
    const { system, prompt } = validateClusterPrompt(members);
    return this.call({ task: 'validate-cluster', system, prompt, schema: ClusterValidationSchema });
  }

  /**
   * Returns the chosen id, or null. Unknown ids are left for the caller to map.
   */
  async chooseParent(input: ChooseParentInput): Promise<string | null> {
    const { system, prompt } = chooseParentPrompt(input.phrase, input.description, input.options);
    const result = await this.call({ task: 'choose-parent', system, prompt, schema: ParentDecisionSchema });
    const parentId = result.parent_concept_id?.trim();
    return parentId ? parentId : null;
  }

  private async call<T>(request: OracleRequest<T>, accept?: Acceptance<T>): Promise<T> {
    const result = await ErrorHandler.wrapOperationWithRetry(
      async () => {
        const raw = await this.backend.generate(request);
        const parsed = request.schema.safeParse(raw);
        if (!parsed.success) {
          throw new Error(`response violates schema: ${parsed.error.issues.map(i => i.message).join('; ')}`);
        }

        const problem = accept?.(parsed.data) ?? null;
        if (problem !== null) {
          throw new Error(problem);
        }
        return parsed.data;
      },
      ErrorCategory.ORACLE,
      `call oracle (${request.task})`,
      { task: request.task },
      {
        maxAttempts: this.config.maxAttempts,
        baseDelayMs: this.config.retryBaseDelayMs,
        isRetryable: isRetryableOracleError
      }
    );

    if (!result.success) {
      const cause = result.error.originalError;
      throw new OracleFailure(request.task, cause?.message ?? result.error.message, { cause });
    }
    return result.data;
  }
}

/**
 * Credentials and quota problems do not go away on retry
 */
export function isRetryableOracleError(error: Error): boolean {
  return !/\b(401|403)\b|unauthori[sz]ed|invalid api key|api key is missing|insufficient[_ ]quota/i.test(error.message);
}
