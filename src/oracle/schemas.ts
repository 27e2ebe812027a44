/**
 * Response contracts of the oracle
 *
 * Field names follow the wire format the model is asked to produce. Anything
 * that fails these schemas is an OracleFailure, never a decision.
 */

import { z } from 'zod';

export const DescriptionSchema = z.object({
  description: z.string()
});

export const MatchDecisionSchema = z
  .object({
    matched_concept_id: z.string().min(1).nullable(),
    is_new: z.boolean(),
    canonical_phrase_summary: z.string(),
    reason: z.string()
  })
  .refine(decision => decision.is_new === (decision.matched_concept_id === null), {
    message: 'is_new must be true exactly when matched_concept_id is null'
  });

export const ClusterValidationSchema = z
  .object({
    representative_phrase: z.string(),
    unified_description: z.string(),
    accepted: z.boolean(),
    reason: z.string()
  })
  .refine(result => !result.accepted || result.unified_description.trim().length > 0, {
    message: 'unified_description is required when the cluster is accepted'
  });

export const ParentDecisionSchema = z.object({
  parent_concept_id: z.string().nullable()
});

export type DescriptionResult = z.infer<typeof DescriptionSchema>;
export type MatchDecision = z.infer<typeof MatchDecisionSchema>;
export type ClusterValidation = z.infer<typeof ClusterValidationSchema>;
export type ParentDecision = z.infer<typeof ParentDecisionSchema>;

export type OracleTask = 'describe-mention' | 'resolve-match' | 'validate-cluster' | 'choose-parent';

export interface OracleRequest<T> {
  task: OracleTask;
  system: string;
  prompt: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * The external text-understanding capability. Returns the raw structured
 * response; validation happens in the OracleClient.
 */
export interface OracleBackend {
  generate<T>(request: OracleRequest<T>): Promise<unknown>;
}
