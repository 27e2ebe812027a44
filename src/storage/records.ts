/**
 * Record schemas for the JSONL stores
 *
 * Every line read back from disk is validated before it reaches a store, so a
 * hand-edited or truncated file cannot inject a malformed concept.
 */

import { z } from 'zod';

const metadata = z.record(z.unknown());

export const ConceptSchema = z.object({
  conceptId: z.string().min(1),
  label: z.string(),
  description: z.string(),
  parentConceptId: z.string().nullable(),
  contributors: z.array(z.string()),
  createdAt: z.string(),
  metadata
});

export const StagedConceptSchema = ConceptSchema.extend({
  stagedAt: z.string(),
  sourceMentions: z.array(z.string()),
  promotionReason: z.string(),
  manifestEntryIds: z.array(z.string())
});

export const RelationSchema = z.object({
  fromConceptId: z.string().min(1),
  toConceptId: z.string().min(1),
  relationType: z.literal('related'),
  weight: z.number().int().positive(),
  createdAt: z.string(),
  lastReinforcedAt: z.string()
});

export const AuthoritativeLineSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('concept'), data: ConceptSchema }),
  z.object({ type: z.literal('relation'), data: RelationSchema })
]);

export const StagedLineSchema = z.object({
  type: z.literal('concept'),
  data: StagedConceptSchema
});

export const StagedEntrySchema = z.object({
  conceptText: z.string().min(1),
  description: z.string(),
  source: z.string().min(1),
  canonicalPhraseSummary: z.string(),
  resolutionReason: z.string(),
  createdAt: z.string(),
  groupId: z.string(),
  metadata,
  embedding: z.array(z.number())
});

export const ClusterRejectionSchema = z.object({
  fingerprint: z.string(),
  memberKeys: z.array(z.string()),
  reason: z.string(),
  firstRejectedAt: z.string(),
  lastSeenAt: z.string(),
  timesSeen: z.number().int().positive()
});

export const StagingLineSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('entry'), data: StagedEntrySchema }),
  z.object({ type: z.literal('rejection'), data: ClusterRejectionSchema })
]);

export const ManifestEntrySchema = z.object({
  id: z.string().min(1),
  clusterRepresentative: z.string().min(1),
  memberMentions: z.array(z.object({ conceptText: z.string(), source: z.string() })),
  parentConceptId: z.string(),
  promotedAt: z.string()
});

export const ManifestLineSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('promotion'), data: ManifestEntrySchema }),
  z.object({ type: z.literal('synced'), data: z.object({ id: z.string(), syncedAt: z.string() }) })
]);

export const VectorRecordSchema = z.object({
  id: z.string().min(1),
  partition: z.enum(['authoritative', 'staged']),
  embedding: z.array(z.number()),
  metadata
});

export type ClusterRejection = z.infer<typeof ClusterRejectionSchema>;
export type VectorRecord = z.infer<typeof VectorRecordSchema>;
