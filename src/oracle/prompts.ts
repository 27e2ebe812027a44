/**
 * Prompt text for the four oracle tasks
 */

import type { Candidate } from '../core/types.js';

export interface ClusterMemberView {
  conceptText: string;
  canonicalPhraseSummary: string;
  description: string;
  source: string;
}

export interface ParentOption {
  conceptId: string;
  description: string;
  /** Ids from the option up to the root */
  path: string[];
}

export interface Prompt {
  system: string;
  prompt: string;
}

const PHRASE_RULES = `Canonical phrase rules:
- A noun phrase of at most three words naming the concept itself.
- Drop words that describe a document's structure: Overview, Introduction to, Mastering, Guide, Tutorial, Complete, Deep Dive, Basics, Fundamentals, Advanced.
- Keep established acronyms as written (e.g. "RAG", "LoRA").`;

export function describeMentionPrompt(conceptText: string, chunkText: string, chunkCharLimit: number): Prompt {
  return {
    system: `You write one or two sentence definitions of technical concepts as they are used in a given passage.
Describe what the concept is, not what the passage says about it. Respond with {"description": string}.`,
    prompt: `Concept: ${conceptText}

Passage:
${chunkText.slice(0, chunkCharLimit)}`
  };
}

export function resolveMatchPrompt(
  conceptText: string,
  chunkText: string,
  groupTitle: string,
  candidates: readonly Candidate[],
  chunkCharLimit: number
): Prompt {
  const candidateList = candidates.length === 0
    ? '(none)'
    : candidates
        .map((c, i) => `${i + 1}. id="${c.conceptId}" similarity=${c.similarity.toFixed(3)}\n   ${c.description}`)
        .join('\n');

  return {
    system: `You decide whether a mention denotes one of the candidate concepts or a new concept.
Match only when the mention and the candidate are the same idea, not merely related ones.
matched_concept_id must be one of the candidate ids or null. is_new is true exactly when matched_concept_id is null.
canonical_phrase_summary names the mention's concept.

${PHRASE_RULES}`,
    prompt: `Mention: ${conceptText}
Section: ${groupTitle}

Context:
${chunkText.slice(0, chunkCharLimit)}

Candidates:
${candidateList}`
  };
}

export function validateClusterPrompt(members: readonly ClusterMemberView[]): Prompt {
  const memberList = members
    .map((m, i) => `${i + 1}. "${m.conceptText}" (summary: "${m.canonicalPhraseSummary}", source: ${m.source})\n   ${m.description}`)
    .join('\n');

  return {
    system: `You review a group of mentions that were grouped because their descriptions are similar.
Accept the group only if every member denotes the same concept and members differ only in phrasing.
Reject it if any members are different kinds of thing, even closely related ones.
representative_phrase must be one of the members' summaries. When accepted, unified_description is one definition that covers every member.`,
    prompt: `Members:
${memberList}`
  };
}

export function chooseParentPrompt(phrase: string, description: string, options: readonly ParentOption[]): Prompt {
  const optionList = options
    .map(o => `- id="${o.conceptId}" path: ${o.path.join(' > ')}\n  ${o.description}`)
    .join('\n');

  return {
    system: `You place a new concept in a taxonomy. Choose the most specific existing concept that the new concept is a kind of or a part of.
parent_concept_id must be one of the listed ids, or null when none fits.`,
    prompt: `New concept: ${phrase}
Definition: ${description}

Existing concepts:
${optionList || '(none)'}`
  };
}
