/**
 * Input loader
 *
 * Reads newline-delimited JSON mention records. Required fields are
 * `concept`, `group_id`, `group_title` and `chunk_text`; `source` defaults to
 * `group_{group_id}`. Any other field is carried through as metadata.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import type { Mention } from '../core/types.js';
import { isNotFound } from '../storage/jsonl-file.js';
import { InputError } from '../utils/errors.js';

const MentionRecordSchema = z
  .object({
    concept: z.string().trim().min(1, 'concept must not be empty'),
    group_id: z.union([z.string().trim().min(1), z.number()]),
    group_title: z.string(),
    chunk_text: z.string(),
    source: z.string().trim().min(1).optional()
  })
  .passthrough();

const KNOWN_FIELDS = new Set(['concept', 'group_id', 'group_title', 'chunk_text', 'source']);

export interface InputLineError {
  line: number;
  message: string;
}

export interface LoadedInput {
  mentions: Mention[];
  errors: InputLineError[];
}

export function parseMentions(content: string, label = 'input'): LoadedInput {
  const mentions: Mention[] = [];
  const errors: InputLineError[] = [];

  content.split('\n').forEach((text, index) => {
    const line = index + 1;
    if (text.trim().length === 0) return;

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      errors.push({ line, message: 'not valid JSON' });
      return;
    }

    const parsed = MentionRecordSchema.safeParse(raw);
    if (!parsed.success) {
      errors.push({
        line,
        message: parsed.error.issues.map(issue => `${issue.path.join('.') || 'record'}: ${issue.message}`).join('; ')
      });
      return;
    }

    const record = parsed.data;
    const groupId = String(record.group_id);
    const metadata = Object.fromEntries(Object.entries(record).filter(([field]) => !KNOWN_FIELDS.has(field)));

    mentions.push({
      conceptText: record.concept,
      chunkText: record.chunk_text,
      groupId,
      groupTitle: record.group_title,
      source: record.source ?? `group_${groupId}`,
      metadata
    });
  });

  for (const error of errors) {
    console.warn(`⚠️ Skipping line ${error.line} of ${label}: ${error.message}`);
  }

  return { mentions, errors };
}

export async function loadMentions(filePath: string): Promise<LoadedInput> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new InputError(
      isNotFound(error) ? `Input file not found: ${filePath}` : `Could not read input file ${filePath}`,
      { cause: error }
    );
  }

  const loaded = parseMentions(content, filePath);
  console.log(`📥 Loaded ${loaded.mentions.length} mentions from ${filePath}`);
  return loaded;
}
