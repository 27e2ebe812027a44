/**
 * JSON Lines file helpers shared by the file-backed stores
 *
 * Full rewrites go through a temporary file and a rename so that a crash never
 * leaves a half-written store behind. Appends are used only for the
 * append-only promotion manifest.
 *
 * References:
 * - JSONL specification: https://jsonlines.org/
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import type { z } from 'zod';

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read and validate every line of a JSONL file. A missing file reads as empty;
 * lines that fail to parse or validate are skipped with a warning.
 */
export async function readJsonl<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }

  return parseJsonl(content, schema, filePath);
}

export function parseJsonl<T>(
  content: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label: string
): T[] {
  const records: T[] = [];
  const lines = content.split('\n');

  lines.forEach((line, index) => {
    if (line.trim().length === 0) return;

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      console.warn(`⚠️ Skipping unparseable line ${index + 1} in ${label}`);
      return;
    }

    const parsed = schema.safeParse(raw);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      console.warn(`⚠️ Skipping invalid record on line ${index + 1} in ${label}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
  });

  return records;
}

export function serializeJsonl(records: readonly unknown[]): string {
  return records.map(record => JSON.stringify(record)).join('\n') + (records.length > 0 ? '\n' : '');
}

/**
 * Replace the file's content atomically
 */
export async function writeJsonlAtomic(filePath: string, records: readonly unknown[]): Promise<void> {
  await fs.mkdir(dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tempPath, serializeJsonl(records), 'utf-8');
  await fs.rename(tempPath, filePath);
}

export async function appendJsonl(filePath: string, records: readonly unknown[]): Promise<void> {
  if (records.length === 0) return;
  await fs.mkdir(dirname(filePath), { recursive: true });
  await fs.appendFile(filePath, serializeJsonl(records), 'utf-8');
}
