/**
 * Promotion manifest
 *
 * Append-only log of promotions written by the Ontology Committer and replayed
 * by Sync, in the manner of a write-ahead log. A promotion line is never
 * rewritten; Sync appends a `synced` line for each entry it merged.
 */

import { v5 as uuidv5 } from 'uuid';
import type { PromotionManifestEntry } from '../core/types.js';
import { appendJsonl, readJsonl } from './jsonl-file.js';
import { ManifestLineSchema } from './records.js';
import type { StorageResult } from './types.js';

const MANIFEST_NAMESPACE = '6f1c2b1e-3c1d-4a39-9a0e-5d7c1f0b8e21';

/**
 * Deterministic id so that a retried commit of the same cluster appends nothing
 */
export function manifestEntryId(representative: string, memberKeys: readonly string[]): string {
  return uuidv5(`${representative}\u0002${[...memberKeys].sort().join('\u0001')}`, MANIFEST_NAMESPACE);
}

export interface PromotionManifestConfig {
  /** Log path; null keeps the manifest in memory only */
  filePath: string | null;
}

export class PromotionManifest {
  private config: PromotionManifestConfig;
  private entries = new Map<string, PromotionManifestEntry>();
  private initialized = false;

  constructor(config: Partial<PromotionManifestConfig> = {}) {
    this.config = {
      filePath: config.filePath ?? null
    };
  }

  async initialize(): Promise<StorageResult> {
    const startTime = Date.now();
    if (this.initialized || this.config.filePath === null) {
      this.initialized = true;
      return { success: true, count: this.entries.size, processingTime: 0 };
    }

    try {
      const lines = await readJsonl(this.config.filePath, ManifestLineSchema);
      for (const line of lines) {
        if (line.type === 'promotion') {
          if (!this.entries.has(line.data.id)) {
            this.entries.set(line.data.id, { ...line.data });
          }
        } else {
          const entry = this.entries.get(line.data.id);
          if (entry) {
            entry.syncedAt = line.data.syncedAt;
          } else {
            console.warn(`⚠️ Manifest sync marker for unknown entry ${line.data.id}`);
          }
        }
      }
      this.initialized = true;
      return { success: true, count: this.entries.size, processingTime: Date.now() - startTime };
    } catch (error) {
      return {
        success: false,
        count: 0,
        processingTime: Date.now() - startTime,
        errors: [error instanceof Error ? error.message : 'Unknown initialization error']
      };
    }
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get(id: string): PromotionManifestEntry | undefined {
    const entry = this.entries.get(id);
    return entry ? { ...entry } : undefined;
  }

  /**
   * Append the entry; returns false when an entry with the same id exists
   */
  async append(entry: PromotionManifestEntry): Promise<boolean> {
    if (this.entries.has(entry.id)) {
      return false;
    }

    const { syncedAt: _ignored, ...promotion } = entry;
    if (this.config.filePath !== null) {
      await appendJsonl(this.config.filePath, [{ type: 'promotion', data: promotion }]);
    }
    this.entries.set(entry.id, { ...promotion });
    return true;
  }

  /**
   * Entries in append order
   */
  list(): PromotionManifestEntry[] {
    return [...this.entries.values()].map(entry => ({ ...entry }));
  }

  listUnsynced(): PromotionManifestEntry[] {
    return this.list().filter(entry => entry.syncedAt === undefined);
  }

  async markSynced(ids: readonly string[], at: Date): Promise<number> {
    const syncedAt = at.toISOString();
    const pending = ids.filter(id => {
      const entry = this.entries.get(id);
      return entry !== undefined && entry.syncedAt === undefined;
    });
    if (pending.length === 0) return 0;

    if (this.config.filePath !== null) {
      await appendJsonl(this.config.filePath, pending.map(id => ({ type: 'synced', data: { id, syncedAt } })));
    }
    for (const id of pending) {
      const entry = this.entries.get(id);
      if (entry) entry.syncedAt = syncedAt;
    }
    return pending.length;
  }
}
