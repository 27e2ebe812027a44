/**
 * Backup/Snapshot Manager
 *
 * Exports the authoritative graph to `graph_{yyyyMMdd_HHmmss}.jsonl` and
 * snapshots the vector index to `vector_{yyyyMMdd_HHmmss}.jsonl.gz` before a
 * Sync, keeping the newest `keep` files of each kind. Names that collide
 * within one second get a `-N` suffix.
 */

import { createReadStream, createWriteStream, promises as fs } from 'fs';
import { basename, dirname, join } from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { createGunzip, createGzip } from 'zlib';
import type { BackupRecord, Partition, StoreKind } from '../core/types.js';
import { toRecord, fromRecord } from '../indexing/vector-index.js';
import { isNotFound, parseJsonl, readJsonl, serializeJsonl, writeJsonlAtomic } from '../storage/jsonl-file.js';
import { AuthoritativeLineSchema, VectorRecordSchema } from '../storage/records.js';
import { assertFlushed } from '../storage/flush.js';
import type { GraphStore, VectorStore } from '../storage/types.js';
import { BackupFailure } from '../utils/errors.js';

export interface BackupManagerConfig {
  /** Directory for graph exports */
  graphDir: string;
  /** Directory for vector snapshots */
  vectorDir: string;
  /** Files retained per store kind */
  keep: number;
}

export interface RestoreResult {
  storeKind: StoreKind;
  concepts: number;
  relations: number;
  vectors: number;
}

const BACKUP_NAME = /^(graph|vector)_(\d{8})_(\d{6})(?:-(\d+))?\.(jsonl|jsonl\.gz)$/;

const EXTENSIONS: Record<StoreKind, string> = {
  graph: 'jsonl',
  vector: 'jsonl.gz'
};

interface ParsedName {
  storeKind: StoreKind;
  createdAt: Date;
  sequence: number;
}

export class BackupManager {
  private config: BackupManagerConfig;

  constructor(
    private readonly graph: GraphStore,
    private readonly vectors: VectorStore,
    config: Partial<BackupManagerConfig> = {},
    private readonly clock: () => Date = () => new Date()
  ) {
    this.config = {
      graphDir: config.graphDir ?? './data/backups',
      vectorDir: config.vectorDir ?? './data/snapshots',
      keep: config.keep ?? 10
    };
  }

  /**
   * Graph export and vector snapshot, then retention. Any failure is a
   * BackupFailure; Sync must not continue after one.
   */
  async backupAll(): Promise<BackupRecord[]> {
    try {
      const records = [await this.backupGraph(), await this.snapshotVectors()];
      console.log(`💾 Backups written: ${records.map(r => basename(r.path)).join(', ')}`);
      return records;
    } catch (error) {
      if (error instanceof BackupFailure) throw error;
      throw new BackupFailure(
        `Backup failed: ${error instanceof Error ? error.message : 'Unknown backup error'}`,
        { cause: error }
      );
    }
  }

  async backupGraph(): Promise<BackupRecord> {
    const data = await this.graph.exportAuthoritative();
    const lines = [
      ...data.concepts.map(concept => ({ type: 'concept', data: concept })),
      ...data.relations.map(relation => ({ type: 'relation', data: relation }))
    ];

    const record = await this.reserve('graph');
    await writeJsonlAtomic(record.path, lines);
    await this.enforceRetention('graph');
    return record;
  }

  async snapshotVectors(): Promise<BackupRecord> {
    const entries = await this.vectors.exportEntries();
    const record = await this.reserve('vector');
    const tempPath = `${record.path}.${process.pid}.tmp`;

    await pipeline(
      Readable.from([serializeJsonl(entries.map(toRecord))]),
      createGzip(),
      createWriteStream(tempPath)
    );
    await fs.rename(tempPath, record.path);

    await this.enforceRetention('vector');
    return record;
  }

  /**
   * Backups of one kind, oldest first
   */
  async list(storeKind: StoreKind): Promise<BackupRecord[]> {
    const directory = this.directoryFor(storeKind);
    let names: string[];
    try {
      names = await fs.readdir(directory);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    return names
      .map(name => ({ name, parsed: parseBackupName(name) }))
      .filter((item): item is { name: string; parsed: ParsedName } => item.parsed?.storeKind === storeKind)
      .sort(
        (a, b) =>
          a.parsed.createdAt.getTime() - b.parsed.createdAt.getTime() || a.parsed.sequence - b.parsed.sequence
      )
      .map(({ name, parsed }) => ({ path: join(directory, name), createdAt: parsed.createdAt, storeKind }));
  }

  /**
   * Delete the oldest files beyond the retention limit; returns removed paths
   */
  async enforceRetention(storeKind: StoreKind): Promise<string[]> {
    const records = await this.list(storeKind);
    const surplus = records.slice(0, Math.max(0, records.length - this.config.keep));

    for (const record of surplus) {
      await fs.rm(record.path, { force: true });
    }

    if (surplus.length > 0) {
      console.log(`🧹 Removed ${surplus.length} old ${storeKind} backup(s)`);
    }
    return surplus.map(r => r.path);
  }

  /**
   * Replace the authoritative partition of the matching store. Manual operator
   * action; the staged partitions are left alone.
   */
  async restore(path: string): Promise<RestoreResult> {
    const parsed = parseBackupName(basename(path));
    if (!parsed) {
      throw new BackupFailure(`Not a backup file name: ${basename(path)}`);
    }

    if (parsed.storeKind === 'graph') {
      const lines = await readJsonl(path, AuthoritativeLineSchema);
      const concepts = lines.flatMap(line => (line.type === 'concept' ? [line.data] : []));
      const relations = lines.flatMap(line => (line.type === 'relation' ? [line.data] : []));

      await this.graph.importAuthoritative({ concepts, relations });
      assertFlushed(await this.graph.flush(), 'graph store', restoreError);
      console.log(`♻️ Restored graph from ${basename(path)} (${concepts.length} concepts, ${relations.length} relations)`);
      return { storeKind: 'graph', concepts: concepts.length, relations: relations.length, vectors: 0 };
    }

    const content = await readGzip(path);
    const partitions: Partition[] = ['authoritative'];
    const entries = parseJsonl(content, VectorRecordSchema, path)
      .filter(record => record.partition === 'authoritative')
      .map(fromRecord);

    await this.vectors.importEntries(entries, partitions);
    assertFlushed(await this.vectors.flush(), 'vector index', restoreError);
    console.log(`♻️ Restored vector index from ${basename(path)} (${entries.length} vectors)`);
    return { storeKind: 'vector', concepts: 0, relations: 0, vectors: entries.length };
  }

  private directoryFor(storeKind: StoreKind): string {
    return storeKind === 'graph' ? this.config.graphDir : this.config.vectorDir;
  }

  /**
   * Next free file name for this second
   */
  private async reserve(storeKind: StoreKind): Promise<BackupRecord> {
    const directory = this.directoryFor(storeKind);
    await fs.mkdir(directory, { recursive: true });

    const createdAt = this.clock();
    const stem = `${storeKind}_${formatTimestamp(createdAt)}`;
    const existing = new Set(await fs.readdir(directory));

    let name = `${stem}.${EXTENSIONS[storeKind]}`;
    for (let sequence = 1; existing.has(name); sequence++) {
      name = `${stem}-${sequence}.${EXTENSIONS[storeKind]}`;
    }

    return { path: join(directory, name), createdAt, storeKind };
  }
}

/**
 * `yyyyMMdd_HHmmss` in local time
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function parseBackupName(name: string): ParsedName | null {
  const match = BACKUP_NAME.exec(name);
  if (!match) return null;

  const [, kind, day, time, sequence, extension] = match;
  const storeKind: StoreKind = kind === 'graph' ? 'graph' : 'vector';
  if (extension !== EXTENSIONS[storeKind]) return null;

  const createdAt = new Date(
    Number(day.slice(0, 4)),
    Number(day.slice(4, 6)) - 1,
    Number(day.slice(6, 8)),
    Number(time.slice(0, 2)),
    Number(time.slice(2, 4)),
    Number(time.slice(4, 6))
  );

  return { storeKind, createdAt, sequence: sequence === undefined ? 0 : Number(sequence) };
}

async function readGzip(path: string): Promise<string> {
  const chunks: Buffer[] = [];
  await pipeline(createReadStream(path), createGunzip(), async (source: AsyncIterable<Buffer>) => {
    for await (const chunk of source) {
      chunks.push(chunk);
    }
  });
  return Buffer.concat(chunks).toString('utf-8');
}

function restoreError(message: string): BackupFailure {
  return new BackupFailure(`Restore could not be persisted: ${message}`);
}
