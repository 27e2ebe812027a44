/**
 * Exclusive lock shared by ingestion and Sync
 *
 * A marker file created with the `wx` flag; its content names the holder. A
 * lock whose holder process no longer exists is treated as stale and taken
 * over. Without a file path the lock only excludes callers in this process.
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { StoreLocked } from '../utils/errors.js';
import { isNotFound } from './jsonl-file.js';

const LockHolderSchema = z.object({
  pid: z.number().int(),
  owner: z.string(),
  acquiredAt: z.string()
});

type LockHolder = z.infer<typeof LockHolderSchema>;

export class StoreLock {
  private heldBy: string | null = null;

  constructor(private readonly lockPath: string | null) {}

  get path(): string | null {
    return this.lockPath;
  }

  /**
   * Run `operation` while holding the lock
   */
  async withLock<T>(owner: string, operation: () => Promise<T>): Promise<T> {
    await this.acquire(owner);
    try {
      return await operation();
    } finally {
      await this.release();
    }
  }

  async acquire(owner: string): Promise<void> {
    if (this.heldBy !== null) {
      throw new StoreLocked(this.lockPath ?? '(in-process)', `${this.heldBy} in this process`);
    }

    if (this.lockPath !== null) {
      await this.createLockFile(owner, true);
    }
    this.heldBy = owner;
  }

  async release(): Promise<void> {
    if (this.heldBy === null) return;
    this.heldBy = null;

    if (this.lockPath !== null) {
      try {
        await fs.unlink(this.lockPath);
      } catch (error) {
        if (!isNotFound(error)) throw error;
      }
    }
  }

  isHeld(): boolean {
    return this.heldBy !== null;
  }

  private async createLockFile(owner: string, allowTakeover: boolean): Promise<void> {
    if (this.lockPath === null) return;
    await fs.mkdir(dirname(this.lockPath), { recursive: true });

    const holder: LockHolder = { pid: process.pid, owner, acquiredAt: new Date().toISOString() };
    try {
      await fs.writeFile(this.lockPath, JSON.stringify(holder), { flag: 'wx' });
      return;
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) {
        throw error;
      }
    }

    const existing = await this.readHolder();
    if (allowTakeover && existing !== null && !isProcessAlive(existing.pid)) {
      console.warn(`⚠️ Removing stale lock held by ${existing.owner} (pid ${existing.pid})`);
      await fs.rm(this.lockPath, { force: true });
      await this.createLockFile(owner, false);
      return;
    }

    const description = existing ? `${existing.owner}, pid ${existing.pid}, since ${existing.acquiredAt}` : 'unknown holder';
    throw new StoreLocked(this.lockPath, description);
  }

  private async readHolder(): Promise<LockHolder | null> {
    if (this.lockPath === null) return null;
    let content: string;
    try {
      content = await fs.readFile(this.lockPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      // Unparseable content: the holder is unknown
      return null;
    }
    const parsed = LockHolderSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means the process exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}
