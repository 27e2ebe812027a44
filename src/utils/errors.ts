/**
 * Typed failures of the ingestion engine
 *
 * Each class maps to one recovery path: retrieval and oracle failures mark a
 * mention failed-for-retry, commit failures leave staging entries in place,
 * backup failures abort Sync, and sync conflicts wait for an operator.
 */

import { ErrorCategory } from './error-handler.js';

export class PipelineError extends Error {
  readonly category: ErrorCategory;

  constructor(message: string, category: ErrorCategory, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.category = category;
  }
}

/** Vector index or embedding service unreachable */
export class RetrievalUnavailable extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCategory.RETRIEVAL, options);
  }
}

/** Oracle timed out, errored or returned a response outside its contract */
export class OracleFailure extends PipelineError {
  readonly task: string;

  constructor(task: string, message: string, options?: { cause?: unknown }) {
    super(`Oracle ${task} failed: ${message}`, ErrorCategory.ORACLE, options);
    this.task = task;
  }
}

/** A write to a staged partition did not complete; staging entries were kept */
export class CommitFailure extends PipelineError {
  readonly conceptId: string;

  constructor(conceptId: string, message: string, options?: { cause?: unknown }) {
    super(`Commit of "${conceptId}" failed: ${message}`, ErrorCategory.COMMIT, options);
    this.conceptId = conceptId;
  }
}

/** A backup or snapshot could not be written; Sync must not proceed */
export class BackupFailure extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCategory.BACKUP, options);
  }
}

/** Staged concept ids collide with authoritative ones created out-of-band */
export class SyncConflict extends PipelineError {
  readonly conceptIds: string[];

  constructor(conceptIds: string[]) {
    super(
      `Staged concept id(s) already authoritative: ${conceptIds.join(', ')}. Resolve manually before syncing.`,
      ErrorCategory.SYNC
    );
    this.conceptIds = conceptIds;
  }
}

/** Another ingestion or sync run holds the store lock */
export class StoreLocked extends PipelineError {
  readonly lockPath: string;

  constructor(lockPath: string, holder: string) {
    super(`Store is locked by another run (${holder}); lock file: ${lockPath}`, ErrorCategory.SYNC);
    this.lockPath = lockPath;
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string) {
    super(message, ErrorCategory.CONFIGURATION);
  }
}

export class InputError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCategory.INPUT, options);
  }
}
