#!/usr/bin/env node
/**
 * Command-line entry point
 *
 * Usage:
 *   concept-ingest --input mentions.jsonl [--skip-sync] [--skip-backup]
 *   concept-ingest --sync-only [--skip-backup]
 *   concept-ingest --verify | --check-clusters | --list-backups
 *   concept-ingest --restore data/backups/graph_20240101_120000.jsonl
 *
 * Exit codes: 0 success, 1 unrecoverable failure, 2 sync or promotion
 * conflicts that need manual resolution.
 */

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { parseArgs } from 'util';
import { config as loadEnv } from 'dotenv';
import type { BatchSummary, SyncReport } from './core/types.js';
import { loadConfig, type EngineConfig } from './config.js';
import { createEngine, type Engine } from './engine.js';
import { loadMentions } from './pipeline/input-loader.js';
import { PipelineError, SyncConflict } from './utils/errors.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFLICTS = 2;

export const USAGE = `Usage: concept-ingest <mode> [options]

Modes:
  -i, --input <file>     Ingest newline-delimited JSON mentions, then sync
      --sync-only        Merge staged concepts into the authoritative stores
      --verify           Compare the graph store with the vector index
      --check-clusters   Show similarity groups in the staging store
      --list-backups     List graph backups and vector snapshots
      --restore <file>   Restore the authoritative partition from a backup

Options:
      --skip-sync        Stop after ingestion; leave promotions staged
      --skip-backup      Sync without taking a backup first
  -h, --help             Show this help`;

export interface CliDependencies {
  env?: Record<string, string | undefined>;
  createEngine?: (config: EngineConfig) => Promise<Engine>;
  signal?: AbortSignal;
}

type CliFlags = ReturnType<typeof parseCliArgs>;

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      input: { type: 'string', short: 'i' },
      'sync-only': { type: 'boolean' },
      'skip-backup': { type: 'boolean' },
      'skip-sync': { type: 'boolean' },
      verify: { type: 'boolean' },
      'check-clusters': { type: 'boolean' },
      'list-backups': { type: 'boolean' },
      restore: { type: 'string' },
      help: { type: 'boolean', short: 'h' }
    },
    strict: true,
    allowPositionals: false
  }).values;
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  let values: CliFlags;
  try {
    values = parseCliArgs(argv);
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : 'Invalid arguments'}\n`);
    console.error(USAGE);
    return EXIT_FAILURE;
  }

  if (values.help === true) {
    console.log(USAGE);
    return EXIT_OK;
  }

  const modes = [
    values.input !== undefined,
    values['sync-only'] === true,
    values.verify === true,
    values['check-clusters'] === true,
    values['list-backups'] === true,
    values.restore !== undefined
  ].filter(Boolean).length;

  if (modes !== 1) {
    console.error(`❌ Choose exactly one mode\n`);
    console.error(USAGE);
    return EXIT_FAILURE;
  }

  try {
    const config = loadConfig(deps.env ?? process.env);
    const engine = await (deps.createEngine ?? createEngine)(config);

    if (values.input !== undefined) {
      const { mentions, errors } = await loadMentions(values.input);
      if (mentions.length === 0) {
        console.error(`❌ No valid mentions in ${values.input} (${errors.length} invalid lines)`);
        return EXIT_FAILURE;
      }

      const summary = await engine.pipeline.runBatch(mentions, { signal: deps.signal });
      printSummary(summary);
      if (summary.aborted) return EXIT_FAILURE;
      const batchCode = batchExitCode(summary);
      if (values['skip-sync'] === true) {
        console.log('⏭️ Sync skipped; promotions stay staged until the next sync');
        return batchCode;
      }
      const syncCode = syncExitCode(await engine.sync.sync({ skipBackup: values['skip-backup'] === true }));
      return syncCode === EXIT_OK ? batchCode : syncCode;
    }

    if (values['sync-only'] === true) {
      return syncExitCode(await engine.sync.sync({ skipBackup: values['skip-backup'] === true }));
    }

    if (values.verify === true) {
      const verification = await engine.sync.verify();
      console.log(JSON.stringify(verification, null, 2));
      return verification.consistent ? EXIT_OK : EXIT_FAILURE;
    }

    if (values['check-clusters'] === true) {
      console.log(JSON.stringify(engine.detector.report(engine.stores.staging.list()), null, 2));
      return EXIT_OK;
    }

    if (values['list-backups'] === true) {
      for (const kind of ['graph', 'vector'] as const) {
        const records = await engine.backups.list(kind);
        console.log(`${kind} (${records.length}):`);
        for (const record of records) {
          console.log(`  ${record.path}  ${record.createdAt.toISOString()}`);
        }
      }
      return EXIT_OK;
    }

    const restorePath = values.restore ?? '';
    const restored = await engine.stores.lock.withLock('restore', () => engine.backups.restore(restorePath));
    console.log(JSON.stringify(restored, null, 2));
    return EXIT_OK;
  } catch (error) {
    if (error instanceof SyncConflict) {
      console.error(`❌ ${error.message}`);
      return EXIT_CONFLICTS;
    }
    if (error instanceof PipelineError) {
      console.error(`❌ [${error.category}] ${error.message}`);
    } else {
      console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    }
    return EXIT_FAILURE;
  }
}

function batchExitCode(summary: BatchSummary): number {
  if (summary.conflicts.length > 0) {
    console.error(
      `❌ ${summary.conflicts.length} promotion(s) collide with authoritative concepts and need manual resolution: ` +
        summary.conflicts.join(', ')
    );
    return EXIT_CONFLICTS;
  }
  return EXIT_OK;
}

function syncExitCode(report: SyncReport): number {
  console.log(JSON.stringify(report, null, 2));
  if (report.conflicts.length > 0) {
    console.error(`❌ ${report.conflicts.length} sync conflict(s) need manual resolution: ${report.conflicts.join(', ')}`);
    return EXIT_CONFLICTS;
  }
  return EXIT_OK;
}

function printSummary(summary: BatchSummary): void {
  console.log(JSON.stringify({ ...summary, failures: summary.failures.length }, null, 2));
  for (const failure of summary.failures) {
    console.warn(`⚠️ ${failure.conceptText} @ ${failure.source}: ${failure.errorType}: ${failure.message}`);
  }
}

function isMain(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isMain()) {
  loadEnv();
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.warn('\n🛑 Stopping after the current chunk...');
    controller.abort();
  });

  runCli(process.argv.slice(2), { signal: controller.signal })
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('❌ Unexpected failure:', error);
      process.exitCode = EXIT_FAILURE;
    });
}
