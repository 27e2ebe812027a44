/**
 * Shared test doubles: an embedder and an oracle backend that run in process,
 * plus temporary directories and record builders.
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig } from '../config.js';
import type { Candidate, Mention, StagedConcept, StagedEntry } from '../core/types.js';
import { createEngine, type Engine } from '../engine.js';
import { openMemoryStores } from '../storage/factory.js';
import type { OracleBackend, OracleRequest, OracleTask } from '../oracle/schemas.js';
import type { Embedder } from '../utils/embedding-service.js';

export const DIMENSIONS = 64;
const FIRST_FALLBACK_DIMENSION = 32;

/**
 * A vector of DIMENSIONS with the given leading values
 */
export function vec(...values: number[]): Float32Array {
  const vector = new Float32Array(DIMENSIONS);
  values.forEach((value, index) => {
    vector[index] = value;
  });
  return vector;
}

/**
 * Embeds registered texts to their registered vectors. Any other text gets its
 * own one-hot vector, orthogonal to every registered one.
 */
export class FakeEmbedder implements Embedder {
  readonly calls: string[] = [];
  private vectors = new Map<string, Float32Array>();
  private nextFallback = FIRST_FALLBACK_DIMENSION;
  private failure: Error | null = null;

  set(text: string, vector: Float32Array): this {
    this.vectors.set(text, vector);
    return this;
  }

  failWith(error: Error | null): this {
    this.failure = error;
    return this;
  }

  async embed(text: string): Promise<Float32Array> {
    this.calls.push(text);
    if (this.failure) throw this.failure;

    let vector = this.vectors.get(text);
    if (!vector) {
      vector = new Float32Array(DIMENSIONS);
      vector[this.nextFallback] = 1;
      this.nextFallback = this.nextFallback + 1 >= DIMENSIONS ? FIRST_FALLBACK_DIMENSION : this.nextFallback + 1;
      this.vectors.set(text, vector);
    }
    return new Float32Array(vector);
  }
}

export interface RecordedCall {
  task: OracleTask;
  system: string;
  prompt: string;
}

type Handler = (request: RecordedCall) => unknown;

/**
 * Oracle backend driven by per-task handlers. Defaults: describe a concept as
 * "About <concept>", resolve every mention as new, accept every cluster with
 * the first member's summary, choose no parent.
 */
export class FakeOracleBackend implements OracleBackend {
  readonly calls: RecordedCall[] = [];
  private handlers = new Map<OracleTask, Handler>();

  constructor() {
    this.on('describe-mention', request => ({ description: `About ${field(request.prompt, 'Concept')}` }));
    this.on('resolve-match', request => ({
      matched_concept_id: null,
      is_new: true,
      canonical_phrase_summary: field(request.prompt, 'Mention'),
      reason: 'no candidate denotes the same idea'
    }));
    this.on('validate-cluster', request => ({
      representative_phrase: firstSummary(request.prompt),
      unified_description: 'A unified description',
      accepted: true,
      reason: 'members differ only in phrasing'
    }));
    this.on('choose-parent', () => ({ parent_concept_id: null }));
  }

  on(task: OracleTask, handler: Handler): this {
    this.handlers.set(task, handler);
    return this;
  }

  callsFor(task: OracleTask): RecordedCall[] {
    return this.calls.filter(call => call.task === task);
  }

  async generate<T>(request: OracleRequest<T>): Promise<unknown> {
    const call: RecordedCall = { task: request.task, system: request.system, prompt: request.prompt };
    this.calls.push(call);

    const handler = this.handlers.get(request.task);
    if (!handler) throw new Error(`No handler for ${request.task}`);
    return handler(call);
  }
}

/**
 * Value of a `Label: value` line in a prompt
 */
export function field(prompt: string, label: string): string {
  const match = new RegExp(`^${label}: (.*)$`, 'm').exec(prompt);
  return match ? match[1] : '';
}

function firstSummary(prompt: string): string {
  const match = /summary: "([^"]*)"/.exec(prompt);
  return match ? match[1] : '';
}

export async function makeTempDir(prefix = 'concept-graph-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function fixedClock(iso = '2024-03-01T12:00:00.000Z'): () => Date {
  return () => new Date(iso);
}

/**
 * Clock that advances one second per call
 */
export function tickingClock(startIso = '2024-03-01T12:00:00.000Z'): () => Date {
  let current = new Date(startIso).getTime();
  return () => {
    const now = new Date(current);
    current += 1000;
    return now;
  };
}

export function makeMention(overrides: Partial<Mention> = {}): Mention {
  return {
    conceptText: 'LoRA',
    chunkText: 'LoRA freezes the pretrained weights and trains small low-rank update matrices.',
    groupId: '1',
    groupTitle: 'Fine-tuning',
    source: 'chapter-1',
    metadata: {},
    ...overrides
  };
}

export function makeEntry(overrides: Partial<StagedEntry> = {}): StagedEntry {
  return {
    conceptText: 'LoRA',
    description: 'A parameter-efficient fine-tuning method',
    source: 'chapter-1',
    canonicalPhraseSummary: 'LoRA',
    resolutionReason: 'new',
    createdAt: '2024-03-01T12:00:00.000Z',
    groupId: '1',
    metadata: {},
    embedding: Array.from(vec(1)),
    ...overrides
  };
}

export function makeStagedConcept(overrides: Partial<StagedConcept> = {}): StagedConcept {
  return {
    conceptId: 'Low-Rank Adaptation',
    label: 'Low-Rank Adaptation',
    description: 'Fine-tuning through low-rank weight updates',
    parentConceptId: 'Concept',
    contributors: ['chapter-1'],
    createdAt: '2024-03-01T12:00:00.000Z',
    metadata: {},
    stagedAt: '2024-03-01T12:00:00.000Z',
    sourceMentions: ['LoRA @ chapter-1'],
    promotionReason: 'same concept',
    manifestEntryIds: ['entry-1'],
    ...overrides
  };
}

export function makeCandidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    conceptId: 'Retrieval-Augmented Generation',
    description: 'Answering with retrieved documents in the prompt',
    similarity: 0.9,
    partition: 'authoritative',
    ...overrides
  };
}

export interface TestEngine {
  engine: Engine;
  backend: FakeOracleBackend;
  embedder: FakeEmbedder;
}

/**
 * Engine over in-memory stores and the fakes above. Backups go under `dataDir`.
 */
export async function createTestEngine(
  dataDir: string,
  env: Record<string, string> = {},
  clock: () => Date = tickingClock()
): Promise<TestEngine> {
  const backend = new FakeOracleBackend();
  const embedder = new FakeEmbedder();
  const config = loadConfig({ DATA_DIR: dataDir, OPENAI_API_KEY: 'test-key', ORACLE_RETRY_BASE_MS: '0', ...env });
  const engine = await createEngine(config, {
    oracleBackend: backend,
    embedder,
    stores: await openMemoryStores(),
    clock
  });
  return { engine, backend, embedder };
}
