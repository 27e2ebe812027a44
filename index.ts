/**
 * Concept graph ingestion engine
 *
 * Resolves concept mentions against an existing concept graph, stages the
 * ones that match nothing, promotes clusters of paraphrases to new concepts
 * and merges them into the authoritative graph store and vector index.
 */

export * from "./src/index.js";
