/**
 * Simulator Public API
 *
 * Plays seeded rounds of the collection game against the decision engine.
 * Use it for:
 * - Comparing weight profiles across many seeds
 * - Checking that the engine never stalls or degrades on realistic boards
 */

// Core execution
export { runSimulation, DEFAULT_MAX_TICKS } from "./runner.js"
export { runBatch, generateSeeds, DEFAULT_SEED_COUNT } from "./batch.js"

// World
export { createWorld, stepWorld, toSnapshot, DEFAULT_WORLD_OPTIONS } from "./world.js"

// Profiles
export { allProfiles, getProfileById, defaultProfile } from "./profiles.js"

// Metrics
export { createMetricsCollector, computeAggregates, computeAllAggregates } from "./metrics.js"

// Types
export type {
  WorldOptions,
  World,
  StepResult,
  EngineProfile,
  RunConfig,
  RunResult,
  BatchConfig,
  BatchResult,
  ProfileAggregates,
  TerminationReason,
  MoveRecord,
  MetricsCollector,
} from "./types.js"
