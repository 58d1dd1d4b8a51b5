/**
 * Batch Executor (Monte Carlo Harness)
 *
 * Runs simulations across seeds and profiles, then aggregates results.
 */

import type { BatchConfig, BatchResult, RunResult } from "./types.js"
import { runSimulation } from "./runner.js"
import { computeAllAggregates } from "./metrics.js"

export const DEFAULT_SEED_COUNT = 20

/**
 * Generate deterministic seed strings.
 */
export function generateSeeds(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `seed-${i}`)
}

/**
 * Run batch simulations across multiple seeds and profiles.
 */
export function runBatch(config: BatchConfig): BatchResult {
  const seeds = config.seeds ?? generateSeeds(config.seedCount ?? DEFAULT_SEED_COUNT)
  const results: RunResult[] = []

  for (const seed of seeds) {
    for (const profile of config.profiles) {
      results.push(
        runSimulation({
          seed,
          profile,
          world: config.world,
          maxTicks: config.maxTicks,
        })
      )
      config.onProgress?.()
    }
  }

  const profileIds = config.profiles.map((p) => p.id)
  return {
    results,
    aggregates: {
      byProfile: computeAllAggregates(results, profileIds),
    },
  }
}
