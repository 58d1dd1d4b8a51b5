/**
 * Metrics Collection and Aggregation
 *
 * Tracks what happened during a simulated round and aggregates results across
 * runs of the same profile.
 */

import type { Move, TickStatus } from "../types.js"
import type {
  MetricsCollector,
  MoveCounts,
  ProfileAggregates,
  RunResult,
  StatusCounts,
  StepResult,
  TerminationReason,
} from "./types.js"

export function emptyMoveCounts(): MoveCounts {
  return { Up: 0, Down: 0, Left: 0, Right: 0, UseTeleporter: 0, Idle: 0 }
}

export function emptyStatusCounts(): StatusCounts {
  return { decided: 0, fallback: 0, degraded: 0, invalid: 0, aborted: 0 }
}

/**
 * Create a new metrics collector for a simulation run.
 */
export function createMetricsCollector(): MetricsCollector {
  const movesByType = emptyMoveCounts()
  const ticksByStatus = emptyStatusCounts()
  let itemsCollected = 0
  let deposits = 0
  let hazardsTriggered = 0

  return {
    recordTick(move: Move, status: TickStatus, step: StepResult): void {
      movesByType[move]++
      ticksByStatus[status]++
      itemsCollected += step.collected.length
      if (step.deposited > 0) deposits++
      if (step.triggered !== null) hazardsTriggered++
    },

    finalize(terminationReason: TerminationReason, score: number, totalTicks: number) {
      return {
        terminationReason,
        score,
        totalTicks,
        itemsCollected,
        deposits,
        hazardsTriggered,
        movesByType: { ...movesByType },
        ticksByStatus: { ...ticksByStatus },
      }
    },
  }
}

/**
 * Calculate percentile from a sorted array of numbers.
 */
export function percentile(sortedValues: number[], p: number): number {
  if (sortedValues.length === 0) return 0
  const index = Math.ceil(p * sortedValues.length) - 1
  return sortedValues[Math.max(0, Math.min(index, sortedValues.length - 1))]
}

/**
 * Compute aggregated statistics for one profile's runs.
 */
export function computeAggregates(results: RunResult[], profileId: string): ProfileAggregates {
  const profileResults = results.filter((r) => r.profileId === profileId)

  if (profileResults.length === 0) {
    return {
      profileId,
      runCount: 0,
      score: { p10: 0, p50: 0, p90: 0 },
      avgScore: 0,
      avgScorePerTick: 0,
      degradedTicks: 0,
      fallbackTicks: 0,
    }
  }

  const sortedScores = profileResults.map((r) => r.score).sort((a, b) => a - b)
  const totalScore = profileResults.reduce((sum, r) => sum + r.score, 0)
  const totalTicks = profileResults.reduce((sum, r) => sum + r.totalTicks, 0)

  return {
    profileId,
    runCount: profileResults.length,
    score: {
      p10: percentile(sortedScores, 0.1),
      p50: percentile(sortedScores, 0.5),
      p90: percentile(sortedScores, 0.9),
    },
    avgScore: totalScore / profileResults.length,
    avgScorePerTick: totalTicks > 0 ? totalScore / totalTicks : 0,
    degradedTicks: profileResults.reduce((sum, r) => sum + r.ticksByStatus.degraded, 0),
    fallbackTicks: profileResults.reduce((sum, r) => sum + r.ticksByStatus.fallback, 0),
  }
}

/**
 * Compute aggregates for every profile in a batch.
 */
export function computeAllAggregates(
  results: RunResult[],
  profileIds: string[]
): Record<string, ProfileAggregates> {
  const aggregates: Record<string, ProfileAggregates> = {}

  for (const profileId of profileIds) {
    aggregates[profileId] = computeAggregates(results, profileId)
  }

  return aggregates
}
