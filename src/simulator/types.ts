/**
 * Type definitions for the Simulator
 *
 * The simulator plays rounds of the collection game offline so the decision
 * engine can be exercised end to end and weight profiles compared across
 * seeds. The engine only ever sees snapshots produced by toSnapshot().
 */

import type {
  CollectibleItem,
  GridPosition,
  HazardButton,
  HazardEffect,
  ItemID,
  Move,
  Teleporter,
  TickStatus,
} from "../types.js"
import type { EngineConfigInput } from "../config.js"
import type { Logger } from "../engine.js"
import type { RngState } from "../rng.js"

// ============================================================================
// World Types
// ============================================================================

export interface WorldOptions {
  width: number
  height: number
  inventoryCapacity: number
  roundTimeMs: number
  moveDurationMs: number
  itemCount: number // Items placed at the start and after a reset
  minItems: number // Respawn threshold
  hazardCount: number
  hazardRadius: number
  teleporterPairs: number
  obstacleCount: number
}

export interface SimAgent {
  position: GridPosition
  base: GridPosition
  inventoryLoad: number
  inventoryCapacity: number
  carriedValue: number
  remainingTimeMs: number
}

/**
 * Full simulator state. Mutated in place by stepWorld().
 */
export interface World {
  seed: string
  rng: RngState
  options: WorldOptions
  tick: number
  score: number
  agent: SimAgent
  items: CollectibleItem[]
  hazards: HazardButton[]
  teleporters: Teleporter[]
  obstacles: GridPosition[]
  nextItemId: number
}

/**
 * What happened when a move was applied.
 */
export interface StepResult {
  moved: boolean
  teleported: boolean
  collected: ItemID[]
  deposited: number // Value banked at the base this step
  triggered: HazardEffect | null
}

// ============================================================================
// Profiles
// ============================================================================

/**
 * A named engine configuration, e.g. a weight vector under evaluation.
 */
export interface EngineProfile {
  id: string
  name: string
  config: EngineConfigInput
}

// ============================================================================
// Run Configuration and Results
// ============================================================================

export interface RunConfig {
  seed: string
  profile: EngineProfile
  world?: Partial<WorldOptions>
  maxTicks?: number // Default 10000
  recordMoves?: boolean // If true, include move log in result
  onMove?: (record: MoveRecord) => void // Called after each tick for streaming output
  logger?: Logger
  now?: () => number // Clock handed to the engine
}

export type TerminationReason = "time_up" | "max_ticks"

/**
 * Record of a single tick.
 */
export interface MoveRecord {
  tick: number
  move: Move
  status: TickStatus
  targetId?: string
  position: GridPosition // After the move
  score: number // Banked score after the move
  step: StepResult
}

export type MoveCounts = Record<Move, number>
export type StatusCounts = Record<TickStatus, number>

export interface RunResult {
  seed: string
  profileId: string
  terminationReason: TerminationReason
  score: number
  totalTicks: number
  itemsCollected: number
  deposits: number
  hazardsTriggered: number
  movesByType: MoveCounts
  ticksByStatus: StatusCounts
  moveLog?: MoveRecord[]
}

// ============================================================================
// Batch Configuration and Results
// ============================================================================

export interface BatchConfig {
  seeds?: string[] // Explicit seeds
  seedCount?: number // Or generate this many (default 20)
  profiles: EngineProfile[]
  world?: Partial<WorldOptions>
  maxTicks?: number
  onProgress?: () => void // Called after each simulation completes
}

export interface ProfileAggregates {
  profileId: string
  runCount: number
  score: {
    p10: number
    p50: number
    p90: number
  }
  avgScore: number
  avgScorePerTick: number
  degradedTicks: number
  fallbackTicks: number
}

export interface BatchResult {
  results: RunResult[]
  aggregates: {
    byProfile: Record<string, ProfileAggregates>
  }
}

// ============================================================================
// Metrics Collector Interface
// ============================================================================

export interface MetricsCollector {
  recordTick(move: Move, status: TickStatus, step: StepResult): void
  finalize(
    terminationReason: TerminationReason,
    score: number,
    totalTicks: number
  ): Omit<RunResult, "seed" | "profileId" | "moveLog">
}
