// Core type definitions for the decision engine

// ============================================================================
// Grid Types
// ============================================================================

/**
 * A cell on the board. Row 0 is the top edge, column 0 the left edge.
 */
export interface GridPosition {
  row: number
  col: number
}

export type ItemID = string
export type HazardID = string
export type TeleporterID = string

export type HazardEffect = "reset-items" | "drop-inventory" | "relocate-agent"

export interface CollectibleItem {
  id: ItemID
  position: GridPosition
  value: number
  weight?: number // Inventory cost, defaults to 1
}

/**
 * A button that triggers an effect when stepped on. Passing within `radius`
 * cells of it is treated as risky.
 */
export interface HazardButton {
  id: HazardID
  position: GridPosition
  radius: number
  effect: HazardEffect
}

/**
 * A link between two non-adjacent cells. Directional links only go a -> b.
 */
export interface Teleporter {
  id: TeleporterID
  a: GridPosition
  b: GridPosition
  cost?: number // Defaults to 1
  bidirectional?: boolean // Defaults to true
}

// ============================================================================
// Snapshot Types
// ============================================================================

export interface Agent {
  position: GridPosition
  inventoryLoad: number
  inventoryCapacity: number
  remainingTimeMs: number
  base?: GridPosition // Where carried items are deposited
  carriedValue?: number
}

/**
 * Everything the engine sees for one tick. Treated as immutable.
 */
export interface GameStateSnapshot {
  tick?: number
  width: number
  height: number
  agent: Agent
  items: CollectibleItem[]
  hazards: HazardButton[]
  teleporters: Teleporter[]
  obstacles?: GridPosition[]
}

// ============================================================================
// Move Types
// ============================================================================

export type Direction = "Up" | "Down" | "Left" | "Right"

export type Move = Direction | "UseTeleporter" | "Idle"

export const DIRECTIONS: readonly Direction[] = ["Up", "Down", "Left", "Right"]

export const DIRECTION_OFFSETS: Record<Direction, GridPosition> = {
  Up: { row: -1, col: 0 },
  Down: { row: 1, col: 0 },
  Left: { row: 0, col: -1 },
  Right: { row: 0, col: 1 },
}

// ============================================================================
// Candidate Types
// ============================================================================

/**
 * Points of interest the scorer can rank. New kinds must be handled in every
 * exhaustive switch over `kind`.
 */
export type Target =
  | { kind: "collectible"; position: GridPosition; item: CollectibleItem }
  | {
      kind: "teleporter"
      position: GridPosition
      exit: GridPosition
      teleporter: Teleporter
    }
  | { kind: "hazard"; position: GridPosition; hazard: HazardButton }
  | { kind: "base"; position: GridPosition }

export type TargetKind = Target["kind"]

/**
 * One leg of a shortest path. `via` tells how the cell was entered.
 */
export interface PathStep {
  position: GridPosition
  via: "step" | "teleport"
}

export interface ScoredCandidate {
  target: Target
  score: number
  pathCost: number
  path: PathStep[]
}

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Coefficients of the scoring function. All must be finite and non-negative.
 */
export interface WeightVector {
  valueWeight: number
  distanceWeight: number
  densityWeight: number
  riskWeight: number
  teleporterWeight: number
  baseWeight: number
}

export type FallbackMode = "idle" | "centroid"
export type HazardPolicy = "penalize" | "exclude"

export interface EngineConfig {
  weights: WeightVector
  tickBudgetMs: number
  maxCandidates: number
  moveDurationMs: number
  clusterRadius: number
  clusterDecay: number
  timePressureThresholdMs: number
  returnBufferMoves: number
  hysteresisMargin: number
  stuckWindow: number
  fallback: FallbackMode
  hazardPolicy: HazardPolicy
}

// ============================================================================
// Decision Types
// ============================================================================

/**
 * How a tick ended:
 * - decided: a candidate was chosen
 * - fallback: nothing qualified, the fallback move was used
 * - degraded: the deadline (or an unexpected fault) cut the tick short
 * - invalid: the snapshot was rejected
 * - aborted: the caller cancelled the tick
 */
export type TickStatus = "decided" | "fallback" | "degraded" | "invalid" | "aborted"

export interface TickDecision {
  move: Move
  status: TickStatus
  target?: Target
  score?: number
  diagnostic?: string
  elapsedMs: number
}

// ============================================================================
// Helpers
// ============================================================================

export function samePosition(a: GridPosition, b: GridPosition): boolean {
  return a.row === b.row && a.col === b.col
}

export function positionKey(pos: GridPosition): string {
  return `${pos.row},${pos.col}`
}

export function manhattan(a: GridPosition, b: GridPosition): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col)
}

/**
 * Row-major ordering used for deterministic tie-breaks.
 */
export function comparePositions(a: GridPosition, b: GridPosition): number {
  if (a.row !== b.row) return a.row - b.row
  return a.col - b.col
}

export function itemWeight(item: CollectibleItem): number {
  return item.weight ?? 1
}

export function formatPosition(pos: GridPosition): string {
  return `(${pos.row},${pos.col})`
}

export function targetId(target: Target): string {
  switch (target.kind) {
    case "collectible":
      return target.item.id
    case "teleporter":
      return `${target.teleporter.id}@${positionKey(target.position)}`
    case "hazard":
      return target.hazard.id
    case "base":
      return "base"
  }
}
