/**
 * Selection Policy
 *
 * Picks one destination from the scored candidates and turns it into the next
 * move. Ordering is total so identical inputs always give identical moves.
 */

import type {
  Direction,
  FallbackMode,
  GridPosition,
  Move,
  ScoredCandidate,
  Target,
  TargetKind,
} from "./types.js"
import { DIRECTIONS, DIRECTION_OFFSETS, comparePositions, samePosition, targetId } from "./types.js"
import type { DistanceField } from "./spatial.js"

const KIND_ORDER: Record<TargetKind, number> = {
  base: 0,
  collectible: 1,
  teleporter: 2,
  hazard: 3,
}

/**
 * Best first: higher score, then shorter path, then smaller position
 * (row, then column), then kind, then id.
 */
export function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.score !== b.score) return a.score > b.score ? -1 : 1
  if (a.pathCost !== b.pathCost) return a.pathCost - b.pathCost
  const byPosition = comparePositions(a.target.position, b.target.position)
  if (byPosition !== 0) return byPosition
  const byKind = KIND_ORDER[a.target.kind] - KIND_ORDER[b.target.kind]
  if (byKind !== 0) return byKind
  const idA = targetId(a.target)
  const idB = targetId(b.target)
  return idA < idB ? -1 : idA > idB ? 1 : 0
}

/**
 * Whether the agent may head for this kind of target. Hazards are scored so
 * they show up in diagnostics, but nobody walks toward one on purpose.
 */
export function isDestination(target: Target): boolean {
  switch (target.kind) {
    case "collectible":
    case "teleporter":
    case "base":
      return true
    case "hazard":
      return false
  }
}

export function directionBetween(from: GridPosition, to: GridPosition): Direction | null {
  for (const direction of DIRECTIONS) {
    const offset = DIRECTION_OFFSETS[direction]
    if (from.row + offset.row === to.row && from.col + offset.col === to.col) {
      return direction
    }
  }
  return null
}

/**
 * First move along a path that starts at `origin`.
 */
export function firstMoveAlong(origin: GridPosition, path: ScoredCandidate["path"]): Move {
  if (path.length === 0) return "Idle"
  const first = path[0]
  if (first.via === "teleport") return "UseTeleporter"
  return directionBetween(origin, first.position) ?? "Idle"
}

/**
 * The move that starts the agent toward a candidate.
 */
export function deriveMove(origin: GridPosition, candidate: ScoredCandidate): Move {
  const { target } = candidate
  switch (target.kind) {
    case "teleporter":
      // Standing on the entry: take it
      if (candidate.path.length === 0) return "UseTeleporter"
      return firstMoveAlong(origin, candidate.path)
    case "collectible":
    case "base":
    case "hazard":
      return firstMoveAlong(origin, candidate.path)
  }
}

export interface SelectionOptions {
  previousTargetId?: string
  hysteresisMargin?: number
}

export interface Selection {
  candidate: ScoredCandidate
  move: Move
  /** True when the previous tick's target was kept over a marginally better one. */
  kept: boolean
}

/**
 * Choose the destination for this tick, or null when none qualifies.
 */
export function selectCandidate(
  candidates: readonly ScoredCandidate[],
  origin: GridPosition,
  options: SelectionOptions = {}
): Selection | null {
  const destinations = candidates
    .filter((c) => isDestination(c.target))
    // An item under the agent is collected on arrival, so there is nowhere to go for it
    .filter((c) => !(c.target.kind === "collectible" && samePosition(c.target.position, origin)))
    .sort(compareCandidates)

  if (destinations.length === 0) return null

  const best = destinations[0]
  let chosen = best
  let kept = false

  if (options.previousTargetId !== undefined) {
    const margin = options.hysteresisMargin ?? 0
    const previous = destinations.find((c) => targetId(c.target) === options.previousTargetId)
    if (previous && previous !== best && previous.score >= best.score - margin) {
      chosen = previous
      kept = true
    }
  }

  return { candidate: chosen, move: deriveMove(origin, chosen), kept }
}

/**
 * The centre cell, rounding toward the top-left.
 */
export function gridCentroid(width: number, height: number): GridPosition {
  return { row: Math.floor((height - 1) / 2), col: Math.floor((width - 1) / 2) }
}

/**
 * The move used when nothing qualifies or the tick ran out of time.
 */
export function fallbackMove(
  mode: FallbackMode,
  width: number,
  height: number,
  fromAgent: DistanceField | null
): Move {
  switch (mode) {
    case "idle":
      return "Idle"
    case "centroid": {
      if (!fromAgent) return "Idle"
      const centre = gridCentroid(width, height)
      const path = fromAgent.pathTo(centre)
      if (!path) return "Idle"
      return firstMoveAlong(fromAgent.origin, path)
    }
  }
}
