/**
 * Candidate Scorer
 *
 * Weighted greedy scoring of every viable point of interest:
 *
 *   score = valueWeight   * normalizedValue
 *         - distanceWeight * normalizedDistance * timePressure
 *         - riskWeight     * hazardProximityPenalty
 *         + densityWeight  * localClusterBonus
 *
 * Items the agent cannot legally pick (capacity) or cannot reach in time are
 * excluded, not penalized.
 */

import type {
  CollectibleItem,
  EngineConfig,
  GameStateSnapshot,
  GridPosition,
  HazardButton,
  PathStep,
  ScoredCandidate,
  Target,
} from "./types.js"
import { itemWeight, manhattan, comparePositions, samePosition, targetId } from "./types.js"
import type { CostField, DistanceField, SpatialModel } from "./spatial.js"
import { UnreachableTargetError } from "./errors.js"
import { compareCandidates } from "./selection.js"

export interface ScoringInput {
  snapshot: GameStateSnapshot
  model: SpatialModel
  fromAgent: DistanceField
  /** Costs back to the agent's base, when it has one. */
  toBase: CostField | null
  config: EngineConfig
  /** Target ids to leave out this tick. */
  suppressed?: ReadonlySet<string>
  /** Called before each candidate is scored; throw from it to stop scoring. */
  checkpoint?: (stage: string) => void
}

interface Pending {
  target: Target
  pathCost: number
  path: PathStep[]
}

// ============================================================================
// Scoring Factors
// ============================================================================

/**
 * 1 when there is plenty of time; grows linearly to 2 as the clock runs out.
 */
export function timePressure(remainingTimeMs: number, thresholdMs: number): number {
  if (thresholdMs <= 0 || remainingTimeMs >= thresholdMs) return 1
  const remaining = Math.max(0, remainingTimeMs)
  return 1 + (thresholdMs - remaining) / thresholdMs
}

/**
 * Sum over hazards of how deep the closest cell of `cells` gets into the
 * hazard's radius: (radius + 1 - d) / (radius + 1) when d <= radius.
 */
export function hazardProximityPenalty(
  cells: readonly GridPosition[],
  hazards: readonly HazardButton[]
): number {
  let penalty = 0
  for (const hazard of hazards) {
    let closest = Infinity
    for (const cell of cells) {
      closest = Math.min(closest, manhattan(cell, hazard.position))
    }
    if (closest <= hazard.radius) {
      penalty += (hazard.radius + 1 - closest) / (hazard.radius + 1)
    }
  }
  return penalty
}

/**
 * Density of other viable items around `center`, each counted with weight
 * exp(-d / decay). Values are ignored on purpose: a neighbour's value must not
 * lift this candidate faster than it lifts the neighbour itself.
 */
export function localClusterBonus(
  center: GridPosition,
  others: readonly CollectibleItem[],
  radius: number,
  decay: number
): number {
  let bonus = 0
  for (const other of others) {
    const d = manhattan(center, other.position)
    if (d > radius || samePosition(center, other.position)) continue
    bonus += Math.exp(-d / decay)
  }
  return bonus
}

/**
 * Value waiting around a teleporter exit, each item weighted by
 * (value / maxValue) * exp(-d / decay).
 */
function exitValue(
  exit: GridPosition,
  items: readonly CollectibleItem[],
  maxValue: number,
  radius: number,
  decay: number
): number {
  let total = 0
  for (const item of items) {
    const d = manhattan(exit, item.position)
    if (d > radius) continue
    total += (item.value / maxValue) * Math.exp(-d / decay)
  }
  return total
}

function pathCells(target: GridPosition, path: readonly PathStep[]): GridPosition[] {
  return path.length === 0 ? [target] : path.map((step) => step.position)
}

function resolvePath(fromAgent: DistanceField, target: Target): Pending {
  const reach = fromAgent.costTo(target.position)
  const path = fromAgent.pathTo(target.position)
  if (!reach.reachable || path === null) {
    throw new UnreachableTargetError(targetId(target))
  }
  return { target, pathCost: reach.cost, path }
}

// ============================================================================
// Scorer
// ============================================================================

/**
 * Score every viable target. The result is ordered best first and is empty
 * when nothing is viable.
 */
export function scoreCandidates(input: ScoringInput): ScoredCandidate[] {
  const { snapshot, model, fromAgent, toBase, config } = input
  const { agent } = snapshot
  const { weights } = config
  const checkpoint = input.checkpoint ?? (() => {})
  const suppressed = input.suppressed ?? new Set<string>()

  const remainingCapacity = agent.inventoryCapacity - agent.inventoryLoad
  const remainingMoves = Math.floor(agent.remainingTimeMs / config.moveDurationMs)
  const pressure = timePressure(agent.remainingTimeMs, config.timePressureThresholdMs)
  const maxValue = snapshot.items.reduce((max, item) => Math.max(max, item.value), 0)
  const hazards = snapshot.hazards

  const normalizedDistance = (cost: number) => cost / model.diameter
  const crossesHazard = (cells: GridPosition[]) => hazardProximityPenalty(cells, hazards) > 0

  // 1. Viable items: legal to pick, reachable, and collectable in time
  const viableItems: CollectibleItem[] = []
  const pendingItems: Pending[] = []
  for (const item of snapshot.items) {
    if (itemWeight(item) > remainingCapacity) continue
    const target: Target = { kind: "collectible", position: item.position, item }
    if (suppressed.has(targetId(target))) continue

    let pending: Pending
    try {
      pending = resolvePath(fromAgent, target)
    } catch (error) {
      if (error instanceof UnreachableTargetError) continue
      throw error
    }

    let returnCost = 0
    if (toBase) {
      const back = toBase.costTo(item.position)
      if (!back.reachable) continue
      returnCost = back.cost
    }
    if (pending.pathCost + returnCost > remainingMoves) continue

    if (
      config.hazardPolicy === "exclude" &&
      crossesHazard(pathCells(item.position, pending.path))
    ) {
      continue
    }

    viableItems.push(item)
    pendingItems.push(pending)
  }

  // 2. Teleporter entries that lead somewhere worth going
  const pendingTeleporters: Pending[] = []
  const exitValues = new Map<Pending, number>()
  if (viableItems.length > 0) {
    for (const teleporter of snapshot.teleporters) {
      const links: Array<[GridPosition, GridPosition]> = [[teleporter.a, teleporter.b]]
      if (teleporter.bidirectional ?? true) links.push([teleporter.b, teleporter.a])

      for (const [entry, exit] of links) {
        const value = exitValue(
          exit,
          viableItems,
          maxValue,
          config.clusterRadius,
          config.clusterDecay
        )
        if (value <= 0) continue
        const target: Target = { kind: "teleporter", position: entry, exit, teleporter }
        if (suppressed.has(targetId(target))) continue

        let pending: Pending
        try {
          pending = resolvePath(fromAgent, target)
        } catch (error) {
          if (error instanceof UnreachableTargetError) continue
          throw error
        }
        if (pending.pathCost > remainingMoves) continue
        if (config.hazardPolicy === "exclude" && crossesHazard(pathCells(entry, pending.path))) {
          continue
        }
        pendingTeleporters.push(pending)
        exitValues.set(pending, value)
      }
    }
  }

  // 3. Cheap pre-filter: only the nearest maxCandidates are fully scored
  const capped = [...pendingItems, ...pendingTeleporters]
    .sort(
      (a, b) =>
        a.pathCost - b.pathCost || comparePositions(a.target.position, b.target.position)
    )
    .slice(0, config.maxCandidates)

  const scored: ScoredCandidate[] = []

  for (const pending of capped) {
    checkpoint("scoring")
    const { target, path, pathCost } = pending
    const distanceTerm = weights.distanceWeight * normalizedDistance(pathCost) * pressure
    const riskTerm =
      weights.riskWeight * hazardProximityPenalty(pathCells(target.position, path), hazards)

    switch (target.kind) {
      case "collectible": {
        const others = viableItems.filter((item) => item.id !== target.item.id)
        const score =
          weights.valueWeight * (target.item.value / maxValue) -
          distanceTerm -
          riskTerm +
          weights.densityWeight *
            localClusterBonus(target.position, others, config.clusterRadius, config.clusterDecay)
        scored.push({ target, score, pathCost, path })
        break
      }
      case "teleporter": {
        const value = exitValues.get(pending) ?? 0
        const score = weights.teleporterWeight * value - distanceTerm - riskTerm
        scored.push({ target, score, pathCost, path })
        break
      }
      case "base":
      case "hazard":
        break
    }
  }

  // 4. Base: worth more the fuller the inventory; forced when full or out of time
  if (agent.base && agent.inventoryLoad > 0 && !samePosition(agent.base, agent.position)) {
    checkpoint("scoring")
    const target: Target = { kind: "base", position: agent.base }
    const reach = fromAgent.costTo(agent.base)
    const path = fromAgent.pathTo(agent.base)
    if (reach.reachable && path !== null && !suppressed.has(targetId(target))) {
      const mustReturn =
        remainingCapacity <= 0 || remainingMoves - reach.cost <= config.returnBufferMoves
      const score = mustReturn
        ? Infinity
        : weights.baseWeight * (agent.inventoryLoad / agent.inventoryCapacity) -
          weights.distanceWeight * normalizedDistance(reach.cost) * pressure
      scored.push({ target, score, pathCost: reach.cost, path })
    }
  }

  // 5. Hazards, as negative utility around the agent
  for (const hazard of hazards) {
    const target: Target = { kind: "hazard", position: hazard.position, hazard }
    const d = manhattan(agent.position, hazard.position)
    const depth = (hazard.radius + 1 - Math.min(d, hazard.radius + 1)) / (hazard.radius + 1)
    scored.push({ target, score: 0 - weights.riskWeight * depth, pathCost: d, path: [] })
  }

  return scored.sort(compareCandidates)
}
