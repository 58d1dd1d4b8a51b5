/**
 * Spatial Model
 *
 * The board as a graph: the 4-neighbour lattice (cost 1 per step) plus
 * teleporter edges. Obstacle cells are never entered. Shortest paths come from
 * Dijkstra with a deterministic tie order, which visits cells in plain BFS
 * order when every edge costs 1.
 */

import type { GridPosition, PathStep, Teleporter } from "./types.js"
import { DIRECTIONS, DIRECTION_OFFSETS, formatPosition, positionKey } from "./types.js"
import { ConfigurationError } from "./errors.js"

export interface SpatialLayout {
  width: number
  height: number
  teleporters: readonly Teleporter[]
  obstacles?: readonly GridPosition[]
}

export type Reachability = { reachable: true; cost: number } | { reachable: false }

/**
 * Costs from every cell to a fixed destination (or from a fixed origin).
 */
export interface CostField {
  costTo(pos: GridPosition): Reachability
}

/**
 * Single-source shortest paths from `origin`.
 */
export interface DistanceField extends CostField {
  readonly origin: GridPosition
  /** Steps after the origin, or null when unreachable. Empty for the origin itself. */
  pathTo(pos: GridPosition): PathStep[] | null
}

export interface SpatialModel {
  readonly width: number
  readonly height: number
  /** Lattice diameter, never less than 1 so it can be used as a divisor. */
  readonly diameter: number
  inBounds(pos: GridPosition): boolean
  isBlocked(pos: GridPosition): boolean
  /** Called periodically during a search; throw from it to stop the search. */
  searchFrom(origin: GridPosition, checkpoint?: () => void): DistanceField
  /** Cost from each cell to `destination`, over the reversed graph. */
  searchTo(destination: GridPosition, checkpoint?: () => void): CostField
}

interface Edge {
  to: number
  cost: number
  via: PathStep["via"]
}

const DEFAULT_TELEPORTER_COST = 1
const CHECKPOINT_INTERVAL = 256

// ============================================================================
// Priority Queue
// ============================================================================

interface QueueEntry {
  node: number
  cost: number
  seq: number
}

function entryLess(a: QueueEntry, b: QueueEntry): boolean {
  return a.cost < b.cost || (a.cost === b.cost && a.seq < b.seq)
}

/**
 * Binary min-heap keyed by (cost, insertion order).
 */
class MinHeap {
  private entries: QueueEntry[] = []

  get size(): number {
    return this.entries.length
  }

  push(entry: QueueEntry): void {
    const entries = this.entries
    entries.push(entry)
    let i = entries.length - 1
    while (i > 0) {
      const parent = (i - 1) >> 1
      if (!entryLess(entries[i], entries[parent])) break
      ;[entries[i], entries[parent]] = [entries[parent], entries[i]]
      i = parent
    }
  }

  pop(): QueueEntry | undefined {
    const entries = this.entries
    const top = entries[0]
    const last = entries.pop()
    if (entries.length > 0 && last !== undefined) {
      entries[0] = last
      let i = 0
      while (true) {
        const left = 2 * i + 1
        const right = left + 1
        let smallest = i
        if (left < entries.length && entryLess(entries[left], entries[smallest])) smallest = left
        if (right < entries.length && entryLess(entries[right], entries[smallest])) smallest = right
        if (smallest === i) break
        ;[entries[i], entries[smallest]] = [entries[smallest], entries[i]]
        i = smallest
      }
    }
    return top
  }
}

// ============================================================================
// Layout Validation
// ============================================================================

function validateLayout(layout: SpatialLayout): void {
  const { width, height } = layout
  if (!Number.isInteger(width) || width < 1 || !Number.isInteger(height) || height < 1) {
    throw new ConfigurationError(`Grid dimensions must be positive integers (got ${width}x${height})`)
  }

  const inside = (pos: GridPosition) =>
    Number.isInteger(pos.row) &&
    Number.isInteger(pos.col) &&
    pos.row >= 0 &&
    pos.row < height &&
    pos.col >= 0 &&
    pos.col < width

  const obstacleKeys = new Set<string>()
  for (const obstacle of layout.obstacles ?? []) {
    if (!inside(obstacle)) {
      throw new ConfigurationError(`Obstacle ${formatPosition(obstacle)} is outside the grid`)
    }
    obstacleKeys.add(positionKey(obstacle))
  }

  for (const teleporter of layout.teleporters) {
    for (const endpoint of [teleporter.a, teleporter.b]) {
      if (!inside(endpoint)) {
        throw new ConfigurationError(
          `Teleporter ${teleporter.id} endpoint ${formatPosition(endpoint)} is outside the ${width}x${height} grid`
        )
      }
      if (obstacleKeys.has(positionKey(endpoint))) {
        throw new ConfigurationError(
          `Teleporter ${teleporter.id} endpoint ${formatPosition(endpoint)} is on an obstacle`
        )
      }
    }
    if (positionKey(teleporter.a) === positionKey(teleporter.b)) {
      throw new ConfigurationError(`Teleporter ${teleporter.id} links a cell to itself`)
    }
    const cost = teleporter.cost ?? DEFAULT_TELEPORTER_COST
    if (!Number.isFinite(cost) || cost < 0) {
      throw new ConfigurationError(`Teleporter ${teleporter.id} has invalid cost ${cost}`)
    }
  }
}

/**
 * Stable identity of a layout, used to reuse a model across ticks.
 */
export function layoutKey(layout: SpatialLayout): string {
  return JSON.stringify([
    layout.width,
    layout.height,
    layout.teleporters.map((t) => [
      t.id,
      t.a.row,
      t.a.col,
      t.b.row,
      t.b.col,
      t.cost ?? DEFAULT_TELEPORTER_COST,
      t.bidirectional ?? true,
    ]),
    (layout.obstacles ?? []).map((o) => [o.row, o.col]),
  ])
}

// ============================================================================
// Model
// ============================================================================

/**
 * Build a spatial model for a layout.
 *
 * @throws ConfigurationError for bad dimensions, out-of-range or self-linked
 * teleporters, negative teleporter costs and out-of-range obstacles
 */
export function createSpatialModel(layout: SpatialLayout): SpatialModel {
  validateLayout(layout)

  const { width, height } = layout
  const cellCount = width * height
  const blocked = new Uint8Array(cellCount)
  const toIndex = (pos: GridPosition) => pos.row * width + pos.col
  const toPosition = (index: number): GridPosition => ({
    row: Math.floor(index / width),
    col: index % width,
  })

  for (const obstacle of layout.obstacles ?? []) {
    blocked[toIndex(obstacle)] = 1
  }

  const forward: Edge[][] = Array.from({ length: cellCount }, () => [])
  const reverse: Edge[][] = Array.from({ length: cellCount }, () => [])

  const addEdge = (from: number, to: number, cost: number, via: Edge["via"]) => {
    forward[from].push({ to, cost, via })
    reverse[to].push({ to: from, cost, via })
  }

  for (let index = 0; index < cellCount; index++) {
    if (blocked[index]) continue
    const pos = toPosition(index)
    for (const direction of DIRECTIONS) {
      const offset = DIRECTION_OFFSETS[direction]
      const row = pos.row + offset.row
      const col = pos.col + offset.col
      if (row < 0 || row >= height || col < 0 || col >= width) continue
      const next = row * width + col
      if (blocked[next]) continue
      forward[index].push({ to: next, cost: 1, via: "step" })
    }
  }
  // Lattice edges are symmetric, so the reverse lattice is the same list
  for (let index = 0; index < cellCount; index++) {
    for (const edge of forward[index]) {
      reverse[edge.to].push({ to: index, cost: edge.cost, via: edge.via })
    }
  }

  for (const teleporter of layout.teleporters) {
    const cost = teleporter.cost ?? DEFAULT_TELEPORTER_COST
    const a = toIndex(teleporter.a)
    const b = toIndex(teleporter.b)
    addEdge(a, b, cost, "teleport")
    if (teleporter.bidirectional ?? true) {
      addEdge(b, a, cost, "teleport")
    }
  }

  const inBounds = (pos: GridPosition) =>
    Number.isInteger(pos.row) &&
    Number.isInteger(pos.col) &&
    pos.row >= 0 &&
    pos.row < height &&
    pos.col >= 0 &&
    pos.col < width

  const isBlocked = (pos: GridPosition) => !inBounds(pos) || blocked[toIndex(pos)] === 1

  /**
   * Dijkstra from `source` over `edges`. Returns cost and parent arrays.
   */
  const search = (source: GridPosition, edges: Edge[][], checkpoint?: () => void) => {
    const cost = new Float64Array(cellCount).fill(Infinity)
    const parent = new Int32Array(cellCount).fill(-1)
    const parentVia = new Uint8Array(cellCount) // 0 = step, 1 = teleport

    if (isBlocked(source)) {
      return { cost, parent, parentVia }
    }

    const heap = new MinHeap()
    let seq = 0
    const start = toIndex(source)
    cost[start] = 0
    heap.push({ node: start, cost: 0, seq: seq++ })

    let popped = 0
    while (heap.size > 0) {
      const entry = heap.pop()
      if (entry === undefined) break
      if (entry.cost > cost[entry.node]) continue

      popped++
      if (checkpoint && popped % CHECKPOINT_INTERVAL === 0) {
        checkpoint()
      }

      for (const edge of edges[entry.node]) {
        const nextCost = entry.cost + edge.cost
        if (nextCost < cost[edge.to]) {
          cost[edge.to] = nextCost
          parent[edge.to] = entry.node
          parentVia[edge.to] = edge.via === "teleport" ? 1 : 0
          heap.push({ node: edge.to, cost: nextCost, seq: seq++ })
        }
      }
    }

    return { cost, parent, parentVia }
  }

  const costLookup = (cost: Float64Array) => (pos: GridPosition): Reachability => {
    if (!inBounds(pos)) return { reachable: false }
    const value = cost[toIndex(pos)]
    return Number.isFinite(value) ? { reachable: true, cost: value } : { reachable: false }
  }

  return {
    width,
    height,
    diameter: Math.max(1, width - 1 + (height - 1)),
    inBounds,
    isBlocked,

    searchFrom(origin: GridPosition, checkpoint?: () => void): DistanceField {
      const { cost, parent, parentVia } = search(origin, forward, checkpoint)
      const costTo = costLookup(cost)

      return {
        origin,
        costTo,
        pathTo(pos: GridPosition): PathStep[] | null {
          if (!costTo(pos).reachable) return null
          const steps: PathStep[] = []
          let index = toIndex(pos)
          while (parent[index] !== -1) {
            steps.push({
              position: toPosition(index),
              via: parentVia[index] === 1 ? "teleport" : "step",
            })
            index = parent[index]
          }
          return steps.reverse()
        },
      }
    },

    searchTo(destination: GridPosition, checkpoint?: () => void): CostField {
      const { cost } = search(destination, reverse, checkpoint)
      return { costTo: costLookup(cost) }
    },
  }
}
