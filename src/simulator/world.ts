/**
 * Simulated board
 *
 * Generates a seeded board and applies moves to it with the game's rules:
 * - stepping off the grid or into an obstacle wastes the move
 * - entering an item's cell picks it up if it fits in the inventory
 * - entering the base banks everything carried
 * - UseTeleporter on an endpoint jumps to the linked cell
 * - entering a hazard's cell triggers its effect
 * Every move, including Idle, costs one move duration of round time.
 */

import type {
  CollectibleItem,
  GameStateSnapshot,
  GridPosition,
  HazardButton,
  Move,
  Teleporter,
} from "../types.js"
import { DIRECTION_OFFSETS, positionKey, samePosition } from "../types.js"
import { createRng, pick, rollChance, rollInt, type RngState } from "../rng.js"
import type { StepResult, World, WorldOptions } from "./types.js"

export const DEFAULT_WORLD_OPTIONS: WorldOptions = {
  width: 15,
  height: 15,
  inventoryCapacity: 5,
  roundTimeMs: 60000,
  moveDurationMs: 1000,
  itemCount: 12,
  minItems: 6,
  hazardCount: 1,
  hazardRadius: 1,
  teleporterPairs: 1,
  obstacleCount: 6,
}

// Share of items worth 2 points (and taking 2 slots)
const HIGH_VALUE_CHANCE = 0.25

// ============================================================================
// Cell Helpers
// ============================================================================

function occupiedKeys(world: World): Set<string> {
  const keys = new Set<string>()
  keys.add(positionKey(world.agent.position))
  keys.add(positionKey(world.agent.base))
  for (const item of world.items) keys.add(positionKey(item.position))
  for (const hazard of world.hazards) keys.add(positionKey(hazard.position))
  for (const teleporter of world.teleporters) {
    keys.add(positionKey(teleporter.a))
    keys.add(positionKey(teleporter.b))
  }
  for (const obstacle of world.obstacles) keys.add(positionKey(obstacle))
  return keys
}

function randomFreeCell(
  rng: RngState,
  options: WorldOptions,
  occupied: ReadonlySet<string>
): GridPosition | undefined {
  const free: GridPosition[] = []
  for (let row = 0; row < options.height; row++) {
    for (let col = 0; col < options.width; col++) {
      if (!occupied.has(positionKey({ row, col }))) free.push({ row, col })
    }
  }
  return pick(rng, free)
}

function spawnItem(world: World): boolean {
  const cell = randomFreeCell(world.rng, world.options, occupiedKeys(world))
  if (!cell) return false
  const value = rollChance(world.rng, HIGH_VALUE_CHANCE) ? 2 : 1
  world.items.push({ id: `item-${world.nextItemId++}`, position: cell, value, weight: value })
  return true
}

function spawnItems(world: World, count: number): void {
  for (let i = 0; i < count; i++) {
    if (!spawnItem(world)) break
  }
}

// ============================================================================
// World Creation
// ============================================================================

/**
 * Create a fresh board from a seed. Identical seeds and options give
 * identical boards.
 */
export function createWorld(seed: string, overrides: Partial<WorldOptions> = {}): World {
  const options: WorldOptions = { ...DEFAULT_WORLD_OPTIONS, ...overrides }
  const rng = createRng(seed)
  const base: GridPosition = {
    row: rollInt(rng, 0, options.height - 1),
    col: rollInt(rng, 0, options.width - 1),
  }

  const world: World = {
    seed,
    rng,
    options,
    tick: 0,
    score: 0,
    agent: {
      position: { ...base },
      base,
      inventoryLoad: 0,
      inventoryCapacity: options.inventoryCapacity,
      carriedValue: 0,
      remainingTimeMs: options.roundTimeMs,
    },
    items: [],
    hazards: [],
    teleporters: [],
    obstacles: [],
    nextItemId: 0,
  }

  for (let i = 0; i < options.obstacleCount; i++) {
    const cell = randomFreeCell(rng, options, occupiedKeys(world))
    if (!cell) break
    world.obstacles.push(cell)
  }

  for (let i = 0; i < options.teleporterPairs; i++) {
    const a = randomFreeCell(rng, options, occupiedKeys(world))
    if (!a) break
    const occupied = occupiedKeys(world)
    occupied.add(positionKey(a))
    const b = randomFreeCell(rng, options, occupied)
    if (!b) break
    world.teleporters.push({ id: `teleporter-${i}`, a, b })
  }

  for (let i = 0; i < options.hazardCount; i++) {
    const cell = randomFreeCell(rng, options, occupiedKeys(world))
    if (!cell) break
    world.hazards.push({
      id: `hazard-${i}`,
      position: cell,
      radius: options.hazardRadius,
      effect: "reset-items",
    })
  }

  spawnItems(world, options.itemCount)
  return world
}

// ============================================================================
// Snapshot
// ============================================================================

/**
 * The engine-facing view of the world. Everything is copied so the engine
 * cannot reach back into simulator state.
 */
export function toSnapshot(world: World): GameStateSnapshot {
  const copy = (pos: GridPosition): GridPosition => ({ row: pos.row, col: pos.col })
  const { agent } = world

  return {
    tick: world.tick,
    width: world.options.width,
    height: world.options.height,
    agent: {
      position: copy(agent.position),
      inventoryLoad: agent.inventoryLoad,
      inventoryCapacity: agent.inventoryCapacity,
      remainingTimeMs: agent.remainingTimeMs,
      base: copy(agent.base),
      carriedValue: agent.carriedValue,
    },
    items: world.items.map((item): CollectibleItem => ({ ...item, position: copy(item.position) })),
    hazards: world.hazards.map((h): HazardButton => ({ ...h, position: copy(h.position) })),
    teleporters: world.teleporters.map(
      (t): Teleporter => ({ ...t, a: copy(t.a), b: copy(t.b) })
    ),
    obstacles: world.obstacles.map(copy),
  }
}

// ============================================================================
// Stepping
// ============================================================================

function teleportExit(world: World, position: GridPosition): GridPosition | null {
  for (const teleporter of world.teleporters) {
    if (samePosition(teleporter.a, position)) return teleporter.b
    if ((teleporter.bidirectional ?? true) && samePosition(teleporter.b, position)) {
      return teleporter.a
    }
  }
  return null
}

function isEnterable(world: World, pos: GridPosition): boolean {
  const { width, height } = world.options
  if (pos.row < 0 || pos.row >= height || pos.col < 0 || pos.col >= width) return false
  return !world.obstacles.some((o) => samePosition(o, pos))
}

/**
 * Apply the effects of arriving on the agent's current cell.
 */
function enterCell(world: World, result: StepResult): void {
  const { agent } = world

  const itemIndex = world.items.findIndex((item) => samePosition(item.position, agent.position))
  if (itemIndex >= 0) {
    const item = world.items[itemIndex]
    const weight = item.weight ?? 1
    if (agent.inventoryLoad + weight <= agent.inventoryCapacity) {
      world.items.splice(itemIndex, 1)
      agent.inventoryLoad += weight
      agent.carriedValue += item.value
      result.collected.push(item.id)
    }
  }

  if (samePosition(agent.position, agent.base) && agent.inventoryLoad > 0) {
    result.deposited = agent.carriedValue
    world.score += agent.carriedValue
    agent.carriedValue = 0
    agent.inventoryLoad = 0
  }

  const hazard = world.hazards.find((h) => samePosition(h.position, agent.position))
  if (hazard) {
    result.triggered = hazard.effect
    switch (hazard.effect) {
      case "reset-items":
        world.items = []
        spawnItems(world, world.options.itemCount)
        break
      case "drop-inventory":
        agent.inventoryLoad = 0
        agent.carriedValue = 0
        break
      case "relocate-agent": {
        const cell = randomFreeCell(world.rng, world.options, occupiedKeys(world))
        if (cell) agent.position = cell
        break
      }
    }
  }
}

/**
 * Apply one move and advance the clock by one move duration.
 */
export function stepWorld(world: World, move: Move): StepResult {
  const { agent } = world
  const result: StepResult = {
    moved: false,
    teleported: false,
    collected: [],
    deposited: 0,
    triggered: null,
  }

  switch (move) {
    case "Idle":
      break
    case "UseTeleporter": {
      const exit = teleportExit(world, agent.position)
      if (exit) {
        agent.position = { ...exit }
        result.teleported = true
      }
      break
    }
    case "Up":
    case "Down":
    case "Left":
    case "Right": {
      const offset = DIRECTION_OFFSETS[move]
      const next = { row: agent.position.row + offset.row, col: agent.position.col + offset.col }
      if (isEnterable(world, next)) {
        agent.position = next
        result.moved = true
      }
      break
    }
  }

  if (result.moved || result.teleported) {
    enterCell(world, result)
  }

  if (world.items.length < world.options.minItems) {
    spawnItems(world, world.options.minItems - world.items.length)
  }

  world.tick++
  agent.remainingTimeMs = Math.max(0, agent.remainingTimeMs - world.options.moveDurationMs)
  return result
}
