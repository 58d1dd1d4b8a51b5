// Snapshot builders shared by the test suites

import type {
  Agent,
  CollectibleItem,
  GameStateSnapshot,
  GridPosition,
  HazardButton,
  Teleporter,
} from "./types.js"

export function at(row: number, col: number): GridPosition {
  return { row, col }
}

export function item(
  id: string,
  position: GridPosition,
  value = 1,
  weight?: number
): CollectibleItem {
  return weight === undefined ? { id, position, value } : { id, position, value, weight }
}

export function hazard(id: string, position: GridPosition, radius = 1): HazardButton {
  return { id, position, radius, effect: "reset-items" }
}

export function teleporter(id: string, a: GridPosition, b: GridPosition): Teleporter {
  return { id, a, b }
}

/**
 * A 5x5 board with the agent in the top-left corner, an empty inventory of 10
 * and a minute on the clock. Override whatever the test cares about.
 */
export function makeSnapshot(
  overrides: Partial<Omit<GameStateSnapshot, "agent">> & { agent?: Partial<Agent> } = {}
): GameStateSnapshot {
  const { agent, ...rest } = overrides
  return {
    width: 5,
    height: 5,
    items: [],
    hazards: [],
    teleporters: [],
    ...rest,
    agent: {
      position: at(0, 0),
      inventoryLoad: 0,
      inventoryCapacity: 10,
      remainingTimeMs: 60000,
      ...agent,
    },
  }
}
