/**
 * Stuck Detection
 *
 * Rolling counter of consecutive moving decisions that left the agent where it
 * was (same cell, same load). When it reaches the window size the agent is
 * considered stuck on its current target.
 */

import type { GridPosition } from "./types.js"
import { samePosition } from "./types.js"

export const DEFAULT_STUCK_WINDOW = 4

export interface StuckDetector {
  /** Record the agent's state at the start of a tick, before deciding. */
  recordTick(position: GridPosition, inventoryLoad: number): void
  /** Record whether the move emitted this tick asked the agent to move. */
  recordMove(moving: boolean): void
  isStuck(): boolean
  reset(): void
}

/**
 * Create a new stuck detector with the specified window size.
 *
 * @param windowSize Consecutive ticks without progress before the detector trips
 */
export function createStuckDetector(windowSize: number = DEFAULT_STUCK_WINDOW): StuckDetector {
  let ticksWithoutProgress = 0
  let lastPosition: GridPosition | null = null
  let lastLoad = 0
  let lastMoveWasMoving = false

  return {
    recordTick(position: GridPosition, inventoryLoad: number): void {
      const unchanged =
        lastPosition !== null && samePosition(lastPosition, position) && lastLoad === inventoryLoad
      if (unchanged && lastMoveWasMoving) {
        ticksWithoutProgress++
      } else {
        ticksWithoutProgress = 0
      }
      lastPosition = position
      lastLoad = inventoryLoad
    },

    recordMove(moving: boolean): void {
      lastMoveWasMoving = moving
    },

    isStuck(): boolean {
      return ticksWithoutProgress >= windowSize
    },

    reset(): void {
      ticksWithoutProgress = 0
      lastPosition = null
      lastLoad = 0
      lastMoveWasMoving = false
    },
  }
}
