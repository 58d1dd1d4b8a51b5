/**
 * WebSocket Protocol Types
 *
 * Messages exchanged between a game session and the decision server.
 */

import type { TickDecision } from "../types.js"

// ============================================================================
// Client -> Server Messages
//
// Note: every tick message is answered exactly once, with either a move or an
// aborted message carrying the same tickId.
// ============================================================================

/**
 * Ask for the move of one tick. `state` is validated by the engine, not here.
 * Server responds with: move (or aborted)
 */
export interface TickMessage {
  type: "tick"
  tickId: string
  state: unknown
}

/**
 * Cancel a tick that has not been answered yet.
 */
export interface AbortMessage {
  type: "abort"
  tickId: string
}

/**
 * Forget tick-to-tick memory, e.g. at the start of a new round.
 * Server responds with: reset_done
 */
export interface ResetMessage {
  type: "reset"
}

export type ClientMessage = TickMessage | AbortMessage | ResetMessage

// ============================================================================
// Server -> Client Messages
// ============================================================================

export interface MoveMessage {
  type: "move"
  tickId: string
  decision: TickDecision
}

export interface AbortedMessage {
  type: "aborted"
  tickId: string
}

export interface ResetDoneMessage {
  type: "reset_done"
}

export interface ErrorMessage {
  type: "error"
  message: string
}

export type ServerMessage = MoveMessage | AbortedMessage | ResetDoneMessage | ErrorMessage

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function isTickId(value: unknown): value is string {
  return typeof value === "string" && value.length > 0
}

export function validateClientMessage(message: unknown): ClientMessage | null {
  if (!isRecord(message)) {
    return null
  }

  switch (message.type) {
    case "tick":
      if (!isTickId(message.tickId) || !("state" in message)) {
        return null
      }
      return { type: "tick", tickId: message.tickId, state: message.state }

    case "abort":
      if (!isTickId(message.tickId)) {
        return null
      }
      return { type: "abort", tickId: message.tickId }

    case "reset":
      return { type: "reset" }

    default:
      return null
  }
}
