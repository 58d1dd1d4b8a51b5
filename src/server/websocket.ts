/**
 * WebSocket Handler
 *
 * Handles messages for one connection. Each WebSocketHandler owns its own
 * decision engine, so tick-to-tick memory never leaks between sessions.
 */

import { DecisionEngine, type Logger } from "../engine.js"
import type { EngineConfigInput } from "../config.js"
import type { ClientMessage, ServerMessage } from "./protocol.js"
import { validateClientMessage } from "./protocol.js"

export type SendFunction = (msg: ServerMessage) => void

export class WebSocketHandler {
  private readonly engine: DecisionEngine
  private readonly pending = new Map<string, AbortController>()
  private readonly logger: Logger | null

  /**
   * @throws ConfigurationError when the config is invalid
   */
  constructor(config: EngineConfigInput = {}, logger?: Logger) {
    this.logger = logger ?? null
    this.engine = new DecisionEngine({ config, logger })
  }

  /**
   * Number of ticks received but not yet answered.
   */
  pendingTicks(): number {
    return this.pending.size
  }

  /**
   * Handle an incoming message and send responses.
   */
  async handleMessage(message: ClientMessage, send: SendFunction): Promise<void> {
    switch (message.type) {
      case "tick":
        await this.handleTick(message.tickId, message.state, send)
        break

      case "abort":
        this.handleAbort(message.tickId)
        break

      case "reset":
        this.engine.reset()
        send({ type: "reset_done" })
        break
    }
  }

  /**
   * Handle a raw message string from WebSocket.
   * Validates and parses the message before processing.
   */
  async handleRawMessage(data: string, send: SendFunction): Promise<void> {
    let parsed: unknown
    try {
      parsed = JSON.parse(data)
    } catch {
      send({ type: "error", message: "Invalid JSON" })
      return
    }

    const message = validateClientMessage(parsed)
    if (!message) {
      send({ type: "error", message: "Invalid message format" })
      return
    }

    await this.handleMessage(message, send)
  }

  // ============================================================================
  // Message Handlers
  // ============================================================================

  private async handleTick(tickId: string, state: unknown, send: SendFunction): Promise<void> {
    if (this.pending.has(tickId)) {
      send({ type: "error", message: `Tick ${tickId} is already pending` })
      return
    }

    const controller = new AbortController()
    this.pending.set(tickId, controller)

    try {
      // Let an abort that arrived alongside this tick land first
      await new Promise<void>((resolve) => setImmediate(resolve))

      const decision = this.engine.decide(state, { signal: controller.signal })
      if (decision.status === "aborted") {
        this.logger?.info(`[ABORTED] tickId=${tickId}`)
        send({ type: "aborted", tickId })
        return
      }

      send({ type: "move", tickId, decision })
    } finally {
      this.pending.delete(tickId)
    }
  }

  private handleAbort(tickId: string): void {
    const controller = this.pending.get(tickId)
    if (!controller) {
      this.logger?.info(`[ABORT] tickId=${tickId} not pending`)
      return
    }
    controller.abort()
  }
}
