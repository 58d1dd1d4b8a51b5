/**
 * Decision Server
 *
 * Fastify app exposing the engine over HTTP and WebSocket.
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify"
import websocketPlugin from "@fastify/websocket"
import { Buffer } from "node:buffer"
import { DecisionEngine } from "../engine.js"
import type { EngineConfigInput } from "../config.js"
import { errorMessage } from "../errors.js"
import { WebSocketHandler } from "./websocket.js"
import type { ServerMessage } from "./protocol.js"

export interface ServerOptions {
  config?: EngineConfigInput
  logger?: FastifyServerOptions["logger"]
}

/**
 * Build the app without listening. The engine config is validated here, so a
 * bad config fails before any port is bound.
 *
 * @throws ConfigurationError when the config is invalid
 */
export async function buildServer(options: ServerOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? {}

  const fastify = Fastify({
    logger: options.logger ?? true,
  })

  // One engine for stateless HTTP callers; hysteresis spans their requests
  const httpEngine = new DecisionEngine({ config, logger: fastify.log })

  await fastify.register(websocketPlugin)

  fastify.post("/move", async (request) => {
    const decision = httpEngine.decide(request.body)
    return {
      move: decision.move,
      status: decision.status,
      ...(decision.target ? { target: decision.target } : {}),
      ...(decision.diagnostic ? { diagnostic: decision.diagnostic } : {}),
    }
  })

  // WebSocket route, one engine per connection
  fastify.get("/ws", { websocket: true }, (socket) => {
    const handler = new WebSocketHandler(config, fastify.log)

    const send = (msg: ServerMessage) => {
      if (socket.readyState === socket.OPEN) {
        socket.send(JSON.stringify(msg))
      }
    }

    fastify.log.info("WebSocket client connected")

    socket.on("message", (data: Buffer) => {
      handler.handleRawMessage(data.toString(), send).catch((error: unknown) => {
        const message = errorMessage(error)
        fastify.log.error(`WebSocket error: ${message}`)
        send({ type: "error", message })
      })
    })

    socket.on("close", () => {
      fastify.log.info("WebSocket client disconnected")
    })

    socket.on("error", (error: Error) => {
      fastify.log.error(`WebSocket error: ${error.message}`)
    })
  })

  // Health check endpoint
  fastify.get("/health", async () => {
    return { status: "ok" }
  })

  return fastify
}
