/**
 * Server Entry Point
 */

import "dotenv/config"
import { loadEngineConfig } from "../config.js"
import { ConfigurationError } from "../errors.js"
import { buildServer } from "./app.js"

const PORT = parseInt(process.env.PORT ?? "8080", 10)
const HOST = process.env.HOST ?? "0.0.0.0"

async function startServer(): Promise<void> {
  const fastify = await buildServer({ config: loadEngineConfig(process.env.ENGINE_CONFIG) })

  try {
    await fastify.listen({ port: PORT, host: HOST })
    console.log(`Decision server listening on http://${HOST}:${PORT}`)
    console.log(`WebSocket available at ws://${HOST}:${PORT}/ws`)
  } catch (err) {
    fastify.log.error(err)
    process.exit(1)
  }
}

startServer().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error(`Configuration error: ${err.message}`)
  } else {
    console.error("Fatal error:", err)
  }
  process.exit(1)
})
