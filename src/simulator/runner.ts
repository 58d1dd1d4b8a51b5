/**
 * Single-Run Executor
 *
 * Plays one simulated round:
 * 1. Creates a fresh board from the seed
 * 2. Asks the engine for a move every tick and applies it
 * 3. Collects metrics throughout the run
 * 4. Returns structured results
 */

import { createDecisionEngine } from "../engine.js"
import type { MoveRecord, RunConfig, RunResult } from "./types.js"
import { createWorld, stepWorld, toSnapshot } from "./world.js"
import { createMetricsCollector } from "./metrics.js"

export const DEFAULT_MAX_TICKS = 10000

/**
 * Run a single simulation with the given configuration.
 *
 * @throws ConfigurationError when the profile's config is invalid
 */
export function runSimulation(config: RunConfig): RunResult {
  const { seed, profile, onMove } = config
  const maxTicks = config.maxTicks ?? DEFAULT_MAX_TICKS
  const recordMoves = config.recordMoves ?? false

  const world = createWorld(seed, config.world)
  const engine = createDecisionEngine({
    config: { moveDurationMs: world.options.moveDurationMs, ...profile.config },
    logger: config.logger,
    now: config.now,
  })
  const metrics = createMetricsCollector()
  const moveLog: MoveRecord[] = []

  const buildResult = (reason: RunResult["terminationReason"]): RunResult => ({
    seed,
    profileId: profile.id,
    ...metrics.finalize(reason, world.score, world.tick),
    ...(recordMoves ? { moveLog } : {}),
  })

  while (true) {
    if (world.agent.remainingTimeMs <= 0) {
      return buildResult("time_up")
    }
    if (world.tick >= maxTicks) {
      return buildResult("max_ticks")
    }

    const tickBefore = world.tick
    const decision = engine.decide(toSnapshot(world))
    const step = stepWorld(world, decision.move)
    metrics.recordTick(decision.move, decision.status, step)

    if (recordMoves || onMove) {
      const record: MoveRecord = {
        tick: tickBefore,
        move: decision.move,
        status: decision.status,
        targetId: engine.currentTargetId,
        position: { ...world.agent.position },
        score: world.score,
        step,
      }
      if (recordMoves) {
        moveLog.push(record)
      }
      onMove?.(record)
    }
  }
}
