/**
 * Decision Loop
 *
 * Runs one tick: validate the snapshot, compute distances, score, select and
 * emit a move. Every tick ends in a move; only construction can throw.
 *
 * Memory carried between ticks is limited to the previous target (for
 * hysteresis) and the stuck detector. Both are updated once, at the end of a
 * tick that produced a move. Aborted and invalid ticks leave them untouched.
 */

import type { EngineConfig, GameStateSnapshot, Move, Target, TickDecision } from "./types.js"
import { formatPosition, targetId } from "./types.js"
import { resolveEngineConfig, type EngineConfigInput } from "./config.js"
import {
  DeadlineExceededError,
  InvalidStateSnapshotError,
  TickAbortedError,
  errorMessage,
} from "./errors.js"
import {
  createSpatialModel,
  layoutKey,
  type DistanceField,
  type SpatialLayout,
  type SpatialModel,
} from "./spatial.js"
import { scoreCandidates } from "./scorer.js"
import { fallbackMove, selectCandidate } from "./selection.js"
import { parseSnapshot } from "./snapshot.js"
import { createStuckDetector, type StuckDetector } from "./stuck-detection.js"

export interface Logger {
  info(msg: string): void
  warn(msg: string): void
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
}

export interface DecisionEngineOptions {
  config?: EngineConfigInput
  logger?: Logger
  /** Millisecond clock used for the tick budget. */
  now?: () => number
  /** Known board layout, validated up front so a bad one fails at startup. */
  layout?: SpatialLayout
}

export interface DecideOptions {
  signal?: AbortSignal
}

function describeTarget(target: Target): string {
  return `${target.kind}:${targetId(target)}@${formatPosition(target.position)}`
}

export class DecisionEngine {
  readonly config: EngineConfig
  private readonly logger: Logger
  private readonly now: () => number
  private readonly stuck: StuckDetector
  private modelCache: { key: string; model: SpatialModel } | null = null
  private previousTargetId: string | undefined
  private suppressedTargetId: string | undefined

  /**
   * @throws ConfigurationError when the config or the layout is malformed
   */
  constructor(options: DecisionEngineOptions = {}) {
    this.config = resolveEngineConfig(options.config)
    this.logger = options.logger ?? silentLogger
    this.now = options.now ?? Date.now
    this.stuck = createStuckDetector(this.config.stuckWindow)

    if (options.layout) {
      this.modelCache = {
        key: layoutKey(options.layout),
        model: createSpatialModel(options.layout),
      }
    }
  }

  /**
   * Target the engine is currently committed to, if any.
   */
  get currentTargetId(): string | undefined {
    return this.previousTargetId
  }

  /**
   * Forget everything carried between ticks (e.g. at the start of a round).
   */
  reset(): void {
    this.previousTargetId = undefined
    this.suppressedTargetId = undefined
    this.stuck.reset()
  }

  /**
   * Decide the move for one tick. Never throws.
   */
  decide(raw: unknown, options: DecideOptions = {}): TickDecision {
    const startedAt = this.now()
    const elapsed = () => this.now() - startedAt
    const { signal } = options

    const checkpoint = (stage: string) => {
      if (signal?.aborted) {
        throw new TickAbortedError(stage)
      }
      const ms = elapsed()
      if (ms > this.config.tickBudgetMs) {
        throw new DeadlineExceededError(stage, ms, this.config.tickBudgetMs)
      }
    }

    let snapshot: GameStateSnapshot
    try {
      snapshot = parseSnapshot(raw)
    } catch (error) {
      const diagnostic =
        error instanceof InvalidStateSnapshotError ? error.problems.join("; ") : errorMessage(error)
      this.logger.warn(`[INVALID] ${diagnostic}`)
      return { move: "Idle", status: "invalid", diagnostic, elapsedMs: elapsed() }
    }

    const { agent } = snapshot
    let fromAgent: DistanceField | null = null

    try {
      checkpoint("validation")
      const model = this.modelFor(snapshot)

      checkpoint("spatial")
      fromAgent = model.searchFrom(agent.position, () => checkpoint("spatial"))
      const toBase = agent.base ? model.searchTo(agent.base, () => checkpoint("spatial")) : null

      const suppressed =
        this.suppressedTargetId !== undefined ? new Set([this.suppressedTargetId]) : undefined
      const candidates = scoreCandidates({
        snapshot,
        model,
        fromAgent,
        toBase,
        config: this.config,
        suppressed,
        checkpoint,
      })

      checkpoint("selection")
      const selection = selectCandidate(candidates, agent.position, {
        previousTargetId: this.previousTargetId,
        hysteresisMargin: this.config.hysteresisMargin,
      })

      if (!selection) {
        const move = fallbackMove(this.config.fallback, snapshot.width, snapshot.height, fromAgent)
        this.commit(snapshot, move, null)
        this.logger.info(`[TICK] tick=${snapshot.tick ?? "-"} move=${move} fallback=no-candidates`)
        return { move, status: "fallback", elapsedMs: elapsed() }
      }

      const { candidate, move, kept } = selection
      this.commit(snapshot, move, targetId(candidate.target))
      this.logger.info(
        `[TICK] tick=${snapshot.tick ?? "-"} move=${move} target=${describeTarget(candidate.target)} score=${candidate.score.toFixed(3)}${kept ? " kept=previous" : ""}`
      )
      return {
        move,
        status: "decided",
        target: candidate.target,
        score: candidate.score,
        elapsedMs: elapsed(),
      }
    } catch (error) {
      if (error instanceof TickAbortedError) {
        this.logger.info(`[ABORTED] tick=${snapshot.tick ?? "-"} ${error.message}`)
        return { move: "Idle", status: "aborted", diagnostic: error.message, elapsedMs: elapsed() }
      }

      // Deadline or unexpected fault: answer with the safe move and carry on
      const move = fallbackMove(this.config.fallback, snapshot.width, snapshot.height, fromAgent)
      this.commit(snapshot, move, undefined)
      const diagnostic = errorMessage(error)
      const kind = error instanceof DeadlineExceededError ? "deadline" : "fault"
      this.logger.warn(`[DEGRADED] tick=${snapshot.tick ?? "-"} ${kind}: ${diagnostic} move=${move}`)
      return { move, status: "degraded", diagnostic, elapsedMs: elapsed() }
    }
  }

  private modelFor(snapshot: GameStateSnapshot): SpatialModel {
    const layout: SpatialLayout = {
      width: snapshot.width,
      height: snapshot.height,
      teleporters: snapshot.teleporters,
      obstacles: snapshot.obstacles,
    }
    const key = layoutKey(layout)
    if (this.modelCache?.key === key) {
      return this.modelCache.model
    }
    const model = createSpatialModel(layout)
    this.modelCache = { key, model }
    return model
  }

  /**
   * Update tick-to-tick memory. `target` null clears the previous target,
   * undefined leaves it as it was.
   */
  private commit(snapshot: GameStateSnapshot, move: Move, target: string | null | undefined): void {
    this.stuck.recordTick(snapshot.agent.position, snapshot.agent.inventoryLoad)
    this.stuck.recordMove(move !== "Idle")

    if (target !== undefined) {
      this.previousTargetId = target ?? undefined
    }
    this.suppressedTargetId = undefined

    if (this.stuck.isStuck() && this.previousTargetId !== undefined) {
      this.logger.warn(
        `[STUCK] no progress for ${this.config.stuckWindow} ticks, dropping target ${this.previousTargetId}`
      )
      this.suppressedTargetId = this.previousTargetId
      this.previousTargetId = undefined
      this.stuck.reset()
    }
  }
}

/**
 * Create a decision engine.
 *
 * @throws ConfigurationError when the config or the layout is malformed
 */
export function createDecisionEngine(options: DecisionEngineOptions = {}): DecisionEngine {
  return new DecisionEngine(options)
}
