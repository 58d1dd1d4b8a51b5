/**
 * Snapshot validation
 *
 * Turns untrusted input (usually parsed JSON from the game session) into a
 * GameStateSnapshot, or a list of problems. The engine refuses to guess: any
 * problem means the tick is answered with Idle.
 */

import type {
  Agent,
  CollectibleItem,
  GameStateSnapshot,
  GridPosition,
  HazardButton,
  HazardEffect,
  Teleporter,
} from "./types.js"
import { positionKey, samePosition } from "./types.js"
import { InvalidStateSnapshotError } from "./errors.js"

export type SnapshotValidation =
  | { ok: true; snapshot: GameStateSnapshot }
  | { ok: false; problems: string[] }

const HAZARD_EFFECTS: readonly HazardEffect[] = ["reset-items", "drop-inventory", "relocate-agent"]

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value)
}

function isHazardEffect(value: unknown): value is HazardEffect {
  return HAZARD_EFFECTS.some((effect) => effect === value)
}

/**
 * Collects problems while reading fields, so one pass reports everything.
 */
class SnapshotReader {
  readonly problems: string[] = []

  constructor(
    private readonly width: number,
    private readonly height: number
  ) {}

  position(value: unknown, path: string): GridPosition | null {
    if (!isRecord(value) || !Number.isInteger(value.row) || !Number.isInteger(value.col)) {
      this.problems.push(`${path} must be { row, col } with integer coordinates`)
      return null
    }
    const row = Number(value.row)
    const col = Number(value.col)
    if (row < 0 || row >= this.height || col < 0 || col >= this.width) {
      this.problems.push(`${path} (${row},${col}) is outside the ${this.width}x${this.height} grid`)
      return null
    }
    return { row, col }
  }

  number(value: unknown, path: string, min: number): number | null {
    if (!isFiniteNumber(value) || value < min) {
      this.problems.push(`${path} must be a finite number >= ${min}`)
      return null
    }
    return value
  }

  id(value: unknown, path: string): string | null {
    if (typeof value !== "string" || value.length === 0) {
      this.problems.push(`${path} must be a non-empty string`)
      return null
    }
    return value
  }

  list(value: unknown, path: string): unknown[] {
    if (!Array.isArray(value)) {
      this.problems.push(`${path} must be an array`)
      return []
    }
    return value
  }

  agent(value: unknown): Agent | null {
    if (!isRecord(value)) {
      this.problems.push("agent must be an object")
      return null
    }
    const position = this.position(value.position, "agent.position")
    const inventoryLoad = this.number(value.inventoryLoad, "agent.inventoryLoad", 0)
    const inventoryCapacity = this.number(value.inventoryCapacity, "agent.inventoryCapacity", 0)
    const remainingTimeMs = this.number(value.remainingTimeMs, "agent.remainingTimeMs", 0)
    const base = value.base === undefined ? undefined : this.position(value.base, "agent.base")
    const carriedValue =
      value.carriedValue === undefined
        ? undefined
        : this.number(value.carriedValue, "agent.carriedValue", 0)

    if (
      position === null ||
      inventoryLoad === null ||
      inventoryCapacity === null ||
      remainingTimeMs === null ||
      base === null ||
      carriedValue === null
    ) {
      return null
    }
    if (inventoryLoad > inventoryCapacity) {
      this.problems.push(
        `agent.inventoryLoad ${inventoryLoad} exceeds agent.inventoryCapacity ${inventoryCapacity}`
      )
      return null
    }

    const agent: Agent = { position, inventoryLoad, inventoryCapacity, remainingTimeMs }
    if (base !== undefined) agent.base = base
    if (carriedValue !== undefined) agent.carriedValue = carriedValue
    return agent
  }

  item(value: unknown, path: string): CollectibleItem | null {
    if (!isRecord(value)) {
      this.problems.push(`${path} must be an object`)
      return null
    }
    const id = this.id(value.id, `${path}.id`)
    const position = this.position(value.position, `${path}.position`)
    const points = isFiniteNumber(value.value) && value.value > 0 ? value.value : null
    if (points === null) this.problems.push(`${path}.value must be a finite number > 0`)
    const weight =
      value.weight === undefined ? undefined : this.number(value.weight, `${path}.weight`, 0)

    if (id === null || position === null || points === null || weight === null) return null
    const item: CollectibleItem = { id, position, value: points }
    if (weight !== undefined) item.weight = weight
    return item
  }

  hazard(value: unknown, path: string): HazardButton | null {
    if (!isRecord(value)) {
      this.problems.push(`${path} must be an object`)
      return null
    }
    const id = this.id(value.id, `${path}.id`)
    const position = this.position(value.position, `${path}.position`)
    const radius =
      Number.isInteger(value.radius) && Number(value.radius) >= 0 ? Number(value.radius) : null
    if (radius === null) {
      this.problems.push(`${path}.radius must be an integer >= 0`)
    }
    const effect = isHazardEffect(value.effect) ? value.effect : null
    if (effect === null) {
      this.problems.push(`${path}.effect must be one of ${HAZARD_EFFECTS.join(", ")}`)
    }

    if (id === null || position === null || radius === null || effect === null) return null
    return { id, position, radius, effect }
  }

  teleporter(value: unknown, path: string): Teleporter | null {
    if (!isRecord(value)) {
      this.problems.push(`${path} must be an object`)
      return null
    }
    const id = this.id(value.id, `${path}.id`)
    const a = this.position(value.a, `${path}.a`)
    const b = this.position(value.b, `${path}.b`)
    const cost = value.cost === undefined ? undefined : this.number(value.cost, `${path}.cost`, 0)
    let bidirectional: boolean | undefined
    if (value.bidirectional !== undefined) {
      if (typeof value.bidirectional === "boolean") {
        bidirectional = value.bidirectional
      } else {
        this.problems.push(`${path}.bidirectional must be a boolean`)
        return null
      }
    }

    if (id === null || a === null || b === null || cost === null) return null
    if (samePosition(a, b)) {
      this.problems.push(`${path} links a cell to itself`)
      return null
    }
    const teleporter: Teleporter = { id, a, b }
    if (cost !== undefined) teleporter.cost = cost
    if (bidirectional !== undefined) teleporter.bidirectional = bidirectional
    return teleporter
  }
}

function collect<T>(
  values: unknown[],
  path: string,
  read: (value: unknown, path: string) => T | null
): T[] {
  const result: T[] = []
  values.forEach((value, index) => {
    const parsed = read(value, `${path}[${index}]`)
    if (parsed !== null) result.push(parsed)
  })
  return result
}

function duplicateIds(entries: readonly { id: string }[], path: string): string[] {
  const seen = new Set<string>()
  const problems: string[] = []
  for (const entry of entries) {
    if (seen.has(entry.id)) problems.push(`${path} has duplicate id "${entry.id}"`)
    seen.add(entry.id)
  }
  return problems
}

/**
 * Validate a raw snapshot. Every problem found is reported, not just the first.
 */
export function validateSnapshot(raw: unknown): SnapshotValidation {
  if (!isRecord(raw)) {
    return { ok: false, problems: ["snapshot must be an object"] }
  }

  const { width, height } = raw
  if (
    typeof width !== "number" ||
    typeof height !== "number" ||
    !Number.isInteger(width) ||
    !Number.isInteger(height) ||
    width < 1 ||
    height < 1
  ) {
    return { ok: false, problems: ["width and height must be positive integers"] }
  }

  const reader = new SnapshotReader(width, height)
  const agent = reader.agent(raw.agent)
  const items = collect(reader.list(raw.items, "items"), "items", (v, p) => reader.item(v, p))
  const hazards = collect(reader.list(raw.hazards, "hazards"), "hazards", (v, p) =>
    reader.hazard(v, p)
  )
  const teleporters = collect(reader.list(raw.teleporters, "teleporters"), "teleporters", (v, p) =>
    reader.teleporter(v, p)
  )
  const obstacles =
    raw.obstacles === undefined
      ? []
      : collect(reader.list(raw.obstacles, "obstacles"), "obstacles", (v, p) =>
          reader.position(v, p)
        )

  let tick: number | undefined
  if (raw.tick !== undefined) {
    if (Number.isInteger(raw.tick) && Number(raw.tick) >= 0) {
      tick = Number(raw.tick)
    } else {
      reader.problems.push("tick must be an integer >= 0")
    }
  }

  const problems = [
    ...reader.problems,
    ...duplicateIds(items, "items"),
    ...duplicateIds(hazards, "hazards"),
    ...duplicateIds(teleporters, "teleporters"),
  ]

  const blocked = new Set(obstacles.map(positionKey))
  if (agent && blocked.has(positionKey(agent.position))) {
    problems.push("agent.position is on an obstacle")
  }
  for (const teleporter of teleporters) {
    if (blocked.has(positionKey(teleporter.a)) || blocked.has(positionKey(teleporter.b))) {
      problems.push(`teleporter ${teleporter.id} has an endpoint on an obstacle`)
    }
  }

  if (problems.length > 0 || agent === null) {
    return { ok: false, problems }
  }

  const snapshot: GameStateSnapshot = { width, height, agent, items, hazards, teleporters, obstacles }
  if (tick !== undefined) snapshot.tick = tick
  return { ok: true, snapshot }
}

/**
 * Validate a raw snapshot and return it.
 *
 * @throws InvalidStateSnapshotError carrying every problem found
 */
export function parseSnapshot(raw: unknown): GameStateSnapshot {
  const validation = validateSnapshot(raw)
  if (!validation.ok) {
    throw new InvalidStateSnapshotError(validation.problems)
  }
  return validation.snapshot
}
