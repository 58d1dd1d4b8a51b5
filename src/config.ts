/**
 * Engine configuration.
 *
 * The weight vector and tunables are supplied once at startup and stay fixed
 * for the engine's lifetime. Anything malformed is a ConfigurationError.
 */

import { readFileSync, existsSync } from "fs"
import { resolve } from "path"
import type { EngineConfig, WeightVector, FallbackMode, HazardPolicy } from "./types.js"
import { ConfigurationError, errorMessage } from "./errors.js"

export const DEFAULT_WEIGHTS: WeightVector = {
  valueWeight: 1.0,
  distanceWeight: 1.0,
  densityWeight: 0.25,
  riskWeight: 0.5,
  teleporterWeight: 0.5,
  baseWeight: 0.5,
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  weights: DEFAULT_WEIGHTS,
  tickBudgetMs: 50,
  maxCandidates: 64,
  moveDurationMs: 1000,
  clusterRadius: 3,
  clusterDecay: 1.5,
  timePressureThresholdMs: 15000,
  returnBufferMoves: 3,
  hysteresisMargin: 0.05,
  stuckWindow: 4,
  fallback: "idle",
  hazardPolicy: "penalize",
}

/**
 * Partial configuration as written by callers or config files.
 * Missing fields take their defaults.
 */
export type EngineConfigInput = Partial<Omit<EngineConfig, "weights">> & {
  weights?: Partial<WeightVector>
}

const WEIGHT_KEYS: readonly (keyof WeightVector)[] = [
  "valueWeight",
  "distanceWeight",
  "densityWeight",
  "riskWeight",
  "teleporterWeight",
  "baseWeight",
]

type NumericField = {
  [K in keyof EngineConfig]: EngineConfig[K] extends number ? K : never
}[keyof EngineConfig]

const NUMERIC_FIELDS: readonly NumericField[] = [
  "tickBudgetMs",
  "maxCandidates",
  "moveDurationMs",
  "clusterRadius",
  "clusterDecay",
  "timePressureThresholdMs",
  "returnBufferMoves",
  "hysteresisMargin",
  "stuckWindow",
]

const INTEGER_FIELDS: ReadonlySet<NumericField> = new Set([
  "maxCandidates",
  "clusterRadius",
  "returnBufferMoves",
  "stuckWindow",
])

const FALLBACK_MODES: readonly FallbackMode[] = ["idle", "centroid"]
const HAZARD_POLICIES: readonly HazardPolicy[] = ["penalize", "exclude"]

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function isFallbackMode(value: unknown): value is FallbackMode {
  return FALLBACK_MODES.some((mode) => mode === value)
}

function isHazardPolicy(value: unknown): value is HazardPolicy {
  return HAZARD_POLICIES.some((policy) => policy === value)
}

function isNumericField(key: string): key is NumericField {
  return NUMERIC_FIELDS.some((field) => field === key)
}

function isWeightKey(key: string): key is keyof WeightVector {
  return WEIGHT_KEYS.some((field) => field === key)
}

/**
 * Check a complete config for range problems. Returns one message per problem.
 */
export function validateEngineConfig(config: EngineConfig): string[] {
  const problems: string[] = []

  for (const key of WEIGHT_KEYS) {
    const weight = config.weights[key]
    if (!Number.isFinite(weight) || weight < 0) {
      problems.push(`weights.${key} must be a finite number >= 0 (got ${weight})`)
    }
  }

  for (const field of NUMERIC_FIELDS) {
    const value = config[field]
    if (!Number.isFinite(value)) {
      problems.push(`${field} must be a finite number (got ${value})`)
      continue
    }
    if (INTEGER_FIELDS.has(field) && !Number.isInteger(value)) {
      problems.push(`${field} must be an integer (got ${value})`)
    }
  }

  if (config.tickBudgetMs <= 0) problems.push("tickBudgetMs must be > 0")
  if (config.maxCandidates < 1) problems.push("maxCandidates must be >= 1")
  if (config.moveDurationMs <= 0) problems.push("moveDurationMs must be > 0")
  if (config.clusterRadius < 0) problems.push("clusterRadius must be >= 0")
  if (config.clusterDecay <= 0) problems.push("clusterDecay must be > 0")
  if (config.timePressureThresholdMs < 0) problems.push("timePressureThresholdMs must be >= 0")
  if (config.returnBufferMoves < 0) problems.push("returnBufferMoves must be >= 0")
  if (config.hysteresisMargin < 0) problems.push("hysteresisMargin must be >= 0")
  if (config.stuckWindow < 1) problems.push("stuckWindow must be >= 1")

  if (!isFallbackMode(config.fallback)) {
    problems.push(`fallback must be one of ${FALLBACK_MODES.join(", ")}`)
  }
  if (!isHazardPolicy(config.hazardPolicy)) {
    problems.push(`hazardPolicy must be one of ${HAZARD_POLICIES.join(", ")}`)
  }

  return problems
}

/**
 * Merge a partial config over the defaults and validate the result.
 *
 * @throws ConfigurationError listing every problem found
 */
export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const config: EngineConfig = {
    ...DEFAULT_ENGINE_CONFIG,
    ...input,
    weights: { ...DEFAULT_WEIGHTS, ...input.weights },
  }

  const problems = validateEngineConfig(config)
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid engine configuration: ${problems.join("; ")}`)
  }

  return config
}

/**
 * Check the shape of untrusted config (e.g. parsed JSON) and narrow it to an
 * EngineConfigInput. Ranges are checked later by resolveEngineConfig.
 */
export function parseEngineConfigInput(raw: unknown, source = "config"): EngineConfigInput {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${source}: expected a JSON object`)
  }

  const input: EngineConfigInput = {}
  const problems: string[] = []

  for (const [key, value] of Object.entries(raw)) {
    if (key === "weights") {
      if (!isRecord(value)) {
        problems.push("weights must be an object")
        continue
      }
      const weights: Partial<WeightVector> = {}
      for (const [weightKey, weight] of Object.entries(value)) {
        if (!isWeightKey(weightKey)) {
          problems.push(`unknown weight "${weightKey}"`)
        } else if (typeof weight !== "number") {
          problems.push(`weights.${weightKey} must be a number`)
        } else {
          weights[weightKey] = weight
        }
      }
      input.weights = weights
    } else if (key === "fallback") {
      if (isFallbackMode(value)) {
        input.fallback = value
      } else {
        problems.push(`fallback must be one of ${FALLBACK_MODES.join(", ")}`)
      }
    } else if (key === "hazardPolicy") {
      if (isHazardPolicy(value)) {
        input.hazardPolicy = value
      } else {
        problems.push(`hazardPolicy must be one of ${HAZARD_POLICIES.join(", ")}`)
      }
    } else if (isNumericField(key)) {
      if (typeof value === "number") {
        input[key] = value
      } else {
        problems.push(`${key} must be a number`)
      }
    } else {
      problems.push(`unknown field "${key}"`)
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`${source}: ${problems.join("; ")}`)
  }

  return input
}

/**
 * Load engine configuration from a JSON file.
 * A missing file means defaults; an unreadable or invalid one is fatal.
 */
export function loadEngineConfig(configPath?: string): EngineConfig {
  const path = configPath ?? resolve(process.cwd(), "engine-config.json")

  if (!existsSync(path)) {
    return resolveEngineConfig()
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"))
  } catch (error) {
    throw new ConfigurationError(`${path}: ${errorMessage(error)}`)
  }

  return resolveEngineConfig(parseEngineConfigInput(parsed, path))
}
