// Core types
export type {
  GridPosition,
  ItemID,
  HazardID,
  TeleporterID,
  HazardEffect,
  CollectibleItem,
  HazardButton,
  Teleporter,
  Agent,
  GameStateSnapshot,
  Direction,
  Move,
  Target,
  TargetKind,
  PathStep,
  ScoredCandidate,
  WeightVector,
  FallbackMode,
  HazardPolicy,
  EngineConfig,
  TickStatus,
  TickDecision,
} from "./types.js"
export { DIRECTIONS, samePosition, positionKey, manhattan, targetId } from "./types.js"

// Decision loop
export { DecisionEngine, createDecisionEngine, silentLogger } from "./engine.js"
export type { Logger, DecisionEngineOptions, DecideOptions } from "./engine.js"

// Configuration
export {
  DEFAULT_WEIGHTS,
  DEFAULT_ENGINE_CONFIG,
  resolveEngineConfig,
  parseEngineConfigInput,
  loadEngineConfig,
} from "./config.js"
export type { EngineConfigInput } from "./config.js"

// Errors
export {
  ConfigurationError,
  InvalidStateSnapshotError,
  DeadlineExceededError,
  TickAbortedError,
  UnreachableTargetError,
} from "./errors.js"

// Building blocks
export { createSpatialModel } from "./spatial.js"
export type { SpatialLayout, SpatialModel, DistanceField, CostField, Reachability } from "./spatial.js"
export { scoreCandidates } from "./scorer.js"
export { selectCandidate, fallbackMove, compareCandidates } from "./selection.js"
export { validateSnapshot, parseSnapshot } from "./snapshot.js"
