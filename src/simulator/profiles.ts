/**
 * Profile Registry
 *
 * Named engine configurations the simulator can compare.
 */

import type { EngineProfile } from "./types.js"

export const defaultProfile: EngineProfile = {
  id: "default",
  name: "Default weights",
  config: {},
}

/**
 * Stays well clear of hazards and never paths through their radius.
 */
export const cautiousProfile: EngineProfile = {
  id: "cautious",
  name: "Cautious",
  config: {
    weights: { riskWeight: 2.0 },
    hazardPolicy: "exclude",
  },
}

/**
 * Chases value over distance and ignores clustering.
 */
export const valueChaserProfile: EngineProfile = {
  id: "value-chaser",
  name: "Value Chaser",
  config: {
    weights: { valueWeight: 2.0, distanceWeight: 0.5, densityWeight: 0 },
  },
}

/**
 * Short hops between dense clusters.
 */
export const clusterProfile: EngineProfile = {
  id: "cluster",
  name: "Cluster Sweeper",
  config: {
    weights: { densityWeight: 1.0, distanceWeight: 1.5 },
    clusterRadius: 4,
  },
}

export const allProfiles: EngineProfile[] = [
  defaultProfile,
  cautiousProfile,
  valueChaserProfile,
  clusterProfile,
]

/**
 * Get a profile by ID.
 */
export function getProfileById(id: string): EngineProfile | undefined {
  return allProfiles.find((p) => p.id === id)
}
