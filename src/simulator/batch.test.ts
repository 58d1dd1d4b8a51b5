/**
 * Tests for batch.ts - Batch executor
 */

import { generateSeeds, runBatch } from "./batch.js"
import { cautiousProfile, defaultProfile } from "./profiles.js"

describe("batch", () => {
  describe("generateSeeds", () => {
    it("numbers seeds from zero", () => {
      expect(generateSeeds(3)).toEqual(["seed-0", "seed-1", "seed-2"])
    })
  })

  describe("runBatch", () => {
    it("runs every seed against every profile", () => {
      const result = runBatch({
        seeds: ["a", "b"],
        profiles: [defaultProfile, cautiousProfile],
        world: { roundTimeMs: 10000 },
      })

      expect(result.results).toHaveLength(4)
      expect(result.results.map((r) => `${r.seed}/${r.profileId}`)).toEqual([
        "a/default",
        "a/cautious",
        "b/default",
        "b/cautious",
      ])
    })

    it("aggregates per profile", () => {
      const result = runBatch({
        seedCount: 3,
        profiles: [defaultProfile],
        world: { roundTimeMs: 10000 },
      })

      const agg = result.aggregates.byProfile["default"]
      expect(agg.runCount).toBe(3)
      expect(agg.score.p10).toBeLessThanOrEqual(agg.score.p50)
      expect(agg.score.p50).toBeLessThanOrEqual(agg.score.p90)
    })

    it("reports progress after each run", () => {
      let calls = 0
      runBatch({
        seeds: ["a", "b", "c"],
        profiles: [defaultProfile],
        maxTicks: 3,
        onProgress: () => calls++,
      })

      expect(calls).toBe(3)
    })
  })
})
