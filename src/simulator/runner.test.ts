/**
 * Tests for runner.ts - Single-run executor
 */

import { runSimulation } from "./runner.js"
import { cautiousProfile, defaultProfile } from "./profiles.js"
import type { MoveRecord } from "./types.js"
import { ConfigurationError } from "../errors.js"

const fixedClock = () => 0

describe("runner", () => {
  describe("runSimulation", () => {
    it("plays until the round time runs out", () => {
      const result = runSimulation({ seed: "test-seed-1", profile: defaultProfile, now: fixedClock })

      expect(result.seed).toBe("test-seed-1")
      expect(result.profileId).toBe("default")
      expect(result.terminationReason).toBe("time_up")
      // 60000ms round at 1000ms per move
      expect(result.totalTicks).toBe(60)
    })

    it("stops at max ticks", () => {
      const result = runSimulation({
        seed: "test-seed-2",
        profile: defaultProfile,
        maxTicks: 10,
        now: fixedClock,
      })

      expect(result.terminationReason).toBe("max_ticks")
      expect(result.totalTicks).toBe(10)
    })

    it("counts one move and one status per tick", () => {
      const result = runSimulation({ seed: "test-seed-3", profile: defaultProfile, now: fixedClock })

      const moves = Object.values(result.movesByType).reduce((sum, n) => sum + n, 0)
      const statuses = Object.values(result.ticksByStatus).reduce((sum, n) => sum + n, 0)
      expect(moves).toBe(result.totalTicks)
      expect(statuses).toBe(result.totalTicks)
    })

    it("never hands the engine an invalid snapshot", () => {
      const result = runSimulation({ seed: "test-seed-4", profile: defaultProfile, now: fixedClock })
      expect(result.ticksByStatus.invalid).toBe(0)
      expect(result.ticksByStatus.degraded).toBe(0)
    })

    it("is deterministic for a seed and profile", () => {
      const a = runSimulation({ seed: "repeat", profile: cautiousProfile, now: fixedClock })
      const b = runSimulation({ seed: "repeat", profile: cautiousProfile, now: fixedClock })
      expect(b).toEqual(a)
    })

    it("records the move log on request", () => {
      const result = runSimulation({
        seed: "test-seed-5",
        profile: defaultProfile,
        recordMoves: true,
        now: fixedClock,
      })

      expect(result.moveLog).toHaveLength(result.totalTicks)
      expect(result.moveLog?.[0].tick).toBe(0)
    })

    it("banks exactly what the deposits add up to", () => {
      const result = runSimulation({
        seed: "test-seed-6",
        profile: defaultProfile,
        recordMoves: true,
        now: fixedClock,
      })

      const deposited = (result.moveLog ?? []).reduce((sum, r) => sum + r.step.deposited, 0)
      expect(result.score).toBe(deposited)
    })

    it("streams moves to onMove without storing them", () => {
      const records: MoveRecord[] = []
      const result = runSimulation({
        seed: "test-seed-7",
        profile: defaultProfile,
        maxTicks: 5,
        onMove: (record) => records.push(record),
        now: fixedClock,
      })

      expect(records.map((r) => r.tick)).toEqual([0, 1, 2, 3, 4])
      expect(result.moveLog).toBeUndefined()
    })

    it("uses the world options it is given", () => {
      const result = runSimulation({
        seed: "test-seed-8",
        profile: defaultProfile,
        world: { roundTimeMs: 5000 },
        now: fixedClock,
      })

      expect(result.totalTicks).toBe(5)
    })

    it("rejects a profile with an invalid config", () => {
      expect(() =>
        runSimulation({
          seed: "test-seed-9",
          profile: { id: "broken", name: "Broken", config: { weights: { valueWeight: -1 } } },
        })
      ).toThrow(ConfigurationError)
    })
  })
})
