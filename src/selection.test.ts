import {
  compareCandidates,
  deriveMove,
  directionBetween,
  fallbackMove,
  gridCentroid,
  isDestination,
  selectCandidate,
} from "./selection.js"
import { createSpatialModel } from "./spatial.js"
import type { ScoredCandidate, Target } from "./types.js"
import { at, hazard, item, teleporter } from "./test-helpers.js"

function collectible(
  id: string,
  row: number,
  col: number,
  score: number,
  pathCost = 1
): ScoredCandidate {
  const position = at(row, col)
  const target: Target = { kind: "collectible", position, item: item(id, position) }
  return { target, score, pathCost, path: [] }
}

function walking(candidate: ScoredCandidate, first: { row: number; col: number }): ScoredCandidate {
  return { ...candidate, path: [{ position: first, via: "step" }] }
}

describe("compareCandidates", () => {
  it("puts higher scores first", () => {
    const sorted = [collectible("a", 0, 0, 0.1), collectible("b", 0, 1, 0.9)].sort(
      compareCandidates
    )
    expect(sorted.map((c) => c.score)).toEqual([0.9, 0.1])
  })

  it("handles infinite scores", () => {
    const base: ScoredCandidate = {
      target: { kind: "base", position: at(4, 4) },
      score: Infinity,
      pathCost: 8,
      path: [],
    }
    const sorted = [collectible("a", 0, 0, 2), base].sort(compareCandidates)
    expect(sorted[0].target.kind).toBe("base")
  })

  it("breaks score ties by path cost", () => {
    const sorted = [collectible("far", 0, 0, 0.5, 4), collectible("near", 3, 3, 0.5, 2)].sort(
      compareCandidates
    )
    expect(sorted[0].pathCost).toBe(2)
  })

  it("breaks remaining ties by the smaller position", () => {
    const sorted = [collectible("b", 2, 0, 0.5), collectible("a", 0, 2, 0.5)].sort(
      compareCandidates
    )
    expect(sorted[0].target.position).toEqual(at(0, 2))
  })

  it("breaks same-cell ties by kind", () => {
    const portal: ScoredCandidate = {
      target: {
        kind: "teleporter",
        position: at(1, 1),
        exit: at(3, 3),
        teleporter: teleporter("t1", at(1, 1), at(3, 3)),
      },
      score: 0.5,
      pathCost: 1,
      path: [],
    }
    const sorted = [portal, collectible("a", 1, 1, 0.5)].sort(compareCandidates)
    expect(sorted[0].target.kind).toBe("collectible")
  })
})

describe("isDestination", () => {
  it("never sends the agent toward a hazard", () => {
    const danger: Target = { kind: "hazard", position: at(0, 0), hazard: hazard("h1", at(0, 0)) }
    expect(isDestination(danger)).toBe(false)
    expect(isDestination({ kind: "base", position: at(0, 0) })).toBe(true)
  })
})

describe("directionBetween", () => {
  it("maps neighbouring cells to directions", () => {
    expect(directionBetween(at(2, 2), at(1, 2))).toBe("Up")
    expect(directionBetween(at(2, 2), at(3, 2))).toBe("Down")
    expect(directionBetween(at(2, 2), at(2, 1))).toBe("Left")
    expect(directionBetween(at(2, 2), at(2, 3))).toBe("Right")
  })

  it("returns null for non-adjacent cells", () => {
    expect(directionBetween(at(0, 0), at(1, 1))).toBeNull()
  })
})

describe("deriveMove", () => {
  it("steps along the path", () => {
    expect(deriveMove(at(0, 0), walking(collectible("a", 0, 3, 1), at(0, 1)))).toBe("Right")
  })

  it("uses the teleporter when the path starts with a jump", () => {
    const candidate: ScoredCandidate = {
      ...collectible("a", 9, 9, 1),
      path: [
        { position: at(9, 8), via: "teleport" },
        { position: at(9, 9), via: "step" },
      ],
    }
    expect(deriveMove(at(0, 0), candidate)).toBe("UseTeleporter")
  })

  it("uses a teleporter target the agent is standing on", () => {
    const candidate: ScoredCandidate = {
      target: {
        kind: "teleporter",
        position: at(0, 0),
        exit: at(4, 4),
        teleporter: teleporter("t1", at(0, 0), at(4, 4)),
      },
      score: 0.3,
      pathCost: 0,
      path: [],
    }
    expect(deriveMove(at(0, 0), candidate)).toBe("UseTeleporter")
  })
})

describe("selectCandidate", () => {
  it("returns null when there are no destinations", () => {
    const danger: ScoredCandidate = {
      target: { kind: "hazard", position: at(1, 1), hazard: hazard("h1", at(1, 1)) },
      score: 0,
      pathCost: 2,
      path: [],
    }
    expect(selectCandidate([danger], at(0, 0))).toBeNull()
  })

  it("moves on from an item under the agent", () => {
    const here = collectible("here", 0, 0, 1, 0)
    const next = walking(collectible("next", 1, 0, 0.5), at(1, 0))

    const selection = selectCandidate([here, next], at(0, 0))

    expect(selection?.move).toBe("Down")
    expect(selection?.candidate.target.position).toEqual(at(1, 0))
  })

  it("keeps the previous target within the hysteresis margin", () => {
    const best = walking(collectible("best", 0, 2, 0.64), at(0, 1))
    const previous = walking(collectible("previous", 2, 0, 0.6), at(1, 0))

    const selection = selectCandidate([best, previous], at(0, 0), {
      previousTargetId: "previous",
      hysteresisMargin: 0.05,
    })

    expect(selection?.move).toBe("Down")
    expect(selection?.kept).toBe(true)
  })

  it("switches when the new best is clearly better", () => {
    const best = walking(collectible("best", 0, 2, 0.8), at(0, 1))
    const previous = walking(collectible("previous", 2, 0, 0.6), at(1, 0))

    const selection = selectCandidate([best, previous], at(0, 0), {
      previousTargetId: "previous",
      hysteresisMargin: 0.05,
    })

    expect(selection?.move).toBe("Right")
    expect(selection?.kept).toBe(false)
  })
})

describe("fallback", () => {
  it("finds the centre cell, rounding toward the top-left", () => {
    expect(gridCentroid(5, 5)).toEqual(at(2, 2))
    expect(gridCentroid(4, 6)).toEqual(at(2, 1))
  })

  it("idles in idle mode", () => {
    expect(fallbackMove("idle", 5, 5, null)).toBe("Idle")
  })

  it("heads for the centre in centroid mode", () => {
    const model = createSpatialModel({ width: 5, height: 5, teleporters: [] })
    expect(fallbackMove("centroid", 5, 5, model.searchFrom(at(0, 0)))).toBe("Down")
    expect(fallbackMove("centroid", 5, 5, model.searchFrom(at(2, 4)))).toBe("Left")
  })

  it("idles at the centre", () => {
    const model = createSpatialModel({ width: 5, height: 5, teleporters: [] })
    expect(fallbackMove("centroid", 5, 5, model.searchFrom(at(2, 2)))).toBe("Idle")
  })

  it("idles without distances", () => {
    expect(fallbackMove("centroid", 5, 5, null)).toBe("Idle")
  })
})
