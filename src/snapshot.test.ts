import { parseSnapshot, validateSnapshot } from "./snapshot.js"
import { InvalidStateSnapshotError } from "./errors.js"
import { at, hazard, item, makeSnapshot, teleporter } from "./test-helpers.js"

function problemsOf(raw: unknown): string[] {
  const result = validateSnapshot(raw)
  return result.ok ? [] : result.problems
}

describe("validateSnapshot", () => {
  it("accepts a well-formed snapshot", () => {
    const snapshot = makeSnapshot({
      tick: 3,
      items: [item("a", at(0, 1), 2, 1)],
      hazards: [hazard("h1", at(2, 2))],
      teleporters: [teleporter("t1", at(0, 4), at(4, 0))],
      obstacles: [at(3, 3)],
    })

    const result = validateSnapshot(JSON.parse(JSON.stringify(snapshot)))

    expect(result).toEqual({ ok: true, snapshot })
  })

  it("defaults missing obstacles to none", () => {
    const result = validateSnapshot(makeSnapshot())
    expect(result.ok && result.snapshot.obstacles).toEqual([])
  })

  it("rejects non-objects", () => {
    expect(problemsOf(null)).toEqual(["snapshot must be an object"])
    expect(problemsOf("state")).toEqual(["snapshot must be an object"])
  })

  it("rejects bad dimensions before anything else", () => {
    expect(problemsOf({ ...makeSnapshot(), width: 0 })).toEqual([
      "width and height must be positive integers",
    ])
  })

  it("rejects positions outside the grid", () => {
    const snapshot = makeSnapshot({ items: [item("a", at(7, 1))] })
    expect(problemsOf(snapshot)).toEqual(["items[0].position (7,1) is outside the 5x5 grid"])
  })

  it("rejects non-positive item values", () => {
    const snapshot = makeSnapshot({ items: [item("a", at(0, 1), 0)] })
    expect(problemsOf(snapshot)).toEqual(["items[0].value must be a finite number > 0"])
  })

  it("rejects a load above capacity", () => {
    const snapshot = makeSnapshot({ agent: { inventoryLoad: 11 } })
    expect(problemsOf(snapshot)).toEqual([
      "agent.inventoryLoad 11 exceeds agent.inventoryCapacity 10",
    ])
  })

  it("rejects unknown hazard effects", () => {
    const raw = {
      ...makeSnapshot(),
      hazards: [{ id: "h1", position: at(1, 1), radius: 1, effect: "explode" }],
    }
    expect(problemsOf(raw)).toEqual([
      "hazards[0].effect must be one of reset-items, drop-inventory, relocate-agent",
    ])
  })

  it("rejects duplicate ids", () => {
    const snapshot = makeSnapshot({ items: [item("a", at(0, 1)), item("a", at(0, 2))] })
    expect(problemsOf(snapshot)).toEqual(['items has duplicate id "a"'])
  })

  it("rejects an agent standing on an obstacle", () => {
    const snapshot = makeSnapshot({ obstacles: [at(0, 0)] })
    expect(problemsOf(snapshot)).toEqual(["agent.position is on an obstacle"])
  })

  it("rejects self-linked teleporters", () => {
    const snapshot = makeSnapshot({ teleporters: [teleporter("t1", at(1, 1), at(1, 1))] })
    expect(problemsOf(snapshot)).toEqual(["teleporters[0] links a cell to itself"])
  })

  it("reports every problem in one pass", () => {
    const raw = {
      width: 5,
      height: 5,
      agent: { position: at(0, 0), inventoryLoad: -1, inventoryCapacity: 10 },
      items: "none",
      hazards: [],
      teleporters: [],
    }

    expect(problemsOf(raw)).toEqual([
      "agent.inventoryLoad must be a finite number >= 0",
      "agent.remainingTimeMs must be a finite number >= 0",
      "items must be an array",
    ])
  })
})

describe("parseSnapshot", () => {
  it("returns the validated snapshot", () => {
    const snapshot = makeSnapshot({ items: [item("a", at(0, 1))] })
    expect(parseSnapshot(snapshot)).toEqual({ ...snapshot, obstacles: [] })
  })

  it("throws with the problems attached", () => {
    let caught: unknown
    try {
      parseSnapshot({})
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(InvalidStateSnapshotError)
    expect(caught instanceof InvalidStateSnapshotError && caught.problems).toEqual([
      "width and height must be positive integers",
    ])
  })
})
