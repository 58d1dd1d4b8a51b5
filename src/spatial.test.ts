import { createSpatialModel, layoutKey } from "./spatial.js"
import { ConfigurationError } from "./errors.js"
import { at, teleporter } from "./test-helpers.js"

describe("createSpatialModel", () => {
  describe("validation", () => {
    it("rejects non-positive dimensions", () => {
      expect(() => createSpatialModel({ width: 0, height: 5, teleporters: [] })).toThrow(
        "Grid dimensions must be positive integers (got 0x5)"
      )
    })

    it("rejects teleporter endpoints outside the grid", () => {
      expect(() =>
        createSpatialModel({
          width: 5,
          height: 5,
          teleporters: [teleporter("t1", at(0, 0), at(5, 1))],
        })
      ).toThrow("Teleporter t1 endpoint (5,1) is outside the 5x5 grid")
    })

    it("rejects negative teleporter costs", () => {
      expect(() =>
        createSpatialModel({
          width: 5,
          height: 5,
          teleporters: [{ id: "t1", a: at(0, 0), b: at(4, 4), cost: -1 }],
        })
      ).toThrow(ConfigurationError)
    })

    it("rejects a teleporter that links a cell to itself", () => {
      expect(() =>
        createSpatialModel({
          width: 5,
          height: 5,
          teleporters: [teleporter("t1", at(2, 2), at(2, 2))],
        })
      ).toThrow("Teleporter t1 links a cell to itself")
    })

    it("rejects obstacles outside the grid", () => {
      expect(() =>
        createSpatialModel({ width: 3, height: 3, teleporters: [], obstacles: [at(-1, 0)] })
      ).toThrow("Obstacle (-1,0) is outside the grid")
    })
  })

  describe("diameter", () => {
    it("is the lattice diameter", () => {
      expect(createSpatialModel({ width: 5, height: 5, teleporters: [] }).diameter).toBe(8)
      expect(createSpatialModel({ width: 10, height: 3, teleporters: [] }).diameter).toBe(11)
    })

    it("is at least 1", () => {
      expect(createSpatialModel({ width: 1, height: 1, teleporters: [] }).diameter).toBe(1)
    })
  })

  describe("searchFrom", () => {
    it("gives Manhattan distances on an open board", () => {
      const model = createSpatialModel({ width: 5, height: 5, teleporters: [] })
      const field = model.searchFrom(at(0, 0))

      expect(field.costTo(at(0, 3))).toEqual({ reachable: true, cost: 3 })
      expect(field.costTo(at(4, 4))).toEqual({ reachable: true, cost: 8 })
      expect(field.costTo(at(0, 0))).toEqual({ reachable: true, cost: 0 })
    })

    it("returns an empty path to the origin", () => {
      const model = createSpatialModel({ width: 5, height: 5, teleporters: [] })
      expect(model.searchFrom(at(2, 2)).pathTo(at(2, 2))).toEqual([])
    })

    it("reports cells outside the grid as unreachable", () => {
      const model = createSpatialModel({ width: 5, height: 5, teleporters: [] })
      const field = model.searchFrom(at(0, 0))

      expect(field.costTo(at(9, 9))).toEqual({ reachable: false })
      expect(field.pathTo(at(9, 9))).toBeNull()
    })

    it("expands neighbours in Up, Down, Left, Right order", () => {
      const model = createSpatialModel({ width: 5, height: 5, teleporters: [] })
      const path = model.searchFrom(at(0, 0)).pathTo(at(2, 2))

      expect(path).toEqual([
        { position: at(1, 0), via: "step" },
        { position: at(2, 0), via: "step" },
        { position: at(2, 1), via: "step" },
        { position: at(2, 2), via: "step" },
      ])
    })

    it("walks around obstacles", () => {
      // Wall across column 1 except the bottom row
      const model = createSpatialModel({
        width: 3,
        height: 3,
        teleporters: [],
        obstacles: [at(0, 1), at(1, 1)],
      })
      const field = model.searchFrom(at(0, 0))

      expect(field.costTo(at(0, 2))).toEqual({ reachable: true, cost: 6 })
      expect(field.pathTo(at(0, 2))?.[0]).toEqual({ position: at(1, 0), via: "step" })
      expect(field.costTo(at(0, 1))).toEqual({ reachable: false })
    })

    it("marks walled-off cells unreachable", () => {
      const model = createSpatialModel({
        width: 3,
        height: 3,
        teleporters: [],
        obstacles: [at(0, 1), at(1, 1), at(2, 1)],
      })
      const field = model.searchFrom(at(0, 0))

      expect(field.costTo(at(0, 2))).toEqual({ reachable: false })
      expect(field.pathTo(at(0, 2))).toBeNull()
    })

    it("takes a teleporter when it is shorter", () => {
      const model = createSpatialModel({
        width: 10,
        height: 1,
        teleporters: [teleporter("t1", at(0, 0), at(0, 9))],
      })
      const field = model.searchFrom(at(0, 0))

      expect(field.costTo(at(0, 8))).toEqual({ reachable: true, cost: 2 })
      expect(field.pathTo(at(0, 8))).toEqual([
        { position: at(0, 9), via: "teleport" },
        { position: at(0, 8), via: "step" },
      ])
    })

    it("honours the teleporter cost", () => {
      const model = createSpatialModel({
        width: 10,
        height: 1,
        teleporters: [{ id: "t1", a: at(0, 0), b: at(0, 9), cost: 20 }],
      })

      expect(model.searchFrom(at(0, 0)).costTo(at(0, 9))).toEqual({ reachable: true, cost: 9 })
    })

    it("only goes a -> b on a one-way teleporter", () => {
      const model = createSpatialModel({
        width: 10,
        height: 1,
        teleporters: [{ id: "t1", a: at(0, 0), b: at(0, 9), bidirectional: false }],
      })

      expect(model.searchFrom(at(0, 0)).costTo(at(0, 9))).toEqual({ reachable: true, cost: 1 })
      expect(model.searchFrom(at(0, 9)).costTo(at(0, 0))).toEqual({ reachable: true, cost: 9 })
    })

    it("calls the checkpoint while searching large boards", () => {
      const model = createSpatialModel({ width: 20, height: 20, teleporters: [] })
      const checkpoint = jest.fn()

      model.searchFrom(at(0, 0), checkpoint)

      expect(checkpoint).toHaveBeenCalledTimes(1)
    })

    it("stops when the checkpoint throws", () => {
      const model = createSpatialModel({ width: 20, height: 20, teleporters: [] })

      expect(() =>
        model.searchFrom(at(0, 0), () => {
          throw new Error("stop")
        })
      ).toThrow("stop")
    })
  })

  describe("searchTo", () => {
    it("measures cost toward the destination over the reversed graph", () => {
      const model = createSpatialModel({
        width: 10,
        height: 1,
        teleporters: [{ id: "t1", a: at(0, 0), b: at(0, 9), bidirectional: false }],
      })

      expect(model.searchTo(at(0, 9)).costTo(at(0, 0))).toEqual({ reachable: true, cost: 1 })
      expect(model.searchTo(at(0, 0)).costTo(at(0, 9))).toEqual({ reachable: true, cost: 9 })
    })
  })
})

describe("layoutKey", () => {
  it("matches for identical layouts", () => {
    const a = { width: 5, height: 5, teleporters: [teleporter("t1", at(0, 0), at(4, 4))] }
    const b = { width: 5, height: 5, teleporters: [teleporter("t1", at(0, 0), at(4, 4))] }
    expect(layoutKey(a)).toBe(layoutKey(b))
  })

  it("changes when an obstacle is added", () => {
    const open = { width: 5, height: 5, teleporters: [] }
    expect(layoutKey(open)).not.toBe(layoutKey({ ...open, obstacles: [at(1, 1)] }))
  })
})
