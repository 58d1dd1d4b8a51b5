import { createStuckDetector, DEFAULT_STUCK_WINDOW } from "./stuck-detection.js"
import { at } from "./test-helpers.js"

describe("createStuckDetector", () => {
  it("uses a window of 4 by default", () => {
    expect(DEFAULT_STUCK_WINDOW).toBe(4)
  })

  it("is not stuck initially", () => {
    expect(createStuckDetector(2).isStuck()).toBe(false)
  })

  it("trips after the window of moving ticks without progress", () => {
    const detector = createStuckDetector(2)

    detector.recordTick(at(1, 1), 0)
    detector.recordMove(true)
    detector.recordTick(at(1, 1), 0)
    detector.recordMove(true)
    expect(detector.isStuck()).toBe(false)

    detector.recordTick(at(1, 1), 0)
    expect(detector.isStuck()).toBe(true)
  })

  it("does not count idle ticks", () => {
    const detector = createStuckDetector(1)

    detector.recordTick(at(1, 1), 0)
    detector.recordMove(false)
    detector.recordTick(at(1, 1), 0)

    expect(detector.isStuck()).toBe(false)
  })

  it("treats a change of load as progress", () => {
    const detector = createStuckDetector(1)

    detector.recordTick(at(1, 1), 0)
    detector.recordMove(true)
    detector.recordTick(at(1, 1), 1)

    expect(detector.isStuck()).toBe(false)
  })

  it("starts over after a move", () => {
    const detector = createStuckDetector(2)

    detector.recordTick(at(1, 1), 0)
    detector.recordMove(true)
    detector.recordTick(at(1, 1), 0)
    detector.recordMove(true)
    detector.recordTick(at(1, 2), 0)
    detector.recordMove(true)
    detector.recordTick(at(1, 2), 0)

    expect(detector.isStuck()).toBe(false)
  })

  it("resets", () => {
    const detector = createStuckDetector(1)
    detector.recordTick(at(0, 0), 0)
    detector.recordMove(true)
    detector.recordTick(at(0, 0), 0)
    expect(detector.isStuck()).toBe(true)

    detector.reset()

    expect(detector.isStuck()).toBe(false)
  })
})
