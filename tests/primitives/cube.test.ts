import { describe, expect, it } from "vitest"
import { intersectCube } from "../../lib/primitives/intersectCube"
import { cube, expectVecClose } from "../fixtures/helpers"

const unitCube = cube([0, 0, 0], 1)
const none = [NaN, NaN, NaN] as const

describe("intersectCube", () => {
  it("hits a unit cube head-on at distance 4.5 with normal +Z", () => {
    const hit = intersectCube(unitCube, [0, 0, 5], [0, 0, -1])
    expect(hit?.distance).toBeCloseTo(4.5, 10)
    expectVecClose(hit?.point ?? none, [0, 0, 0.5])
    expectVecClose(hit?.normal ?? none, [0, 0, 1])
    expect(hit?.u).toBeCloseTo(0.5)
    expect(hit?.v).toBeCloseTo(0.5)
  })

  it("misses a ray that runs parallel to the cube outside its slab", () => {
    expect(intersectCube(unitCube, [2, 0, 5], [0, 0, -1])).toBeNull()
  })

  it("misses a cube behind the origin", () => {
    expect(intersectCube(unitCube, [0, 0, 5], [0, 0, 1])).toBeNull()
  })

  it("returns the exit face when the origin is inside", () => {
    const hit = intersectCube(unitCube, [0, 0, 0], [0, 0, -1])
    expect(hit?.distance).toBeCloseTo(0.5, 10)
    expectVecClose(hit?.point ?? none, [0, 0, -0.5])
    expectVecClose(hit?.normal ?? none, [0, 0, -1])
  })

  it("maps the +X face with u from z and v from y", () => {
    const hit = intersectCube(unitCube, [5, 0.25, -0.25], [-1, 0, 0])
    expect(hit?.distance).toBeCloseTo(4.5, 10)
    expectVecClose(hit?.normal ?? none, [1, 0, 0])
    expect(hit?.u).toBeCloseTo(0.25)
    expect(hit?.v).toBeCloseTo(0.75)
  })

  it("maps the +Y face with u from x and v from z", () => {
    const hit = intersectCube(unitCube, [0.25, 5, 0.1], [0, -1, 0])
    expectVecClose(hit?.normal ?? none, [0, 1, 0])
    expect(hit?.u).toBeCloseTo(0.75)
    expect(hit?.v).toBeCloseTo(0.6)
  })

  it("honours the cube center and size", () => {
    const big = cube([10, 0, 0], 4)
    const hit = intersectCube(big, [10, 0, 10], [0, 0, -1])
    expect(hit?.distance).toBeCloseTo(8, 10)
    expectVecClose(hit?.point ?? none, [10, 0, 2])
  })

  it("still hits when the ray runs inside a face plane (0/0 slab bound)", () => {
    const hit = intersectCube(unitCube, [0.5, 0, 5], [0, 0, -1])
    expect(hit?.distance).toBeCloseTo(4.5, 10)
    expectVecClose(hit?.point ?? none, [0.5, 0, 0.5])
  })

  describe("face choice on edges and corners", () => {
    it("picks the y face on an x/y edge", () => {
      const hit = intersectCube(unitCube, [5.5, 5.5, 0], [-1, -1, 0])
      expect(hit?.distance).toBeCloseTo(5, 10)
      expectVecClose(hit?.point ?? none, [0.5, 0.5, 0])
      expectVecClose(hit?.normal ?? none, [0, 1, 0])
    })

    it("picks the z face on an x/z edge", () => {
      const hit = intersectCube(unitCube, [5.5, 0, 5.5], [-1, 0, -1])
      expectVecClose(hit?.normal ?? none, [0, 0, 1])
    })

    it("picks the z face on a corner", () => {
      const hit = intersectCube(unitCube, [5.5, 5.5, 5.5], [-1, -1, -1])
      expectVecClose(hit?.point ?? none, [0.5, 0.5, 0.5])
      expectVecClose(hit?.normal ?? none, [0, 0, 1])
      expect(hit?.u).toBeCloseTo(1)
      expect(hit?.v).toBeCloseTo(1)
    })

    it("resolves a top-face corner hit to the z face", () => {
      const hit = intersectCube(unitCube, [0.5, 5, -0.5], [0, -1, 0])
      expect(hit?.distance).toBeCloseTo(4.5, 10)
      expectVecClose(hit?.normal ?? none, [0, 0, -1])
      expect(hit?.u).toBeCloseTo(1)
      expect(hit?.v).toBeCloseTo(1)
    })
  })
})
