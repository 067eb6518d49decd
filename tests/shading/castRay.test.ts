import { describe, expect, it } from "vitest"
import type { Vector3 } from "../../lib/math/vector3"
import { castRay } from "../../lib/shading/castRay"
import { proceduralSky } from "../../lib/shading/skyboxColor"
import type { TextureLookup } from "../../lib/texture/TextureLookup"
import { TextureManager } from "../../lib/texture/TextureManager"
import { createUint8Bitmap } from "../../lib/image/createUint8Bitmap"
import {
  cube,
  expectVecClose,
  sphere,
  traceContext,
  whiteLight,
} from "../fixtures/helpers"

const SKY_AHEAD: Vector3 = [0.7, 0.8, 1]

function solidTexture(r: number, g: number, b: number) {
  const bitmap = createUint8Bitmap(1, 1)
  bitmap.data.set([r, g, b, 255])
  return bitmap
}

describe("castRay", () => {
  it("returns the environment color when nothing is hit", () => {
    const color = castRay([0, 0, 0], [0, 0, -1], traceContext([]))
    expectVecClose(color, proceduralSky([0, 0, -1]))
    expectVecClose(color, SKY_AHEAD)
  })

  it("returns the environment color for a miss in any direction", () => {
    const ctx = traceContext([sphere([0, 0, -3], 1)])
    const directions = [
      [0, 1, 0],
      [0, -1, 0],
      [1, 0, 0],
      [0, 0, 1],
      [1, 1, 1],
      [-0.3, -0.2, 0.9],
    ] as const
    for (const direction of directions) {
      expectVecClose(
        castRay([0, 0, 0], direction, ctx),
        proceduralSky(direction),
      )
    }
  })

  it("returns the environment color once depth passes the limit", () => {
    const ctx = traceContext([sphere([0, 0, -3], 1, { diffuse: [1, 0, 0] })])
    expectVecClose(castRay([0, 0, 0], [0, 0, -1], ctx, 4), SKY_AHEAD)
    expect(castRay([0, 0, 0], [0, 0, -1], ctx, 3)[1]).not.toBeCloseTo(0.8)
  })

  it("shades a lit diffuse sphere with its diffuse color", () => {
    const ctx = traceContext(
      [sphere([0, 0, -3], 1, { diffuse: [1, 0.5, 0.25] })],
      whiteLight([0, 0, 10]),
    )
    expectVecClose(castRay([0, 0, 0], [0, 0, -1], ctx), [1, 0.5, 0.25])
  })

  it("tints the specular highlight with the light color", () => {
    const ctx = traceContext(
      [sphere([0, 0, -3], 1, { specular: 50, albedo: [0, 1, 0, 0] })],
      { position: [0, 0, 10], color: [255, 200, 100], intensity: 1 },
    )
    expectVecClose(castRay([0, 0, 0], [0, 0, -1], ctx), [1, 200 / 255, 100 / 255])
  })

  it("scales diffuse light by the light intensity", () => {
    const ctx = traceContext(
      [sphere([0, 0, -3], 1, { diffuse: [0.5, 0.5, 0.5] })],
      whiteLight([0, 0, 10], 1.5),
    )
    expectVecClose(castRay([0, 0, 0], [0, 0, -1], ctx), [0.75, 0.75, 0.75])
  })

  describe("shadows", () => {
    const target = () =>
      sphere([0, 0, -3], 1, { emissive: [0.1, 0.2, 0.3] })

    it("adds direct light when the path to the light is clear", () => {
      const ctx = traceContext([target()], whiteLight([0, 0, 10]))
      expectVecClose(castRay([0, 0, 0], [0, 0, -1], ctx), [1.1, 1.2, 1.3])
    })

    it("leaves only the emissive term when an occluder blocks the light", () => {
      const occluder = sphere([0, 0, 5], 1)
      const ctx = traceContext([target(), occluder], whiteLight([0, 0, 10]))
      expectVecClose(castRay([0, 0, 0], [0, 0, -1], ctx), [0.1, 0.2, 0.3])
    })
  })

  it("reflects the environment off a perfect mirror", () => {
    const ctx = traceContext([sphere([0, 0, -3], 1, { albedo: [0, 0, 1, 0] })])
    expectVecClose(castRay([0, 0, 0], [0, 0, -1], ctx), SKY_AHEAD)
  })

  it("blends local and reflected color without renormalizing", () => {
    const ctx = traceContext(
      [sphere([0, 0, -3], 1, { diffuse: [1, 0, 0], albedo: [0.5, 0, 0.5, 0] })],
      whiteLight([0, 0, 10]),
    )
    // phong (0.5, 0, 0) * 0.5 + sky (0.7, 0.8, 1) * 0.5
    expectVecClose(castRay([0, 0, 0], [0, 0, -1], ctx), [0.6, 0.4, 0.5])
  })

  it("stops bouncing between facing mirrors after the depth limit", () => {
    let samples = 0
    const skyTexture: TextureLookup = {
      getTexture: () => ({ width: 2, height: 2 }),
      getPixelColor: () => {
        samples++
        return [2, 1, 0]
      },
      getNormalFromMap: () => null,
    }
    const mirror = { albedo: [0, 0, 1, 0] } as const
    const ctx = traceContext(
      [cube([0, 0, -3], 2, mirror), cube([0, 0, 3], 2, mirror)],
      whiteLight([0, 10, 0]),
      skyTexture,
      "sky",
    )
    expectVecClose(castRay([0, 0, 0], [0, 0, -1], ctx), [2, 1, 0])
    expect(samples).toBe(1)
  })

  it("passes straight through glass at normal incidence", () => {
    const ctx = traceContext([
      sphere([0, 0, -3], 1, { albedo: [0, 0, 0, 1], refractiveIndex: 1.5 }),
    ])
    expectVecClose(castRay([0, 0, 0], [0, 0, -1], ctx), SKY_AHEAD)
  })

  it("falls back to reflection on total internal reflection", () => {
    const glass = cube([0, 0, 0], 2, {
      albedo: [0, 0, 0, 1],
      refractiveIndex: 1.5,
    })
    const ctx = traceContext([glass])
    // Past the critical angle on the +X face, then out through +Z
    const color = castRay(
      [0.5, 0, -0.9],
      [Math.sqrt(0.4), 0, Math.sqrt(0.6)],
      ctx,
    )
    expectVecClose(color, proceduralSky([-Math.sqrt(0.9), 0, Math.sqrt(0.1)]))
  })

  describe("textures", () => {
    it("uses the texture color in place of the diffuse color", () => {
      const textures = new TextureManager().loadTexture(
        "paint",
        solidTexture(255, 0, 51),
      )
      const ctx = traceContext(
        [cube([0, 0, 0], 1, { textureId: "paint" })],
        whiteLight([0, 10, 0]),
        textures,
      )
      expectVecClose(castRay([0, 5, 0], [0, -1, 0], ctx), [1, 0, 0.2])
    })

    it("lights with the normal-mapped normal", () => {
      const textures = new TextureManager().loadTexture(
        "bumps",
        solidTexture(0, 255, 255),
      )
      const ctx = traceContext(
        [cube([0, 0, 0], 1, { normalMapId: "bumps" })],
        whiteLight([0, 10, 0]),
        textures,
      )
      // tangent-space (-1, 1, 1) on a +Y face is world (-1, 1, -1) / sqrt(3)
      const k = 1 / Math.sqrt(3)
      expectVecClose(castRay([0, 5, 0], [0, -1, 0], ctx), [k, k, k])
    })

    it("throws when a material names a texture that was never loaded", () => {
      const ctx = traceContext([cube([0, 0, 0], 1, { textureId: "missing" })])
      expect(() => castRay([0, 5, 0], [0, -1, 0], ctx)).toThrow(
        'Texture "missing" is not loaded',
      )
    })
  })
})
