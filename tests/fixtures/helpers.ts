import { expect } from "vitest"
import type { ReadonlyVector3 } from "../../lib/math/vector3"
import { createMaterial, type MaterialInput } from "../../lib/scene/createMaterial"
import type { Cube, Light, Primitive, Sphere } from "../../lib/scene/types"
import type { TraceContext } from "../../lib/shading/castRay"
import { TextureManager } from "../../lib/texture/TextureManager"
import type { TextureLookup } from "../../lib/texture/TextureLookup"

export function expectVecClose(
  actual: ReadonlyVector3,
  expected: ReadonlyVector3,
  digits = 6,
) {
  expect(actual[0]).toBeCloseTo(expected[0], digits)
  expect(actual[1]).toBeCloseTo(expected[1], digits)
  expect(actual[2]).toBeCloseTo(expected[2], digits)
}

export const sphere = (
  center: ReadonlyVector3,
  radius: number,
  material: MaterialInput = {},
): Sphere => ({
  kind: "sphere",
  center,
  radius,
  material: createMaterial(material),
})

export const cube = (
  center: ReadonlyVector3,
  size: number,
  material: MaterialInput = {},
): Cube => ({
  kind: "cube",
  center,
  size,
  material: createMaterial(material),
})

export const whiteLight = (
  position: ReadonlyVector3,
  intensity = 1,
): Light => ({
  position,
  color: [255, 255, 255],
  intensity,
})

export function traceContext(
  primitives: Primitive[],
  light: Light = whiteLight([0, 10, 0]),
  textures: TextureLookup = new TextureManager(),
  skybox: string | null = null,
): TraceContext {
  return { primitives, light, textures, skybox }
}
