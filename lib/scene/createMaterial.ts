import type { ReadonlyVector3 } from "../math/vector3"
import type { Albedo, Material } from "./types"

export type MaterialInput = Partial<Material>

export const DEFAULT_MATERIAL: Material = {
  diffuse: [1, 1, 1],
  specular: 0,
  albedo: [1, 0, 0, 0],
  refractiveIndex: 1,
  textureId: null,
  normalMapId: null,
  emissive: [0, 0, 0],
}

const copyVec3 = (v: ReadonlyVector3): ReadonlyVector3 =>
  Object.freeze([v[0], v[1], v[2]] as const)

/**
 * Materials are frozen on creation so one instance can be shared by every
 * primitive that uses it.
 */
export function createMaterial(input: MaterialInput = {}): Material {
  const albedo: Albedo = input.albedo ?? DEFAULT_MATERIAL.albedo
  return Object.freeze({
    diffuse: copyVec3(input.diffuse ?? DEFAULT_MATERIAL.diffuse),
    specular: input.specular ?? DEFAULT_MATERIAL.specular,
    albedo: Object.freeze([albedo[0], albedo[1], albedo[2], albedo[3]] as const),
    refractiveIndex: input.refractiveIndex ?? DEFAULT_MATERIAL.refractiveIndex,
    textureId: input.textureId ?? null,
    normalMapId: input.normalMapId ?? null,
    emissive: copyVec3(input.emissive ?? DEFAULT_MATERIAL.emissive),
  })
}
