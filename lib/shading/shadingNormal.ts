import {
  type ReadonlyVector3,
  type Vector3,
  cross,
  length,
  normalize,
  vector3,
} from "../math/vector3"
import type { Intersect } from "../scene/types"
import type { TextureLookup } from "../texture/TextureLookup"
import { sampleNormalMap } from "./sampleTexture"

/**
 * Takes a tangent-space normal into world space around `normal`, using
 * tangent = normalize(n.y, -n.x, 0) and bitangent = n x tangent.
 *
 * For a normal along ±Z the tangent collapses to zero and only the z
 * component of the sample survives. If nothing survives at all the
 * geometric normal is kept.
 */
export function perturbNormal(
  normal: ReadonlyVector3,
  tangentSpace: ReadonlyVector3,
): Vector3 {
  const tangent = normalize(vector3(normal[1], -normal[0], 0))
  const bitangent = cross(normal, tangent)
  const [tx, ty, tz] = tangentSpace

  const world = vector3(
    tx * tangent[0] + ty * bitangent[0] + tz * normal[0],
    tx * tangent[1] + ty * bitangent[1] + tz * normal[1],
    tx * tangent[2] + ty * bitangent[2] + tz * normal[2],
  )
  if (length(world) === 0) return vector3(normal[0], normal[1], normal[2])
  return normalize(world)
}

export function shadingNormal(
  intersect: Intersect,
  textures: TextureLookup,
): Vector3 {
  const { normalMapId } = intersect.material
  if (!normalMapId) return intersect.normal

  const sample = sampleNormalMap(textures, normalMapId, intersect.u, intersect.v)
  if (!sample) return intersect.normal
  return perturbNormal(intersect.normal, sample)
}
