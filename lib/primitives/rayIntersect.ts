import type { ReadonlyVector3 } from "../math/vector3"
import type { Intersect, Primitive } from "../scene/types"
import { intersectCube } from "./intersectCube"
import { intersectSphere } from "./intersectSphere"

export function rayIntersect(
  primitive: Primitive,
  origin: ReadonlyVector3,
  direction: ReadonlyVector3,
): Intersect | null {
  switch (primitive.kind) {
    case "sphere":
      return intersectSphere(primitive, origin, direction)
    case "cube":
      return intersectCube(primitive, origin, direction)
  }
}

/**
 * Nearest hit over a linear scan. Only a strictly smaller distance replaces
 * the current best, so on a tie the earlier primitive wins.
 */
export function findNearestIntersect(
  primitives: readonly Primitive[],
  origin: ReadonlyVector3,
  direction: ReadonlyVector3,
): Intersect | null {
  let nearest: Intersect | null = null
  let zbuffer = Infinity
  for (const primitive of primitives) {
    const hit = rayIntersect(primitive, origin, direction)
    if (hit && hit.distance < zbuffer) {
      zbuffer = hit.distance
      nearest = hit
    }
  }
  return nearest
}
