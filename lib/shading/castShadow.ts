import { distance, normalize, sub } from "../math/vector3"
import { rayIntersect } from "../primitives/rayIntersect"
import type { Intersect, Light, Primitive } from "../scene/types"
import { offsetOrigin } from "./offsetOrigin"

/**
 * Hard shadow: 1 when anything sits between the point and the light,
 * otherwise 0.
 */
export function castShadow(
  intersect: Intersect,
  light: Light,
  primitives: readonly Primitive[],
): number {
  const lightDir = normalize(sub(light.position, intersect.point))
  const lightDistance = distance(light.position, intersect.point)
  const shadowOrigin = offsetOrigin(intersect, lightDir)

  for (const primitive of primitives) {
    const hit = rayIntersect(primitive, shadowOrigin, lightDir)
    if (hit && hit.distance < lightDistance) return 1
  }
  return 0
}
