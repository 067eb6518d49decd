import {
  type ReadonlyVector3,
  type Vector3,
  dot,
  scaleAndAdd,
} from "../math/vector3"
import type { Intersect } from "../scene/types"
import { ORIGIN_BIAS } from "./constants"

/**
 * Moves the hit point off the surface, onto the side `direction` leaves
 * towards.
 */
export function offsetOrigin(
  intersect: Pick<Intersect, "point" | "normal">,
  direction: ReadonlyVector3,
): Vector3 {
  const bias = dot(direction, intersect.normal) < 0 ? -ORIGIN_BIAS : ORIGIN_BIAS
  return scaleAndAdd(intersect.point, intersect.normal, bias)
}
