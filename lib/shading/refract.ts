import {
  type ReadonlyVector3,
  type Vector3,
  add,
  dot,
  negate,
  scale,
} from "../math/vector3"
import { clamp } from "../utils/clamp"

/**
 * Snell's law. The outside medium has index 1; a ray leaving the surface
 * (incident along the normal) swaps the indices and uses the flipped
 * normal. Returns null on total internal reflection.
 */
export function refract(
  incident: ReadonlyVector3,
  normal: ReadonlyVector3,
  refractiveIndex: number,
): Vector3 | null {
  let cosi = clamp(dot(incident, normal), -1, 1)
  let etai = 1
  let etat = refractiveIndex
  let n: ReadonlyVector3 = normal

  if (cosi > 0) {
    ;[etai, etat] = [etat, etai]
    n = negate(normal)
  } else {
    cosi = -cosi
  }

  const eta = etai / etat
  const k = 1 - eta * eta * (1 - cosi * cosi)
  if (k < 0) return null

  return add(scale(incident, eta), scale(n, eta * cosi - Math.sqrt(k)))
}
