import {
  type ReadonlyVector3,
  dot,
  normalize,
  scale,
  scaleAndAdd,
  sub,
} from "../math/vector3"
import type { Intersect, Sphere } from "../scene/types"
import { clamp } from "../utils/clamp"

/**
 * Equirectangular mapping of a point on the sphere, v = 0 at the top pole.
 */
export function getSphereUV(sphere: Sphere, point: ReadonlyVector3) {
  const [x, y, z] = scale(sub(point, sphere.center), 1 / sphere.radius)
  const u = 0.5 + Math.atan2(x, z) / (2 * Math.PI)
  // asin is only defined on [-1, 1]; rounding can push y just past it
  const v = 0.5 - Math.asin(clamp(y, -1, 1)) / Math.PI
  return { u, v }
}

export function intersectSphere(
  sphere: Sphere,
  origin: ReadonlyVector3,
  direction: ReadonlyVector3,
): Intersect | null {
  const oc = sub(origin, sphere.center)
  const a = dot(direction, direction)
  const b = 2 * dot(oc, direction)
  const c = dot(oc, oc) - sphere.radius * sphere.radius
  const discriminant = b * b - 4 * a * c

  if (discriminant <= 0) return null

  const t = (-b - Math.sqrt(discriminant)) / (2 * a)
  if (!(t > 0)) return null

  const point = scaleAndAdd(origin, direction, t)
  const normal = normalize(sub(point, sphere.center))
  const { u, v } = getSphereUV(sphere, point)

  return { point, normal, distance: t, material: sphere.material, u, v }
}
