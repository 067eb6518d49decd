import { computeSceneAABB } from "../scene/computeSceneAABB"
import type { Primitive } from "../scene/types"
import { type ReadonlyVector3, distance, normalize, vector3 } from "../math/vector3"
import { toRad } from "../utils/toRad"
import { OrbitCamera } from "./OrbitCamera"

export function buildCamera(
  primitives: readonly Primitive[],
  fovDeg: number,
  camPos: ReadonlyVector3 | null | undefined,
  lookAt: ReadonlyVector3 | null | undefined,
  up: ReadonlyVector3 = [0, 1, 0],
): OrbitCamera {
  const aabb = computeSceneAABB(primitives)
  const center =
    lookAt ??
    vector3(
      0.5 * (aabb.min[0] + aabb.max[0]),
      0.5 * (aabb.min[1] + aabb.max[1]),
      0.5 * (aabb.min[2] + aabb.max[2]),
    )

  if (camPos) return new OrbitCamera(camPos, center, up)

  const radius = distance(aabb.min, aabb.max) * 0.5
  const fov = toRad(fovDeg)
  const dist = radius / Math.tan(fov * 0.5) + radius * 0.5
  const eye = vector3(
    center[0] + dist,
    center[1] + dist * 0.3,
    center[2] + dist,
  )
  return new OrbitCamera(eye, center, up)
}

/**
 * Camera-space direction through pixel (x, y); the image plane sits at
 * z = -1 and +y is up.
 */
export function primaryRayDirection(
  x: number,
  y: number,
  width: number,
  height: number,
  fovRad: number,
) {
  const aspectRatio = width / height
  const perspectiveScale = Math.tan(fovRad * 0.5)
  const screenX = ((2 * x) / width - 1) * aspectRatio * perspectiveScale
  const screenY = (1 - (2 * y) / height) * perspectiveScale
  return normalize(vector3(screenX, screenY, -1))
}
