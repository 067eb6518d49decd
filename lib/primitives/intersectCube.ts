import {
  type ReadonlyVector3,
  type Vector3,
  divide,
  maxNum,
  minNum,
  scaleAndAdd,
  signum,
  sub,
  vector3,
} from "../math/vector3"
import { clamp } from "../utils/clamp"
import type { Cube, Intersect } from "../scene/types"

/**
 * Picks the face for a local-space point. Axes are checked x, then y, then
 * z with strict comparisons, so on an exact edge or corner the later axis
 * wins. Rendered output depends on this order.
 */
function dominantAxis(local: ReadonlyVector3): 0 | 1 | 2 {
  const ax = Math.abs(local[0])
  const ay = Math.abs(local[1])
  const az = Math.abs(local[2])
  if (ax > ay && ax > az) return 0
  if (ay > az) return 1
  return 2
}

function faceNormal(local: ReadonlyVector3): Vector3 {
  const axis = dominantAxis(local)
  if (axis === 0) return vector3(signum(local[0]), 0, 0)
  if (axis === 1) return vector3(0, signum(local[1]), 0)
  return vector3(0, 0, signum(local[2]))
}

export function getCubeUV(
  cube: Cube,
  point: ReadonlyVector3,
  normal: ReadonlyVector3,
) {
  const half = cube.size * 0.5
  const [lx, ly, lz] = sub(point, cube.center)
  const toUnit = (value: number) => clamp((value + half) / cube.size, 0, 1)

  switch (dominantAxis(normal)) {
    case 0:
      return { u: toUnit(lz), v: toUnit(ly) }
    case 1:
      return { u: toUnit(lx), v: toUnit(lz) }
    case 2:
      return { u: toUnit(lx), v: toUnit(ly) }
  }
}

/**
 * Slab test. A zero direction component divides to ±Infinity and the
 * comparisons below stay correct, so it is not special-cased.
 */
export function intersectCube(
  cube: Cube,
  origin: ReadonlyVector3,
  direction: ReadonlyVector3,
): Intersect | null {
  const half = cube.size * 0.5
  const [cx, cy, cz] = cube.center
  const min = vector3(cx - half, cy - half, cz - half)
  const max = vector3(cx + half, cy + half, cz + half)

  const t0 = divide(sub(min, origin), direction)
  const t1 = divide(sub(max, origin), direction)

  const near = vector3()
  const far = vector3()
  for (let axis = 0; axis < 3; axis++) {
    const swap = t0[axis] > t1[axis]
    near[axis] = swap ? t1[axis] : t0[axis]
    far[axis] = swap ? t0[axis] : t1[axis]
  }

  const tEnter = maxNum(maxNum(near[0], near[1]), near[2])
  const tExit = minNum(minNum(far[0], far[1]), far[2])

  if (!(tEnter < tExit && tExit > 0)) return null

  // Origin inside the cube: the exit face is the visible one
  const t = tEnter > 0 ? tEnter : tExit
  const point = scaleAndAdd(origin, direction, t)
  const normal = faceNormal(sub(point, cube.center))
  const { u, v } = getCubeUV(cube, point, normal)

  return { point, normal, distance: t, material: cube.material, u, v }
}
