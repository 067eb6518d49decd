import type { Vector3 } from "../math/vector3"
import type { Primitive } from "./types"

function halfExtent(primitive: Primitive) {
  switch (primitive.kind) {
    case "sphere":
      return primitive.radius
    case "cube":
      return primitive.size * 0.5
  }
}

export function computeSceneAABB(primitives: readonly Primitive[]): {
  min: Vector3
  max: Vector3
} {
  const min: Vector3 = [Infinity, Infinity, Infinity]
  const max: Vector3 = [-Infinity, -Infinity, -Infinity]
  for (const primitive of primitives) {
    const extent = halfExtent(primitive)
    for (let axis = 0; axis < 3; axis++) {
      min[axis] = Math.min(min[axis], primitive.center[axis] - extent)
      max[axis] = Math.max(max[axis], primitive.center[axis] + extent)
    }
  }

  if (!isFinite(min[0])) {
    return {
      min: [-1, -1, -1],
      max: [1, 1, 1],
    }
  }

  return { min, max }
}
