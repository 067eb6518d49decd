import {
  type ReadonlyVector3,
  type Vector3,
  dot,
  scaleAndAdd,
} from "../math/vector3"

export function reflect(
  incident: ReadonlyVector3,
  normal: ReadonlyVector3,
): Vector3 {
  return scaleAndAdd(incident, normal, -2 * dot(incident, normal))
}
