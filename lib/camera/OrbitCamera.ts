import {
  type ReadonlyVector3,
  type Vector3,
  add,
  cross,
  distance,
  length,
  normalize,
  scale,
  scaleAndAdd,
  sub,
  vector3,
} from "../math/vector3"
import { clamp } from "../utils/clamp"

/** Closest the eye may get to the target */
export const MIN_CAMERA_DISTANCE = 0.5

/** Pitch stays this far from the poles so the basis never flips */
export const PITCH_LIMIT = Math.PI / 2 - 0.1

const copy = (v: ReadonlyVector3) => vector3(v[0], v[1], v[2])

/**
 * True when (eye, target, worldUp) spans no basis: eye on the target, or
 * looking straight along the up vector. `right` would collapse to zero.
 */
export function isDegenerateView(
  eye: ReadonlyVector3,
  target: ReadonlyVector3,
  worldUp: ReadonlyVector3,
) {
  return length(cross(sub(target, eye), worldUp)) === 0
}

/**
 * Look-at camera that orbits a fixed target. The basis is rebuilt from
 * (eye, target, worldUp) after every mutation rather than updated in place.
 */
export class OrbitCamera {
  private _eye: Vector3
  readonly target: Vector3
  readonly worldUp: Vector3

  private _forward: Vector3 = vector3(0, 0, -1)
  private _right: Vector3 = vector3(1, 0, 0)
  private _up: Vector3 = vector3(0, 1, 0)

  constructor(
    eye: ReadonlyVector3,
    target: ReadonlyVector3,
    worldUp: ReadonlyVector3 = [0, 1, 0],
  ) {
    this._eye = copy(eye)
    this.target = copy(target)
    this.worldUp = copy(worldUp)
    this.updateBasis()
  }

  get eye(): ReadonlyVector3 {
    return this._eye
  }

  get forward(): ReadonlyVector3 {
    return this._forward
  }

  get right(): ReadonlyVector3 {
    return this._right
  }

  get up(): ReadonlyVector3 {
    return this._up
  }

  get distanceToTarget() {
    return distance(this._eye, this.target)
  }

  /** Camera space (forward is -Z) to world space */
  basisChange(local: ReadonlyVector3): Vector3 {
    const [x, y, z] = local
    return add(
      add(scale(this._right, x), scale(this._up, y)),
      scale(this._forward, -z),
    )
  }

  /** Rotates the eye around the target; angles in radians */
  orbit(deltaYaw: number, deltaPitch: number) {
    const relative = sub(this._eye, this.target)
    const radius = this.distanceToTarget
    const yaw = Math.atan2(relative[2], relative[0]) + deltaYaw
    const pitch = clamp(
      Math.asin(clamp(relative[1] / radius, -1, 1)) + deltaPitch,
      -PITCH_LIMIT,
      PITCH_LIMIT,
    )

    this._eye = add(
      this.target,
      vector3(
        radius * Math.cos(yaw) * Math.cos(pitch),
        radius * Math.sin(pitch),
        radius * Math.sin(yaw) * Math.cos(pitch),
      ),
    )
    this.updateBasis()
  }

  /** Positive delta moves towards the target, negative moves away */
  zoom(delta: number) {
    const next = Math.max(MIN_CAMERA_DISTANCE, this.distanceToTarget - delta)
    this._eye = scaleAndAdd(this.target, this._forward, -next)
    this.updateBasis()
  }

  private updateBasis() {
    this._forward = normalize(sub(this.target, this._eye))
    this._right = normalize(cross(this._forward, this.worldUp))
    this._up = cross(this._right, this._forward)
  }
}
