import { vec3 } from "gl-matrix"

/**
 * Vectors are plain `[x, y, z]` tuples handed to gl-matrix as output
 * arguments, so all math runs in double precision rather than on the
 * library's default Float32Array storage.
 */
export type Vector3 = [number, number, number]
export type ReadonlyVector3 = readonly [number, number, number]

export const vector3 = (x = 0, y = 0, z = 0): Vector3 => [x, y, z]

export function add(a: ReadonlyVector3, b: ReadonlyVector3): Vector3 {
  const out = vector3()
  vec3.add(out, a, b)
  return out
}

export function sub(a: ReadonlyVector3, b: ReadonlyVector3): Vector3 {
  const out = vector3()
  vec3.subtract(out, a, b)
  return out
}

export function scale(a: ReadonlyVector3, s: number): Vector3 {
  const out = vector3()
  vec3.scale(out, a, s)
  return out
}

/** `a + b * s` */
export function scaleAndAdd(
  a: ReadonlyVector3,
  b: ReadonlyVector3,
  s: number,
): Vector3 {
  const out = vector3()
  vec3.scaleAndAdd(out, a, b, s)
  return out
}

export function negate(a: ReadonlyVector3): Vector3 {
  const out = vector3()
  vec3.negate(out, a)
  return out
}

export function cross(a: ReadonlyVector3, b: ReadonlyVector3): Vector3 {
  const out = vector3()
  vec3.cross(out, a, b)
  return out
}

// gl-matrix leaves a zero-length vector at zero instead of producing NaN
export function normalize(a: ReadonlyVector3): Vector3 {
  const out = vector3()
  vec3.normalize(out, a)
  return out
}

/** Component-wise division; zero components give ±Infinity, or NaN for 0/0. */
export function divide(a: ReadonlyVector3, b: ReadonlyVector3): Vector3 {
  const out = vector3()
  vec3.divide(out, a, b)
  return out
}

export const dot = (a: ReadonlyVector3, b: ReadonlyVector3) => vec3.dot(a, b)

export const length = (a: ReadonlyVector3) => vec3.length(a)

export const distance = (a: ReadonlyVector3, b: ReadonlyVector3) =>
  vec3.distance(a, b)

/** IEEE maxNum: a NaN operand loses to the other one. */
export function maxNum(a: number, b: number) {
  if (Number.isNaN(a)) return b
  if (Number.isNaN(b)) return a
  return a > b ? a : b
}

/** IEEE minNum: a NaN operand loses to the other one. */
export function minNum(a: number, b: number) {
  if (Number.isNaN(a)) return b
  if (Number.isNaN(b)) return a
  return a < b ? a : b
}

/** Sign that counts zero as positive, so a face normal is never zero. */
export const signum = (x: number) => (x < 0 ? -1 : 1)
