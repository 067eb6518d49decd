import {
  type ReadonlyVector3,
  type Vector3,
  add,
  normalize,
  scale,
  vector3,
} from "../math/vector3"
import type { TextureLookup } from "../texture/TextureLookup"
import { clamp } from "../utils/clamp"
import { sampleTextureColor } from "./sampleTexture"

export const SKY_BLUE: ReadonlyVector3 = [0.4, 0.6, 1.0]
export const HORIZON_WHITE: ReadonlyVector3 = [0.9, 0.9, 1.0]
export const CLOUD_WHITE: ReadonlyVector3 = [1.0, 1.0, 1.0]

const mix = (a: ReadonlyVector3, b: ReadonlyVector3, k: number) =>
  add(scale(a, 1 - k), scale(b, k))

/**
 * Three bands over t = (dy + 1) / 2: horizon fading into sky, a cloud band
 * with a sinusoidal ripple, and flat sky above.
 */
export function proceduralSky(direction: ReadonlyVector3): Vector3 {
  const [dx, dy, dz] = normalize(direction)
  const t = (dy + 1) * 0.5

  if (t < 0.3) {
    return mix(HORIZON_WHITE, SKY_BLUE, t / 0.3)
  }
  if (t < 0.7) {
    const k = (t - 0.3) / 0.4
    const cloud = Math.sin(dx * 3) * Math.cos(dz * 2) * 0.1
    return add(mix(SKY_BLUE, CLOUD_WHITE, k), vector3(cloud, cloud, cloud))
  }
  return vector3(SKY_BLUE[0], SKY_BLUE[1], SKY_BLUE[2])
}

export function skyboxColor(
  direction: ReadonlyVector3,
  textures: TextureLookup,
  skybox: string | null,
): Vector3 {
  if (!skybox) return proceduralSky(direction)

  const [dx, dy, dz] = normalize(direction)
  const u = 0.5 + Math.atan2(dx, dz) / (2 * Math.PI)
  const v = 0.5 - Math.asin(clamp(dy, -1, 1)) / Math.PI
  return sampleTextureColor(textures, skybox, u, v)
}
