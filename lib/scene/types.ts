import type { ReadonlyVector3, Vector3 } from "../math/vector3"
import type { TextureLookup } from "../texture/TextureLookup"
import type { OrbitCamera } from "../camera/OrbitCamera"

/** `[diffuse, specular, reflectivity, transparency]` mixing weights */
export type Albedo = readonly [number, number, number, number]

export interface Material {
  readonly diffuse: ReadonlyVector3
  readonly specular: number
  readonly albedo: Albedo
  readonly refractiveIndex: number
  readonly textureId: string | null
  readonly normalMapId: string | null
  readonly emissive: ReadonlyVector3
}

export interface Light {
  readonly position: ReadonlyVector3
  /** 0-255 per channel */
  readonly color: ReadonlyVector3
  readonly intensity: number
}

export interface Sphere {
  readonly kind: "sphere"
  readonly center: ReadonlyVector3
  readonly radius: number
  readonly material: Material
}

/** Axis-aligned cube, `size` is the full edge length */
export interface Cube {
  readonly kind: "cube"
  readonly center: ReadonlyVector3
  readonly size: number
  readonly material: Material
}

export type Primitive = Sphere | Cube

/**
 * Nearest forward hit of one ray against one primitive. A miss is `null`,
 * never a record with placeholder fields.
 */
export interface Intersect {
  point: Vector3
  normal: Vector3
  distance: number
  material: Material
  u: number
  v: number
}

export interface Scene {
  primitives: readonly Primitive[]
  light: Light
  camera: OrbitCamera
  /** Panoramic environment texture id, or null for the procedural sky */
  skybox: string | null
  textures: TextureLookup
}
