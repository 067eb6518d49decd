/** JSON scene file format */

export type Vec3Tuple = [number, number, number]

/** `[r, g, b]` in 0-1, or a `#rrggbb` hex string */
export type ColorInput = Vec3Tuple | string

export interface CameraDescription {
  eye: Vec3Tuple
  target: Vec3Tuple
  up?: Vec3Tuple
}

export interface LightDescription {
  position: Vec3Tuple
  /** 0-255 per channel */
  color?: Vec3Tuple
  intensity?: number
}

export interface MaterialDescription {
  diffuse?: ColorInput
  specular?: number
  albedo?: [number, number, number, number]
  refractiveIndex?: number
  texture?: string
  normalMap?: string
  emissive?: ColorInput
}

export type ObjectDescription =
  | { type: "sphere"; center: Vec3Tuple; radius: number; material: string }
  | { type: "cube"; center: Vec3Tuple; size?: number; material: string }

export interface SceneDescription {
  camera?: CameraDescription
  light: LightDescription
  materials: Record<string, MaterialDescription>
  /** Texture id to file path (relative to the scene file) or data URI */
  textures?: Record<string, string>
  skybox?: string | null
  objects: ObjectDescription[]
}
