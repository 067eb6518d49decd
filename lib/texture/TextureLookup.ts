import type { Vector3 } from "../math/vector3"

export interface TextureInfo {
  width: number
  height: number
}

/**
 * Read-only access to decoded textures. Pixel coordinates are integer
 * texel indices; colors come back as linear [0,1] RGB.
 */
export interface TextureLookup {
  getTexture(id: string): TextureInfo | null
  getPixelColor(id: string, x: number, y: number): Vector3
  /** Tangent-space normal with components in [-1, 1] */
  getNormalFromMap(id: string, x: number, y: number): Vector3 | null
}
