import type { Vector3 } from "../math/vector3"
import type { TextureInfo, TextureLookup } from "../texture/TextureLookup"

function requireTexture(textures: TextureLookup, id: string): TextureInfo {
  const texture = textures.getTexture(id)
  if (!texture) throw new Error(`Texture "${id}" is not loaded`)
  return texture
}

/** Normalized UV to integer texel indices, truncating like a pixel cast */
function toTexel(texture: TextureInfo, u: number, v: number) {
  return {
    x: Math.max(0, Math.trunc(u * texture.width)),
    y: Math.max(0, Math.trunc(v * texture.height)),
  }
}

export function sampleTextureColor(
  textures: TextureLookup,
  id: string,
  u: number,
  v: number,
): Vector3 {
  const { x, y } = toTexel(requireTexture(textures, id), u, v)
  return textures.getPixelColor(id, x, y)
}

export function sampleNormalMap(
  textures: TextureLookup,
  id: string,
  u: number,
  v: number,
): Vector3 | null {
  const { x, y } = toTexel(requireTexture(textures, id), u, v)
  return textures.getNormalFromMap(id, x, y)
}
