import type { BitmapLike } from "../image/createUint8Bitmap"
import { vector3, type Vector3 } from "../math/vector3"
import { clamp } from "../utils/clamp"
import type { TextureInfo, TextureLookup } from "./TextureLookup"

export class TextureManager implements TextureLookup {
  private readonly textures = new Map<string, BitmapLike>()

  loadTexture(id: string, bitmap: BitmapLike) {
    this.textures.set(id, bitmap)
    return this
  }

  has(id: string) {
    return this.textures.has(id)
  }

  getTexture(id: string): TextureInfo | null {
    const bitmap = this.textures.get(id)
    if (!bitmap) return null
    return { width: bitmap.width, height: bitmap.height }
  }

  getPixelColor(id: string, x: number, y: number): Vector3 {
    const [r, g, b] = this.readTexel(id, x, y)
    return vector3(r / 255, g / 255, b / 255)
  }

  getNormalFromMap(id: string, x: number, y: number): Vector3 | null {
    const [r, g, b] = this.readTexel(id, x, y)
    return vector3((r / 255) * 2 - 1, (g / 255) * 2 - 1, (b / 255) * 2 - 1)
  }

  private readTexel(id: string, x: number, y: number): Vector3 {
    const bitmap = this.textures.get(id)
    if (!bitmap) throw new Error(`Texture "${id}" is not loaded`)
    const px = clamp(Math.trunc(x), 0, bitmap.width - 1)
    const py = clamp(Math.trunc(y), 0, bitmap.height - 1)
    const idx = (py * bitmap.width + px) * 4
    const d = bitmap.data
    return [d[idx + 0] ?? 0, d[idx + 1] ?? 0, d[idx + 2] ?? 0]
  }
}
