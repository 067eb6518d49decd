import type { ReadonlyVector3 } from "../math/vector3"
import {
  type BitmapLike,
  type ImageFactory,
  createUint8Bitmap,
} from "../image/createUint8Bitmap"
import { clamp } from "../utils/clamp"
import { srgbEncodeLinear01 } from "../utils/srgbEncodeLinear01"

export class Framebuffer {
  readonly width: number
  readonly height: number
  readonly bitmap: BitmapLike

  constructor(
    width: number,
    height: number,
    imageFactory: ImageFactory = createUint8Bitmap,
  ) {
    this.width = width
    this.height = height
    this.bitmap = imageFactory(width, height)
  }

  get buffer() {
    return this.bitmap.data
  }

  clear(colorRGBA: [number, number, number, number] = [0, 0, 0, 255]) {
    const [r, g, b, a] = colorRGBA
    for (let i = 0; i < this.width * this.height; i++) {
      const j = i * 4
      this.buffer[j + 0] = r
      this.buffer[j + 1] = g
      this.buffer[j + 2] = b
      this.buffer[j + 3] = a
    }
  }

  setPixel(x: number, y: number, r: number, g: number, b: number, a: number) {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return
    const idx = (y * this.width + x) * 4
    this.buffer[idx + 0] = r
    this.buffer[idx + 1] = g
    this.buffer[idx + 2] = b
    this.buffer[idx + 3] = a
  }

  /** Writes a linear [0,1] color, clamping overshoot */
  setPixelColor(x: number, y: number, color: ReadonlyVector3, gammaOut = false) {
    let r = clamp(color[0], 0, 1)
    let g = clamp(color[1], 0, 1)
    let b = clamp(color[2], 0, 1)
    if (gammaOut) {
      r = srgbEncodeLinear01(r)
      g = srgbEncodeLinear01(g)
      b = srgbEncodeLinear01(b)
    }
    this.setPixel(x, y, (r * 255) | 0, (g * 255) | 0, (b * 255) | 0, 255)
  }
}
