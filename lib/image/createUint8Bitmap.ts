/** RGBA8 pixel storage, row 0 at the top */
export interface BitmapLike {
  width: number
  height: number
  data: Uint8Array | Uint8ClampedArray
}

export type ImageFactory = (width: number, height: number) => BitmapLike

export const createUint8Bitmap: ImageFactory = (width, height) => ({
  width,
  height,
  data: new Uint8ClampedArray(width * height * 4),
})
