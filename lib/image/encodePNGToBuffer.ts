import { PassThrough } from "readable-stream"
import * as PImage from "pureimage"
import type { BitmapLike } from "./createUint8Bitmap"

export async function encodePNGToBuffer(image: BitmapLike): Promise<Buffer> {
  const bitmap = PImage.make(image.width, image.height)
  bitmap.data.set(image.data)

  const passThrough = new PassThrough()
  const chunks: Buffer[] = []
  passThrough.on("data", (chunk: Buffer | Uint8Array) => {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
  })
  const resultPromise = new Promise<Buffer>((resolve, reject) => {
    passThrough.on("end", () => resolve(Buffer.concat(chunks)))
    passThrough.on("error", reject)
  })
  await PImage.encodePNGToStream(bitmap, passThrough as any)
  return await resultPromise
}
