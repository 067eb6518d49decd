import { PassThrough } from "readable-stream"
import * as PImage from "pureimage"
import type { BitmapLike } from "./createUint8Bitmap"

export type ImageMimeType = "image/png" | "image/jpeg"

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]

export function isDataURI(uri: string) {
  return uri.startsWith("data:")
}

export function bufferFromDataURI(uri: string): Uint8Array {
  const match = uri.match(/^data:.*?;base64,(.*)$/)
  if (!match) throw new Error(`Unsupported data URI: ${uri.slice(0, 64)}...`)
  return Buffer.from(match[1], "base64")
}

/** Mime type implied by a file extension or a data-URI header */
export function mimeTypeFromName(filenameOrUri: string): ImageMimeType | null {
  if (/(\.png(\?|$)|image\/png)/i.test(filenameOrUri)) return "image/png"
  if (/(\.jpe?g(\?|$)|image\/jpe?g)/i.test(filenameOrUri)) return "image/jpeg"
  return null
}

export function sniffMimeType(buf: Uint8Array): ImageMimeType | null {
  if (
    buf.length >= PNG_SIGNATURE.length &&
    PNG_SIGNATURE.every((byte, i) => buf[i] === byte)
  )
    return "image/png"
  if (buf.length >= 2 && buf[0] === 0xff && buf[1] === 0xd8) return "image/jpeg"
  return null
}

function bufferToStream(buf: Uint8Array) {
  const stream = new PassThrough()
  stream.end(Buffer.from(buf))
  return stream
}

/** Decodes PNG or JPEG bytes; the bytes win over a conflicting hint. */
export async function decodeImage(
  buf: Uint8Array,
  hint: ImageMimeType | null = null,
): Promise<BitmapLike> {
  const type = sniffMimeType(buf) ?? hint
  if (type === "image/png")
    return PImage.decodePNGFromStream(bufferToStream(buf))
  if (type === "image/jpeg")
    return PImage.decodeJPEGFromStream(bufferToStream(buf))
  throw new Error(`Unsupported image format: ${hint ?? "unknown"}`)
}
