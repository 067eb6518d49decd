import * as PImage from "pureimage"
import type { ImageFactory } from "./createUint8Bitmap"

export const pureImageFactory: ImageFactory = (width, height) =>
  PImage.make(width, height)
