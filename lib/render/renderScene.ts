import type { OrbitCamera } from "../camera/OrbitCamera"
import { primaryRayDirection } from "../camera/buildCamera"
import type { BitmapLike, ImageFactory } from "../image/createUint8Bitmap"
import { createUint8Bitmap } from "../image/createUint8Bitmap"
import type { Vector3 } from "../math/vector3"
import type { Scene } from "../scene/types"
import { type TraceContext, castRay } from "../shading/castRay"
import { toRad } from "../utils/toRad"
import { Framebuffer } from "./Framebuffer"
import type { RenderOptions, RenderOptionsInput } from "./getDefaultRenderOptions"
import { resolveRenderOptions } from "./resolveRenderOptions"

export interface RenderResult {
  bitmap: BitmapLike
  camera: OrbitCamera
  options: RenderOptions
}

/**
 * Color of one pixel. Pixels share nothing mutable, so any evaluation order
 * gives the same image.
 */
export function renderPixel(
  scene: Scene,
  x: number,
  y: number,
  options: RenderOptions,
): Vector3 {
  const local = primaryRayDirection(
    x,
    y,
    options.width,
    options.height,
    toRad(options.fov),
  )
  const direction = scene.camera.basisChange(local)
  const ctx: TraceContext = {
    primitives: scene.primitives,
    light: scene.light,
    textures: scene.textures,
    skybox: scene.skybox,
  }
  return castRay(scene.camera.eye, direction, ctx, 0)
}

export function renderScene(
  scene: Scene,
  optionsInput: RenderOptionsInput = {},
  imageFactory: ImageFactory = createUint8Bitmap,
): RenderResult {
  const options = resolveRenderOptions(optionsInput)
  const framebuffer = new Framebuffer(
    options.width,
    options.height,
    imageFactory,
  )
  framebuffer.clear([0, 0, 0, 255])

  for (let y = 0; y < options.height; y++) {
    for (let x = 0; x < options.width; x++) {
      const color = renderPixel(scene, x, y, options)
      framebuffer.setPixelColor(x, y, color, options.gamma)
    }
  }

  return { bitmap: framebuffer.bitmap, camera: scene.camera, options }
}
