import { encodePNGToBuffer } from "../image/encodePNGToBuffer"
import { pureImageFactory } from "../image/pureImageFactory"
import type { Scene } from "../scene/types"
import type { RenderOptionsInput } from "./getDefaultRenderOptions"
import { renderScene } from "./renderScene"

export async function renderSceneToPNGBuffer(
  scene: Scene,
  options: RenderOptionsInput = {},
): Promise<Buffer> {
  const { bitmap } = renderScene(scene, options, pureImageFactory)
  return encodePNGToBuffer(bitmap)
}
