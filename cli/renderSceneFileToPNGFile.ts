import * as fs from "node:fs"
import {
  type RenderSceneFileOptions,
  renderSceneFileToPNGBuffer,
} from "./renderSceneFileToPNGBuffer"

export async function renderSceneFileToPNGFile(
  scenePath: string,
  outputPath: string,
  options: RenderSceneFileOptions = {},
): Promise<Buffer> {
  const pngBuffer = await renderSceneFileToPNGBuffer(scenePath, options)
  await fs.promises.writeFile(outputPath, pngBuffer)
  return pngBuffer
}
