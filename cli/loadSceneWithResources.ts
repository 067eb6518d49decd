import * as fs from "node:fs"
import * as path from "node:path"
import {
  bufferFromDataURI,
  decodeImage,
  isDataURI,
  mimeTypeFromName,
} from "../lib/image/decodeImage"
import { TextureManager } from "../lib/texture/TextureManager"

export interface SceneWithResources {
  description: unknown
  textures: TextureManager
}

async function readTextureBytes(source: string, baseDir: string) {
  if (isDataURI(source)) return bufferFromDataURI(source)
  const resolved = path.resolve(baseDir, decodeURIComponent(source))
  return fs.promises.readFile(resolved)
}

/**
 * Reads a scene file and decodes every texture it lists. Texture paths are
 * resolved against the scene file's directory.
 */
export async function loadSceneWithResources(
  scenePath: string,
): Promise<SceneWithResources> {
  const baseDir = path.dirname(scenePath)
  const description: unknown = JSON.parse(
    await fs.promises.readFile(scenePath, "utf8"),
  )
  const textures = new TextureManager()

  const listed =
    typeof description === "object" &&
    description !== null &&
    "textures" in description
      ? description.textures
      : undefined
  if (listed === undefined) return { description, textures }
  if (typeof listed !== "object" || listed === null || Array.isArray(listed))
    throw new Error(`${scenePath}: "textures" must map ids to paths`)

  await Promise.all(
    Object.entries(listed).map(async ([id, source]: [string, unknown]) => {
      if (typeof source !== "string")
        throw new Error(`${scenePath}: texture "${id}" must be a path string`)
      const bytes = await readTextureBytes(source, baseDir)
      textures.loadTexture(id, await decodeImage(bytes, mimeTypeFromName(source)))
    }),
  )

  return { description, textures }
}
