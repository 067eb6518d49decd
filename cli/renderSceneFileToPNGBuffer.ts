import { isDegenerateView } from "../lib/camera/OrbitCamera"
import { buildCamera } from "../lib/camera/buildCamera"
import { renderSceneToPNGBuffer } from "../lib/render/renderSceneToPNGBuffer"
import { resolveRenderOptions } from "../lib/render/resolveRenderOptions"
import type {
  RenderOptions,
  RenderOptionsInput,
} from "../lib/render/getDefaultRenderOptions"
import { createSceneFromDescription } from "../lib/scene/createSceneFromDescription"
import type { Scene } from "../lib/scene/types"
import { toRad } from "../lib/utils/toRad"
import { loadSceneWithResources } from "./loadSceneWithResources"

export interface CameraOverrides {
  camPos?: [number, number, number] | null
  lookAt?: [number, number, number] | null
  /** Degrees of orbit around the target, applied before zoom */
  yaw?: number
  pitch?: number
  zoom?: number
}

export type RenderSceneFileOptions = RenderOptionsInput & CameraOverrides

/**
 * Loads a scene file and applies the camera overrides. An overridden eye or
 * target keeps the scene's world up.
 */
export async function loadSceneFile(
  scenePath: string,
  options: RenderSceneFileOptions = {},
): Promise<{ scene: Scene; renderOptions: RenderOptions }> {
  const { camPos, lookAt, yaw = 0, pitch = 0, zoom = 0, ...renderInput } =
    options
  const renderOptions = resolveRenderOptions(renderInput)

  const { description, textures } = await loadSceneWithResources(scenePath)
  const scene = createSceneFromDescription(description, {
    textures,
    fov: renderOptions.fov,
  })

  if (camPos || lookAt) {
    const eye = camPos ?? scene.camera.eye
    const target = lookAt ?? scene.camera.target
    const { worldUp } = scene.camera
    if (isDegenerateView(eye, target, worldUp))
      throw new Error("--cam/--look: eye-target direction is parallel to up")
    scene.camera = buildCamera(
      scene.primitives,
      renderOptions.fov,
      eye,
      target,
      worldUp,
    )
  }
  if (yaw !== 0 || pitch !== 0) scene.camera.orbit(toRad(yaw), toRad(pitch))
  if (zoom !== 0) scene.camera.zoom(zoom)

  return { scene, renderOptions }
}

export async function renderSceneFileToPNGBuffer(
  scenePath: string,
  options: RenderSceneFileOptions = {},
): Promise<Buffer> {
  const { scene, renderOptions } = await loadSceneFile(scenePath, options)
  return renderSceneToPNGBuffer(scene, renderOptions)
}
