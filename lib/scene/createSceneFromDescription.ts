import { isDegenerateView } from "../camera/OrbitCamera"
import { buildCamera } from "../camera/buildCamera"
import type { ReadonlyVector3 } from "../math/vector3"
import {
  DEFAULT_RENDER_OPTIONS,
  hexToRgb,
} from "../render/getDefaultRenderOptions"
import { TextureManager } from "../texture/TextureManager"
import type { TextureLookup } from "../texture/TextureLookup"
import { createMaterial } from "./createMaterial"
import type { Albedo, Light, Material, Primitive, Scene } from "./types"

type JSONObject = Record<string, unknown>

function isObject(value: unknown): value is JSONObject {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function readObject(value: unknown, path: string): JSONObject {
  if (!isObject(value)) throw new Error(`${path}: expected an object`)
  return value
}

function readNumber(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isFinite(value))
    throw new Error(`${path}: expected a finite number`)
  return value
}

function readOptionalNumber(
  value: unknown,
  path: string,
  fallback: number,
): number {
  return value === undefined ? fallback : readNumber(value, path)
}

function readString(value: unknown, path: string): string {
  if (typeof value !== "string" || value.length === 0)
    throw new Error(`${path}: expected a non-empty string`)
  return value
}

function readTuple(value: unknown, size: 3 | 4, path: string): number[] {
  if (!Array.isArray(value) || value.length !== size)
    throw new Error(`${path}: expected an array of ${size} numbers`)
  return value.map((item, i) => readNumber(item, `${path}[${i}]`))
}

function readVec3(value: unknown, path: string): ReadonlyVector3 {
  const [x = 0, y = 0, z = 0] = readTuple(value, 3, path)
  return [x, y, z]
}

function readColor(value: unknown, path: string): ReadonlyVector3 {
  if (typeof value === "string") {
    const rgb = hexToRgb(value)
    if (!rgb) throw new Error(`${path}: invalid hex color "${value}"`)
    return rgb
  }
  return readVec3(value, path)
}

function readAlbedo(value: unknown, path: string): Albedo {
  const [a = 0, b = 0, c = 0, d = 0] = readTuple(value, 4, path)
  return [a, b, c, d]
}

function requireTexture(
  textures: TextureLookup,
  id: string,
  path: string,
): string {
  if (!textures.getTexture(id))
    throw new Error(`${path}: texture "${id}" is not loaded`)
  return id
}

function readMaterial(
  value: unknown,
  path: string,
  textures: TextureLookup,
): Material {
  const m = readObject(value, path)
  return createMaterial({
    diffuse:
      m.diffuse === undefined ? undefined : readColor(m.diffuse, `${path}.diffuse`),
    specular:
      m.specular === undefined
        ? undefined
        : readNumber(m.specular, `${path}.specular`),
    albedo:
      m.albedo === undefined ? undefined : readAlbedo(m.albedo, `${path}.albedo`),
    refractiveIndex:
      m.refractiveIndex === undefined
        ? undefined
        : readNumber(m.refractiveIndex, `${path}.refractiveIndex`),
    textureId:
      m.texture === undefined
        ? null
        : requireTexture(
            textures,
            readString(m.texture, `${path}.texture`),
            `${path}.texture`,
          ),
    normalMapId:
      m.normalMap === undefined
        ? null
        : requireTexture(
            textures,
            readString(m.normalMap, `${path}.normalMap`),
            `${path}.normalMap`,
          ),
    emissive:
      m.emissive === undefined
        ? undefined
        : readColor(m.emissive, `${path}.emissive`),
  })
}

function readLight(value: unknown): Light {
  const l = readObject(value, "light")
  return {
    position: readVec3(l.position, "light.position"),
    color:
      l.color === undefined ? [255, 255, 255] : readVec3(l.color, "light.color"),
    intensity: readOptionalNumber(l.intensity, "light.intensity", 1),
  }
}

function readPrimitive(
  value: unknown,
  path: string,
  materials: Map<string, Material>,
): Primitive {
  const o = readObject(value, path)
  const materialName = readString(o.material, `${path}.material`)
  const material = materials.get(materialName)
  if (!material)
    throw new Error(`${path}.material: unknown material "${materialName}"`)
  const center = readVec3(o.center, `${path}.center`)

  switch (o.type) {
    case "sphere": {
      const radius = readNumber(o.radius, `${path}.radius`)
      if (radius <= 0) throw new Error(`${path}.radius: must be positive`)
      return { kind: "sphere", center, radius, material }
    }
    case "cube": {
      const size = readOptionalNumber(o.size, `${path}.size`, 1)
      if (size <= 0) throw new Error(`${path}.size: must be positive`)
      return { kind: "cube", center, size, material }
    }
    default:
      throw new Error(`${path}.type: expected "sphere" or "cube"`)
  }
}

type CameraArgs = [
  eye: ReadonlyVector3 | null,
  target: ReadonlyVector3 | null,
  up?: ReadonlyVector3,
]

function readCamera(value: unknown): CameraArgs {
  if (value === undefined) return [null, null]
  const cam = readObject(value, "camera")
  const eye = readVec3(cam.eye, "camera.eye")
  const target = readVec3(cam.target, "camera.target")
  const up: ReadonlyVector3 =
    cam.up === undefined ? [0, 1, 0] : readVec3(cam.up, "camera.up")
  if (isDegenerateView(eye, target, up))
    throw new Error("camera: eye-target direction is parallel to up")
  return [eye, target, up]
}

export interface CreateSceneOptions {
  textures?: TextureLookup
  /** Field of view used when the camera is fitted to the scene */
  fov?: number
}

/**
 * Builds a scene from a parsed scene file. Every object naming the same
 * material shares one Material instance.
 */
export function createSceneFromDescription(
  description: unknown,
  options: CreateSceneOptions = {},
): Scene {
  const textures = options.textures ?? new TextureManager()
  const root = readObject(description, "scene")

  const materials = new Map<string, Material>()
  for (const [name, value] of Object.entries(
    readObject(root.materials, "materials"),
  )) {
    materials.set(name, readMaterial(value, `materials.${name}`, textures))
  }

  if (!Array.isArray(root.objects))
    throw new Error("objects: expected an array")
  const primitives = root.objects.map((value, i) =>
    readPrimitive(value, `objects[${i}]`, materials),
  )

  const light = readLight(root.light)

  const skybox =
    root.skybox === undefined || root.skybox === null
      ? null
      : requireTexture(textures, readString(root.skybox, "skybox"), "skybox")

  const camera = buildCamera(
    primitives,
    options.fov ?? DEFAULT_RENDER_OPTIONS.fov,
    ...readCamera(root.camera),
  )

  return { primitives, light, camera, skybox, textures }
}
