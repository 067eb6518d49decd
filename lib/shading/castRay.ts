import {
  type ReadonlyVector3,
  type Vector3,
  add,
  dot,
  negate,
  normalize,
  scale,
  sub,
  vector3,
} from "../math/vector3"
import { findNearestIntersect } from "../primitives/rayIntersect"
import type { Intersect, Light, Primitive } from "../scene/types"
import type { TextureLookup } from "../texture/TextureLookup"
import { castShadow } from "./castShadow"
import { MAX_RAY_DEPTH } from "./constants"
import { offsetOrigin } from "./offsetOrigin"
import { reflect } from "./reflect"
import { refract } from "./refract"
import { sampleTextureColor } from "./sampleTexture"
import { shadingNormal } from "./shadingNormal"
import { skyboxColor } from "./skyboxColor"

/** Everything a ray needs from the scene; read-only during a render pass */
export interface TraceContext {
  primitives: readonly Primitive[]
  light: Light
  textures: TextureLookup
  skybox: string | null
}

function surfaceColor(intersect: Intersect, textures: TextureLookup) {
  const { textureId, diffuse } = intersect.material
  if (!textureId) return diffuse
  return sampleTextureColor(textures, textureId, intersect.u, intersect.v)
}

function traceSecondary(
  intersect: Intersect,
  direction: ReadonlyVector3,
  ctx: TraceContext,
  depth: number,
) {
  const origin = offsetOrigin(intersect, direction)
  return castRay(origin, direction, ctx, depth + 1)
}

/**
 * Local Phong shading plus mirror and transmitted contributions, blended
 * with the material's fixed weights. Past MAX_RAY_DEPTH the environment is
 * returned without tracing.
 */
export function castRay(
  origin: ReadonlyVector3,
  direction: ReadonlyVector3,
  ctx: TraceContext,
  depth = 0,
): Vector3 {
  const { primitives, light, textures, skybox } = ctx
  if (depth > MAX_RAY_DEPTH) return skyboxColor(direction, textures, skybox)

  const intersect = findNearestIntersect(primitives, origin, direction)
  if (!intersect) return skyboxColor(direction, textures, skybox)

  const { material } = intersect
  const normal = shadingNormal(intersect, textures)
  const lightDir = normalize(sub(light.position, intersect.point))
  const viewDir = normalize(sub(origin, intersect.point))
  const lightReflectDir = normalize(reflect(negate(lightDir), normal))

  const shadow = castShadow(intersect, light, primitives)
  const lightIntensity = light.intensity * (1 - shadow)

  const diffuseIntensity = Math.max(0, dot(normal, lightDir)) * lightIntensity
  const diffuse = scale(surfaceColor(intersect, textures), diffuseIntensity)

  const specularIntensity =
    Math.max(0, dot(viewDir, lightReflectDir)) ** material.specular *
    lightIntensity
  const lightColor = scale(light.color, 1 / 255)
  const specular = scale(lightColor, specularIntensity)

  const [albedoDiffuse, albedoSpecular, reflectivity, transparency] =
    material.albedo
  const phong = add(
    add(scale(diffuse, albedoDiffuse), scale(specular, albedoSpecular)),
    material.emissive,
  )

  let reflectColor = vector3()
  if (reflectivity > 0) {
    const reflectDir = normalize(reflect(direction, normal))
    reflectColor = traceSecondary(intersect, reflectDir, ctx, depth)
  }

  let refractColor = vector3()
  if (transparency > 0) {
    const refractDir = refract(direction, normal, material.refractiveIndex)
    refractColor = refractDir
      ? traceSecondary(intersect, refractDir, ctx, depth)
      : traceSecondary(
          intersect,
          normalize(reflect(direction, normal)),
          ctx,
          depth,
        )
  }

  return add(
    add(
      scale(phong, 1 - reflectivity - transparency),
      scale(reflectColor, reflectivity),
    ),
    scale(refractColor, transparency),
  )
}
