export {
  type Vector3,
  type ReadonlyVector3,
  vector3,
} from "./math/vector3"

export type {
  Albedo,
  Cube,
  Intersect,
  Light,
  Material,
  Primitive,
  Scene,
  Sphere,
} from "./scene/types"
export type {
  CameraDescription,
  ColorInput,
  LightDescription,
  MaterialDescription,
  ObjectDescription,
  SceneDescription,
  Vec3Tuple,
} from "./scene/description"
export {
  createMaterial,
  DEFAULT_MATERIAL,
  type MaterialInput,
} from "./scene/createMaterial"
export {
  createSceneFromDescription,
  type CreateSceneOptions,
} from "./scene/createSceneFromDescription"
export { computeSceneAABB } from "./scene/computeSceneAABB"

export {
  findNearestIntersect,
  rayIntersect,
} from "./primitives/rayIntersect"
export { getSphereUV, intersectSphere } from "./primitives/intersectSphere"
export { getCubeUV, intersectCube } from "./primitives/intersectCube"

export { castRay, type TraceContext } from "./shading/castRay"
export { castShadow } from "./shading/castShadow"
export { offsetOrigin } from "./shading/offsetOrigin"
export { reflect } from "./shading/reflect"
export { refract } from "./shading/refract"
export { perturbNormal, shadingNormal } from "./shading/shadingNormal"
export { proceduralSky, skyboxColor } from "./shading/skyboxColor"
export { MAX_RAY_DEPTH, ORIGIN_BIAS } from "./shading/constants"

export type { TextureInfo, TextureLookup } from "./texture/TextureLookup"
export { TextureManager } from "./texture/TextureManager"

export {
  isDegenerateView,
  MIN_CAMERA_DISTANCE,
  OrbitCamera,
  PITCH_LIMIT,
} from "./camera/OrbitCamera"
export { buildCamera, primaryRayDirection } from "./camera/buildCamera"

export { Framebuffer } from "./render/Framebuffer"
export {
  renderPixel,
  renderScene,
  type RenderResult,
} from "./render/renderScene"
export { renderSceneToPNGBuffer } from "./render/renderSceneToPNGBuffer"
export { resolveRenderOptions } from "./render/resolveRenderOptions"
export {
  DEFAULT_RENDER_OPTIONS,
  getDefaultRenderOptions,
  hexToRgb,
} from "./render/getDefaultRenderOptions"
export type {
  RenderOptions,
  RenderOptionsInput,
} from "./render/getDefaultRenderOptions"

export { createUint8Bitmap } from "./image/createUint8Bitmap"
export type { BitmapLike, ImageFactory } from "./image/createUint8Bitmap"
export { pureImageFactory } from "./image/pureImageFactory"
export { encodePNGToBuffer } from "./image/encodePNGToBuffer"
export {
  bufferFromDataURI,
  decodeImage,
  isDataURI,
  mimeTypeFromName,
  sniffMimeType,
  type ImageMimeType,
} from "./image/decodeImage"
