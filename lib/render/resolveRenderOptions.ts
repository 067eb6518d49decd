import {
  DEFAULT_RENDER_OPTIONS,
  type RenderOptions,
  type RenderOptionsInput,
} from "./getDefaultRenderOptions"

const pick = <T>(value: T | undefined, fallback: T) =>
  value !== undefined ? value : fallback

export function resolveRenderOptions(
  options: RenderOptionsInput = {},
): RenderOptions {
  return {
    width: pick(options.width, DEFAULT_RENDER_OPTIONS.width),
    height: pick(options.height, DEFAULT_RENDER_OPTIONS.height),
    fov: pick(options.fov, DEFAULT_RENDER_OPTIONS.fov),
    gamma: pick(options.gamma, DEFAULT_RENDER_OPTIONS.gamma),
  }
}
