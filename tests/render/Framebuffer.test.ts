import { describe, expect, it } from "vitest"
import { Framebuffer } from "../../lib/render/Framebuffer"
import {
  DEFAULT_RENDER_OPTIONS,
  getDefaultRenderOptions,
  hexToRgb,
} from "../../lib/render/getDefaultRenderOptions"
import { resolveRenderOptions } from "../../lib/render/resolveRenderOptions"

describe("Framebuffer", () => {
  it("clears to the given color", () => {
    const fb = new Framebuffer(2, 1)
    fb.clear([1, 2, 3, 4])
    expect([...fb.buffer]).toEqual([1, 2, 3, 4, 1, 2, 3, 4])
  })

  it("clamps colors and writes opaque bytes", () => {
    const fb = new Framebuffer(1, 1)
    fb.setPixelColor(0, 0, [1.5, -0.2, 0.5])
    expect([...fb.buffer]).toEqual([255, 0, 127, 255])
  })

  it("ignores writes outside the image", () => {
    const fb = new Framebuffer(1, 1)
    fb.setPixel(1, 0, 9, 9, 9, 9)
    fb.setPixel(0, -1, 9, 9, 9, 9)
    expect([...fb.buffer]).toEqual([0, 0, 0, 0])
  })

  it("uses the image factory it is given", () => {
    const fb = new Framebuffer(3, 2, (width, height) => ({
      width,
      height,
      data: new Uint8Array(width * height * 4),
    }))
    expect(fb.bitmap.data).toBeInstanceOf(Uint8Array)
    expect(fb.bitmap.width).toBe(3)
  })
})

describe("render options", () => {
  it("defaults to 800x600, 60 degrees, linear output", () => {
    expect(getDefaultRenderOptions()).toEqual({
      width: 800,
      height: 600,
      fov: 60,
      gamma: false,
    })
  })

  it("hands out copies of the defaults", () => {
    const options = getDefaultRenderOptions()
    options.width = 1
    expect(DEFAULT_RENDER_OPTIONS.width).toBe(800)
  })

  it("merges partial input over the defaults", () => {
    expect(resolveRenderOptions({ width: 320, gamma: true })).toEqual({
      width: 320,
      height: 600,
      fov: 60,
      gamma: true,
    })
  })

  it("ignores keys explicitly set to undefined", () => {
    expect(resolveRenderOptions({ fov: undefined }).fov).toBe(60)
  })
})

describe("hexToRgb", () => {
  it("parses with or without the hash", () => {
    expect(hexToRgb("#ff0000")).toEqual([1, 0, 0])
    expect(hexToRgb("00ff00")).toEqual([0, 1, 0])
  })

  it("returns null for malformed input", () => {
    expect(hexToRgb("#fff")).toBeNull()
    expect(hexToRgb("#gg0000")).toBeNull()
  })
})
