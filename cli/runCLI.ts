#!/usr/bin/env node
import { DEFAULT_RENDER_OPTIONS } from "../lib/render/getDefaultRenderOptions"
import { isMainModule } from "./isMainModule"
import { parseCliArgs, readNumberArg } from "./parseCliArgs"
import { parseVec3 } from "./parseVec3"
import { renderSceneFileToPNGFile } from "./renderSceneFileToPNGFile"
import type { RenderSceneFileOptions } from "./renderSceneFileToPNGBuffer"

export const USAGE =
  "Usage: rayblock scene.json [--out out.png] [--w 800] [--h 600] [--fov 60] [--gamma] [--cam x,y,z] [--look x,y,z] [--yaw deg] [--pitch deg] [--zoom d]"

const BOOLEAN_FLAGS = ["gamma"] as const

export function cliArgsToOptions(args: string[]): {
  scenePath: string | null
  outPath: string
  options: RenderSceneFileOptions
} {
  const argv = parseCliArgs(args, BOOLEAN_FLAGS)
  return {
    scenePath: argv._[0] ?? null,
    outPath: typeof argv.out === "string" ? argv.out : "out.png",
    options: {
      width: Math.trunc(readNumberArg(argv, "w", DEFAULT_RENDER_OPTIONS.width)),
      height: Math.trunc(
        readNumberArg(argv, "h", DEFAULT_RENDER_OPTIONS.height),
      ),
      fov: readNumberArg(argv, "fov", DEFAULT_RENDER_OPTIONS.fov),
      gamma: argv.gamma ? true : DEFAULT_RENDER_OPTIONS.gamma,
      camPos: parseVec3(argv.cam),
      lookAt: parseVec3(argv.look),
      yaw: readNumberArg(argv, "yaw", 0),
      pitch: readNumberArg(argv, "pitch", 0),
      zoom: readNumberArg(argv, "zoom", 0),
    },
  }
}

export async function runCLI() {
  const { scenePath, outPath, options } = cliArgsToOptions(
    process.argv.slice(2),
  )
  if (!scenePath) {
    console.error(USAGE)
    process.exit(1)
  }

  await renderSceneFileToPNGFile(scenePath, outPath, options)
  console.log(`Wrote ${outPath} (${options.width}x${options.height})`)
}

if (isMainModule(import.meta)) {
  runCLI().catch((err) => {
    console.error(err)
    process.exit(1)
  })
}
