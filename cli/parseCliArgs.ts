export type ParsedArgs = {
  _: string[]
  [key: string]: string | boolean | string[]
}

/**
 * `--key value` pairs, bare `--flag` switches and positionals. Only a
 * token starting with "--" ends a key, so `--pitch -20` keeps its value.
 * Keys listed in `booleanFlags` never take a value.
 */
export function parseCliArgs(
  args: string[],
  booleanFlags: readonly string[] = [],
): ParsedArgs {
  const out: ParsedArgs = { _: [] }
  for (let i = 0; i < args.length; i++) {
    const tok = args[i]
    if (tok === undefined) continue
    if (tok.startsWith("--")) {
      const key = tok.slice(2)
      const next = args[i + 1]
      if (
        !booleanFlags.includes(key) &&
        next !== undefined &&
        !next.startsWith("--")
      ) {
        out[key] = next
        i++
      } else {
        out[key] = true
      }
    } else {
      out._.push(tok)
    }
  }
  return out
}

export function readNumberArg(
  argv: ParsedArgs,
  key: string,
  fallback: number,
): number {
  const raw = argv[key]
  if (typeof raw !== "string") return fallback
  const value = Number.parseFloat(raw)
  if (Number.isNaN(value)) throw new Error(`--${key}: expected a number, got "${raw}"`)
  return value
}
