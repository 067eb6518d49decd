export function parseVec3(value: unknown): [number, number, number] | null {
  if (typeof value !== "string") return null
  const parts = value.split(",").map(Number)
  if (parts.length !== 3 || parts.some((n) => Number.isNaN(n))) return null
  const [x = 0, y = 0, z = 0] = parts
  return [x, y, z]
}
