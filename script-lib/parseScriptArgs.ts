import type { Coordinate } from "../lib/types"

/** Reads `--name=value` flags; the last occurrence wins. */
export const getFlagValue = (
  args: string[],
  name: string,
): string | undefined => {
  const prefix = `--${name}=`
  const match = args.filter((a) => a.startsWith(prefix)).pop()
  return match?.slice(prefix.length)
}

export const getIntegerFlag = (
  args: string[],
  name: string,
  fallback: number,
): number => {
  const raw = getFlagValue(args, name)
  if (raw === undefined) return fallback
  const value = Number.parseInt(raw, 10)
  if (!Number.isFinite(value)) {
    throw new Error(`--${name} must be an integer, got "${raw}"`)
  }
  return value
}

/** Parses "x,y". */
export const getCoordinateFlag = (
  args: string[],
  name: string,
  fallback: Coordinate,
): Coordinate => {
  const raw = getFlagValue(args, name)
  if (raw === undefined) return fallback
  const parts = raw.split(",").map((part) => Number.parseInt(part.trim(), 10))
  if (parts.length !== 2 || parts.some((n) => !Number.isFinite(n))) {
    throw new Error(`--${name} must look like "x,y", got "${raw}"`)
  }
  return { x: parts[0], y: parts[1] }
}
