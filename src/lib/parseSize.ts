/**
 * Parse human-readable device sizes to bytes.
 *
 * Supports raw bytes ("1024") and binary units with an optional decimal part:
 * K/KB/KiB, M/MB/MiB, G/GB/GiB, T/TB/TiB. Case-insensitive, spaces optional.
 *
 * @example
 *   parseSize("32GB")  // Either.right(34359738368)
 *   parseSize("1.5G")  // Either.right(1610612736)
 *   parseSize("big")   // Either.left(InvalidSizeFormat)
 */

import { Data, Either } from "effect"

export class InvalidSizeFormat extends Data.TaggedError("InvalidSizeFormat")<{
  readonly input: string
  readonly reason: string
}> {}

const KIB = 1024
const MIB = KIB * 1024
const GIB = MIB * 1024
const TIB = GIB * 1024

const UNITS: Record<string, number> = {
  b: 1,
  k: KIB,
  kb: KIB,
  kib: KIB,
  m: MIB,
  mb: MIB,
  mib: MIB,
  g: GIB,
  gb: GIB,
  gib: GIB,
  t: TIB,
  tb: TIB,
  tib: TIB,
}

export const parseSize = (input: string): Either.Either<number, InvalidSizeFormat> => {
  const trimmed = input.trim().toLowerCase()

  if (/^\d+$/.test(trimmed)) {
    return Either.right(parseInt(trimmed, 10))
  }

  const match = trimmed.match(/^(\d+(?:\.\d+)?)\s*([a-z]+)$/)
  const amount = match?.[1]
  const unit = match?.[2]
  if (amount === undefined || unit === undefined) {
    return Either.left(
      new InvalidSizeFormat({ input, reason: "use formats like 512MB, 32GB, 1.5TB" })
    )
  }

  const multiplier = UNITS[unit]
  if (multiplier === undefined) {
    return Either.left(new InvalidSizeFormat({ input, reason: `unknown unit "${unit}"` }))
  }

  return Either.right(Math.floor(parseFloat(amount) * multiplier))
}

const SIZE_STEPS = [
  { limit: MIB, divisor: KIB, unit: "KB", digits: 1 },
  { limit: GIB, divisor: MIB, unit: "MB", digits: 1 },
  { limit: TIB, divisor: GIB, unit: "GB", digits: 2 },
] as const

/**
 * Format bytes as human-readable string.
 */
export const formatSize = (bytes: number): string => {
  if (bytes < KIB) return `${Math.round(bytes)} B`
  const step = SIZE_STEPS.find((s) => bytes < s.limit)
  if (step) return `${(bytes / step.divisor).toFixed(step.digits)} ${step.unit}`
  return `${(bytes / TIB).toFixed(2)} TB`
}
