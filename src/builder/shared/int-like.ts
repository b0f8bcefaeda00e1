import { createError } from './errors'
import { REGEX_CACHE } from './constants'
import { isNotNullish } from './validators/type-guards'

type NormalizeIntLikeOptions = {
  min?: number
  max?: number
}

export function normalizeIntLike(
  name: string,
  v: unknown,
  opts: NormalizeIntLikeOptions = {},
): number | undefined {
  if (!isNotNullish(v)) return undefined

  if (typeof v !== 'number' || !Number.isFinite(v) || !Number.isInteger(v)) {
    throw createError(`${name} must be an integer`, { field: name, value: v })
  }

  const min = opts.min ?? 0
  if (v < min) {
    throw createError(`${name} must be >= ${min}`, { field: name, value: v })
  }

  if (typeof opts.max === 'number' && v > opts.max) {
    throw createError(`${name} must be <= ${opts.max}`, {
      field: name,
      value: v,
    })
  }

  return v
}

/**
 * Parses a non-negative count as drivers return it: number, bigint, or a
 * digit string (postgres bigint).
 */
export function parseCount(v: unknown): number | undefined {
  if (typeof v === 'bigint') {
    if (v < 0n || v > BigInt(Number.MAX_SAFE_INTEGER)) return undefined
    return Number(v)
  }

  if (typeof v === 'string') {
    if (!REGEX_CACHE.DIGITS.test(v)) return undefined
    const n = parseInt(v, 10)
    return Number.isSafeInteger(n) ? n : undefined
  }

  if (typeof v === 'number' && Number.isSafeInteger(v) && v >= 0) return v

  return undefined
}
