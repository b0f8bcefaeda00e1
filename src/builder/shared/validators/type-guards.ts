// src/builder/shared/validators/type-guards.ts

/**
 * Type Guards and Checks
 * Pure type checking with no business logic
 */

// ═══════════════════════════════════════════════════════════════
// Basic Type Guards
// ═══════════════════════════════════════════════════════════════

export function isNotNullish<T>(
  value: T | null | undefined,
): value is NonNullable<T> {
  return value !== null && value !== undefined
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0
}

export function isEmptyString(value: unknown): boolean {
  return typeof value === 'string' && value.trim().length === 0
}

export function isNonEmptyArray<T>(value: unknown): value is T[] {
  return Array.isArray(value) && value.length > 0
}

export function isPlainObject(val: unknown): val is Record<string, unknown> {
  if (!isNotNullish(val)) return false
  if (Array.isArray(val)) return false
  if (typeof val !== 'object') return false
  return Object.prototype.toString.call(val) === '[object Object]'
}

// ═══════════════════════════════════════════════════════════════
// Domain Checks
// ═══════════════════════════════════════════════════════════════

export function isParentId(value: unknown): value is string | number {
  if (typeof value === 'string') return value.length > 0
  return typeof value === 'number' && Number.isFinite(value)
}
