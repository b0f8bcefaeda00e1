import { LIMITS, REGEX_CACHE } from './constants'
import { createError } from './errors'
import { needsQuoting } from './validators/sql-validators'
import { isEmptyString } from './validators/type-guards'

function containsControlChars(s: string): boolean {
  for (let i = 0; i < s.length; i++) {
    const code = s.charCodeAt(i)
    if ((code >= 0 && code <= 31) || code === 127) {
      return true
    }
  }
  return false
}

function quoteRawIdent(id: string): string {
  return `"${id.replace(/"/g, '""')}"`
}

export function assertSafeIdentifier(label: string, id: string): void {
  if (typeof id !== 'string' || isEmptyString(id)) {
    throw createError(`${label} is required and cannot be empty`, {
      field: label,
    })
  }

  if (containsControlChars(id)) {
    throw createError(
      `${label} contains invalid characters: ${JSON.stringify(id)}`,
      { field: label, value: id },
    )
  }

  if (id.length > LIMITS.MAX_IDENTIFIER_LENGTH) {
    throw createError(
      `${label} exceeds ${LIMITS.MAX_IDENTIFIER_LENGTH} characters: ${JSON.stringify(id)}`,
      { field: label, value: id },
    )
  }

  if (!REGEX_CACHE.SAFE_IDENTIFIER.test(id)) {
    throw createError(
      `${label} must be a simple identifier (letters, digits, underscores): ${JSON.stringify(id)}`,
      { field: label, value: id },
    )
  }
}

export function quote(id: string): string {
  if (isEmptyString(id)) {
    throw new Error('quote: identifier is required and cannot be empty')
  }

  if (containsControlChars(id)) {
    throw new Error(
      `quote: identifier contains invalid characters: ${JSON.stringify(id)}`,
    )
  }

  return needsQuoting(id) ? quoteRawIdent(id) : id
}

/**
 * Accepts `table` or `schema.table` and returns it quoted part by part.
 */
export function tableReference(label: string, tableRef: string): string {
  if (typeof tableRef !== 'string' || isEmptyString(tableRef)) {
    throw createError(`${label} is required and cannot be empty`, {
      field: label,
    })
  }

  const parts = tableRef.split('.')
  if (parts.length > 2) {
    throw createError(
      `${label} must be 'table' or 'schema.table' (max 2 parts). Got: ${JSON.stringify(tableRef)}`,
      { field: label, value: tableRef },
    )
  }

  for (const part of parts) {
    assertSafeIdentifier(label, part)
  }

  return parts.map(quote).join('.')
}

export function col(alias: string, column: string): string {
  return `${alias}.${quote(column)}`
}
